import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { ValidationError } from '../api/errors.js';
import { encodePng } from '../image/transform.js';
import type { PhotoLoader } from '../loader/photoLoader.js';
import type { PhotoLoaderResponse } from '../loader/assembler.js';
import logger from '../utils/logger.js';

/**
 * MCP tool result content
 */
export type ToolContent =
  | { type: 'text'; text: string }
  | { type: 'image'; data: string; mimeType: string };

export type ToolResult = {
  content: ToolContent[];
  isError?: boolean;
};

const sizeSpecSchema = {
  type: 'object',
  description: 'Sizing applied to each image (default: original)',
  properties: {
    mode: {
      type: 'string',
      enum: ['original', 'fixed_size', 'scale_to_size', 'fill_to_size'],
    },
    width: { type: 'number', description: 'Target width for fixed_size and fill_to_size' },
    height: { type: 'number', description: 'Target height for fixed_size and fill_to_size' },
    size: { type: 'number', description: 'Long edge for scale_to_size' },
    crop: { type: 'boolean', description: 'fixed_size only: fill the box and centre-crop' },
  },
  required: ['mode'],
};

const sortSchema = {
  type: 'object',
  properties: {
    criteria: { type: 'string', enum: ['creation_time', 'filename'], default: 'creation_time' },
    direction: { type: 'string', enum: ['asc', 'desc', 'random'], default: 'desc' },
  },
};

const loadProperties = {
  maxCount: {
    type: 'number',
    description: 'Number of images to return (default: 10, max: 100)',
    default: 10,
  },
  sizeSpec: sizeSpecSchema,
  sort: sortSchema,
  seed: {
    type: 'number',
    description: 'Makes random ordering repeatable',
  },
  startFrom: {
    type: 'number',
    description: 'Number of leading items to skip (default: 0)',
    default: 0,
  },
  clearImageCache: {
    type: 'boolean',
    description: 'Empty the image cache before loading',
    default: false,
  },
};

const searchFilterProperties = {
  excludeCategories: {
    type: 'array',
    items: { type: 'string' },
    description: 'Content categories to leave out, e.g. ["screenshots"]',
  },
  date: {
    type: 'object',
    description: 'Only photos taken on this date; omitted fields match any value',
    properties: {
      year: { type: 'number' },
      month: { type: 'number' },
      day: { type: 'number' },
    },
  },
};

/**
 * MCP server exposing the photo loader as tools.
 * Each tool call is one `handleRequest` invocation.
 */
export class PhotoLoaderMCPCore {
  protected server: Server;
  private readonly loader: PhotoLoader;

  constructor(serverInfo: { name: string; version: string }, loader: PhotoLoader) {
    this.loader = loader;
    this.server = new Server(serverInfo, {
      capabilities: {
        tools: {},
      },
    });

    this.registerHandlers();
  }

  protected registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, this.handleListTools.bind(this));
    this.server.setRequestHandler(CallToolRequestSchema, this.handleCallTool.bind(this));
  }

  protected async handleListTools() {
    return {
      tools: [
        {
          name: 'list_albums',
          description: 'List all albums in the Google Photos library',
          inputSchema: {
            type: 'object' as const,
            properties: {},
          },
        },
        {
          name: 'load_album',
          description: 'Load, order and resize the images of one album',
          inputSchema: {
            type: 'object' as const,
            properties: {
              albumId: {
                type: 'string',
                description: 'ID of the album (see list_albums)',
              },
              ...loadProperties,
            },
            required: ['albumId'],
          },
        },
        {
          name: 'search_photos',
          description: 'Load images matching a content category such as "pets" or "landscapes"',
          inputSchema: {
            type: 'object' as const,
            properties: {
              query: {
                type: 'string',
                description: 'Content category to search for',
              },
              ...searchFilterProperties,
              ...loadProperties,
            },
            required: ['query'],
          },
        },
      ],
    };
  }

  protected async handleCallTool(request: CallToolRequest): Promise<ToolResult> {
    return this.callTool(request.params.name, request.params.arguments ?? {});
  }

  /**
   * Runs one tool against the loader.
   *
   * @throws McpError for unknown tools and invalid arguments
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    logger.info(`Handling tool request: ${name}`);

    let response: PhotoLoaderResponse;
    switch (name) {
      case 'list_albums':
        response = await this.loader.handleRequest({ action: 'list_albums' });
        break;
      case 'load_album':
        response = await this.loader.handleRequest({ ...args, action: 'load_album' });
        break;
      case 'search_photos':
        response = await this.loader.handleRequest({ ...args, action: 'search' });
        break;
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    if (response.error instanceof ValidationError) {
      throw new McpError(ErrorCode.InvalidParams, response.error.message);
    }

    const content: ToolContent[] = [{ type: 'text', text: response.statusText }];
    for (const image of response.images) {
      const png = await encodePng(image);
      content.push({ type: 'image', data: png.toString('base64'), mimeType: 'image/png' });
    }

    return response.error ? { content, isError: true } : { content };
  }

  getServer(): Server {
    return this.server;
  }
}
