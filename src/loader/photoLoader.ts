import config from '../utils/config.js';
import logger from '../utils/logger.js';
import { validateArgs } from '../utils/validation.js';
import { runPool } from '../utils/workerPool.js';
import { CatalogEngine } from '../api/catalog.js';
import { Transport } from '../api/transport.js';
import { createTokenRefresher } from '../api/oauth.js';
import { DecodeError, UpstreamError, describeError } from '../api/errors.js';
import type { AlbumRef, MediaItemRef } from '../api/types.js';
import { CredentialManager } from '../auth/credentialManager.js';
import { FileCredentialStore } from '../auth/credentials.js';
import { ImageCache } from '../image/imageCache.js';
import { ImageTensor, TransformSpec, sizedUrl, transform, transformKey } from '../image/transform.js';
import { order } from '../ordering/order.js';
import { PhotoLoaderRequest, photoLoaderRequestSchema } from '../schemas/requestSchemas.js';
import { PhotoLoaderResponse, ResultEntry, assembleResponse } from './assembler.js';

export interface PhotoLoaderOptions {
  catalog: CatalogEngine;
  transport: Transport;
  imageCache?: ImageCache;
  concurrency?: number;
  /** Wall-clock budget for the image fan-out of one request */
  batchDeadlineMs?: number;
  now?: () => number;
}

interface LoadedImage {
  image: ImageTensor;
  fromCache: boolean;
}

interface ImageBatch {
  entries: ResultEntry[];
  imageCacheHits: number;
  imageDownloads: number;
  error?: unknown;
}

/**
 * Errors confined to one item's bytes. Anything else stops the batch.
 */
function isItemError(error: unknown): boolean {
  if (error instanceof DecodeError) {
    return true;
  }
  return error instanceof UpstreamError && error.status >= 400 && error.status < 500;
}

function describeScope(request: PhotoLoaderRequest): string | undefined {
  if (request.albumId) {
    return `album ${request.albumId}`;
  }
  if (request.query) {
    return `query "${request.query}"`;
  }
  return undefined;
}

/**
 * Request boundary: validate, list, order, load and assemble.
 */
export class PhotoLoader {
  private readonly catalog: CatalogEngine;
  private readonly transport: Transport;
  private readonly imageCache: ImageCache;
  private readonly concurrency: number;
  private readonly batchDeadlineMs: number;
  private readonly now: () => number;

  constructor(options: PhotoLoaderOptions) {
    this.catalog = options.catalog;
    this.transport = options.transport;
    this.imageCache = options.imageCache ?? new ImageCache();
    this.concurrency = options.concurrency ?? config.loader.concurrency;
    this.batchDeadlineMs = options.batchDeadlineMs ?? config.loader.batchDeadlineMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Handles one host request. Never throws: failures are reported in the
   * response's `error` and `statusText`, alongside any partial results.
   */
  async handleRequest(input: unknown): Promise<PhotoLoaderResponse> {
    const startedAt = this.now();

    let request: PhotoLoaderRequest | undefined;
    let albums: AlbumRef[] | undefined;
    let itemsFound = 0;
    let skipped = 0;
    let pageCacheHits = 0;
    let networkFetches = 0;
    let imageCacheCleared = false;
    let batch: ImageBatch = { entries: [], imageCacheHits: 0, imageDownloads: 0 };
    let error: unknown;

    try {
      request = validateArgs(input, photoLoaderRequestSchema);
      logger.info(`Handling ${request.action} request`);

      if (request.action === 'list_albums') {
        const listing = await this.catalog.listAlbums();
        ({ pageCacheHits, networkFetches } = listing);
        albums = listing.items;
      } else {
        const listing = await this.catalog.listMedia({
          albumId: request.albumId,
          query: request.query,
          excludeCategories: request.excludeCategories,
          date: request.date,
          startFrom: request.startFrom,
          maxCount: request.maxCount,
        });
        ({ pageCacheHits, networkFetches, skipped } = listing);
        itemsFound = listing.items.length;
        const selected = order(listing.items, request.sort, request.maxCount, request.seed);
        if (request.clearImageCache) {
          this.imageCache.clear();
          imageCacheCleared = true;
        }
        batch = await this.loadImages(selected, request.sizeSpec);
        error = batch.error;
      }
    } catch (caught) {
      error = caught;
    }

    if (error !== undefined) {
      logger.error(`Request failed: ${describeError(error)}`);
    }

    return assembleResponse({
      action: request?.action ?? 'invalid_request',
      scope: request ? describeScope(request) : undefined,
      albums,
      itemsFound,
      skipped,
      entries: batch.entries,
      pageCacheHits,
      networkFetches,
      imageCacheHits: batch.imageCacheHits,
      imageDownloads: batch.imageDownloads,
      elapsedMs: this.now() - startedAt,
      imageCacheCleared,
      quota: request ? this.transport.quotaUsage() : undefined,
      error,
    });
  }

  private async loadImages(items: readonly MediaItemRef[], spec: TransformSpec): Promise<ImageBatch> {
    const key = transformKey(spec);
    let imageDownloads = 0;
    let batchError: unknown;

    const outcomes = await runPool(
      items,
      async (item): Promise<LoadedImage> => {
        const cacheKey = ImageCache.key(item.id, key);
        const cached = this.imageCache.get(cacheKey);
        if (cached) {
          return { image: cached, fromCache: true };
        }

        const response = await this.transport.call<Buffer | ArrayBuffer>({
          method: 'GET',
          url: sizedUrl(item, spec),
          responseType: 'arraybuffer',
          authenticated: false,
          context: 'media.download',
        });
        imageDownloads++;

        const bytes = Buffer.isBuffer(response.data) ? response.data : Buffer.from(response.data);
        const image = await transform(bytes, spec);
        this.imageCache.set(cacheKey, image);
        return { image, fromCache: false };
      },
      {
        concurrency: this.concurrency,
        deadline: this.now() + this.batchDeadlineMs,
        shouldAbort: reason => {
          if (isItemError(reason)) {
            return false;
          }
          batchError ??= reason;
          return true;
        },
        now: this.now,
      },
    );

    const entries = outcomes.map((outcome, index): ResultEntry => {
      const item = items[index];
      switch (outcome.status) {
        case 'fulfilled':
          return { item, image: outcome.value.image, fromCache: outcome.value.fromCache };
        case 'rejected':
          logger.warn(`Failed to load ${item.filename}: ${describeError(outcome.reason)}`);
          return { item, error: describeError(outcome.reason), fromCache: false };
        case 'skipped':
          return {
            item,
            error: outcome.reason === 'deadline' ? 'Not started: batch deadline exceeded' : 'Not started: batch aborted',
            fromCache: false,
          };
      }
    });

    const imageCacheHits = entries.filter(entry => entry.fromCache).length;
    const cacheStats = this.imageCache.getStats();
    logger.info(`Loaded ${entries.filter(entry => entry.image).length}/${items.length} images`);
    logger.debug(`Image cache holds ${cacheStats.entries} images (${cacheStats.bytes}/${cacheStats.maxBytes} bytes)`);
    return { entries, imageCacheHits, imageDownloads, error: batchError };
  }
}

/**
 * Wires a loader from configuration: file credential store, OAuth refresher,
 * transport, catalog and image cache.
 */
export function createPhotoLoader(): PhotoLoader {
  const tokens = new CredentialManager({
    store: new FileCredentialStore(),
    refresher: createTokenRefresher(),
  });
  const transport = new Transport({ tokens });
  const catalog = new CatalogEngine({ transport });
  return new PhotoLoader({ catalog, transport, imageCache: new ImageCache() });
}
