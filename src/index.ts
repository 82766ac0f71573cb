#!/usr/bin/env node
import fs from 'fs/promises';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import config from './utils/config.js';
import logger from './utils/logger.js';
import { createPhotoLoader } from './loader/photoLoader.js';
import { PhotoLoaderMCPCore } from './mcp/core.js';

async function checkCredentials(): Promise<void> {
  try {
    await fs.access(config.credentials.path);
    logger.info(`Using credentials from ${config.credentials.path}`);
  } catch {
    logger.warn('=================================================================');
    logger.warn(`No credential file found at ${config.credentials.path}.`);
    logger.warn('Tool calls will fail with an AUTH error until one is provided.');
    logger.warn('Run the OAuth consent flow once and save the resulting');
    logger.warn('{ access_token, expires_at, refresh_token } record there.');
    logger.warn('=================================================================');
  }
}

async function main(): Promise<void> {
  await checkCredentials();

  const core = new PhotoLoaderMCPCore(config.mcp, createPhotoLoader());
  const transport = new StdioServerTransport();
  await core.getServer().connect(transport);
  logger.info(`${config.mcp.name} connected via STDIO`);
}

// Error handling
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.message}`);
  logger.error(error.stack || '');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${String(reason)}`);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`Failed to start server: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
