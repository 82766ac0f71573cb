import { PhotoLoaderError, describeError } from '../api/errors.js';
import type { AlbumRef, MediaItemRef } from '../api/types.js';
import type { ImageTensor } from '../image/transform.js';
import type { QuotaUsage } from '../utils/quotaManager.js';

/**
 * One selected media item and what became of it.
 */
export interface ResultEntry {
  item: MediaItemRef;
  image?: ImageTensor;
  /** Set when this item failed; the rest of the batch is unaffected */
  error?: string;
  fromCache: boolean;
}

export interface PhotoLoaderResponse {
  /** Successfully loaded images, in requested order */
  images: ImageTensor[];
  /** Every selected item, including failures, in requested order */
  results: ResultEntry[];
  albums: AlbumRef[];
  statusText: string;
  /** Batch-level failure; partial results above are still valid */
  error?: Error;
}

export interface BatchSummary {
  action: string;
  /** Album id or search query */
  scope?: string;
  albums?: AlbumRef[];
  itemsFound: number;
  /** Leading items dropped by `startFrom` */
  skipped?: number;
  entries: ResultEntry[];
  pageCacheHits: number;
  networkFetches: number;
  imageCacheHits: number;
  imageDownloads: number;
  elapsedMs: number;
  imageCacheCleared?: boolean;
  quota?: QuotaUsage;
  error?: unknown;
}

/**
 * `[ 0001 | <id> | count: <n> | "<title>" ]`, one line per album.
 */
export function formatAlbumList(albums: readonly AlbumRef[]): string {
  return albums
    .map((album, idx) => {
      const index = String(idx + 1).padStart(4, '0');
      return `[ ${index} | ${album.id} | count: ${album.mediaCount} | "${album.title}" ]`;
    })
    .join('\n');
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Builds the final response and its human-readable status report.
 */
export function assembleResponse(summary: BatchSummary): PhotoLoaderResponse {
  const succeeded = summary.entries.filter(entry => entry.image !== undefined);
  const failed = summary.entries.filter(entry => entry.image === undefined);

  const lines: string[] = [
    `Action: ${summary.action}${summary.scope ? ` (${summary.scope})` : ''}`,
  ];

  if (summary.albums) {
    lines.push(`Albums found: ${summary.albums.length}`);
  } else {
    const skipped = summary.skipped ? `, skipped: ${summary.skipped}` : '';
    lines.push(`Items found: ${summary.itemsFound}${skipped}, selected: ${summary.entries.length}`);
    lines.push(`Images: ${succeeded.length} succeeded, ${failed.length} failed`);
  }

  lines.push(`Listing pages: ${summary.pageCacheHits} from cache, ${summary.networkFetches} from network`);
  if (!summary.albums) {
    if (summary.imageCacheCleared) {
      lines.push('Image cache cleared before loading');
    }
    lines.push(`Images: ${summary.imageCacheHits} from cache, ${summary.imageDownloads} downloaded`);
  }
  if (summary.quota) {
    const { requests, maxRequests, mediaRequests, maxMediaRequests } = summary.quota;
    lines.push(`API quota today: ${requests}/${maxRequests} requests, ${mediaRequests}/${maxMediaRequests} media downloads`);
  }
  lines.push(`Elapsed: ${summary.elapsedMs} ms`);

  if (summary.error !== undefined) {
    const code = summary.error instanceof PhotoLoaderError ? summary.error.code : 'INTERNAL';
    lines.push(`Error [${code}]: ${describeError(summary.error)}`);
  }

  if (failed.length > 0) {
    lines.push('Failed items:');
    for (const entry of failed) {
      lines.push(`  - ${entry.item.filename} (${entry.item.id}): ${entry.error ?? 'unknown error'}`);
    }
  }

  if (summary.albums && summary.albums.length > 0) {
    lines.push(formatAlbumList(summary.albums));
  }

  return {
    images: succeeded.flatMap(entry => (entry.image ? [entry.image] : [])),
    results: summary.entries,
    albums: summary.albums ?? [],
    statusText: lines.join('\n'),
    error: summary.error === undefined ? undefined : toError(summary.error),
  };
}
