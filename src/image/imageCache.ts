import config from '../utils/config.js';
import logger from '../utils/logger.js';
import type { ImageTensor } from './transform.js';

/**
 * Bounded in-process cache of transformed images, keyed by media item id and
 * transform. Least recently used entries are evicted once the byte budget is
 * exceeded. Nothing is persisted across runs.
 */
export class ImageCache {
  private readonly entries = new Map<string, ImageTensor>();
  private totalBytes = 0;
  private hits = 0;
  private misses = 0;
  readonly maxBytes: number;

  constructor(maxBytes: number = config.cache.imageCacheMaxBytes) {
    this.maxBytes = maxBytes;
  }

  static key(mediaId: string, transformKey: string): string {
    return `${mediaId}:${transformKey}`;
  }

  get(key: string): ImageTensor | undefined {
    const tensor = this.entries.get(key);
    if (!tensor) {
      this.misses++;
      return undefined;
    }
    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, tensor);
    this.hits++;
    return tensor;
  }

  set(key: string, tensor: ImageTensor): void {
    const size = tensor.data.byteLength;
    if (size > this.maxBytes) {
      logger.debug(`Image ${key} (${size} bytes) exceeds the cache budget, not cached`);
      return;
    }

    const existing = this.entries.get(key);
    if (existing) {
      this.totalBytes -= existing.data.byteLength;
      this.entries.delete(key);
    }

    this.entries.set(key, tensor);
    this.totalBytes += size;

    for (const [oldestKey, oldest] of this.entries) {
      if (this.totalBytes <= this.maxBytes) {
        break;
      }
      this.entries.delete(oldestKey);
      this.totalBytes -= oldest.data.byteLength;
      logger.debug(`Evicted ${oldestKey} from image cache`);
    }
  }

  clear(): void {
    this.entries.clear();
    this.totalBytes = 0;
    logger.info('Image cache cleared');
  }

  getStats(): { entries: number; bytes: number; maxBytes: number; hits: number; misses: number } {
    return {
      entries: this.entries.size,
      bytes: this.totalBytes,
      maxBytes: this.maxBytes,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
