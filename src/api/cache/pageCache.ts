import config from '../../utils/config.js';
import logger from '../../utils/logger.js';

/**
 * Identifies one paginated listing. Two listings that differ only in page size
 * are distinct: their page boundaries do not line up.
 */
export interface PageCacheKey {
  action: string;
  scopeId: string;
  pageSize: number;
}

/**
 * One fetched page. A page with a `nextCursor` is not the end of the listing.
 */
export interface CachePage<T> {
  readonly key: PageCacheKey;
  /** Cursor that produced this page; '' for the first page */
  readonly cursor: string;
  readonly items: readonly T[];
  readonly nextCursor?: string;
  readonly fetchedAt: number;
}

export interface PageCacheOptions {
  /** Maximum age of a page before it is refetched (default: config.cache.pageTtlMs) */
  ttlMs?: number;
  now?: () => number;
}

function serializeKey(key: PageCacheKey): string {
  return JSON.stringify([key.action, key.scopeId, key.pageSize]);
}

/**
 * Process-local cache of listing pages, owned by one catalog instance.
 *
 * Pages are stored per key and per cursor so a listing can be served partly
 * from cache and partly from the network. Stored pages are frozen and inserted
 * in a single assignment; readers never observe a partial page.
 */
export class PageCache<T> {
  private readonly entries = new Map<string, Map<string, CachePage<T>>>();
  readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: PageCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? config.cache.pageTtlMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns the fresh page for (key, cursor), dropping it if it has expired.
   */
  get(key: PageCacheKey, cursor: string = ''): CachePage<T> | undefined {
    const pages = this.entries.get(serializeKey(key));
    const page = pages?.get(cursor);
    if (!pages || !page) {
      return undefined;
    }
    if (this.now() - page.fetchedAt >= this.ttlMs) {
      pages.delete(cursor);
      if (pages.size === 0) {
        this.entries.delete(serializeKey(key));
      }
      return undefined;
    }
    return page;
  }

  /**
   * Stores a completed page and returns the stored copy.
   */
  set(key: PageCacheKey, cursor: string, items: readonly T[], nextCursor?: string): CachePage<T> {
    const page: CachePage<T> = Object.freeze({
      key: { ...key },
      cursor,
      items: Object.freeze([...items]),
      nextCursor: nextCursor || undefined,
      fetchedAt: this.now(),
    });

    const serialized = serializeKey(key);
    let pages = this.entries.get(serialized);
    if (!pages) {
      pages = new Map();
      this.entries.set(serialized, pages);
    }
    pages.set(cursor, page);
    return page;
  }

  /**
   * Drops expired pages; returns how many were removed.
   */
  prune(): number {
    let removed = 0;
    const now = this.now();
    for (const [serialized, pages] of this.entries) {
      for (const [cursor, page] of pages) {
        if (now - page.fetchedAt >= this.ttlMs) {
          pages.delete(cursor);
          removed++;
        }
      }
      if (pages.size === 0) {
        this.entries.delete(serialized);
      }
    }
    if (removed > 0) {
      logger.debug(`Pruned ${removed} expired cache pages`);
    }
    return removed;
  }

  /** Number of stored pages, fresh or not */
  get size(): number {
    let total = 0;
    for (const pages of this.entries.values()) {
      total += pages.size;
    }
    return total;
  }
}
