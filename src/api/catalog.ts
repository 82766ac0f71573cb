import config from '../utils/config.js';
import logger from '../utils/logger.js';
import { PageCache, PageCacheKey } from './cache/pageCache.js';
import { buildSearchFilter } from './search/contentCategories.js';
import { Transport } from './transport.js';
import { UnsupportedOperationError, UpstreamError, ValidationError } from './errors.js';
import {
  AlbumRef,
  AlbumsListResponse,
  BASE_URL_VALIDITY_MS,
  CalendarDate,
  MediaItemRef,
  MediaItemsSearchRequest,
  MediaItemsSearchResponse,
  SearchFilter,
  isImageItem,
  toAlbumRef,
  toMediaItemRef,
} from './types.js';

/** Largest page the mediaItems:search endpoint accepts */
export const MAX_MEDIA_PAGE_SIZE = 100;

/** Statuses that mean the search capability itself is unavailable */
const SEARCH_UNAVAILABLE_STATUSES = new Set([403, 404, 501]);

/** Cached media pages must be dropped well before their baseUrls stop working */
const MEDIA_PAGE_TTL_CEILING_MS = BASE_URL_VALIDITY_MS - 5 * 60 * 1000;

export interface ListMediaOptions {
  albumId?: string;
  query?: string;
  /** Search only: labels of content categories to leave out */
  excludeCategories?: readonly string[];
  /** Search only: restrict results to one calendar date */
  date?: CalendarDate;
  /** Leading items of the listing to skip (default: 0) */
  startFrom?: number;
  /** Upper bound on returned items; pagination stops once it is reached */
  maxCount: number;
}

/**
 * Items of one listing call and how its pages were obtained.
 */
export interface CatalogListing<T> {
  items: T[];
  /** Leading items dropped by `startFrom` */
  skipped: number;
  pageCacheHits: number;
  networkFetches: number;
}

export interface CatalogEngineOptions {
  transport: Transport;
  /** Cache TTL for listing pages (default: config.cache.pageTtlMs) */
  pageTtlMs?: number;
  albumPageSize?: number;
  mediaPageSize?: number;
  /** Pre-built media page cache; its own TTL applies */
  mediaPages?: PageCache<MediaItemRef>;
  now?: () => number;
}

interface FetchedPage<T> {
  items: T[];
  nextCursor?: string;
}

/**
 * Lists albums and media items with cursor pagination and a per-page cache.
 */
export class CatalogEngine {
  private readonly transport: Transport;
  private readonly albumPages: PageCache<AlbumRef>;
  private readonly mediaPages: PageCache<MediaItemRef>;
  private readonly albumPageSize: number;
  private readonly mediaPageSize: number;

  constructor(options: CatalogEngineOptions) {
    this.transport = options.transport;
    const ttlMs = options.pageTtlMs ?? config.cache.pageTtlMs;
    if (ttlMs > MEDIA_PAGE_TTL_CEILING_MS) {
      logger.warn(`Page cache TTL ${ttlMs}ms exceeds media URL validity; media pages use ${MEDIA_PAGE_TTL_CEILING_MS}ms`);
    }
    this.albumPages = new PageCache<AlbumRef>({ ttlMs, now: options.now });
    this.mediaPages = options.mediaPages ?? new PageCache<MediaItemRef>({
      ttlMs: Math.min(ttlMs, MEDIA_PAGE_TTL_CEILING_MS),
      now: options.now,
    });
    this.albumPageSize = options.albumPageSize ?? config.loader.albumPageSize;
    this.mediaPageSize = Math.min(options.mediaPageSize ?? config.loader.mediaPageSize, MAX_MEDIA_PAGE_SIZE);
  }

  /**
   * Lists every album in the user's library.
   */
  async listAlbums(): Promise<CatalogListing<AlbumRef>> {
    const key: PageCacheKey = { action: 'albums.list', scopeId: 'library', pageSize: this.albumPageSize };

    const albums = await this.paginate(this.albumPages, key, Number.POSITIVE_INFINITY, async cursor => {
      const response = await this.transport.call<AlbumsListResponse>({
        method: 'GET',
        url: '/albums',
        params: { pageSize: this.albumPageSize, pageToken: cursor },
        context: 'albums.list',
      });
      return {
        items: (response.data.albums ?? []).map(toAlbumRef),
        nextCursor: response.data.nextPageToken,
      };
    });

    logger.info(`Retrieved a total of ${albums.items.length} albums`);
    return albums;
  }

  /**
   * Lists the image items of an album, or of a content-category search.
   *
   * With `startFrom`, `startFrom + maxCount` items are fetched and the leading
   * `startFrom` are dropped.
   *
   * @throws ValidationError unless exactly one of albumId/query is set, or when
   * search filters are combined with an album
   * @throws UnsupportedOperationError when upstream search is unavailable
   */
  async listMedia(options: ListMediaOptions): Promise<CatalogListing<MediaItemRef>> {
    const albumId = options.albumId?.trim();
    const query = options.query?.trim();

    if (albumId && query) {
      throw new ValidationError('Specify either albumId or query, not both');
    }
    if (!albumId && !query) {
      throw new ValidationError('Either albumId or query is required');
    }
    if (!Number.isInteger(options.maxCount) || options.maxCount < 1) {
      throw new ValidationError(`maxCount must be a positive integer (got ${options.maxCount})`);
    }
    const startFrom = options.startFrom ?? 0;
    if (!Number.isInteger(startFrom) || startFrom < 0) {
      throw new ValidationError(`startFrom must be a non-negative integer (got ${startFrom})`);
    }
    if (albumId && (options.excludeCategories?.length || options.date)) {
      throw new ValidationError('Category and date filters apply to search only, not to albums');
    }

    const fetchCount = startFrom + options.maxCount;
    const pageSize = Math.min(this.mediaPageSize, fetchCount);
    let key: PageCacheKey;
    let body: Omit<MediaItemsSearchRequest, 'pageToken'>;
    let filters: SearchFilter | undefined;

    if (albumId) {
      key = { action: 'mediaItems.search:album', scopeId: albumId, pageSize };
      body = { albumId, pageSize };
    } else {
      filters = buildSearchFilter(query ?? '', { exclude: options.excludeCategories, date: options.date });
      // Exclusions and date change the listing, so the key covers the whole filter
      key = { action: 'mediaItems.search:filter', scopeId: JSON.stringify(filters), pageSize };
      body = { pageSize, filters };
    }

    const listing = await this.paginate(this.mediaPages, key, fetchCount, async cursor => {
      try {
        const response = await this.transport.call<MediaItemsSearchResponse>({
          method: 'POST',
          url: '/mediaItems:search',
          data: { ...body, pageToken: cursor },
          context: key.action,
        });
        const mediaItems = response.data.mediaItems ?? [];
        const images = mediaItems.filter(isImageItem);
        if (images.length < mediaItems.length) {
          logger.debug(`Skipped ${mediaItems.length - images.length} non-image items`);
        }
        return { items: images.map(toMediaItemRef), nextCursor: response.data.nextPageToken };
      } catch (error) {
        if (filters && error instanceof UpstreamError && SEARCH_UNAVAILABLE_STATUSES.has(error.status)) {
          throw new UnsupportedOperationError(
            `Library search is not available for this account (status ${error.status}). ` +
            'Since March 31, 2025 the Library API only exposes app-created content.'
          );
        }
        throw error;
      }
    });

    const items = listing.items.slice(startFrom);
    const skipped = listing.items.length - items.length;
    logger.info(
      `Retrieved a total of ${items.length} media items for ${key.action} ${albumId ?? query}` +
      (skipped > 0 ? ` (skipped first ${skipped})` : '')
    );
    return { ...listing, items, skipped };
  }

  /**
   * Follows cursors until the listing ends or `limit` items are collected.
   * Each page is served from cache when fresh; only missing pages hit the network.
   * Expired pages of every listing in `cache` are dropped first.
   */
  private async paginate<T>(
    cache: PageCache<T>,
    key: PageCacheKey,
    limit: number,
    fetchPage: (cursor: string | undefined) => Promise<FetchedPage<T>>,
  ): Promise<CatalogListing<T>> {
    cache.prune();

    const collected: T[] = [];
    let pageCacheHits = 0;
    let networkFetches = 0;
    const seenCursors = new Set<string>();
    let cursor = '';

    do {
      seenCursors.add(cursor);
      let page = cache.get(key, cursor);

      if (page) {
        pageCacheHits++;
        logger.debug(`Cache hit for ${key.action} ${key.scopeId} page "${cursor}"`);
      } else {
        const fetched = await fetchPage(cursor || undefined);
        networkFetches++;
        page = cache.set(key, cursor, fetched.items, fetched.nextCursor);
        logger.debug(`Retrieved ${fetched.items.length} items in this batch (${cache.size} pages cached)`);
      }

      collected.push(...page.items);
      cursor = page.nextCursor ?? '';

      if (cursor && seenCursors.has(cursor)) {
        logger.warn(`Upstream repeated page token for ${key.action}; stopping pagination`);
        break;
      }
    } while (cursor && collected.length < limit);

    return { items: collected.slice(0, limit), skipped: 0, pageCacheHits, networkFetches };
  }
}
