/**
 * Type definitions for the Google Photos Library API and the refs derived from it
 */

/**
 * Response from Google Photos API when listing albums
 */
export interface AlbumsListResponse {
  albums?: Album[];
  nextPageToken?: string;
}

/**
 * Response from Google Photos API when searching media items
 */
export interface MediaItemsSearchResponse {
  mediaItems?: MediaItem[];
  nextPageToken?: string;
}

/**
 * Represents a media item from Google Photos API.
 */
export interface MediaItem {
  id: string;
  filename: string;
  /** MIME type of the media (e.g., 'image/jpeg', 'video/mp4') */
  mimeType?: string;
  description?: string;
  /** URL to access the bytes (time-limited) */
  baseUrl: string;
  productUrl?: string;
  mediaMetadata?: {
    creationTime?: string;
    width?: string;
    height?: string;
    photo?: Record<string, unknown>;
    video?: Record<string, unknown>;
  };
}

/**
 * Represents an album from Google Photos API
 */
export interface Album {
  id: string;
  title?: string;
  productUrl?: string;
  /** Number of items in the album, serialized as a string by the API */
  mediaItemsCount?: string;
  coverPhotoBaseUrl?: string;
}

/**
 * Calendar date for date filters; omitted fields match any value
 */
export interface CalendarDate {
  year?: number;
  month?: number;
  day?: number;
}

/**
 * Search filter for Google Photos API
 */
export interface SearchFilter {
  contentFilter?: {
    includedContentCategories?: string[];
    excludedContentCategories?: string[];
  };
  dateFilter?: {
    dates: CalendarDate[];
  };
  mediaTypeFilter?: {
    mediaTypes?: Array<'ALL_MEDIA' | 'PHOTO' | 'VIDEO'>;
  };
  includeArchivedMedia?: boolean;
}

/**
 * Body of a mediaItems:search request
 */
export interface MediaItemsSearchRequest {
  albumId?: string;
  pageSize: number;
  pageToken?: string;
  filters?: SearchFilter;
}

/**
 * Album as seen by the rest of the loader.
 */
export interface AlbumRef {
  readonly id: string;
  readonly title: string;
  readonly mediaCount: number;
}

/**
 * Media item as seen by the rest of the loader.
 * `baseUrl` is a capability URL that stops working about an hour after it was issued.
 */
export interface MediaItemRef {
  readonly id: string;
  readonly filename: string;
  /** Epoch milliseconds; 0 when the API reported no creation time */
  readonly creationTime: number;
  readonly baseUrl: string;
  readonly mimeType: string;
  readonly width?: number;
  readonly height?: number;
}

/** How long a baseUrl stays usable after it was returned. */
export const BASE_URL_VALIDITY_MS = 60 * 60 * 1000;

export function toAlbumRef(album: Album): AlbumRef {
  const count = parseInt(album.mediaItemsCount ?? '0', 10);
  return {
    id: album.id,
    title: album.title ?? 'Untitled',
    mediaCount: Number.isNaN(count) || count < 0 ? 0 : count,
  };
}

function parseDimension(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? undefined : parsed;
}

export function toMediaItemRef(item: MediaItem): MediaItemRef {
  const created = item.mediaMetadata?.creationTime ? Date.parse(item.mediaMetadata.creationTime) : NaN;
  return {
    id: item.id,
    filename: item.filename,
    creationTime: Number.isNaN(created) ? 0 : created,
    baseUrl: item.baseUrl,
    mimeType: item.mimeType ?? 'application/octet-stream',
    width: parseDimension(item.mediaMetadata?.width),
    height: parseDimension(item.mediaMetadata?.height),
  };
}

/**
 * Only still images go through the transform pipeline; video is not supported.
 */
export function isImageItem(item: MediaItem): boolean {
  if (item.mimeType) {
    return item.mimeType.startsWith('image/');
  }
  return item.mediaMetadata?.video === undefined;
}
