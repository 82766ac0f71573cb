import assert from 'node:assert/strict';
import { before, test } from 'node:test';

import { CatalogEngine } from '../src/api/catalog.js';
import { AuthError, UpstreamError, ValidationError } from '../src/api/errors.js';
import { Transport } from '../src/api/transport.js';
import type { MediaItem } from '../src/api/types.js';
import type { Credential } from '../src/auth/credentials.js';
import type { TokenProvider } from '../src/auth/credentialManager.js';
import { ImageCache } from '../src/image/imageCache.js';
import { PhotoLoader, PhotoLoaderOptions } from '../src/loader/photoLoader.js';
import { QuotaManager } from '../src/utils/quotaManager.js';
import {
  FakeTokens,
  StubResponse,
  instantRetry,
  mediaItem,
  pagedMediaResponder,
  solidPng,
  stubAdapter,
} from './helpers/stubApi.js';

const listing: MediaItem[] = Array.from({ length: 10 }, (_, i) => mediaItem(i));
let png: Buffer;

before(async () => {
  png = await solidPng(64, 48);
});

type MediaResponder = (id: string) => StubResponse;

const servePng: MediaResponder = () => ({ status: 200, data: png });

function createLoader(
  media: MediaResponder = servePng,
  options: { tokens?: TokenProvider; library?: MediaItem[] } & Partial<Omit<PhotoLoaderOptions, 'catalog' | 'transport'>> = {}
) {
  const listMedia = pagedMediaResponder(options.library ?? listing);
  const { adapter, requests } = stubAdapter(request => {
    if (request.url === '/mediaItems:search') {
      return listMedia(request);
    }
    if (request.url === '/albums') {
      return { status: 200, data: { albums: [{ id: 'album-1', title: 'Holidays', mediaItemsCount: '10' }] } };
    }
    const match = /item-(\d+)/.exec(request.url);
    return match ? media(`item-${match[1]}`) : { status: 404 };
  });
  const transport = new Transport({
    tokens: options.tokens ?? new FakeTokens(),
    retryPolicy: instantRetry().policy,
    quota: new QuotaManager(1000, 500),
    baseURL: 'https://photos.test/v1',
    adapter,
  });
  const loader = new PhotoLoader({
    catalog: new CatalogEngine({ transport }),
    transport,
    imageCache: options.imageCache ?? new ImageCache(64 * 1024 * 1024),
    concurrency: options.concurrency ?? 4,
    batchDeadlineMs: options.batchDeadlineMs,
    now: options.now,
  });
  const downloads = () => requests.filter(request => request.url.startsWith('https://media.test/'));
  return { loader, requests, downloads };
}

const loadAlbum = {
  action: 'load_album',
  albumId: 'album-1',
  maxCount: 10,
  sort: { criteria: 'creation_time', direction: 'asc' },
};

test('one corrupt image fails alone while the rest of the batch loads', async () => {
  const { loader } = createLoader(id =>
    id === 'item-4' ? { status: 200, data: png.subarray(0, 16) } : { status: 200, data: png }
  );

  const response = await loader.handleRequest(loadAlbum);

  assert.equal(response.error, undefined);
  assert.equal(response.images.length, 9);
  assert.equal(response.results.length, 10);
  assert.deepEqual(response.results.map(entry => entry.item.id), listing.map(item => item.id));
  assert.match(response.results[4].error ?? '', /^Could not decode image \(16 bytes\)/);
  assert.ok(response.results.every((entry, i) => (i === 4) === (entry.image === undefined)));
  assert.ok(response.statusText.split('\n').includes('Images: 9 succeeded, 1 failed'));
});

test('images are downloaded at the requested size and transformed', async () => {
  const { loader, downloads } = createLoader();

  const response = await loader.handleRequest({
    ...loadAlbum,
    sizeSpec: { mode: 'fixed_size', width: 16, height: 16, crop: true },
  });

  assert.equal(response.images.length, 10);
  assert.ok(response.images.every(image => image.width === 16 && image.height === 16));
  assert.equal(downloads()[0].url.endsWith('=w16-h16-c'), true);
  assert.equal(downloads()[0].authorization, undefined);
  assert.ok(response.statusText.split('\n').includes('API quota today: 11/1000 requests, 10/500 media downloads'));
});

test('the newest 100 of 250 items come from a single listing page', async () => {
  const library = Array.from({ length: 250 }, (_, i) => mediaItem(i));
  const { loader, requests } = createLoader(servePng, { library });

  const response = await loader.handleRequest({
    action: 'load_album',
    albumId: 'album-1',
    maxCount: 100,
    sort: { criteria: 'creation_time', direction: 'desc' },
  });

  assert.equal(response.error, undefined);
  assert.equal(response.results.length, 100);
  assert.deepEqual(
    response.results.map(entry => entry.item.id),
    Array.from({ length: 100 }, (_, i) => `item-${99 - i}`)
  );
  assert.equal(requests.filter(request => request.url === '/mediaItems:search').length, 1);
  const lines = response.statusText.split('\n');
  assert.ok(lines.includes('Items found: 100, selected: 100'));
  assert.ok(lines.includes('Listing pages: 0 from cache, 1 from network'));
});

test('startFrom skips leading items before ordering', async () => {
  const { loader, requests } = createLoader();

  const response = await loader.handleRequest({ ...loadAlbum, startFrom: 4, maxCount: 3 });

  assert.deepEqual(response.results.map(entry => entry.item.id), ['item-4', 'item-5', 'item-6']);
  assert.equal(requests.filter(request => request.url === '/mediaItems:search').length, 1);
  assert.ok(response.statusText.split('\n').includes('Items found: 3, skipped: 4, selected: 3'));
});

test('clearImageCache downloads every image again', async () => {
  const { loader, downloads } = createLoader();

  await loader.handleRequest(loadAlbum);
  const response = await loader.handleRequest({ ...loadAlbum, clearImageCache: true });

  assert.equal(downloads().length, 20);
  assert.ok(response.results.every(entry => !entry.fromCache));
  const lines = response.statusText.split('\n');
  assert.ok(lines.includes('Image cache cleared before loading'));
  assert.ok(lines.includes('Images: 0 from cache, 10 downloaded'));
});

test('concurrent requests report only their own listing pages', async () => {
  const { loader } = createLoader();

  const responses = await Promise.all([
    loader.handleRequest(loadAlbum),
    loader.handleRequest({ ...loadAlbum, albumId: 'album-2' }),
  ]);

  for (const response of responses) {
    assert.ok(response.statusText.split('\n').includes('Listing pages: 0 from cache, 1 from network'));
  }
});

test('a repeated request is served from the page and image caches', async () => {
  const { loader, requests } = createLoader();

  await loader.handleRequest(loadAlbum);
  const before = requests.length;
  const response = await loader.handleRequest(loadAlbum);

  assert.equal(requests.length, before);
  assert.equal(response.images.length, 10);
  assert.ok(response.results.every(entry => entry.fromCache));
  const lines = response.statusText.split('\n');
  assert.ok(lines.includes('Listing pages: 1 from cache, 0 from network'));
  assert.ok(lines.includes('Images: 10 from cache, 0 downloaded'));
});

test('a missing image is a per-item failure', async () => {
  const { loader } = createLoader(id => (id === 'item-7' ? { status: 404 } : { status: 200, data: png }));

  const response = await loader.handleRequest(loadAlbum);

  assert.equal(response.error, undefined);
  assert.equal(response.images.length, 9);
  assert.ok(response.results[7].error?.includes('(status 404)'));
});

test('a systemic failure stops the batch and keeps partial results', async () => {
  const { loader, downloads } = createLoader(
    id => (id === 'item-2' ? { status: 500 } : { status: 200, data: png }),
    { concurrency: 1 }
  );

  const response = await loader.handleRequest(loadAlbum);

  assert.ok(response.error instanceof UpstreamError);
  assert.equal(response.images.length, 2);
  assert.deepEqual(
    response.results.slice(3).map(entry => entry.error),
    Array.from({ length: 7 }, () => 'Not started: batch aborted')
  );
  assert.equal(downloads().length, 2 + 3);
  const lines = response.statusText.split('\n');
  assert.ok(lines.includes('Images: 2 succeeded, 8 failed'));
  assert.ok(lines.some(line => line.startsWith('Error [UPSTREAM]: ')));
});

test('items not started before the deadline are reported as failed', async () => {
  const { loader, downloads } = createLoader(servePng, { batchDeadlineMs: 0, now: () => 1000 });

  const response = await loader.handleRequest(loadAlbum);

  assert.equal(response.error, undefined);
  assert.equal(response.images.length, 0);
  assert.equal(downloads().length, 0);
  assert.ok(response.results.every(entry => entry.error === 'Not started: batch deadline exceeded'));
});

test('invalid requests are reported without touching the network', async () => {
  const { loader, requests } = createLoader();

  const response = await loader.handleRequest({ action: 'load_album', maxCount: 500 });

  assert.ok(response.error instanceof ValidationError);
  assert.equal(requests.length, 0);
  assert.equal(response.statusText.split('\n')[0], 'Action: invalid_request');
});

test('authentication failures are returned, not thrown', async () => {
  const rejectingTokens: TokenProvider = {
    async getValidToken(): Promise<Credential> {
      throw new AuthError('No stored credential found.');
    },
    async forceRefresh(): Promise<Credential> {
      throw new AuthError('No stored credential found.');
    },
  };
  const { loader } = createLoader(servePng, { tokens: rejectingTokens });

  const response = await loader.handleRequest(loadAlbum);

  assert.ok(response.error instanceof AuthError);
  assert.deepEqual(response.results, []);
  assert.ok(response.statusText.split('\n').includes('Error [AUTH]: No stored credential found.'));
});

test('list_albums returns the album listing', async () => {
  const { loader } = createLoader();

  const response = await loader.handleRequest({ action: 'list_albums' });

  assert.deepEqual(response.albums, [{ id: 'album-1', title: 'Holidays', mediaCount: 10 }]);
  assert.ok(response.statusText.endsWith('[ 0001 | album-1 | count: 10 | "Holidays" ]'));
});
