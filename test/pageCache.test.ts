import assert from 'node:assert/strict';
import test from 'node:test';

import { PageCache, PageCacheKey } from '../src/api/cache/pageCache.js';

const key: PageCacheKey = { action: 'mediaItems.search:album', scopeId: 'album-1', pageSize: 10 };

test('stores frozen pages by key and cursor', () => {
  const cache = new PageCache<string>({ ttlMs: 1000, now: () => 0 });

  cache.set(key, '', ['a', 'b'], 'page-1');
  cache.set(key, 'page-1', ['c']);

  const first = cache.get(key);
  assert.deepEqual(first?.items, ['a', 'b']);
  assert.equal(first?.nextCursor, 'page-1');
  assert.ok(first && Object.isFrozen(first) && Object.isFrozen(first.items));
  assert.deepEqual(cache.get(key, 'page-1')?.items, ['c']);
  assert.equal(cache.get(key, 'page-1')?.nextCursor, undefined);
  assert.equal(cache.size, 2);
});

test('pages expire once their age reaches the TTL', () => {
  let now = 0;
  const cache = new PageCache<string>({ ttlMs: 1000, now: () => now });
  cache.set(key, '', ['a']);

  now = 999;
  assert.ok(cache.get(key));

  now = 1000;
  assert.equal(cache.get(key), undefined);
  assert.equal(cache.size, 0);
});

test('different page sizes never share entries', () => {
  const cache = new PageCache<string>({ ttlMs: 1000, now: () => 0 });
  cache.set(key, '', ['a']);

  assert.equal(cache.get({ ...key, pageSize: 20 }), undefined);
  assert.equal(cache.get({ ...key, scopeId: 'album-2' }), undefined);
  assert.ok(cache.get({ ...key }));
});

test('prune drops only expired pages', () => {
  let now = 0;
  const cache = new PageCache<string>({ ttlMs: 1000, now: () => now });
  cache.set(key, '', ['a'], 'page-1');
  now = 500;
  cache.set(key, 'page-1', ['b']);

  now = 1200;
  assert.equal(cache.prune(), 1);
  assert.equal(cache.size, 1);
  assert.deepEqual(cache.get(key, 'page-1')?.items, ['b']);
});
