import assert from 'node:assert/strict';
import { before, test } from 'node:test';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

import { CatalogEngine } from '../src/api/catalog.js';
import { Transport } from '../src/api/transport.js';
import { PhotoLoader } from '../src/loader/photoLoader.js';
import { PhotoLoaderMCPCore } from '../src/mcp/core.js';
import { QuotaManager } from '../src/utils/quotaManager.js';
import {
  FakeTokens,
  instantRetry,
  mediaItem,
  pagedMediaResponder,
  solidPng,
  stubAdapter,
} from './helpers/stubApi.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
let png: Buffer;

before(async () => {
  png = await solidPng(20, 10);
});

function createCore(searchStatus = 200) {
  const listMedia = pagedMediaResponder([mediaItem(0), mediaItem(1), mediaItem(2)]);
  const { adapter } = stubAdapter(request => {
    if (request.url === '/albums') {
      return { status: 200, data: { albums: [{ id: 'album-1', title: 'Pets', mediaItemsCount: '3' }] } };
    }
    if (request.url === '/mediaItems:search') {
      return searchStatus === 200 ? listMedia(request) : { status: searchStatus };
    }
    return { status: 200, data: png };
  });
  const transport = new Transport({
    tokens: new FakeTokens(),
    retryPolicy: instantRetry().policy,
    quota: new QuotaManager(),
    baseURL: 'https://photos.test/v1',
    adapter,
  });
  const loader = new PhotoLoader({ catalog: new CatalogEngine({ transport }), transport });
  return new PhotoLoaderMCPCore({ name: 'photo-library-loader-test', version: '0.0.0' }, loader);
}

test('list_albums returns the status report as text', async () => {
  const result = await createCore().callTool('list_albums', {});

  assert.equal(result.isError, undefined);
  assert.equal(result.content.length, 1);
  const [first] = result.content;
  assert.equal(first.type, 'text');
  assert.ok(first.type === 'text' && first.text.endsWith('[ 0001 | album-1 | count: 3 | "Pets" ]'));
});

test('load_album returns one PNG part per image', async () => {
  const result = await createCore().callTool('load_album', {
    albumId: 'album-1',
    maxCount: 2,
    sizeSpec: { mode: 'scale_to_size', size: 8 },
  });

  assert.equal(result.content.length, 3);
  for (const part of result.content.slice(1)) {
    assert.equal(part.type, 'image');
    if (part.type === 'image') {
      assert.equal(part.mimeType, 'image/png');
      assert.deepEqual(Buffer.from(part.data, 'base64').subarray(0, 8), PNG_SIGNATURE);
    }
  }
});

test('invalid arguments become InvalidParams', async () => {
  await assert.rejects(createCore().callTool('load_album', { maxCount: 2 }), (error: unknown) => {
    assert.ok(error instanceof McpError);
    assert.equal(error.code, ErrorCode.InvalidParams);
    return true;
  });
});

test('unknown tools become MethodNotFound', async () => {
  await assert.rejects(createCore().callTool('delete_album', {}), (error: unknown) => {
    assert.ok(error instanceof McpError);
    assert.equal(error.code, ErrorCode.MethodNotFound);
    return true;
  });
});

test('batch failures are flagged as tool errors', async () => {
  const result = await createCore(501).callTool('search_photos', { query: 'pets' });

  assert.equal(result.isError, true);
  const [first] = result.content;
  assert.ok(first.type === 'text' && first.text.includes('Error [UNSUPPORTED]: '));
});
