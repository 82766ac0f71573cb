import assert from 'node:assert/strict';
import test from 'node:test';

import { QuotaExceededError } from '../src/api/errors.js';
import { QuotaManager } from '../src/utils/quotaManager.js';

test('checkQuota throws once the request limit is reached', () => {
  const quota = new QuotaManager(2, 10);

  quota.checkQuota();
  quota.recordRequest();
  quota.checkQuota();
  quota.recordRequest();

  assert.throws(() => quota.checkQuota(), QuotaExceededError);
});

test('media requests have their own bucket', () => {
  const quota = new QuotaManager(10, 1);

  quota.recordRequest(true);

  assert.doesNotThrow(() => quota.checkQuota(false));
  assert.throws(() => quota.checkQuota(true), QuotaExceededError);
});

test('counters reset at the next UTC midnight', () => {
  let now = Date.UTC(2026, 0, 1, 23, 0);
  const quota = new QuotaManager(10, 10, () => now);

  quota.recordRequest();
  quota.recordRequest(true);
  assert.equal(quota.usage().requests, 2);

  now = Date.UTC(2026, 0, 2, 0, 0);

  assert.deepEqual(quota.usage(), {
    requests: 0,
    maxRequests: 10,
    mediaRequests: 0,
    maxMediaRequests: 10,
    resetsAt: '2026-01-03T00:00:00.000Z',
  });
});

test('media downloads count against both buckets', () => {
  const quota = new QuotaManager(10, 4, () => Date.UTC(2026, 0, 1, 12, 0));

  for (let i = 0; i < 4; i++) {
    quota.recordRequest();
  }
  quota.recordRequest(true);

  const usage = quota.usage();
  assert.equal(usage.requests, 5);
  assert.equal(usage.mediaRequests, 1);
  assert.equal(usage.resetsAt, '2026-01-02T00:00:00.000Z');
});

test('the exhausted bucket is named in the error', () => {
  const quota = new QuotaManager(10, 1, () => Date.UTC(2026, 0, 1, 12, 0));
  quota.recordRequest(true);

  assert.throws(() => quota.checkQuota(true), {
    name: 'QuotaExceededError',
    message: 'Media byte quota exceeded (1/1 today). Quota resets at 2026-01-02T00:00:00.000Z.',
  });
});
