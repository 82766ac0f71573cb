import assert from 'node:assert/strict';
import test from 'node:test';

import type { MediaItemRef } from '../src/api/types.js';
import { order, seededRandom, shuffle } from '../src/ordering/order.js';

function ref(id: string, creationTime: number, filename = `${id}.jpg`): MediaItemRef {
  return { id, filename, creationTime, baseUrl: `https://media.test/${id}`, mimeType: 'image/jpeg' };
}

const ids = (items: MediaItemRef[]) => items.map(item => item.id);

test('ascending and descending sorts keep ties in fetch order', () => {
  const items = [ref('a', 2), ref('b', 1), ref('c', 2), ref('d', 1)];

  assert.deepEqual(ids(order(items, { criteria: 'creation_time', direction: 'asc' }, 10)), ['b', 'd', 'a', 'c']);
  assert.deepEqual(ids(order(items, { criteria: 'creation_time', direction: 'desc' }, 10)), ['a', 'c', 'b', 'd']);
});

test('filenames sort with numeric awareness', () => {
  const items = [ref('x', 0, 'IMG_10.jpg'), ref('y', 0, 'img_2.jpg'), ref('z', 0, 'IMG_1.jpg')];

  assert.deepEqual(ids(order(items, { criteria: 'filename', direction: 'asc' }, 10)), ['z', 'y', 'x']);
});

test('truncation happens after ordering', () => {
  const items = [ref('old', 1), ref('newest', 3), ref('middle', 2)];

  assert.deepEqual(ids(order(items, { criteria: 'creation_time', direction: 'desc' }, 2)), ['newest', 'middle']);
});

test('random order is a truncated permutation', () => {
  const items = Array.from({ length: 20 }, (_, i) => ref(`item-${i}`, i));

  const picked = order(items, { criteria: 'creation_time', direction: 'random' }, 5);

  assert.equal(picked.length, 5);
  assert.equal(new Set(ids(picked)).size, 5);
  assert.ok(picked.every(item => items.includes(item)));
});

test('random order reaches every item at every position', () => {
  const items = Array.from({ length: 5 }, (_, i) => ref(`item-${i}`, i));
  const seen = new Set<string>();

  for (let draw = 0; draw < 1000; draw++) {
    order(items, { criteria: 'creation_time', direction: 'random' }, 5).forEach((item, position) => {
      seen.add(`${item.id}@${position}`);
    });
  }

  assert.equal(seen.size, 25);
});

test('a seed makes random order repeatable', () => {
  const items = Array.from({ length: 30 }, (_, i) => ref(`item-${i}`, i));
  const sort = { criteria: 'filename', direction: 'random' } as const;

  assert.deepEqual(ids(order(items, sort, 30, 42)), ids(order(items, sort, 30, 42)));
});

test('seededRandom stays in [0, 1) and shuffle leaves its input alone', () => {
  const random = seededRandom(7);
  for (let i = 0; i < 100; i++) {
    const value = random();
    assert.ok(value >= 0 && value < 1);
  }

  const input = [1, 2, 3, 4];
  const output = shuffle(input, seededRandom(7));
  assert.deepEqual(input, [1, 2, 3, 4]);
  assert.deepEqual([...output].sort(), [1, 2, 3, 4]);
});
