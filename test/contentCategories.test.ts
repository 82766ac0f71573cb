import assert from 'node:assert/strict';
import test from 'node:test';

import { buildSearchFilter, resolveContentCategory } from '../src/api/search/contentCategories.js';

test('maps known labels regardless of case and spacing', () => {
  assert.equal(resolveContentCategory('Food  and Drink'), 'FOOD');
  assert.equal(resolveContentCategory('  pets '), 'PETS');
  assert.equal(resolveContentCategory('city'), 'CITYSCAPES');
});

test('passes unknown labels through as enum-style values', () => {
  assert.equal(resolveContentCategory('hot air-balloons'), 'HOT_AIR_BALLOONS');
});

test('buildSearchFilter restricts results to photos of one category', () => {
  assert.deepEqual(buildSearchFilter('landscapes'), {
    contentFilter: { includedContentCategories: ['LANDSCAPES'] },
    mediaTypeFilter: { mediaTypes: ['PHOTO'] },
  });
});

test('buildSearchFilter adds excluded categories and a calendar date', () => {
  assert.deepEqual(
    buildSearchFilter('landscapes', { exclude: ['Screenshots', 'screenshots', 'people'], date: { year: 2024, month: 7 } }),
    {
      contentFilter: {
        includedContentCategories: ['LANDSCAPES'],
        excludedContentCategories: ['SCREENSHOTS', 'PEOPLE'],
      },
      dateFilter: { dates: [{ year: 2024, month: 7 }] },
      mediaTypeFilter: { mediaTypes: ['PHOTO'] },
    }
  );
});

test('buildSearchFilter ignores an empty exclusion list and an empty date', () => {
  assert.deepEqual(buildSearchFilter('pets', { exclude: [], date: {} }), {
    contentFilter: { includedContentCategories: ['PETS'] },
    mediaTypeFilter: { mediaTypes: ['PHOTO'] },
  });
});
