import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import logger from '../../utils/logger.js';
import type { CalendarDate, SearchFilter } from '../types.js';

/**
 * Maps search queries onto the API's content categories.
 * The Library API has no free-text search; a query is only meaningful as a category.
 */

const CATEGORIES_FILE = fileURLToPath(new URL('../../../data/contentCategories.json', import.meta.url));

const categoriesSchema = z.record(z.string(), z.string().regex(/^[A-Z_]+$/));

let categories: Record<string, string> | undefined;

function loadCategories(): Record<string, string> {
  if (!categories) {
    categories = categoriesSchema.parse(JSON.parse(fs.readFileSync(CATEGORIES_FILE, 'utf-8')));
  }
  return categories;
}

/**
 * Resolves a query to a category enum value.
 * Known labels ("food and drink", "Pets") map through the table; anything
 * else is passed through upper-cased, which upstream may reject.
 */
export function resolveContentCategory(query: string): string {
  const normalized = query.trim().toLowerCase().replace(/\s+/g, ' ');
  const known = loadCategories()[normalized];
  if (known) {
    return known;
  }

  const passthrough = normalized.toUpperCase().replace(/[\s-]+/g, '_');
  logger.warn(`"${query}" is not a known content category; sending ${passthrough} as-is`);
  return passthrough;
}

export interface SearchFilterOptions {
  /** Labels whose content categories must not appear in results */
  exclude?: readonly string[];
  date?: CalendarDate;
}

/**
 * Builds the search filter for a query: one content category, photos only,
 * plus optional excluded categories and a calendar date.
 */
export function buildSearchFilter(query: string, options: SearchFilterOptions = {}): SearchFilter {
  const contentFilter: NonNullable<SearchFilter['contentFilter']> = {
    includedContentCategories: [resolveContentCategory(query)],
  };
  if (options.exclude && options.exclude.length > 0) {
    contentFilter.excludedContentCategories = [...new Set(options.exclude.map(resolveContentCategory))];
  }

  const filter: SearchFilter = {
    contentFilter,
    mediaTypeFilter: { mediaTypes: ['PHOTO'] },
  };

  const date = options.date;
  if (date && (date.year || date.month || date.day)) {
    filter.dateFilter = {
      dates: [{
        ...(date.year ? { year: date.year } : {}),
        ...(date.month ? { month: date.month } : {}),
        ...(date.day ? { day: date.day } : {}),
      }],
    };
  }

  return filter;
}
