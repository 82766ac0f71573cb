import { z } from 'zod';

/**
 * Zod schemas for the loader's inbound request.
 */

const dimension = z.number().int().min(1, 'Must be at least 1 pixel').max(4096, 'Must be at most 4096 pixels');

/**
 * Schema for the sizing spec
 */
export const transformSpecSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('original') }),
  z.object({
    mode: z.literal('fixed_size'),
    width: dimension,
    height: dimension,
    crop: z.boolean().default(false),
  }),
  z.object({
    mode: z.literal('scale_to_size'),
    size: dimension,
    /** Accepted for symmetry with fixed_size; has no effect */
    crop: z.boolean().optional(),
  }),
  z.object({
    mode: z.literal('fill_to_size'),
    width: dimension,
    height: dimension,
  }),
]);

export const calendarDateSchema = z
  .object({
    year: z.number().int().min(1).max(9999).optional(),
    month: z.number().int().min(1).max(12).optional(),
    day: z.number().int().min(1).max(31).optional(),
  })
  .refine(date => date.year !== undefined || date.month !== undefined || date.day !== undefined, {
    message: 'Date needs at least one of year, month or day',
  });

export const sortSchema = z.object({
  criteria: z.enum(['creation_time', 'filename']).default('creation_time'),
  direction: z.enum(['asc', 'desc', 'random']).default('desc'),
});

/**
 * Schema for `PhotoLoader.handleRequest`
 */
export const photoLoaderRequestSchema = z
  .object({
    action: z.enum(['list_albums', 'load_album', 'search']),
    albumId: z.string().min(1, 'Album ID cannot be empty').optional(),
    query: z.string().min(1, 'Query cannot be empty').max(200, 'Query too long').optional(),
    maxCount: z.number().int().min(1).max(100).default(10),
    /** Leading items of the listing to skip */
    startFrom: z.number().int().min(0).max(10000).default(0),
    excludeCategories: z.array(z.string().min(1).max(200)).max(10).optional(),
    date: calendarDateSchema.optional(),
    /** Empties the image cache before loading */
    clearImageCache: z.boolean().default(false),
    sizeSpec: transformSpecSchema.default({ mode: 'original' }),
    sort: sortSchema.default({}),
    /** Makes random ordering repeatable */
    seed: z.number().int().optional(),
  })
  .superRefine((request, ctx) => {
    if (request.action === 'list_albums') {
      return;
    }
    if (request.albumId && request.query) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['query'],
        message: 'Specify either albumId or query, not both',
      });
    }
    if (request.action === 'load_album' && !request.albumId) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['albumId'], message: 'Album ID is required' });
    }
    if (request.action === 'search' && !request.query) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['query'], message: 'Query is required' });
    }
    if (request.albumId && (request.excludeCategories?.length || request.date)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [request.date ? 'date' : 'excludeCategories'],
        message: 'Category and date filters apply to search only, not to albums',
      });
    }
  });

export type PhotoLoaderRequest = z.infer<typeof photoLoaderRequestSchema>;
