import { z } from 'zod';
import { ValidationError } from '../api/errors.js';

/**
 * Validates arguments against a Zod schema and converts validation errors to ValidationError.
 *
 * @param args - The arguments to validate (from a host request)
 * @param schema - The Zod schema to validate against
 * @returns The validated and typed arguments, with defaults applied
 * @throws ValidationError if validation fails
 *
 * @example
 * ```typescript
 * const request = validateArgs(input, photoLoaderRequestSchema);
 * ```
 */
export function validateArgs<T>(
  args: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  const result = schema.safeParse(args);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.errors
    .map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');

  throw new ValidationError(`Invalid parameters: ${issues}`);
}
