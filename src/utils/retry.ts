import logger from './logger.js';
import config from './config.js';
import { PhotoLoaderError, RateLimitedError, UpstreamError, describeError } from '../api/errors.js';

/**
 * Retry configuration options
 */
export interface RetryConfig {
  /** Total attempts including the first one (default: 3) */
  maxAttempts?: number;
  /** Delay before the first retry in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Minimum delay for 429 errors without Retry-After, before jitter (default: 30000) */
  rateLimitDelayMs?: number;
  /** Source of jitter in [0, 1) */
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Sleep for specified milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Single retry policy consumed by the transport.
 *
 * Retry behavior:
 * - errors flagged `retryable` (network failures, 429, 5xx): exponential backoff,
 *   capped and jittered, until the attempt budget is spent
 * - 429 with Retry-After: waits what the server asked for, unless that exceeds
 *   `maxDelayMs`, in which case the error is rethrown at once
 * - everything else: rethrown immediately
 *
 * @example
 * ```typescript
 * const policy = new RetryPolicy({ maxAttempts: 3 });
 * const page = await policy.execute(() => fetchPage(cursor), 'list albums');
 * ```
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly rateLimitDelayMs: number;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryConfig = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? config.transport.maxAttempts);
    this.baseDelayMs = options.baseDelayMs ?? config.transport.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? config.transport.maxDelayMs;
    this.rateLimitDelayMs = options.rateLimitDelayMs ?? config.transport.rateLimitDelayMs;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Calculate delay for next retry attempt using exponential backoff
   *
   * @param attempt - Attempt that just failed (0-indexed)
   */
  delayFor(attempt: number, error: unknown): number {
    let backoff = Math.min(this.baseDelayMs * Math.pow(2, attempt), this.maxDelayMs);

    if (error instanceof RateLimitedError) {
      if (error.retryAfterMs !== undefined) {
        return Math.min(error.retryAfterMs, this.maxDelayMs);
      }
      backoff = Math.max(this.rateLimitDelayMs, backoff);
    }

    // Jitter between 50% and 100% of the capped backoff
    return Math.round(backoff * (0.5 + this.random() * 0.5));
  }

  /**
   * A Retry-After longer than the delay cap cannot be honoured within the budget.
   */
  private exceedsCap(error: unknown): boolean {
    return error instanceof RateLimitedError && error.retryAfterMs !== undefined && error.retryAfterMs > this.maxDelayMs;
  }

  isRetryable(error: unknown): boolean {
    return error instanceof PhotoLoaderError && error.retryable;
  }

  /**
   * Runs `fn` until it succeeds, fails with a non-retryable error, or the
   * attempt budget is exhausted; in the last two cases the error is rethrown.
   *
   * @param fn - Receives the 0-based attempt number
   * @param context - Context string for logging (e.g., "list albums")
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, context: string = 'operation'): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        const result = await fn(attempt);

        if (attempt > 0) {
          logger.info(`${context} succeeded after ${attempt} ${attempt === 1 ? 'retry' : 'retries'}`);
        }

        return result;
      } catch (error) {
        lastError = error;

        if (!this.isRetryable(error)) {
          logger.debug(`${context} failed with non-retryable error: ${describeError(error)}`);
          throw error;
        }

        if (this.exceedsCap(error)) {
          logger.error(`${context} was asked to wait longer than ${this.maxDelayMs}ms; giving up`);
          throw error;
        }

        if (attempt === this.maxAttempts - 1) {
          logger.error(`${context} failed after ${this.maxAttempts} attempts: ${describeError(error)}`);
          throw error;
        }

        const delayMs = this.delayFor(attempt, error);
        const statusCode = error instanceof UpstreamError ? error.status : error instanceof RateLimitedError ? 429 : undefined;

        logger.warn(
          `${context} failed (attempt ${attempt + 1}/${this.maxAttempts})${
            statusCode ? ` with status ${statusCode}` : ''
          }. Retrying in ${delayMs}ms...`
        );

        await this.sleep(delayMs);
      }
    }

    // Unreachable with maxAttempts >= 1, but keeps the return type honest
    throw lastError;
  }
}
