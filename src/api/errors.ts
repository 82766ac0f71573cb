/**
 * Error taxonomy shared by every layer of the loader.
 *
 * `retryable` is what the retry policy looks at; nothing else inspects
 * subclasses to decide whether a call may be repeated.
 */

export type PhotoLoaderErrorCode =
  | 'AUTH'
  | 'VALIDATION'
  | 'NETWORK'
  | 'RATE_LIMITED'
  | 'UPSTREAM'
  | 'DECODE'
  | 'UNSUPPORTED'
  | 'QUOTA_EXCEEDED';

export class PhotoLoaderError extends Error {
  readonly code: PhotoLoaderErrorCode;
  readonly retryable: boolean;

  constructor(code: PhotoLoaderErrorCode, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * The credential is missing or the refresh token was rejected.
 * Recovering requires the user to go through the consent flow again.
 */
export class AuthError extends PhotoLoaderError {
  constructor(message: string, cause?: unknown) {
    super('AUTH', message, { cause });
  }
}

export class ValidationError extends PhotoLoaderError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

/** No response was received (connection failure or timeout). */
export class NetworkError extends PhotoLoaderError {
  constructor(message: string, cause?: unknown) {
    super('NETWORK', message, { retryable: true, cause });
  }
}

export class RateLimitedError extends PhotoLoaderError {
  /** Server-provided wait from the Retry-After header, if any */
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super('RATE_LIMITED', message, { retryable: true });
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Non-success HTTP status from the upstream service.
 * 5xx responses are retryable within the attempt budget; 4xx are not.
 */
export class UpstreamError extends PhotoLoaderError {
  readonly status: number;
  readonly body: unknown;

  constructor(message: string, status: number, body?: unknown) {
    super('UPSTREAM', message, { retryable: status >= 500 });
    this.status = status;
    this.body = body;
  }
}

/** The downloaded bytes are not a decodable image. */
export class DecodeError extends PhotoLoaderError {
  constructor(message: string, cause?: unknown) {
    super('DECODE', message, { cause });
  }
}

/**
 * The upstream capability is not available (e.g. library search restricted to
 * app-created content). Distinct from an empty result.
 */
export class UnsupportedOperationError extends PhotoLoaderError {
  constructor(message: string) {
    super('UNSUPPORTED', message);
  }
}

export class QuotaExceededError extends PhotoLoaderError {
  constructor(message: string) {
    super('QUOTA_EXCEEDED', message);
  }
}

/**
 * Renders any thrown value as a one-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof UpstreamError) {
    return `${error.message} (status ${error.status})`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extracts the human-readable message from a Google API error body
 * (`{ error: { message, status } }`), falling back to a JSON dump.
 */
export function upstreamMessage(body: unknown): string {
  if (body && typeof body === 'object' && 'error' in body) {
    const inner = body.error;
    if (inner && typeof inner === 'object' && 'message' in inner && typeof inner.message === 'string') {
      return inner.message;
    }
  }
  if (typeof body === 'string') {
    return body;
  }
  if (body === undefined || body === null) {
    return 'no response body';
  }
  return JSON.stringify(body);
}
