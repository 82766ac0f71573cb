import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import https from 'https';
import config from '../utils/config.js';
import logger from '../utils/logger.js';
import { RetryPolicy } from '../utils/retry.js';
import { QuotaManager, QuotaUsage, quotaManager } from '../utils/quotaManager.js';
import type { TokenProvider } from '../auth/credentialManager.js';
import {
  AuthError,
  NetworkError,
  RateLimitedError,
  UpstreamError,
  upstreamMessage,
} from './errors.js';

export interface TransportRequest {
  method: 'GET' | 'POST';
  /** Path relative to the API base URL, or an absolute URL */
  url: string;
  params?: Record<string, string | number | undefined>;
  data?: unknown;
  responseType?: 'json' | 'arraybuffer';
  /**
   * Sends the bearer token (default). Media downloads go to a capability URL
   * and are sent without one.
   */
  authenticated?: boolean;
  /** Operation name for logs and error messages (e.g. 'albums.list') */
  context: string;
}

export interface TransportResponse<T> {
  status: number;
  data: T;
}

export interface TransportOptions {
  tokens: TokenProvider;
  retryPolicy?: RetryPolicy;
  quota?: QuotaManager;
  baseURL?: string;
  timeoutMs?: number;
  /** Replaces the HTTP adapter; tests use this to answer requests in-process */
  adapter?: AxiosAdapter;
}

/**
 * Authenticated HTTP layer for the Photos Library API.
 *
 * Every status is accepted by axios and classified here, so retries,
 * the single refresh-on-401 and error typing live in one place.
 */
export class Transport {
  private readonly http: AxiosInstance;
  private readonly tokens: TokenProvider;
  private readonly retryPolicy: RetryPolicy;
  private readonly quota: QuotaManager;

  constructor(options: TransportOptions) {
    this.tokens = options.tokens;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.quota = options.quota ?? quotaManager;
    this.http = axios.create({
      baseURL: options.baseURL ?? config.google.apiBaseUrl,
      timeout: options.timeoutMs ?? config.transport.timeoutMs,
      validateStatus: () => true,
      adapter: options.adapter,
      // Reuse TCP connections across pages and image downloads
      httpsAgent: new https.Agent({
        keepAlive: true,
        keepAliveMsecs: 30000,
        maxSockets: 50,
        maxFreeSockets: 10,
        timeout: 60000,
      }),
    });
  }

  /**
   * Issues a request with retries.
   *
   * @throws NetworkError | RateLimitedError once the attempt budget is spent
   * @throws AuthError when a refreshed token is still rejected, or refresh fails
   * @throws UpstreamError for other non-success statuses
   * @throws QuotaExceededError when the daily quota is used up
   */
  async call<T>(request: TransportRequest): Promise<TransportResponse<T>> {
    const authenticated = request.authenticated ?? true;
    let authRetried = false;

    return this.retryPolicy.execute(async () => {
      this.quota.checkQuota(!authenticated);

      // Token is read per attempt so a refresh by another caller is picked up
      let token = authenticated ? (await this.tokens.getValidToken()).access_token : undefined;
      let response = await this.send<T>(request, token);

      if (response.status === 401 && token !== undefined) {
        if (authRetried) {
          throw new AuthError(`${request.context} was rejected after a token refresh`);
        }
        authRetried = true;
        logger.warn(`${request.context} returned 401, refreshing token and retrying once`);
        token = (await this.tokens.forceRefresh(token)).access_token;
        response = await this.send<T>(request, token);
        if (response.status === 401) {
          throw new AuthError(`${request.context} was rejected after a token refresh`);
        }
      }

      return this.classify(request, response);
    }, request.context);
  }

  quotaUsage(): QuotaUsage {
    return this.quota.usage();
  }

  private async send<T>(request: TransportRequest, token: string | undefined): Promise<AxiosResponse<T>> {
    logger.debug(`${request.method} ${request.url} (${request.context})`);
    try {
      const response = await this.http.request<T>({
        method: request.method,
        url: request.url,
        params: request.params,
        data: request.data,
        responseType: request.responseType ?? 'json',
        headers: token ? { Authorization: `Bearer ${token}` } : undefined,
      });
      this.quota.recordRequest(request.authenticated === false);
      return response;
    } catch (error) {
      const detail = axios.isAxiosError(error)
        ? `${error.code ?? 'ERR_NETWORK'}: ${error.message}`
        : error instanceof Error ? error.message : String(error);
      throw new NetworkError(`${request.context} failed without a response (${detail})`, error);
    }
  }

  private classify<T>(request: TransportRequest, response: AxiosResponse<T>): TransportResponse<T> {
    const { status } = response;

    if (status >= 200 && status < 300) {
      return { status, data: response.data };
    }

    const body = decodeBody(response.data);

    if (status === 429) {
      const retryAfterMs = parseRetryAfter(headerValue(response.headers, 'retry-after'));
      throw new RateLimitedError(`${request.context} was rate limited`, retryAfterMs);
    }

    if (status === 401) {
      // Only unauthenticated capability URLs reach this point
      throw new UpstreamError(`${request.context} was refused: ${upstreamMessage(body)}`, status, body);
    }

    throw new UpstreamError(`Google Photos API ${request.context} failed: ${upstreamMessage(body)}`, status, body);
  }
}

function decodeBody(data: unknown): unknown {
  if (Buffer.isBuffer(data)) {
    const text = data.toString('utf8');
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
  return data;
}

function headerValue(headers: AxiosResponse['headers'], name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name && (typeof value === 'string' || typeof value === 'number')) {
      return String(value);
    }
  }
  return undefined;
}

/**
 * Retry-After is either delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}
