import logger from './logger.js';
import config from './config.js';
import { QuotaExceededError } from '../api/errors.js';

/**
 * Requests used today against each daily limit.
 */
export interface QuotaUsage {
  requests: number;
  maxRequests: number;
  mediaRequests: number;
  maxMediaRequests: number;
  /** ISO timestamp of the next reset */
  resetsAt: string;
}

interface Bucket {
  label: string;
  used: number;
  max: number;
}

/**
 * Daily request counters for the Photos Library API: one bucket for every
 * request and one for media byte downloads. Both reset at the next UTC midnight.
 *
 * @see https://developers.google.com/photos/overview/api-limits-quotas
 */
export class QuotaManager {
  private readonly all: Bucket;
  private readonly media: Bucket;
  private resetsAt: number;
  private readonly now: () => number;

  constructor(
    maxRequests: number = config.quota.maxRequests,
    maxMediaRequests: number = config.quota.maxMediaRequests,
    now: () => number = Date.now,
  ) {
    this.all = { label: 'API request', used: 0, max: maxRequests };
    this.media = { label: 'Media byte', used: 0, max: maxMediaRequests };
    this.now = now;
    this.resetsAt = nextUtcMidnight(now());
  }

  /**
   * @throws QuotaExceededError when a bucket the request counts against is full
   */
  checkQuota(isMediaRequest: boolean = false): void {
    this.rollOver();
    for (const bucket of this.bucketsFor(isMediaRequest)) {
      if (bucket.used >= bucket.max) {
        const resetDate = new Date(this.resetsAt).toISOString();
        logger.error(`${bucket.label} quota exhausted (${bucket.used}/${bucket.max}), resets at ${resetDate}`);
        throw new QuotaExceededError(
          `${bucket.label} quota exceeded (${bucket.used}/${bucket.max} today). Quota resets at ${resetDate}.`
        );
      }
    }
  }

  recordRequest(isMediaRequest: boolean = false): void {
    this.rollOver();
    for (const bucket of this.bucketsFor(isMediaRequest)) {
      bucket.used++;
      if (bucket.used === Math.floor(bucket.max * 0.8)) {
        logger.warn(`${bucket.label} quota at 80% (${bucket.max - bucket.used} remaining today)`);
      }
    }
  }

  usage(): QuotaUsage {
    this.rollOver();
    return {
      requests: this.all.used,
      maxRequests: this.all.max,
      mediaRequests: this.media.used,
      maxMediaRequests: this.media.max,
      resetsAt: new Date(this.resetsAt).toISOString(),
    };
  }

  private bucketsFor(isMediaRequest: boolean): Bucket[] {
    return isMediaRequest ? [this.all, this.media] : [this.all];
  }

  private rollOver(): void {
    if (this.now() < this.resetsAt) {
      return;
    }
    logger.info(`Resetting quota counters (previous: ${this.all.used} requests, ${this.media.used} media requests)`);
    this.all.used = 0;
    this.media.used = 0;
    this.resetsAt = nextUtcMidnight(this.now());
  }
}

function nextUtcMidnight(now: number): number {
  const next = new Date(now);
  next.setUTCDate(next.getUTCDate() + 1);
  next.setUTCHours(0, 0, 0, 0);
  return next.getTime();
}

/**
 * Process-wide instance; the quota is per Google Cloud project, not per loader.
 */
export const quotaManager = new QuotaManager();
