import logger from '../utils/logger.js';
import config from '../utils/config.js';
import { AuthError } from '../api/errors.js';
import { Credential, CredentialStore } from './credentials.js';

/**
 * Result of an OAuth2 refresh-grant exchange.
 */
export interface RefreshedToken {
  access_token: string;
  expires_at: number;
}

/**
 * Exchanges a refresh token for a new access token.
 */
export type TokenRefresher = (refreshToken: string) => Promise<RefreshedToken>;

/**
 * What the transport needs from the credential layer.
 */
export interface TokenProvider {
  getValidToken(): Promise<Credential>;
  forceRefresh(staleAccessToken: string): Promise<Credential>;
}

export interface CredentialManagerOptions {
  store: CredentialStore;
  refresher: TokenRefresher;
  /** Refresh this long before expiry (default: config.credentials.refreshSkewMs) */
  skewMarginMs?: number;
  now?: () => number;
}

/**
 * Owns the access/refresh token pair.
 * Refreshes proactively before expiry and keeps at most one refresh in flight:
 * concurrent callers wait for and reuse the pending refresh.
 */
export class CredentialManager implements TokenProvider {
  private current: Credential | null = null;
  private loadPromise: Promise<Credential> | null = null;
  private refreshPromise: Promise<Credential> | null = null;
  private readonly store: CredentialStore;
  private readonly refresher: TokenRefresher;
  private readonly skewMarginMs: number;
  private readonly now: () => number;

  constructor(options: CredentialManagerOptions) {
    this.store = options.store;
    this.refresher = options.refresher;
    this.skewMarginMs = options.skewMarginMs ?? config.credentials.refreshSkewMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns a credential whose access token is valid for at least the skew margin.
   *
   * @throws AuthError if nothing is stored or the refresh token is rejected
   */
  async getValidToken(): Promise<Credential> {
    const credential = await this.ensureLoaded();

    if (this.now() + this.skewMarginMs < credential.expires_at) {
      return credential;
    }

    logger.debug('Access token expired or about to expire, refreshing');
    return this.refresh();
  }

  /**
   * Called after the upstream rejected `staleAccessToken` with 401.
   * If another caller already replaced that token, the replacement is returned
   * without a second refresh.
   */
  async forceRefresh(staleAccessToken: string): Promise<Credential> {
    const credential = await this.ensureLoaded();
    if (this.refreshPromise) {
      return this.refreshPromise;
    }
    if (credential.access_token !== staleAccessToken) {
      return credential;
    }
    return this.refresh();
  }

  private async ensureLoaded(): Promise<Credential> {
    if (this.current) {
      return this.current;
    }
    if (!this.loadPromise) {
      this.loadPromise = this.loadFromStore().finally(() => {
        this.loadPromise = null;
      });
    }
    return this.loadPromise;
  }

  private async loadFromStore(): Promise<Credential> {
    const stored = await this.store.load();
    if (!stored) {
      throw new AuthError('No stored credential found. Complete the Google Photos consent flow first.');
    }
    this.current = stored;
    return stored;
  }

  private refresh(): Promise<Credential> {
    if (!this.refreshPromise) {
      this.refreshPromise = this.performRefresh().finally(() => {
        this.refreshPromise = null;
      });
    }
    return this.refreshPromise;
  }

  private async performRefresh(): Promise<Credential> {
    const previous = await this.ensureLoaded();
    logger.info('Refreshing access token');

    let refreshed: RefreshedToken;
    try {
      refreshed = await this.refresher(previous.refresh_token);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to refresh access token: ${message}`);
      throw new AuthError(`Refresh token was rejected; re-consent is required (${message})`, error);
    }

    const next: Credential = {
      access_token: refreshed.access_token,
      expires_at: refreshed.expires_at,
      refresh_token: previous.refresh_token,
    };
    this.current = next;

    try {
      await this.store.save(next);
    } catch (error) {
      // The new token is valid either way; the next process start refreshes again.
      logger.warn(`Refreshed token could not be persisted: ${error instanceof Error ? error.message : String(error)}`);
    }

    logger.info('Successfully refreshed access token');
    return next;
  }
}
