import { google } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import config from '../utils/config.js';
import type { RefreshedToken, TokenRefresher } from '../auth/credentialManager.js';

/**
 * OAuth2 client management for Google Photos API
 */

/**
 * Creates a new OAuth2 client using the configured credentials.
 *
 * @returns A new OAuth2Client instance.
 */
export function createOAuthClient(): OAuth2Client {
  return new google.auth.OAuth2(
    config.google.clientId,
    config.google.clientSecret,
    config.google.redirectUri,
  );
}

/**
 * Builds a refresher that performs the standard OAuth2 refresh-grant exchange
 * through google-auth-library.
 *
 * @param client - Client configured with the app's id/secret; defaults to one built from config.
 */
export function createTokenRefresher(client: OAuth2Client = createOAuthClient()): TokenRefresher {
  return async (refreshToken: string): Promise<RefreshedToken> => {
    client.setCredentials({ refresh_token: refreshToken });
    const { credentials } = await client.refreshAccessToken();

    if (!credentials.access_token) {
      throw new Error('Token endpoint returned no access token');
    }

    return {
      access_token: credentials.access_token,
      // Google access tokens live one hour when the response carries no expiry
      expires_at: credentials.expiry_date ?? Date.now() + 60 * 60 * 1000,
    };
  };
}
