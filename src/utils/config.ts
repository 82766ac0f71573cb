import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config();

/**
 * Validates and sanitizes the credential file path to prevent path traversal attacks.
 * Ensures the path stays within the project directory.
 *
 * @param inputPath - The credential path from environment or default
 * @returns Validated absolute path
 * @throws Error if path escapes project directory
 */
function validateCredentialsPath(inputPath: string): string {
  const projectRoot = process.cwd();
  const resolvedPath = path.resolve(projectRoot, inputPath);
  const relativePath = path.relative(projectRoot, resolvedPath);

  if (relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
    throw new Error(
      `SECURITY ERROR: CREDENTIALS_PATH must be within project directory.\n` +
      `Attempted path: ${inputPath}\n` +
      `Resolved to: ${resolvedPath}`
    );
  }

  return resolvedPath;
}

/**
 * Reads a positive integer from the environment, falling back when unset or malformed.
 */
function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    console.warn(`Warning: ignoring invalid value for ${name}: ${raw}`);
    return fallback;
  }
  return parsed;
}

/**
 * Global configuration object for the library.
 * Values are loaded from environment variables or use default fallbacks.
 */
export const config = {
  /**
   * Google OAuth Configuration.
   * The client id/secret are only needed when an access token has to be refreshed.
   */
  google: {
    /** Google Cloud Project Client ID */
    clientId: process.env.GOOGLE_CLIENT_ID || '',
    /** Google Cloud Project Client Secret */
    clientSecret: process.env.GOOGLE_CLIENT_SECRET || '',
    /** OAuth Redirect URI registered with the consent flow that issued the credential */
    redirectUri: process.env.GOOGLE_REDIRECT_URI || 'http://localhost:3000/auth/callback',
    /** Base URL of the Photos Library REST API */
    apiBaseUrl: process.env.PHOTOS_API_BASE_URL || 'https://photoslibrary.googleapis.com/v1',
  },

  credentials: {
    /** File holding the persisted credential record (validated to prevent path traversal) */
    path: validateCredentialsPath(
      process.env.CREDENTIALS_PATH || path.join(process.cwd(), 'credentials.json')
    ),
    /** Refresh this long before the access token actually expires (default: 5 min) */
    refreshSkewMs: intFromEnv('TOKEN_REFRESH_SKEW_MS', 5 * 60 * 1000),
  },

  /**
   * HTTP transport and retry settings.
   */
  transport: {
    timeoutMs: intFromEnv('HTTP_TIMEOUT_MS', 15000),
    maxAttempts: intFromEnv('RETRY_MAX_ATTEMPTS', 3),
    baseDelayMs: intFromEnv('RETRY_BASE_DELAY_MS', 1000),
    maxDelayMs: intFromEnv('RETRY_MAX_DELAY_MS', 30000),
    /** Minimum wait after a 429 without Retry-After */
    rateLimitDelayMs: intFromEnv('RETRY_RATE_LIMIT_DELAY_MS', 30000),
  },

  cache: {
    /** Freshness window of a cached listing page (default: 5 min) */
    pageTtlMs: intFromEnv('PAGE_CACHE_TTL_MS', 5 * 60 * 1000),
    imageCacheMaxBytes: intFromEnv('IMAGE_CACHE_MAX_MB', 512) * 1024 * 1024,
  },

  loader: {
    /** Parallel image downloads per batch */
    concurrency: intFromEnv('LOADER_CONCURRENCY', 4),
    /** Overall deadline for one batch; unstarted items fail after it */
    batchDeadlineMs: intFromEnv('BATCH_DEADLINE_MS', 120000),
    albumPageSize: 50,
    mediaPageSize: 100,
  },

  /**
   * Google Photos API limits: 10,000 requests/day, 75,000 media byte requests/day
   */
  quota: {
    maxRequests: intFromEnv('QUOTA_MAX_REQUESTS', 10000),
    maxMediaRequests: intFromEnv('QUOTA_MAX_MEDIA_REQUESTS', 75000),
  },

  logger: {
    /** Minimum log level (default: 'info') */
    level: process.env.LOG_LEVEL || 'info',
    /** Optional log file; errors also go to a sibling *.error.log */
    file: process.env.LOG_FILE || '',
  },

  /**
   * MCP Server Configuration.
   */
  mcp: {
    name: process.env.MCP_SERVER_NAME || 'photo-library-loader',
    version: process.env.MCP_SERVER_VERSION || '0.1.0',
  },
};

const requiredEnvVars = [
  'GOOGLE_CLIENT_ID',
  'GOOGLE_CLIENT_SECRET',
];

requiredEnvVars.forEach(envVar => {
  if (!process.env[envVar]) {
    console.warn(`Warning: Required environment variable ${envVar} is not set; token refresh will fail.`);
  }
});

export default config;
