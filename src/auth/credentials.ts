import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import config from '../utils/config.js';
import logger from '../utils/logger.js';

/**
 * OAuth credential pair held by the credential manager.
 */
export interface Credential {
  /** OAuth2 access token */
  access_token: string;
  /** Expiration timestamp (in milliseconds) */
  expires_at: number;
  /** OAuth2 refresh token, immutable once issued */
  refresh_token: string;
}

export const CREDENTIAL_SCHEMA_VERSION = 1;

/**
 * On-disk record. Unknown keys are stripped so files written by a newer
 * version still load; `expiry_date` is what google-auth-library writes.
 */
const credentialRecordSchema = z
  .object({
    schema_version: z.number().int().min(1).optional(),
    access_token: z.string().min(1),
    refresh_token: z.string().min(1),
    expires_at: z.number().nonnegative().optional(),
    expiry_date: z.number().nonnegative().optional(),
  })
  .refine(record => record.expires_at !== undefined || record.expiry_date !== undefined, {
    message: 'expires_at is required',
    path: ['expires_at'],
  });

/**
 * Persistence seam for the credential manager.
 */
export interface CredentialStore {
  /** Resolves to null when no credential has been stored yet */
  load(): Promise<Credential | null>;
  save(credential: Credential): Promise<void>;
}

/**
 * Parses a persisted credential record.
 *
 * @returns The credential, or null when the content is not a usable record
 */
export function parseCredentialRecord(content: string): Credential | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    logger.warn(`Credential file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  const result = credentialRecordSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
    logger.warn(`Credential file does not match the expected format: ${issues}`);
    return null;
  }

  const record = result.data;
  if (record.schema_version !== undefined && record.schema_version > CREDENTIAL_SCHEMA_VERSION) {
    logger.debug(`Reading credential record written with schema_version ${record.schema_version}`);
  }

  return {
    access_token: record.access_token,
    refresh_token: record.refresh_token,
    expires_at: record.expires_at ?? record.expiry_date ?? 0,
  };
}

export function serializeCredentialRecord(credential: Credential): string {
  return JSON.stringify(
    {
      schema_version: CREDENTIAL_SCHEMA_VERSION,
      access_token: credential.access_token,
      expires_at: credential.expires_at,
      refresh_token: credential.refresh_token,
    },
    null,
    2,
  );
}

/**
 * Stores the single credential record as a JSON file.
 * Writes go to a temporary sibling first and are renamed into place, so a
 * reader never sees a half-written record.
 */
export class FileCredentialStore implements CredentialStore {
  constructor(private readonly filePath: string = config.credentials.path) {}

  async load(): Promise<Credential | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info(`No credential file at ${this.filePath}`);
        return null;
      }
      throw error;
    }
    return parseCredentialRecord(content);
  }

  async save(credential: Credential): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, serializeCredentialRecord(credential), { mode: 0o600 });
    await fs.rename(tempPath, this.filePath);
    logger.debug(`Saved credential record to ${this.filePath}`);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
