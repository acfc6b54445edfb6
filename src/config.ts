/**
 * Shared Application Configuration
 *
 * Centralizes environment variable access for the HTTP API and the review
 * session registry. Enrollment targets and the review bot keep their own
 * config modules (src/enrollment/config.ts, src/bot/config.ts).
 *
 * Environment variables:
 * - APP_ENV: 'production' or anything else (development)
 * - PORT: HTTP server port (default 8000)
 * - SESSION_TTL_MINUTES: Idle lifetime of a review session (default 1440, 0 = never expire)
 * - SESSION_MAX_COUNT: Maximum live sessions before the least recently used is evicted (default 1000)
 * - MAX_UPLOAD_BYTES: Largest accepted CSV upload (default 5 MB)
 * - CSV_LINKEDIN_COLUMN: Header of the LinkedIn URL column (default "What is your LinkedIn profile?")
 */

import 'dotenv/config';

export interface AppConfig {
  isDev: boolean;
  server: {
    port: number;
    maxUploadBytes: number;
  };
  sessions: {
    /** Sliding idle lifetime in milliseconds; 0 disables expiry */
    ttlMs: number;
    maxCount: number;
  };
  csv: {
    linkedinColumn: string;
  };
}

export const DEFAULT_LINKEDIN_COLUMN = 'What is your LinkedIn profile?';

export function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

/** Reads a non-negative integer env var; blank or unset means `fallback`. */
export function intEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid value for ${key}: expected a non-negative integer, got "${raw}"`);
  }
  return value;
}

const isDev = optionalEnv('APP_ENV', 'development') !== 'production';

export const appConfig: AppConfig = {
  isDev,
  server: {
    port: intEnv('PORT', 8000),
    maxUploadBytes: intEnv('MAX_UPLOAD_BYTES', 5 * 1024 * 1024),
  },
  sessions: {
    ttlMs: intEnv('SESSION_TTL_MINUTES', 24 * 60) * 60 * 1000,
    maxCount: intEnv('SESSION_MAX_COUNT', 1000),
  },
  csv: {
    linkedinColumn: optionalEnv('CSV_LINKEDIN_COLUMN', DEFAULT_LINKEDIN_COLUMN),
  },
};
