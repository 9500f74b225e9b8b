/**
 * Environment configuration loader with validation.
 * Supplies the defaults every verifier starts from; per-verifier options
 * (see ./options) override them.
 */

import dotenv from 'dotenv';
import { join } from 'path';

// Load .env file from root directory
dotenv.config({ path: join(__dirname, '../../.env') });

export type MxBackendKind = 'doh' | 'dns';

export interface Config {
  nodeEnv: string;

  // Every dataset from bundled lists, no network checks
  offline: boolean;

  // Redis-backed MX cache (in-memory when disabled)
  redis: {
    enabled: boolean;
    url: string;
    keyPrefix: string;
  };

  // HTTP client for remote lists, DNS-over-HTTPS and avatar lookups
  http: {
    timeoutMs: number;
    maxRetries: number;                 // Retries on 5xx / network failure
    initialRetryDelayMs: number;
    retryBackoffFactor: number;
    userAgent: string;
  };

  mx: {
    backend: MxBackendKind;
    dohEndpoint: string;
    cacheTtlMs: number;
  };

  avatar: {
    baseUrl: string;
  };

  smtp: {
    timeoutMs: number;                  // Connect timeout and per-reply read timeout
    maxRetries: number;                 // Attempts per MX host
    port: number;
    heloDomain: string;
    mailFrom: string;
  };
}

/**
 * Parse environment variable as integer with validation
 * @throws Error if value is invalid or out of range
 */
export function getEnvInt(
  key: string,
  defaultValue: number,
  options: { min?: number; max?: number; required?: boolean } = {}
): number {
  const value = process.env[key];

  if (!value) {
    if (options.required) {
      throw new Error(`Required environment variable ${key} is not set`);
    }
    return defaultValue;
  }

  const parsed = parseInt(value, 10);

  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key}="${value}" is not a valid integer`);
  }

  if (options.min !== undefined && parsed < options.min) {
    throw new Error(`Environment variable ${key}=${parsed} is below minimum ${options.min}`);
  }

  if (options.max !== undefined && parsed > options.max) {
    throw new Error(`Environment variable ${key}=${parsed} exceeds maximum ${options.max}`);
  }

  return parsed;
}

/**
 * Parse environment variable as float with validation
 */
export function getEnvFloat(
  key: string,
  defaultValue: number,
  options: { min?: number; max?: number } = {}
): number {
  const value = process.env[key];

  if (!value) return defaultValue;

  const parsed = parseFloat(value);

  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key}="${value}" is not a valid number`);
  }

  if (options.min !== undefined && parsed < options.min) {
    throw new Error(`Environment variable ${key}=${parsed} is below minimum ${options.min}`);
  }

  if (options.max !== undefined && parsed > options.max) {
    throw new Error(`Environment variable ${key}=${parsed} exceeds maximum ${options.max}`);
  }

  return parsed;
}

/**
 * Get environment variable as string with fallback default
 * @throws Error if required variable is not set
 */
export function getEnvString(key: string, defaultValue: string, required: boolean = false): string {
  const value = process.env[key];

  if (!value && required) {
    throw new Error(`Required environment variable ${key} is not set`);
  }

  return value || defaultValue;
}

/**
 * Boolean flag: "true"/"1"/"yes" and "false"/"0"/"no", case-insensitive
 */
export function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key]?.trim().toLowerCase();

  if (!value) return defaultValue;
  if (value === 'true' || value === '1' || value === 'yes') return true;
  if (value === 'false' || value === '0' || value === 'no') return false;

  throw new Error(`Environment variable ${key}="${value}" is not a valid boolean`);
}

function getEnvMxBackend(key: string, defaultValue: MxBackendKind): MxBackendKind {
  const value = process.env[key]?.trim().toLowerCase();

  if (!value) return defaultValue;
  if (value === 'doh' || value === 'dns') return value;

  throw new Error(`Environment variable ${key}="${value}" must be "doh" or "dns"`);
}

/**
 * Read the configuration from the current environment
 */
export function loadConfig(): Config {
  return {
    nodeEnv: getEnvString('NODE_ENV', 'development'),
    offline: getEnvBool('VERIMAIL_OFFLINE', false),

    redis: {
      enabled: getEnvBool('REDIS_ENABLED', false),
      url: getEnvString('REDIS_URL', 'redis://localhost:6379'),
      keyPrefix: getEnvString('REDIS_KEY_PREFIX', 'verimail:'),
    },

    http: {
      timeoutMs: getEnvInt('HTTP_TIMEOUT_MS', 10000, { min: 100, max: 120000 }),
      maxRetries: getEnvInt('HTTP_MAX_RETRIES', 3, { min: 0, max: 10 }),
      initialRetryDelayMs: getEnvInt('HTTP_INITIAL_RETRY_DELAY_MS', 500, { min: 0 }),
      retryBackoffFactor: getEnvFloat('HTTP_RETRY_BACKOFF_FACTOR', 2, { min: 1, max: 10 }),
      userAgent: getEnvString('HTTP_USER_AGENT', 'verimail/1.0'),
    },

    mx: {
      backend: getEnvMxBackend('MX_BACKEND', 'doh'),
      dohEndpoint: getEnvString('MX_DOH_ENDPOINT', 'https://dns.google/resolve'),
      cacheTtlMs: getEnvInt('MX_CACHE_TTL_SECONDS', 600, { min: 0 }) * 1000,
    },

    avatar: {
      baseUrl: getEnvString('AVATAR_BASE_URL', 'https://www.gravatar.com/avatar'),
    },

    smtp: {
      timeoutMs: getEnvInt('SMTP_TIMEOUT_MS', 5000, { min: 100, max: 120000 }),
      maxRetries: getEnvInt('SMTP_MAX_RETRIES', 2, { min: 1, max: 10 }),
      port: getEnvInt('SMTP_PORT', 25, { min: 1, max: 65535 }),
      heloDomain: getEnvString('SMTP_HELO_DOMAIN', 'example.com'),
      mailFrom: getEnvString('SMTP_MAIL_FROM', 'check@example.com'),
    },
  };
}

export const config: Config = loadConfig();
