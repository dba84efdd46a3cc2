/**
 * Banking client configuration.
 *
 * Values come from defaults, the process environment, and optionally a
 * `.env` file loaded with dotenv:
 *
 * | Variable              | Field            | Default                 |
 * |-----------------------|------------------|-------------------------|
 * | `BANKING_API_URL`     | `apiBaseUrl`     | `http://localhost:8123` |
 * | `BANKING_API_TIMEOUT` | `apiTimeout` (s) | `10`                    |
 * | `BANKING_USERNAME`    | `defaultUsername`| `alice`                 |
 * | `BANKING_PASSWORD`    | `defaultPassword`| `secret`                |
 * | `BANKING_SCOPE`       | `defaultScope`   | `transfer`              |
 * | `MAX_RETRIES`         | `maxRetries`     | `3`                     |
 * | `BACKOFF_FACTOR`      | `backoffFactor`  | `1`                     |
 * | `LOG_LEVEL`           | `logLevel`       | `info`                  |
 */

import { resolve } from 'path';
import dotenv from 'dotenv';
import { BANKING_DEFAULTS, isTokenScope, type TokenScope } from '../banking/types/index.js';
import { ValidationError } from './errors.js';
import { isLogLevelName, type LogLevelName } from './utils/strategic-logger.js';

export interface BankingConfig {
  apiBaseUrl: string;
  /** Request timeout in seconds */
  apiTimeout: number;
  defaultUsername: string;
  defaultPassword: string;
  defaultScope: TokenScope;
  maxRetries: number;
  backoffFactor: number;
  logLevel: LogLevelName;
}

export type Env = Record<string, string | undefined>;

export function defaultConfig(): BankingConfig {
  return {
    apiBaseUrl: BANKING_DEFAULTS.baseUrl,
    apiTimeout: BANKING_DEFAULTS.timeoutSeconds,
    defaultUsername: BANKING_DEFAULTS.username,
    defaultPassword: BANKING_DEFAULTS.password,
    defaultScope: BANKING_DEFAULTS.scope,
    maxRetries: BANKING_DEFAULTS.maxRetries,
    backoffFactor: BANKING_DEFAULTS.backoffFactor,
    logLevel: 'info'
  };
}

/**
 * Build a config from environment variables, falling back to defaults.
 * Throws {@link ValidationError} for malformed values.
 */
export function loadConfigFromEnv(env: Env = process.env): BankingConfig {
  const defaults = defaultConfig();

  const scope = readString(env, 'BANKING_SCOPE', defaults.defaultScope);
  if (!isTokenScope(scope)) {
    throw new ValidationError(`BANKING_SCOPE must be 'enquiry' or 'transfer', got: ${scope}`, 'BANKING_SCOPE');
  }

  const logLevel = readString(env, 'LOG_LEVEL', defaults.logLevel).toLowerCase();
  const normalizedLevel = logLevel === 'warning' ? 'warn' : logLevel;
  if (!isLogLevelName(normalizedLevel)) {
    throw new ValidationError(`LOG_LEVEL is not a known level: ${logLevel}`, 'LOG_LEVEL');
  }

  return {
    apiBaseUrl: readString(env, 'BANKING_API_URL', defaults.apiBaseUrl),
    apiTimeout: readNumber(env, 'BANKING_API_TIMEOUT', defaults.apiTimeout, { integer: true, min: 1 }),
    defaultUsername: readString(env, 'BANKING_USERNAME', defaults.defaultUsername),
    defaultPassword: readString(env, 'BANKING_PASSWORD', defaults.defaultPassword),
    defaultScope: scope,
    maxRetries: readNumber(env, 'MAX_RETRIES', defaults.maxRetries, { integer: true, min: 0 }),
    backoffFactor: readNumber(env, 'BACKOFF_FACTOR', defaults.backoffFactor, { min: 0 }),
    logLevel: normalizedLevel
  };
}

/**
 * Load a `.env` file (when present) into the environment, then read the config.
 * Variables already set in the environment win over the file.
 */
export function loadConfigFromFile(filepath: string = '.env', env: Env = process.env): BankingConfig {
  const loaded: Record<string, string> = {};
  dotenv.config({ path: resolve(filepath), processEnv: loaded });

  for (const [key, value] of Object.entries(loaded)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return loadConfigFromEnv(env);
}

// ============================================================================
// Process-wide instance
// ============================================================================

let current: BankingConfig | null = null;

export function getConfig(): BankingConfig {
  if (current === null) {
    current = loadConfigFromEnv();
  }
  return current;
}

export function setConfig(config: BankingConfig | null): void {
  current = config;
}

// ============================================================================
// Helpers
// ============================================================================

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined || value.trim() === '' ? fallback : value.trim();
}

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  rules: { integer?: boolean; min?: number } = {}
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw.trim());
  if (!Number.isFinite(value) || (rules.integer && !Number.isInteger(value))) {
    throw new ValidationError(`${key} must be a${rules.integer ? 'n integer' : ' number'}, got: ${raw}`, key);
  }
  if (rules.min !== undefined && value < rules.min) {
    throw new ValidationError(`${key} must be >= ${rules.min}, got: ${raw}`, key);
  }
  return value;
}
