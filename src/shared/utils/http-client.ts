/**
 * Shared HTTP Client Utilities
 *
 * Provides the JSON transport used by the banking client:
 * - Per-request timeout through AbortController
 * - JSON request bodies and query parameters
 * - Retry with exponential backoff on a fixed set of status codes,
 *   network failures and timeouts
 * - `Retry-After` support for 413/429/503 responses
 *
 * ## JsonFetch
 *
 * ```typescript
 * const http = createJsonFetch({ timeout: 10000, maxRetries: 3 });
 * const data = await http.getJson('http://localhost:8123/accounts');
 * await http.getJson('http://localhost:8123/transfer', { method: 'POST', json: { amount: 10 } });
 * ```
 *
 * @see {@link JsonFetch} - Main HTTP client class
 * @see {@link createJsonFetch} - Factory function
 */

import { BankingError, HttpError } from '../errors.js';
import { Helpers, getErrorMessage } from './helpers.js';
import { createLogger } from './strategic-logger.js';

// ============================================================================
// Types
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD' | 'OPTIONS' | 'TRACE';

export interface HttpClientConfig {
  /** Request timeout in ms (default: 10000) */
  timeout?: number;
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Backoff factor in seconds; retry n waits factor * 2^(n-1) (default: 1) */
  backoffFactor?: number;
  /** Status codes that trigger a retry (default: 429, 500, 502, 503, 504) */
  retryStatuses?: readonly number[];
}

export interface RequestOptions {
  method?: HttpMethod;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  /** Serialized with JSON.stringify as the request body */
  json?: unknown;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_RETRY_STATUSES: readonly number[] = [429, 500, 502, 503, 504];
const RETRY_AFTER_STATUSES: readonly number[] = [413, 429, 503];
const MAX_BACKOFF_MS = 120_000;
const ERROR_BODY_LIMIT = 200;

const log = createLogger('HTTP');

// ============================================================================
// JsonFetch - fetch wrapper with timeout and retry
// ============================================================================

export class JsonFetch {
  private config: Required<HttpClientConfig>;

  constructor(config: HttpClientConfig = {}) {
    this.config = {
      timeout: config.timeout ?? 10000,
      maxRetries: config.maxRetries ?? 3,
      backoffFactor: config.backoffFactor ?? 1,
      retryStatuses: config.retryStatuses ?? DEFAULT_RETRY_STATUSES
    };
  }

  /**
   * Make an HTTP request, retrying retryable failures.
   * Returns the last response, whatever its status, with its body already
   * buffered: the timeout covers the body read as well as the headers.
   */
  async request(url: string, options: RequestOptions = {}): Promise<Response> {
    const method = options.method ?? 'GET';
    const target = buildUrl(url, options.query);
    const headers: Record<string, string> = {
      'Accept': 'application/json',
      ...(options.headers || {})
    };

    let body: string | undefined;
    if (options.json !== undefined) {
      body = JSON.stringify(options.json);
      if (!headers['Content-Type']) {
        headers['Content-Type'] = 'application/json';
      }
    }

    for (let attempt = 0; ; attempt++) {
      const canRetry = attempt < this.config.maxRetries;

      let response: Response;
      try {
        response = await this.send(target, method, headers, body);
      } catch (error: unknown) {
        if (!canRetry || !isTransientError(error)) {
          throw error;
        }
        const waitMs = this.backoffMs(attempt + 1);
        log.warn(`${method} ${target} failed (${getErrorMessage(error)}), retry ${attempt + 1}/${this.config.maxRetries} in ${waitMs}ms`);
        await Helpers.delay(waitMs);
        continue;
      }

      if (canRetry && this.config.retryStatuses.includes(response.status)) {
        const waitMs = this.retryAfterMs(response) ?? this.backoffMs(attempt + 1);
        log.warn(`${method} ${target} returned ${response.status}, retry ${attempt + 1}/${this.config.maxRetries} in ${waitMs}ms`);
        await Helpers.delay(waitMs);
        continue;
      }

      return response;
    }
  }

  /**
   * Request and decode a JSON body. Non-2xx responses raise {@link HttpError}.
   */
  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    const target = buildUrl(url, options.query);
    const response = await this.request(url, options);
    const text = await response.text();

    if (!response.ok) {
      throw new HttpError(response.status, response.statusText, target, text.slice(0, ERROR_BODY_LIMIT));
    }

    if (text.trim() === '') {
      return null;
    }

    try {
      return JSON.parse(text);
    } catch (error: unknown) {
      throw new BankingError(`Invalid JSON from ${target}: ${getErrorMessage(error)}`, 'INVALID_JSON', response.status);
    }
  }

  getConfig(): Readonly<Required<HttpClientConfig>> {
    return this.config;
  }

  private async send(
    url: string,
    method: HttpMethod,
    headers: Record<string, string>,
    body: string | undefined
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      log.network(`[${method}] ${url}`);

      const response = await fetch(url, {
        method,
        headers,
        body,
        signal: controller.signal
      });

      log.network(`[Response] ${response.status} ${response.statusText}`);

      const text = await response.text();
      return new Response(text === '' ? null : text, {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers
      });

    } catch (error: unknown) {
      if (controller.signal.aborted) {
        throw new BankingError(`Request timeout after ${this.config.timeout}ms`, 'TIMEOUT');
      }
      throw new BankingError(`Request to ${url} failed: ${getErrorMessage(error)}`, 'NETWORK_ERROR');
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private backoffMs(retryNumber: number): number {
    const seconds = this.config.backoffFactor * 2 ** (retryNumber - 1);
    return Math.min(seconds * 1000, MAX_BACKOFF_MS);
  }

  private retryAfterMs(response: Response): number | null {
    if (!RETRY_AFTER_STATUSES.includes(response.status)) {
      return null;
    }
    return parseRetryAfter(response.headers.get('retry-after'));
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isTransientError(error: unknown): boolean {
  return error instanceof BankingError && (error.code === 'NETWORK_ERROR' || error.code === 'TIMEOUT');
}

/**
 * Parse a `Retry-After` header (delta seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (value === null || value.trim() === '') {
    return null;
  }

  if (/^\d+$/.test(value.trim())) {
    return Math.min(Number(value.trim()) * 1000, MAX_BACKOFF_MS);
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.min(Math.max(date - now, 0), MAX_BACKOFF_MS);
}

export function buildUrl(url: string, query?: Record<string, string>): string {
  if (!query || Object.keys(query).length === 0) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a new JsonFetch instance
 */
export function createJsonFetch(config?: HttpClientConfig): JsonFetch {
  return new JsonFetch(config);
}
