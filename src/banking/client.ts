/**
 * BankingClient - HTTP client for the banking API
 *
 * Wraps the REST endpoints with local input validation, optional bearer-token
 * authentication and typed response mapping.
 *
 * ## Token handling
 *
 * `authenticate()` stores the token returned by `POST /authToken` and treats it
 * as valid for `tokenTtlMs` (one hour by default). Authenticated calls reuse an
 * unexpired token and log in again, with the last credentials used, once it is
 * missing or expired.
 *
 * ## Endpoints
 *
 * | Method                    | Request                           | Auth            |
 * |---------------------------|-----------------------------------|-----------------|
 * | `authenticate`            | `POST /authToken?claim=<scope>`   | -               |
 * | `transfer`                | `POST /transfer`                  | optional (on)   |
 * | `validateAccount`         | `GET /accounts/validate/{id}`     | -               |
 * | `getBalance`              | `GET /accounts/balance/{id}`      | optional (off)  |
 * | `listAccounts`            | `GET /accounts`                   | optional (off)  |
 * | `getTransactionHistory`   | `GET /transactions/history`       | always          |
 *
 * @example
 * ```typescript
 * const client = createBankingClient({ baseUrl: 'http://localhost:8123' });
 *
 * await client.authenticate('alice', 'secret', 'transfer');
 * const result = await client.transfer('ACC1000', 'ACC1001', 100);
 * client.close();
 * ```
 */

import { BankingError, ValidationError } from '../shared/errors.js';
import type { BankingConfig } from '../shared/config.js';
import { JsonFetch, type RequestOptions } from '../shared/utils/http-client.js';
import { Helpers, getErrorMessage } from '../shared/utils/helpers.js';
import { createLogger } from '../shared/utils/strategic-logger.js';
import {
  parseAccountBalance,
  parseAccountList,
  parseAccountValidation,
  parseTransactionHistory
} from './models/accounts.js';
import {
  createTransferRequest,
  isRecord,
  parseTransferResponse,
  toTransferPayload,
  validateTransferRequest
} from './models/transfer.js';
import {
  BANKING_DEFAULTS,
  BANKING_ENDPOINTS,
  type AccountBalance,
  type AccountList,
  type AccountValidation,
  type BankingCredentials,
  type TokenScope,
  type TransactionHistory,
  type TransferResponse
} from './types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface BankingClientConfig {
  /** API base URL (default: http://localhost:8123) */
  baseUrl?: string;
  /** Request timeout in ms (default: 10000) */
  timeout?: number;
  /** Retries on 429/5xx, network errors and timeouts (default: 3) */
  maxRetries?: number;
  /** Exponential backoff factor in seconds (default: 1) */
  backoffFactor?: number;
  /** How long an issued token is trusted, in ms (default: one hour) */
  tokenTtlMs?: number;
  /** Credentials used when authentication has to happen implicitly */
  credentials?: BankingCredentials;
  /** Scope used by `authenticate()` when none is given (default: transfer) */
  defaultScope?: TokenScope;
}

const log = createLogger('BankingClient');

// ============================================================================
// BankingClient
// ============================================================================

export class BankingClient {
  readonly baseUrl: string;
  readonly timeout: number;
  private tokenTtlMs: number;
  private defaultScope: TokenScope;
  private credentials: BankingCredentials;
  private http: JsonFetch;
  private token: string | null = null;
  private tokenExpiry: Date | null = null;
  private closed: boolean = false;

  constructor(config: BankingClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? BANKING_DEFAULTS.baseUrl).replace(/\/+$/, '');
    this.timeout = config.timeout ?? BANKING_DEFAULTS.timeoutSeconds * 1000;
    this.tokenTtlMs = config.tokenTtlMs ?? BANKING_DEFAULTS.tokenTtlMs;
    this.defaultScope = config.defaultScope ?? BANKING_DEFAULTS.scope;
    this.credentials = config.credentials ?? {
      username: BANKING_DEFAULTS.username,
      password: BANKING_DEFAULTS.password
    };

    this.http = new JsonFetch({
      timeout: this.timeout,
      maxRetries: config.maxRetries ?? BANKING_DEFAULTS.maxRetries,
      backoffFactor: config.backoffFactor ?? BANKING_DEFAULTS.backoffFactor
    });

    log.info(`BankingClient initialized with base_url: ${this.baseUrl}`);
  }

  // ==========================================================================
  // Authentication
  // ==========================================================================

  /**
   * Obtain a bearer token for the given scope and keep it on the client.
   */
  async authenticate(
    username: string = this.credentials.username,
    password: string = this.credentials.password,
    scope: TokenScope = this.defaultScope
  ): Promise<string> {
    log.info(`Authenticating user '${username}' with scope '${scope}'`);
    log.debug('Credentials', { username, password: Helpers.maskSensitiveData(password, 0) });

    const data = await this.call('Authentication', BANKING_ENDPOINTS.AUTH_TOKEN, {
      method: 'POST',
      query: { claim: scope },
      json: { username, password }
    });

    const token = data.token;
    if (typeof token !== 'string' || token === '') {
      log.error('Authentication response did not include a token');
      throw new BankingError('Authentication response did not include a token', 'AUTH_ERROR');
    }

    this.token = token;
    this.tokenExpiry = new Date(Date.now() + this.tokenTtlMs);
    this.credentials = { username, password };

    log.info('Authentication successful');
    return token;
  }

  /**
   * Re-authenticate when no token is held or the held one has expired.
   * Renewal reuses the credentials of the last successful `authenticate()`,
   * or the configured ones before any login.
   */
  async ensureAuthenticated(scope: TokenScope = 'transfer'): Promise<void> {
    if (this.isAuthenticated()) {
      return;
    }
    log.info('Token expired or missing, re-authenticating');
    await this.authenticate(this.credentials.username, this.credentials.password, scope);
  }

  isAuthenticated(): boolean {
    return this.token !== null && this.tokenExpiry !== null && Date.now() < this.tokenExpiry.getTime();
  }

  getToken(): string | null {
    return this.token;
  }

  getTokenExpiry(): Date | null {
    return this.tokenExpiry;
  }

  /**
   * Request headers, with the bearer token when `useAuth` is set and a token is held.
   */
  getHeaders(useAuth: boolean = false): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };

    if (useAuth && this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    return headers;
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /**
   * Transfer funds between two accounts. Input is validated before any request.
   */
  async transfer(
    fromAccount: string,
    toAccount: string,
    amount: number,
    useAuth: boolean = true
  ): Promise<TransferResponse> {
    const request = createTransferRequest(fromAccount, toAccount, amount);
    validateTransferRequest(request);

    if (useAuth) {
      await this.ensureAuthenticated('transfer');
    }

    log.info(`Initiating transfer: ${fromAccount} -> ${toAccount}, amount: ${amount}`);

    const data = await this.call('Transfer', BANKING_ENDPOINTS.TRANSFER, {
      method: 'POST',
      headers: this.getHeaders(useAuth),
      json: toTransferPayload(request)
    });

    const result = parseTransferResponse(data);
    log.info(`Transfer successful: ${result.transactionId}`);
    return result;
  }

  /**
   * Check whether an account exists and is active.
   */
  async validateAccount(accountId: string): Promise<AccountValidation> {
    const id = requireAccountId(accountId);
    log.info(`Validating account: ${id}`);

    const data = await this.call('Account validation', `${BANKING_ENDPOINTS.VALIDATE_ACCOUNT}/${encodeURIComponent(id)}`, {
      method: 'GET'
    });

    const result = parseAccountValidation(data);
    log.info(`Account ${id} validation result: ${String(result.isValid)}`);
    return result;
  }

  async getBalance(accountId: string, useAuth: boolean = false): Promise<AccountBalance> {
    const id = requireAccountId(accountId);

    if (useAuth) {
      await this.ensureAuthenticated('enquiry');
    }

    log.info(`Getting balance for account: ${id}`);

    const data = await this.call('Get balance', `${BANKING_ENDPOINTS.BALANCE}/${encodeURIComponent(id)}`, {
      method: 'GET',
      headers: this.getHeaders(useAuth)
    });

    const result = parseAccountBalance(data);
    log.info(`Balance for ${id}: ${String(result.balance)}`);
    return result;
  }

  async listAccounts(useAuth: boolean = false): Promise<AccountList> {
    if (useAuth) {
      await this.ensureAuthenticated('enquiry');
    }

    log.info('Listing all accounts');

    const data = await this.call('List accounts', BANKING_ENDPOINTS.ACCOUNTS, {
      method: 'GET',
      headers: this.getHeaders(useAuth)
    });

    return parseAccountList(data);
  }

  /**
   * Transaction history always requires a token.
   */
  async getTransactionHistory(): Promise<TransactionHistory> {
    await this.ensureAuthenticated('transfer');

    log.info('Getting transaction history');

    const data = await this.call('Get transaction history', BANKING_ENDPOINTS.TRANSACTION_HISTORY, {
      method: 'GET',
      headers: this.getHeaders(true)
    });

    return parseTransactionHistory(data);
  }

  /**
   * Drop the token; the client rejects further calls.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.token = null;
    this.tokenExpiry = null;
    log.info('BankingClient closed');
  }

  isClosed(): boolean {
    return this.closed;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async call(label: string, path: string, options: RequestOptions): Promise<Record<string, unknown>> {
    if (this.closed) {
      throw new BankingError('Client is closed', 'CLIENT_CLOSED');
    }

    const operationId = log.startOperation(label);

    try {
      const data = await this.http.getJson(`${this.baseUrl}${path}`, options);
      if (!isRecord(data)) {
        throw new BankingError(`Unexpected response body from ${path}`, 'UNEXPECTED_RESPONSE');
      }
      return data;
    } catch (error: unknown) {
      log.error(`${label} failed: ${getErrorMessage(error)}`, error);
      throw error;
    } finally {
      log.endOperation(operationId);
    }
  }
}

function requireAccountId(accountId: string): string {
  const id = accountId.trim();
  if (!id) {
    throw new ValidationError('Account id is required', 'accountId');
  }
  return id;
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a new BankingClient instance
 */
export function createBankingClient(config?: BankingClientConfig): BankingClient {
  return new BankingClient(config);
}

/**
 * Create a BankingClient from a loaded {@link BankingConfig}
 */
export function createBankingClientFromConfig(config: BankingConfig): BankingClient {
  return new BankingClient({
    baseUrl: config.apiBaseUrl,
    timeout: config.apiTimeout * 1000,
    maxRetries: config.maxRetries,
    backoffFactor: config.backoffFactor,
    credentials: {
      username: config.defaultUsername,
      password: config.defaultPassword
    },
    defaultScope: config.defaultScope
  });
}
