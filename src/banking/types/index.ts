// Centralized types for the banking API client

export type TokenScope = 'enquiry' | 'transfer';

export const TOKEN_SCOPES: readonly TokenScope[] = ['enquiry', 'transfer'];

export function isTokenScope(value: string): value is TokenScope {
  return value === 'enquiry' || value === 'transfer';
}

export interface BankingCredentials {
  username: string;
  password: string;
}

// ============================================================================
// Transfer records
// ============================================================================

export interface TransferRequest {
  fromAccount: string;
  toAccount: string;
  amount: number;
}

export interface TransferResponse {
  transactionId: string;
  status: string;
  message: string;
  fromAccount: string;
  toAccount: string;
  amount: number;
  timestamp?: string;
}

// ============================================================================
// Account and history payloads (passed through as returned by the API)
// ============================================================================

export interface AuthTokenResponse {
  token?: string;
  [key: string]: unknown;
}

export interface AccountValidation {
  accountId?: string;
  isValid?: boolean;
  accountType?: string;
  status?: string;
  bonusPoints?: unknown;
  [key: string]: unknown;
}

export interface AccountBalance {
  accountId?: string;
  balance?: number;
  currency?: string;
  [key: string]: unknown;
}

export interface AccountSummary {
  accountId?: string;
  accountType?: string;
  status?: string;
  balance?: number;
  [key: string]: unknown;
}

export interface AccountList {
  accounts?: AccountSummary[];
  [key: string]: unknown;
}

export interface TransactionRecord {
  transactionId?: string;
  fromAccount?: string;
  toAccount?: string;
  amount?: number;
  status?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface TransactionHistory {
  transactions?: TransactionRecord[];
  [key: string]: unknown;
}

// ============================================================================
// Constants
// ============================================================================

export const ACCOUNT_ID_PREFIX = 'ACC';

export const BANKING_ENDPOINTS = {
  AUTH_TOKEN: '/authToken',
  TRANSFER: '/transfer',
  VALIDATE_ACCOUNT: '/accounts/validate',
  BALANCE: '/accounts/balance',
  ACCOUNTS: '/accounts',
  TRANSACTION_HISTORY: '/transactions/history'
} as const;

const DEFAULT_SCOPE: TokenScope = 'transfer';

export const BANKING_DEFAULTS = {
  baseUrl: 'http://localhost:8123',
  timeoutSeconds: 10,
  username: 'alice',
  password: 'secret',
  scope: DEFAULT_SCOPE,
  /** Tokens are treated as valid for one hour after issue */
  tokenTtlMs: 60 * 60 * 1000,
  maxRetries: 3,
  backoffFactor: 1
};
