/**
 * Banking API Client Library
 *
 * A TypeScript client for a REST banking API: bearer-token authentication,
 * transfers, account validation, balances, account listing and transaction
 * history.
 *
 * @example
 * ```typescript
 * import { createBankingClient } from 'banking-api-client';
 *
 * const client = createBankingClient({ baseUrl: 'http://localhost:8123' });
 * await client.authenticate('alice', 'secret', 'transfer');
 * const result = await client.transfer('ACC1000', 'ACC1001', 100);
 * console.log(result.transactionId);
 * client.close();
 * ```
 */

// ============================================================================
// Banking Client
// ============================================================================

export {
  BankingClient,
  createBankingClient,
  createBankingClientFromConfig,
  type BankingClientConfig,
} from './banking/index.js';

export {
  createTransferRequest,
  validateTransferRequest,
  toTransferPayload,
  parseTransferResponse,
  parseAccountValidation,
  parseAccountBalance,
  parseAccountList,
  parseTransactionHistory,
} from './banking/index.js';

export type {
  TokenScope,
  BankingCredentials,
  TransferRequest,
  TransferResponse,
  AuthTokenResponse,
  AccountValidation,
  AccountBalance,
  AccountSummary,
  AccountList,
  TransactionRecord,
  TransactionHistory,
} from './banking/index.js';

export {
  ACCOUNT_ID_PREFIX,
  BANKING_ENDPOINTS,
  BANKING_DEFAULTS,
  TOKEN_SCOPES,
  isTokenScope,
} from './banking/index.js';

// ============================================================================
// Shared Infrastructure Exports (Advanced)
// ============================================================================

export {
  BankingError,
  ValidationError,
  HttpError,
  type BankingErrorCode,
} from './shared/errors.js';

export {
  defaultConfig,
  loadConfigFromEnv,
  loadConfigFromFile,
  getConfig,
  setConfig,
  type BankingConfig,
} from './shared/config.js';

export {
  JsonFetch,
  createJsonFetch,
  type HttpClientConfig,
  type RequestOptions,
} from './shared/utils/http-client.js';

export {
  StrategicLogger,
  LogLevel,
  parseLogLevel,
  createLogger,
} from './shared/utils/strategic-logger.js';
