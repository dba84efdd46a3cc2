/**
 * Banking API Client
 *
 * ```typescript
 * import { createBankingClient } from './banking/index.js';
 *
 * const client = createBankingClient({ baseUrl: 'http://localhost:8123' });
 * const balance = await client.getBalance('ACC1000');
 * client.close();
 * ```
 */

export {
  BankingClient,
  createBankingClient,
  createBankingClientFromConfig,
  type BankingClientConfig,
} from './client.js';

export {
  createTransferRequest,
  validateTransferRequest,
  toTransferPayload,
  parseTransferResponse,
} from './models/transfer.js';

export {
  parseAccountValidation,
  parseAccountBalance,
  parseAccountList,
  parseTransactionHistory,
} from './models/accounts.js';

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
} from './types/index.js';

export {
  ACCOUNT_ID_PREFIX,
  BANKING_ENDPOINTS,
  BANKING_DEFAULTS,
  TOKEN_SCOPES,
  isTokenScope,
} from './types/index.js';
