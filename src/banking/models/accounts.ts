/**
 * Mapping for account, balance and history payloads.
 *
 * Known fields are kept only when they carry the expected JSON type; any
 * other fields the API returns are passed through untouched.
 */

import type {
  AccountBalance,
  AccountList,
  AccountSummary,
  AccountValidation,
  TransactionHistory,
  TransactionRecord
} from '../types/index.js';
import { isRecord } from './transfer.js';

export function parseAccountValidation(record: Record<string, unknown>): AccountValidation {
  return {
    ...record,
    accountId: optionalString(record.accountId),
    isValid: typeof record.isValid === 'boolean' ? record.isValid : undefined,
    accountType: optionalString(record.accountType),
    status: optionalString(record.status)
  };
}

export function parseAccountBalance(record: Record<string, unknown>): AccountBalance {
  return {
    ...record,
    accountId: optionalString(record.accountId),
    balance: optionalNumber(record.balance),
    currency: optionalString(record.currency)
  };
}

export function parseAccountSummary(record: Record<string, unknown>): AccountSummary {
  return {
    ...record,
    accountId: optionalString(record.accountId),
    accountType: optionalString(record.accountType),
    status: optionalString(record.status),
    balance: optionalNumber(record.balance)
  };
}

export function parseAccountList(record: Record<string, unknown>): AccountList {
  return {
    ...record,
    accounts: Array.isArray(record.accounts)
      ? record.accounts.filter(isRecord).map(parseAccountSummary)
      : undefined
  };
}

export function parseTransactionRecord(record: Record<string, unknown>): TransactionRecord {
  return {
    ...record,
    transactionId: optionalString(record.transactionId),
    fromAccount: optionalString(record.fromAccount),
    toAccount: optionalString(record.toAccount),
    amount: optionalNumber(record.amount),
    status: optionalString(record.status),
    timestamp: optionalString(record.timestamp)
  };
}

export function parseTransactionHistory(record: Record<string, unknown>): TransactionHistory {
  return {
    ...record,
    transactions: Array.isArray(record.transactions)
      ? record.transactions.filter(isRecord).map(parseTransactionRecord)
      : undefined
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
