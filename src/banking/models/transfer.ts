/**
 * Transfer request/response helpers.
 *
 * Requests are validated locally before anything is sent; responses are
 * mapped field by field with defaults for anything missing or mistyped.
 */

import { ValidationError } from '../../shared/errors.js';
import { ACCOUNT_ID_PREFIX, type TransferRequest, type TransferResponse } from '../types/index.js';

export function createTransferRequest(fromAccount: string, toAccount: string, amount: number): TransferRequest {
  return { fromAccount, toAccount, amount };
}

/**
 * Throws {@link ValidationError} on the first problem found.
 */
export function validateTransferRequest(request: TransferRequest): void {
  if (!request.fromAccount || !request.toAccount) {
    throw new ValidationError('Both fromAccount and toAccount are required');
  }

  if (!request.fromAccount.startsWith(ACCOUNT_ID_PREFIX)) {
    throw new ValidationError(`Invalid fromAccount format: ${request.fromAccount}`, 'fromAccount');
  }

  if (!request.toAccount.startsWith(ACCOUNT_ID_PREFIX)) {
    throw new ValidationError(`Invalid toAccount format: ${request.toAccount}`, 'toAccount');
  }

  if (!Number.isFinite(request.amount) || request.amount <= 0) {
    throw new ValidationError(`Amount must be positive, got: ${request.amount}`, 'amount');
  }
}

export function toTransferPayload(request: TransferRequest): Record<string, unknown> {
  return {
    fromAccount: request.fromAccount,
    toAccount: request.toAccount,
    amount: request.amount
  };
}

export function parseTransferResponse(data: unknown): TransferResponse {
  const record = isRecord(data) ? data : {};

  const response: TransferResponse = {
    transactionId: stringField(record, 'transactionId', ''),
    status: stringField(record, 'status', 'UNKNOWN'),
    message: stringField(record, 'message', ''),
    fromAccount: stringField(record, 'fromAccount', ''),
    toAccount: stringField(record, 'toAccount', ''),
    amount: numberField(record, 'amount', 0)
  };

  if (typeof record.timestamp === 'string') {
    response.timestamp = record.timestamp;
  }

  return response;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string, fallback: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : fallback;
}

function numberField(record: Record<string, unknown>, key: string, fallback: number): number {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}
