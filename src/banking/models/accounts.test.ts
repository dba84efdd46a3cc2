import { describe, expect, it } from 'vitest';
import { parseAccountBalance, parseAccountList, parseAccountValidation, parseTransactionHistory } from './accounts.js';

describe('account payloads', () => {
  it('keeps extra validation fields', () => {
    const result = parseAccountValidation({
      accountId: 'ACC1000',
      isValid: true,
      accountType: 'VALID_ACCOUNT',
      status: 'ACTIVE',
      bonusPoints: 'Try ACC2000 too'
    });

    expect(result.isValid).toBe(true);
    expect(result.bonusPoints).toBe('Try ACC2000 too');
  });

  it('drops a mistyped balance', () => {
    const result = parseAccountBalance({ accountId: 'ACC1000', balance: '1000', currency: 'USD' });

    expect(result.balance).toBeUndefined();
    expect(result.currency).toBe('USD');
  });

  it('skips non-object entries in the account list', () => {
    const result = parseAccountList({
      accounts: [{ accountId: 'ACC1000', balance: 12.5 }, 'ACC1001', null]
    });

    expect(result.accounts).toHaveLength(1);
    expect(result.accounts?.[0]?.balance).toBe(12.5);
  });

  it('leaves accounts undefined when the field is missing', () => {
    expect(parseAccountList({}).accounts).toBeUndefined();
  });

  it('maps transaction records', () => {
    const result = parseTransactionHistory({
      transactions: [{ transactionId: 'tx1', amount: 25, timestamp: '2024-01-01T12:00:00' }]
    });

    expect(result.transactions?.[0]).toMatchObject({ transactionId: 'tx1', amount: 25, timestamp: '2024-01-01T12:00:00' });
  });
});
