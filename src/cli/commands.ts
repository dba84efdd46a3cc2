/**
 * CLI command handlers.
 *
 * Each handler runs one client operation, prints the result block and returns
 * the process exit code: 0 on success, 1 on any failure.
 */

import type { BankingClient } from '../banking/client.js';
import type { TokenScope } from '../banking/types/index.js';
import { Helpers, getErrorMessage } from '../shared/utils/helpers.js';

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line)
};

export interface Credentials {
  username: string;
  password: string;
}

export interface TransferOptions extends Credentials {
  from: string;
  to: string;
  amount: number;
  auth: boolean;
}

export interface AccountOptions {
  account: string;
}

export interface BalanceOptions extends AccountOptions {
  auth: boolean;
}

export interface ListAccountsOptions {
  auth: boolean;
}

export interface AuthOptions extends Credentials {
  scope: TokenScope;
}

function money(value: unknown): string {
  return Helpers.formatAmount(typeof value === 'number' ? value : 0);
}

function show(value: unknown): string {
  return value === undefined ? 'None' : String(value);
}

export async function handleTransfer(client: BankingClient, options: TransferOptions, out: CliOutput): Promise<number> {
  try {
    if (options.auth) {
      out.log(`🔐 Authenticating as ${options.username}...`);
      await client.authenticate(options.username, options.password, 'transfer');
    }

    out.log(`💸 Transferring ${money(options.amount)} from ${options.from} to ${options.to}...`);

    const result = await client.transfer(options.from, options.to, options.amount, options.auth);

    out.log('✅ Transfer Successful!');
    out.log(`   Transaction ID: ${result.transactionId}`);
    out.log(`   Status: ${result.status}`);
    out.log(`   Message: ${result.message}`);
    out.log(`   From: ${result.fromAccount}`);
    out.log(`   To: ${result.toAccount}`);
    out.log(`   Amount: ${money(result.amount)}`);
    return 0;
  } catch (error: unknown) {
    out.error(`❌ Transfer Failed: ${getErrorMessage(error)}`);
    return 1;
  }
}

export async function handleValidate(client: BankingClient, options: AccountOptions, out: CliOutput): Promise<number> {
  try {
    out.log(`🔍 Validating account ${options.account}...`);

    const result = await client.validateAccount(options.account);

    out.log('✅ Validation Result:');
    out.log(`   Account ID: ${show(result.accountId)}`);
    out.log(`   Valid: ${show(result.isValid)}`);
    out.log(`   Type: ${show(result.accountType)}`);
    out.log(`   Status: ${show(result.status)}`);
    if (result.bonusPoints !== undefined) {
      out.log(`   💡 Hint: ${String(result.bonusPoints)}`);
    }
    return 0;
  } catch (error: unknown) {
    out.error(`❌ Validation Failed: ${getErrorMessage(error)}`);
    return 1;
  }
}

export async function handleBalance(client: BankingClient, options: BalanceOptions, out: CliOutput): Promise<number> {
  try {
    out.log(`💰 Getting balance for account ${options.account}...`);

    const result = await client.getBalance(options.account, options.auth);

    out.log('✅ Balance Information:');
    out.log(`   Account ID: ${show(result.accountId)}`);
    out.log(`   Balance: ${money(result.balance)}`);
    out.log(`   Currency: ${result.currency ?? 'USD'}`);
    return 0;
  } catch (error: unknown) {
    out.error(`❌ Get Balance Failed: ${getErrorMessage(error)}`);
    return 1;
  }
}

export async function handleListAccounts(client: BankingClient, options: ListAccountsOptions, out: CliOutput): Promise<number> {
  try {
    out.log('📋 Listing all accounts...');

    const result = await client.listAccounts(options.auth);
    const accounts = result.accounts ?? [];

    out.log(`✅ Found ${accounts.length} accounts:`);
    accounts.forEach((account, index) => {
      out.log(`   ${index + 1}. ${show(account.accountId)}`);
      out.log(`      Type: ${show(account.accountType)}`);
      out.log(`      Status: ${show(account.status)}`);
      if (account.balance !== undefined) {
        out.log(`      Balance: ${money(account.balance)}`);
      }
    });
    return 0;
  } catch (error: unknown) {
    out.error(`❌ List Accounts Failed: ${getErrorMessage(error)}`);
    return 1;
  }
}

export async function handleHistory(client: BankingClient, options: Credentials, out: CliOutput): Promise<number> {
  try {
    out.log(`🔐 Authenticating as ${options.username}...`);
    await client.authenticate(options.username, options.password, 'transfer');

    out.log('📜 Getting transaction history...');

    const result = await client.getTransactionHistory();
    const transactions = result.transactions ?? [];

    out.log(`✅ Found ${transactions.length} transactions:`);
    transactions.forEach((tx, index) => {
      out.log(`   ${index + 1}. Transaction ID: ${show(tx.transactionId)}`);
      out.log(`      From: ${show(tx.fromAccount)} → To: ${show(tx.toAccount)}`);
      out.log(`      Amount: ${money(tx.amount)}`);
      out.log(`      Status: ${show(tx.status)}`);
      if (tx.timestamp !== undefined) {
        out.log(`      Time: ${tx.timestamp}`);
      }
    });
    return 0;
  } catch (error: unknown) {
    out.error(`❌ Get History Failed: ${getErrorMessage(error)}`);
    return 1;
  }
}

export async function handleAuth(client: BankingClient, options: AuthOptions, out: CliOutput): Promise<number> {
  try {
    out.log(`🔐 Authenticating as ${options.username} with scope '${options.scope}'...`);

    const token = await client.authenticate(options.username, options.password, options.scope);

    out.log('✅ Authentication Successful!');
    out.log(`   Token: ${Helpers.truncate(token, 50)}`);
    out.log(`   Scope: ${options.scope}`);
    return 0;
  } catch (error: unknown) {
    out.error(`❌ Authentication Failed: ${getErrorMessage(error)}`);
    return 1;
  }
}
