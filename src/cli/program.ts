/**
 * Banking CLI
 *
 * Usage:
 *   banking transfer --from ACC1000 --to ACC1001 --amount 100 --auth
 *   banking transfer --from ACC1002 --to ACC1003 --amount 50
 *   banking validate --account ACC1000
 *   banking balance --account ACC1000
 *   banking list-accounts
 *   banking history
 *   banking auth --scope enquiry
 *
 * Global options `--url` and `--timeout` (seconds) override the loaded config.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { createBankingClientFromConfig, type BankingClient } from '../banking/client.js';
import { TOKEN_SCOPES } from '../banking/types/index.js';
import type { BankingConfig } from '../shared/config.js';
import {
  consoleOutput,
  handleAuth,
  handleBalance,
  handleHistory,
  handleListAccounts,
  handleTransfer,
  handleValidate,
  type AuthOptions,
  type BalanceOptions,
  type AccountOptions,
  type CliOutput,
  type Credentials,
  type ListAccountsOptions,
  type TransferOptions
} from './commands.js';

export interface CliDependencies {
  config: BankingConfig;
  createClient?: (config: BankingConfig) => BankingClient;
  output?: CliOutput;
}

type GlobalOptions = {
  url: string;
  timeout: number;
};

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export function parseAmount(value: string): number {
  const amount = Number.parseFloat(value);
  if (!DECIMAL_PATTERN.test(value.trim()) || !Number.isFinite(amount)) {
    throw new InvalidArgumentError('Amount must be a number.');
  }
  return amount;
}

export function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive integer (seconds).');
  }
  return timeout;
}

/**
 * Build the commander program. Every action stores its handler's exit code
 * through `setExitCode`.
 */
export function createProgram(deps: CliDependencies, setExitCode: (code: number) => void): Command {
  const { config } = deps;
  const output = deps.output ?? consoleOutput;
  const createClient = deps.createClient ?? createBankingClientFromConfig;

  const program = new Command();

  program
    .name('banking')
    .description('Command-line access to the banking API')
    .version('1.0.0')
    .option('--url <url>', 'Banking API base URL', config.apiBaseUrl)
    .option('--timeout <seconds>', 'Request timeout in seconds', parseTimeout, config.apiTimeout)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => output.log(str.trimEnd()),
      writeErr: (str) => output.error(str.trimEnd())
    });

  const run = async <T>(
    command: Command,
    options: T,
    handler: (client: BankingClient, options: T, out: CliOutput) => Promise<number>
  ): Promise<void> => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const client = createClient({ ...config, apiBaseUrl: globals.url, apiTimeout: globals.timeout });
    try {
      setExitCode(await handler(client, options, output));
    } finally {
      client.close();
    }
  };

  program
    .command('transfer')
    .description('Transfer funds between accounts')
    .requiredOption('--from <account>', 'Source account ID (e.g., ACC1000)')
    .requiredOption('--to <account>', 'Destination account ID (e.g., ACC1001)')
    .requiredOption('--amount <amount>', 'Transfer amount', parseAmount)
    .option('--auth', 'Use JWT authentication', false)
    .option('--username <username>', 'Username for authentication', config.defaultUsername)
    .option('--password <password>', 'Password for authentication', config.defaultPassword)
    .action((options: TransferOptions, command: Command) => run(command, options, handleTransfer));

  program
    .command('validate')
    .description('Validate account')
    .requiredOption('--account <account>', 'Account ID to validate')
    .action((options: AccountOptions, command: Command) => run(command, options, handleValidate));

  program
    .command('balance')
    .description('Get account balance')
    .requiredOption('--account <account>', 'Account ID')
    .option('--auth', 'Use JWT authentication', false)
    .action((options: BalanceOptions, command: Command) => run(command, options, handleBalance));

  program
    .command('list-accounts')
    .description('List all accounts')
    .option('--auth', 'Use JWT authentication', false)
    .action((options: ListAccountsOptions, command: Command) => run(command, options, handleListAccounts));

  program
    .command('history')
    .description('Get transaction history')
    .option('--username <username>', 'Username for authentication', config.defaultUsername)
    .option('--password <password>', 'Password for authentication', config.defaultPassword)
    .action((options: Credentials, command: Command) => run(command, options, handleHistory));

  program
    .command('auth')
    .description('Get authentication token')
    .option('--username <username>', 'Username', config.defaultUsername)
    .option('--password <password>', 'Password', config.defaultPassword)
    .addOption(
      new Option('--scope <scope>', 'Token scope')
        .choices(TOKEN_SCOPES)
        .default(config.defaultScope)
    )
    .action((options: AuthOptions, command: Command) => run(command, options, handleAuth));

  return program;
}

/**
 * Parse `args` (without the node and script entries) and run the command.
 * Resolves to the exit code.
 */
export async function runCli(args: string[], deps: CliDependencies): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  if (args.length === 0) {
    program.outputHelp({ error: true });
    return 1;
  }

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
