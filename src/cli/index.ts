#!/usr/bin/env node
/**
 * Banking CLI entry point.
 *
 * Reads `.env` from the working directory (variables already exported win),
 * applies LOG_LEVEL and runs the requested command.
 */

import { loadConfigFromFile, type BankingConfig } from '../shared/config.js';
import { getErrorMessage } from '../shared/utils/helpers.js';
import { StrategicLogger, parseLogLevel, LogLevel } from '../shared/utils/strategic-logger.js';
import { runCli } from './program.js';

async function main(): Promise<number> {
  let config: BankingConfig;
  try {
    config = loadConfigFromFile();
  } catch (error: unknown) {
    console.error(`❌ Invalid configuration: ${getErrorMessage(error)}`);
    return 1;
  }

  if (process.env.DEBUG !== 'true') {
    StrategicLogger.getInstance().setLogLevel(parseLogLevel(config.logLevel) ?? LogLevel.Info);
  }

  return runCli(process.argv.slice(2), { config });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`💥 ${getErrorMessage(error)}`);
    process.exitCode = 1;
  });
