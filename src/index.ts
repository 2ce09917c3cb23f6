#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { start } from './startup.js';

export { parseCliArgs } from './cli.js';
export type { CliOptions } from './cli.js';
export { parseConfig, readConfig, resolveConfigPath } from './config.js';
export type { DispatchConfig } from './config.js';
export type { Account, CommandLine, DispatchStage } from './contracts.js';
export { dispatchMessage, planStages, spawnCommand } from './dispatch.js';
export type { CommandOutcome, CommandRunner } from './dispatch.js';
export {
  ConfigError,
  DispatchError,
  ExecutionError,
  MessageError,
  ResolutionError,
  UsageError,
} from './errors.js';
export { interpolateCommand } from './interpolate.js';
export { loadAccounts } from './registry.js';
export { describeAccount, start } from './startup.js';
export type { StartOptions } from './startup.js';
export { findAccount, findAccountOrError } from './utils/account.js';
export { readSenderAddress } from './utils/mailparser.js';

function isEntrypoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  // npm links the bin, so compare resolved paths
  try {
    return fileURLToPath(import.meta.url) === realpathSync(entry);
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  start({
    argv: process.argv.slice(2),
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  })
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Fatal error: ${message}`);
      process.exitCode = 1;
    });
}
