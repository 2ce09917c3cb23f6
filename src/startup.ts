import { buffer } from 'node:stream/consumers';
import dotenv from 'dotenv';

import { parseCliArgs } from './cli.js';
import { readConfig, resolveConfigPath } from './config.js';
import type { Account } from './contracts.js';
import { dispatchMessage, spawnCommand, type CommandRunner } from './dispatch.js';
import { ResolutionError, describeError } from './errors.js';
import { getHelpText } from './help.js';
import { logEvent } from './logging.js';
import { loadAccounts } from './registry.js';
import { findAccountOrError } from './utils/account.js';
import { readSenderAddress } from './utils/mailparser.js';

/** Anything text can be written to, such as `process.stdout` */
export type OutputSink = {
  write(chunk: string): unknown;
};

export type StartOptions = Readonly<{
  argv: readonly string[];
  stdin: NodeJS.ReadableStream;
  stdout: OutputSink;
  stderr: OutputSink;
  /** Replaces subprocess execution, mainly for tests */
  runner?: CommandRunner;
}>;

/**
 * Fields printed in debug mode, keyed the way the configuration file names them.
 */
export function describeAccount(account: Account): Record<string, unknown> {
  return {
    account: account.name,
    from_address: account.fromAddress,
    sent_folder: account.sentFolder,
    sendmail: [...account.sendmail],
    post_sendmail: [...account.postSendmail],
    post_post: account.postPost ? [...account.postPost] : null,
  };
}

async function run(options: StartOptions): Promise<void> {
  const cli = parseCliArgs(options.argv);

  // Load .env before resolving anything that reads the environment
  dotenv.config({ quiet: true });

  if (cli.help) {
    options.stdout.write(getHelpText(cli.configPath));
    return;
  }

  // Configuration is validated in full before the message is read, so a
  // bad account section aborts before anything is sent.
  const config = readConfig(resolveConfigPath(cli.configPath));
  const accounts = loadAccounts(config);

  const raw = await buffer(options.stdin);
  const sender = await readSenderAddress(raw);

  const lookup = findAccountOrError(sender, accounts);
  if ('error' in lookup) {
    throw new ResolutionError(lookup.error);
  }
  const account = lookup.account;
  logEvent('debug', 'account_resolved', { account: account.name, sender, config: config.path });

  if (cli.debug) {
    options.stdout.write(`${JSON.stringify(describeAccount(account), null, 2)}\n`);
    return;
  }

  const stages = dispatchMessage(raw, account, options.runner ?? spawnCommand);
  logEvent('info', 'dispatch_finished', { account: account.name, stages });
}

/**
 * Run one invocation: parse flags, load accounts, read the message from
 * stdin and either print the matching account (`-d`) or run its hooks.
 *
 * Every failure is reported as `Error: <message>` on stderr.
 *
 * @returns The process exit code, 0 on success and 1 on any failure
 */
export async function start(options: StartOptions): Promise<number> {
  try {
    await run(options);
    return 0;
  } catch (error: unknown) {
    options.stderr.write(`Error: ${describeError(error)}\n`);
    return 1;
  }
}
