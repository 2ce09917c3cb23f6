import { parseArgs } from 'node:util';

import { UsageError, describeError } from './errors.js';

export type CliOptions = Readonly<{
  /** Print the resolved account instead of running hooks */
  debug: boolean;
  /** Print usage and exit */
  help: boolean;
  /** Configuration file given with `-c`, if any */
  configPath?: string;
}>;

function parseFlags(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      debug: { type: 'boolean', short: 'd', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      config: { type: 'string', short: 'c' },
    },
    strict: true,
    allowPositionals: false,
  });
}

/**
 * Parse command line flags: `-d/--debug`, `-c/--config <path>`, `-h/--help`.
 *
 * @throws UsageError for unknown flags, missing values or positional arguments
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let parsed: ReturnType<typeof parseFlags>;
  try {
    parsed = parseFlags(argv);
  } catch (error: unknown) {
    throw new UsageError(`${describeError(error)}\nRun with --help for usage.`, { cause: error });
  }

  const debug = parsed.values.debug === true;
  const help = parsed.values.help === true;
  const config = parsed.values.config;
  return config === undefined ? { debug, help } : { debug, help, configPath: config };
}
