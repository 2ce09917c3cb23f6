import { isVerbose } from './config.js';

/**
 * Matches option names that likely carry sensitive values
 * (password, passwordeval, token, secret, authorization, cookie, key).
 */
const SECRET_OPTION_PATTERN = /(pass(word)?|token|secret|authorization|cookie|key)/i;

const REDACTED = '[REDACTED]';

function isOption(token: string): boolean {
  return token.startsWith('-');
}

/**
 * Redact secret values from a command's arguments before they are logged.
 *
 * Handles both `--option=value` and `--option value` forms. Non-option
 * tokens are kept, so the program and its ordinary flags stay readable.
 *
 * @example
 * ```ts
 * redactArgv(['msmtp', '--passwordeval=pass show mail', '-t']);
 * // ['msmtp', '--passwordeval=[REDACTED]', '-t']
 * redactArgv(['fetch', '--token', 'abc123']);
 * // ['fetch', '--token', '[REDACTED]']
 * ```
 */
export function redactArgv(argv: readonly string[]): string[] {
  const redacted: string[] = [];
  let redactNext = false;

  for (const token of argv) {
    if (redactNext && !isOption(token)) {
      redacted.push(REDACTED);
      redactNext = false;
      continue;
    }
    redactNext = false;

    if (!isOption(token)) {
      redacted.push(token);
      continue;
    }

    const separatorIndex = token.indexOf('=');
    const name = separatorIndex === -1 ? token : token.slice(0, separatorIndex);
    if (!SECRET_OPTION_PATTERN.test(name)) {
      redacted.push(token);
      continue;
    }
    if (separatorIndex === -1) {
      redacted.push(token);
      redactNext = true;
    } else {
      redacted.push(`${name}=${REDACTED}`);
    }
  }

  return redacted;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Write one structured event line to stderr.
 *
 * Stdout is reserved for debug-mode output. Nothing is written unless
 * `MAIL_DISPATCH_VERBOSE` is enabled.
 */
export function logEvent(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
  if (!isVerbose()) {
    return;
  }
  console.error(JSON.stringify({ level, event, ...fields }));
}
