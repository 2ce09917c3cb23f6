import type { CommandLine } from './contracts.js';

/** Placeholder replaced with the account's sent folder */
export const SENT_FOLDER_PLACEHOLDER = '$sent_folder';

/**
 * Split a command template into arguments and substitute the sent folder.
 *
 * Tokenization is a plain whitespace split with no shell quoting. Splitting
 * happens before substitution, so a folder containing spaces still ends up
 * inside a single argument.
 *
 * @example
 * ```ts
 * interpolateCommand('notmuch insert --folder=$sent_folder +sent -new', 'home/Sent');
 * // ['notmuch', 'insert', '--folder=home/Sent', '+sent', '-new']
 * ```
 */
export function interpolateCommand(template: string | undefined, sentFolder: string): string[] {
  if (template === undefined) {
    return [];
  }
  return template
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map((token) => token.replaceAll(SENT_FOLDER_PLACEHOLDER, () => sentFolder));
}

export function toCommandLine(tokens: readonly string[]): CommandLine | undefined {
  const [program, ...args] = tokens;
  if (program === undefined) {
    return undefined;
  }
  return [program, ...args];
}

/** Join a command back into a display string */
export function formatCommand(command: readonly string[]): string {
  return command.join(' ');
}
