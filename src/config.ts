import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { decode } from 'ini';

import { ConfigError, describeError } from './errors.js';

/** Section name prefix that marks an account definition */
export const ACCOUNT_SECTION_PREFIX = 'account';
/** Separator between the prefix and the account identifier (`account.work`) */
export const ACCOUNT_SECTION_SEPARATOR = '.';
/** Transport used when neither the account nor the globals set `sendmail` */
export const DEFAULT_SENDMAIL = 'msmtp -t';
/** Indexing command used when neither the account nor the globals set `post_sendmail` */
export const DEFAULT_POST_SENDMAIL = 'notmuch insert --folder=$sent_folder +sent -new';
/** Section whose keys override the global defaults, for INI files with a `[DEFAULT]` section */
export const DEFAULTS_SECTION = 'DEFAULT';

export const CONFIG_PATH_ENV = 'MAIL_DISPATCH_CONFIG';
export const VERBOSE_ENV = 'MAIL_DISPATCH_VERBOSE';
export const DEFAULT_VERBOSE = false;

/**
 * Hook templates every account inherits unless its section overrides them.
 */
export type GlobalDefaults = Readonly<{
  sendmail: string;
  post_sendmail: string;
}>;

/**
 * One named section of the configuration file, in file order.
 */
export type ConfigSection = Readonly<{
  name: string;
  entries: Readonly<Record<string, unknown>>;
}>;

/**
 * The parsed configuration file. Loaded once per invocation and passed
 * explicitly to the registry.
 */
export type DispatchConfig = Readonly<{
  path: string;
  defaults: GlobalDefaults;
  sections: readonly ConfigSection[];
}>;

/**
 * Parse an environment variable string into a boolean value.
 *
 * Accepts common truthy values ('1', 'true', 'yes', 'y', 'on') and falsy values
 * ('0', 'false', 'no', 'n', 'off'), case-insensitive. Returns the default value
 * if the input is undefined or doesn't match any known values.
 */
export function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }
  return defaultValue;
}

/** Whether structured event lines are written to stderr */
export function isVerbose(): boolean {
  return parseBooleanEnv(process.env[VERBOSE_ENV], DEFAULT_VERBOSE);
}

/**
 * Directory holding per-user configuration, honouring `XDG_CONFIG_HOME`.
 */
function configHome(): string {
  const xdg = process.env['XDG_CONFIG_HOME'];
  if (xdg) {
    return xdg;
  }
  return join(homedir(), '.config');
}

/**
 * Locate the account configuration file.
 *
 * Precedence: the explicit `-c` argument, then `MAIL_DISPATCH_CONFIG`, then
 * `<config home>/mail-dispatch/config.ini`.
 *
 * @example
 * ```ts
 * // XDG_CONFIG_HOME=/home/me/.config
 * resolveConfigPath(); // '/home/me/.config/mail-dispatch/config.ini'
 * resolveConfigPath('/tmp/test.ini'); // '/tmp/test.ini'
 * ```
 */
export function resolveConfigPath(explicit?: string): string {
  if (explicit) {
    return explicit;
  }
  const fromEnv = process.env[CONFIG_PATH_ENV];
  if (fromEnv) {
    return fromEnv;
  }
  return join(configHome(), 'mail-dispatch', 'config.ini');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Values of one decoded node, without its nested sections.
 *
 * The `ini` decoder turns bare `true`, `false` and `null` into JSON values;
 * they are turned back into their source text, since `post_sendmail = true`
 * is a command like any other.
 */
function scalarEntries(node: Record<string, unknown>): Record<string, unknown> {
  const entries: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(node)) {
    if (isRecord(value)) {
      continue;
    }
    entries[key] = typeof value === 'boolean' || value === null ? String(value) : value;
  }
  return entries;
}

/**
 * Index every decoded node by its dotted section name.
 *
 * The `ini` decoder nests dotted section names, so `[account.work]` arrives
 * as `{ account: { work: {...} } }`.
 */
function indexSections(
  node: Record<string, unknown>,
  parent: string | undefined,
  index: Map<string, Record<string, unknown>>,
): void {
  for (const [key, value] of Object.entries(node)) {
    if (!isRecord(value)) {
      continue;
    }
    const name = parent === undefined ? key : `${parent}${ACCOUNT_SECTION_SEPARATOR}${key}`;
    index.set(name, scalarEntries(value));
    indexSections(value, name, index);
  }
}

const SECTION_HEADER_PATTERN = /^\[([^\]]*)\]\s*$/;
const KEY_VALUE_PATTERN = /^([^=]+)=(.*)$/;

function isQuoted(value: string): boolean {
  return (
    value.length > 1 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  );
}

/**
 * Index of the first unescaped `;` or `#` that the decoder would treat as
 * the start of an inline comment, or -1.
 */
function inlineCommentIndex(value: string): number {
  let escaped = false;
  for (let i = 0; i < value.length; i += 1) {
    const char = value.charAt(i);
    if (escaped) {
      escaped = false;
    } else if (char === '\\') {
      escaped = true;
    } else if (char === ';' || char === '#') {
      return i;
    }
  }
  return -1;
}

/**
 * Scan the raw text for section headers, in file order.
 *
 * Header names are taken from the text because the decoded tree cannot tell
 * a header-only `[account]` apart from the parent node of `[account.work]`.
 * A `;` or `#` glued to the preceding character (`Mail/#Sent`) would be cut
 * off as a comment by the decoder, so such unquoted values are rejected.
 *
 * @throws ConfigError naming the line of a value the decoder would truncate
 */
function scanConfigText(text: string): string[] {
  const headers: string[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, lineIndex) => {
    if (/^\s*([;#]|$)/.test(line)) {
      return;
    }
    const header = SECTION_HEADER_PATTERN.exec(line);
    if (header) {
      const name = (header[1] ?? '').trim().replaceAll('\\.', '.');
      if (!headers.includes(name)) {
        headers.push(name);
      }
      return;
    }
    const pair = KEY_VALUE_PATTERN.exec(line);
    const rawValue = (pair?.[2] ?? '').trim();
    if (!pair || isQuoted(rawValue)) {
      return;
    }
    const commentAt = inlineCommentIndex(rawValue);
    if (commentAt > 0 && !/\s/.test(rawValue.charAt(commentAt - 1))) {
      const key = (pair[1] ?? '').trim();
      const char = rawValue.charAt(commentAt);
      throw new ConfigError(
        `Line ${lineIndex + 1}: value of '${key}' would be cut at '${char}'; ` +
          'quote the value or escape the character with a backslash',
      );
    }
  });

  return headers;
}

function pickDefault(
  layers: ReadonlyArray<Record<string, unknown>>,
  key: keyof GlobalDefaults,
  fallback: string,
): string {
  let resolved = fallback;
  for (const layer of layers) {
    const value = layer[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      resolved = value;
    }
  }
  return resolved;
}

/**
 * Decode INI text into a {@link DispatchConfig}.
 *
 * Keys above the first section are global defaults; a `[DEFAULT]` section
 * overrides them. Only `sendmail` and `post_sendmail` are inherited. Every
 * section header in the file yields a section, even one with no keys.
 *
 * @throws ConfigError when an unquoted value would be truncated at `;` or `#`
 */
export function parseConfig(text: string, path: string): DispatchConfig {
  const headers = scanConfigText(text);
  const tree: Record<string, unknown> = decode(text);
  const globals = scalarEntries(tree);
  const defaultsSection = tree[DEFAULTS_SECTION];
  const layers = isRecord(defaultsSection)
    ? [globals, scalarEntries(defaultsSection)]
    : [globals];

  const index = new Map<string, Record<string, unknown>>();
  indexSections(tree, undefined, index);

  return {
    path,
    defaults: {
      sendmail: pickDefault(layers, 'sendmail', DEFAULT_SENDMAIL),
      post_sendmail: pickDefault(layers, 'post_sendmail', DEFAULT_POST_SENDMAIL),
    },
    sections: headers
      .filter((name) => name !== DEFAULTS_SECTION)
      .map((name) => ({ name, entries: index.get(name) ?? {} })),
  };
}

/**
 * Read and decode the configuration file at `path`.
 *
 * @throws ConfigError when the file cannot be read
 */
export function readConfig(path: string): DispatchConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error: unknown) {
    throw new ConfigError(`Unable to read configuration file ${path}: ${describeError(error)}`, {
      cause: error,
    });
  }
  return parseConfig(text, path);
}
