import type { ZodError } from 'zod';

import { ACCOUNT_SECTION_PREFIX, ACCOUNT_SECTION_SEPARATOR } from './config.js';
import type { ConfigSection, DispatchConfig } from './config.js';
import { AccountSectionSchema } from './contracts.js';
import type { Account, CommandLine } from './contracts.js';
import { ConfigError } from './errors.js';
import { interpolateCommand, toCommandLine } from './interpolate.js';

/**
 * Format a Zod validation error into one `field: message` line per issue.
 */
function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'section';
      return `${path}: ${issue.message}`;
    })
    .join('\n');
}

function accountName(sectionName: string): string {
  const separatorIndex = sectionName.indexOf(ACCOUNT_SECTION_SEPARATOR);
  if (separatorIndex === -1) {
    throw new ConfigError('Configuration file is malformed');
  }
  return sectionName.slice(separatorIndex + ACCOUNT_SECTION_SEPARATOR.length);
}

function requireCommand(section: string, key: string, tokens: readonly string[]): CommandLine {
  const command = toCommandLine(tokens);
  if (!command) {
    throw new ConfigError(`Account section '${section}' is invalid:\n${key}: must not be empty`);
  }
  return command;
}

/**
 * Build one account from its section, layering the section over the
 * global hook defaults and interpolating every command template.
 *
 * @throws ConfigError naming the section when required values are missing
 */
export function buildAccount(section: ConfigSection, config: DispatchConfig): Account {
  const name = accountName(section.name);
  const parsed = AccountSectionSchema.safeParse({ ...config.defaults, ...section.entries });
  if (!parsed.success) {
    throw new ConfigError(
      `Account section '${section.name}' is invalid:\n${formatZodError(parsed.error)}`,
    );
  }

  const values = parsed.data;
  const sentFolder = values.sent_folder;
  const postPost = toCommandLine(interpolateCommand(values.post_post, sentFolder));

  return {
    name,
    fromAddress: values.from_address,
    sentFolder,
    sendmail: requireCommand(
      section.name,
      'sendmail',
      interpolateCommand(values.sendmail, sentFolder),
    ),
    postSendmail: requireCommand(
      section.name,
      'post_sendmail',
      interpolateCommand(values.post_sendmail, sentFolder),
    ),
    ...(postPost ? { postPost } : {}),
  };
}

/**
 * Build every account defined in the configuration, in file order.
 *
 * Sections whose name does not start with `account` are ignored. One bad
 * account section fails the whole load; nothing is skipped silently.
 */
export function loadAccounts(config: DispatchConfig): Account[] {
  return config.sections
    .filter((section) => section.name.startsWith(ACCOUNT_SECTION_PREFIX))
    .map((section) => buildAccount(section, config));
}
