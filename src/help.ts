import {
  CONFIG_PATH_ENV,
  DEFAULT_POST_SENDMAIL,
  DEFAULT_SENDMAIL,
  DEFAULT_VERBOSE,
  VERBOSE_ENV,
  parseBooleanEnv,
  resolveConfigPath,
} from './config.js';

type EnvValueSource = 'default' | 'env' | 'unset';

type ResolvedEnvValue = Readonly<{
  value: string;
  source: EnvValueSource;
}>;

function resolveStringEnv(name: string): ResolvedEnvValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return { value: '<unset>', source: 'unset' };
  }
  return { value: raw, source: 'env' };
}

function resolveBooleanEnv(name: string, defaultValue: boolean): ResolvedEnvValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return { value: String(defaultValue), source: 'default' };
  }
  return { value: String(parseBooleanEnv(raw, defaultValue)), source: 'env' };
}

function formatEnvLine(name: string, resolved: ResolvedEnvValue): string {
  const suffix = resolved.source === 'default' ? ' (default)' : '';
  return `  ${name}=${resolved.value}${suffix}`;
}

/**
 * Usage text, including where the configuration is read from.
 */
export function getHelpText(configPath?: string): string {
  const lines: string[] = [];
  lines.push('mail-dispatch');
  lines.push('');
  lines.push('Reads a message on stdin, picks the account matching its From address,');
  lines.push('then runs the account sendmail, post_sendmail and post_post commands.');
  lines.push('');
  lines.push('Usage:');
  lines.push('  mail-dispatch [-d|--debug] [-c|--config <path>] < message.eml');
  lines.push('  mail-dispatch [-h|--help]');
  lines.push('');
  lines.push('Options:');
  lines.push('  -d, --debug   Print the resolved account instead of running commands');
  lines.push('  -c, --config  Read accounts from <path>');
  lines.push('  -h, --help    Show this help');
  lines.push('');
  lines.push('Configuration:');
  lines.push(`  File: ${resolveConfigPath(configPath)}`);
  lines.push('  Sections: [account.<name>] with from_address and sent_folder (required),');
  lines.push('  sendmail, post_sendmail and post_post (optional).');
  lines.push('  $sent_folder in a command is replaced with the account sent_folder.');
  lines.push(`  sendmail default: ${DEFAULT_SENDMAIL}`);
  lines.push(`  post_sendmail default: ${DEFAULT_POST_SENDMAIL}`);
  lines.push('');
  lines.push('Environment:');
  lines.push(formatEnvLine(CONFIG_PATH_ENV, resolveStringEnv(CONFIG_PATH_ENV)));
  lines.push(formatEnvLine(VERBOSE_ENV, resolveBooleanEnv(VERBOSE_ENV, DEFAULT_VERBOSE)));
  lines.push('');

  return lines.join('\n');
}
