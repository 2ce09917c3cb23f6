import { afterEach, describe, expect, it } from 'vitest';
import { getHelpText } from '../src/help.js';

describe('getHelpText', () => {
  const originalEnv = process.env;

  afterEach(() => {
    process.env = originalEnv;
  });

  it('shows defaults and where each setting comes from', () => {
    process.env = { XDG_CONFIG_HOME: '/home/jane/.config' };
    const helpText = getHelpText();

    expect(helpText).toContain('  File: /home/jane/.config/mail-dispatch/config.ini\n');
    expect(helpText).toContain('  sendmail default: msmtp -t\n');
    expect(helpText).toContain(
      '  post_sendmail default: notmuch insert --folder=$sent_folder +sent -new\n',
    );
    expect(helpText).toContain('  MAIL_DISPATCH_CONFIG=<unset>\n');
    expect(helpText).toContain('  MAIL_DISPATCH_VERBOSE=false (default)\n');
  });

  it('reports values set in the environment', () => {
    process.env = { MAIL_DISPATCH_CONFIG: '/etc/mail-dispatch.ini', MAIL_DISPATCH_VERBOSE: 'on' };
    const helpText = getHelpText();

    expect(helpText).toContain('  File: /etc/mail-dispatch.ini\n');
    expect(helpText).toContain('  MAIL_DISPATCH_CONFIG=/etc/mail-dispatch.ini\n');
    expect(helpText).toContain('  MAIL_DISPATCH_VERBOSE=true\n');
  });
});
