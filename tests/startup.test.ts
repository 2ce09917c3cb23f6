import { Readable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CommandRunner } from '../src/dispatch.js';
import { start } from '../src/startup.js';

const accountsPath = fileURLToPath(new URL('./fixtures/accounts.ini', import.meta.url));
const malformedPath = fileURLToPath(new URL('./fixtures/malformed.ini', import.meta.url));

function message(from: string | undefined): Buffer {
  const headers = from === undefined ? [] : [`From: ${from}`];
  return Buffer.from(
    [...headers, 'To: bob@example.net', 'Subject: Notes', '', 'See attached.', ''].join('\r\n'),
  );
}

function collector() {
  const chunks: string[] = [];
  return {
    sink: {
      write(chunk: string) {
        chunks.push(chunk);
        return true;
      },
    },
    text: () => chunks.join(''),
  };
}

describe('start', () => {
  const originalEnv = process.env;
  const runner = vi.fn<CommandRunner>();
  let stdout: ReturnType<typeof collector>;
  let stderr: ReturnType<typeof collector>;

  beforeEach(() => {
    process.env = {};
    runner.mockReset();
    runner.mockReturnValue({ status: 0, signal: null });
    stdout = collector();
    stderr = collector();
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  function invoke(argv: string[], raw: Buffer): Promise<number> {
    return start({
      argv,
      stdin: Readable.from([raw]),
      stdout: stdout.sink,
      stderr: stderr.sink,
      runner,
    });
  }

  it('prints the resolved account in debug mode without running anything', async () => {
    const raw = message('Jane Doe <jane@example.com>');
    const exitCode = await invoke(['-d', '-c', accountsPath], raw);

    expect(exitCode).toBe(0);
    expect(runner).not.toHaveBeenCalled();
    expect(JSON.parse(stdout.text())).toEqual({
      account: 'work',
      from_address: 'jane@example.com',
      sent_folder: 'work/Sent',
      sendmail: ['msmtp', '-t', '--account=work'],
      post_sendmail: ['notmuch', 'insert', '--folder=work/Sent', '+sent', '-new'],
      post_post: null,
    });
    expect(stderr.text()).toBe('');
  });

  it('runs all three stages for an account with post_post', async () => {
    const raw = message('Jane <jane@home.example.org>');
    const exitCode = await invoke(['-c', accountsPath], raw);

    expect(exitCode).toBe(0);
    expect(runner.mock.calls).toEqual([
      [['msmtp', '-t', '--read-envelope-from'], raw],
      [['notmuch', 'insert', '--folder=home/Sent', '+sent', '-new'], raw],
      [['notmuch', 'tag', '+personal', '--', 'tag:sent'], undefined],
    ]);
  });

  it('reads the configuration path from the environment', async () => {
    process.env = { MAIL_DISPATCH_CONFIG: accountsPath };
    const exitCode = await invoke(['--debug'], message('jane@home.example.org'));

    expect(exitCode).toBe(0);
    expect(JSON.parse(stdout.text())).toMatchObject({ account: 'home' });
  });

  it('fails without running anything when no account matches', async () => {
    const exitCode = await invoke(['-c', accountsPath], message('stranger@example.net'));

    expect(exitCode).toBe(1);
    expect(runner).not.toHaveBeenCalled();
    expect(stderr.text()).toBe(
      [
        "Error: No account matches sender 'stranger@example.net'.",
        'Configured senders:',
        '- jane@example.com (account.work)',
        '- jane@home.example.org (account.home)',
        '',
      ].join('\n'),
    );
  });

  it('fails on a message without a From header', async () => {
    const exitCode = await invoke(['-c', accountsPath], message(undefined));

    expect(exitCode).toBe(1);
    expect(stderr.text()).toBe('Error: Message is malformed: no From address\n');
    expect(runner).not.toHaveBeenCalled();
  });

  it('stops the pipeline when the send command exits with status 2', async () => {
    runner.mockReturnValueOnce({ status: 2, signal: null });
    const exitCode = await invoke(['-c', accountsPath], message('jane@home.example.org'));

    expect(exitCode).toBe(1);
    expect(runner).toHaveBeenCalledTimes(1);
    expect(stderr.text()).toBe(
      "Error: The send command 'msmtp -t --read-envelope-from' exited with status 2\n",
    );
  });

  it('fails on a malformed configuration before dispatching', async () => {
    const exitCode = await invoke(['-c', malformedPath], message('jane@example.com'));

    expect(exitCode).toBe(1);
    expect(stderr.text()).toBe('Error: Configuration file is malformed\n');
    expect(runner).not.toHaveBeenCalled();
  });

  it('prints help', async () => {
    const exitCode = await invoke(['--help', '-c', accountsPath], Buffer.alloc(0));

    expect(exitCode).toBe(0);
    expect(stdout.text()).toContain(`  File: ${accountsPath}\n`);
    expect(stdout.text()).toContain(
      '  -d, --debug   Print the resolved account instead of running commands\n',
    );
  });

  it('rejects unknown flags', async () => {
    const exitCode = await invoke(['-x'], message('jane@example.com'));

    expect(exitCode).toBe(1);
    expect(stderr.text()).toMatch(/^Error: Unknown option '-x'/);
    expect(stderr.text()).toContain('Run with --help for usage.\n');
  });
});
