import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Account } from '../src/contracts.js';
import { dispatchMessage, planStages, type CommandRunner } from '../src/dispatch.js';
import { ExecutionError } from '../src/errors.js';

const raw = Buffer.from('From: jane@example.com\r\nTo: bob@example.net\r\n\r\nHi\r\n');

const twoStageAccount: Account = {
  name: 'work',
  fromAddress: 'jane@example.com',
  sentFolder: 'work/Sent',
  sendmail: ['msmtp', '-t', '--account=work'],
  postSendmail: ['notmuch', 'insert', '--folder=work/Sent', '+sent', '-new'],
};

const threeStageAccount: Account = {
  ...twoStageAccount,
  postPost: ['notmuch', 'tag', '+work', '--', 'tag:sent'],
};

describe('planStages', () => {
  it('pipes the message to send and post_send only', () => {
    expect(planStages(raw, threeStageAccount)).toEqual([
      { stage: 'send', command: threeStageAccount.sendmail, input: raw },
      { stage: 'post_send', command: threeStageAccount.postSendmail, input: raw },
      { stage: 'post_post', command: threeStageAccount.postPost },
    ]);
  });
});

describe('dispatchMessage', () => {
  const runner = vi.fn<CommandRunner>();

  beforeEach(() => {
    runner.mockReset();
    runner.mockReturnValue({ status: 0, signal: null });
  });

  it('runs exactly two stages when post_post is absent', () => {
    expect(dispatchMessage(raw, twoStageAccount, runner)).toEqual(['send', 'post_send']);
    expect(runner).toHaveBeenCalledTimes(2);
    expect(runner).toHaveBeenNthCalledWith(1, ['msmtp', '-t', '--account=work'], raw);
    expect(runner).toHaveBeenNthCalledWith(
      2,
      ['notmuch', 'insert', '--folder=work/Sent', '+sent', '-new'],
      raw,
    );
  });

  it('runs post_post last without stdin', () => {
    expect(dispatchMessage(raw, threeStageAccount, runner)).toEqual([
      'send',
      'post_send',
      'post_post',
    ]);
    expect(runner).toHaveBeenNthCalledWith(
      3,
      ['notmuch', 'tag', '+work', '--', 'tag:sent'],
      undefined,
    );
  });

  it('stops after a failing send stage', () => {
    runner.mockReturnValueOnce({ status: 2, signal: null });

    let caught: unknown;
    try {
      dispatchMessage(raw, threeStageAccount, runner);
    } catch (error: unknown) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExecutionError);
    expect(caught).toMatchObject({
      stage: 'send',
      status: 2,
      command: ['msmtp', '-t', '--account=work'],
      message: "The send command 'msmtp -t --account=work' exited with status 2",
    });
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('stops after a failing post_send stage', () => {
    runner
      .mockReturnValueOnce({ status: 0, signal: null })
      .mockReturnValueOnce({ status: 1, signal: null });

    expect(() => dispatchMessage(raw, threeStageAccount, runner)).toThrow(
      "The post_send command 'notmuch insert --folder=work/Sent +sent -new' exited with status 1",
    );
    expect(runner).toHaveBeenCalledTimes(2);
  });

  it('reports a command killed by a signal', () => {
    runner.mockReturnValueOnce({ status: null, signal: 'SIGTERM' });
    expect(() => dispatchMessage(raw, twoStageAccount, runner)).toThrow(
      "The send command 'msmtp -t --account=work' was terminated by SIGTERM",
    );
  });

  it('reports a command that could not be started', () => {
    runner.mockReturnValueOnce({
      status: null,
      signal: null,
      error: new Error('spawnSync msmtp ENOENT'),
    });
    expect(() => dispatchMessage(raw, twoStageAccount, runner)).toThrow(
      "Failed to start send command 'msmtp -t --account=work': spawnSync msmtp ENOENT",
    );
  });
});
