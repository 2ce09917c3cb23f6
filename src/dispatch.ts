import { spawnSync } from 'node:child_process';

import type { Account, CommandLine, DispatchStage } from './contracts.js';
import { ExecutionError } from './errors.js';
import { formatCommand } from './interpolate.js';
import { logEvent, redactArgv } from './logging.js';

/**
 * Result of running one hook command to completion.
 */
export type CommandOutcome = Readonly<{
  /** Exit status, or null when the process was killed or never started */
  status: number | null;
  /** Terminating signal, if any */
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned at all */
  error?: Error;
}>;

/**
 * Runs a command synchronously, feeding `input` to its stdin when given.
 */
export type CommandRunner = (command: CommandLine, input?: Buffer) => CommandOutcome;

/**
 * One step of the dispatch pipeline.
 */
export type StagePlan = Readonly<{
  stage: DispatchStage;
  command: CommandLine;
  /** Bytes piped to the command's stdin; absent means no stdin */
  input?: Buffer;
}>;

/**
 * Default {@link CommandRunner}: blocks until the child exits.
 *
 * Stdout and stderr are inherited so hook output reaches the caller
 * unchanged. There is no timeout; a hung hook hangs the invocation.
 */
export function spawnCommand(command: CommandLine, input?: Buffer): CommandOutcome {
  const [program, ...args] = command;
  const result =
    input === undefined
      ? spawnSync(program, args, { stdio: ['ignore', 'inherit', 'inherit'] })
      : spawnSync(program, args, { input, stdio: ['pipe', 'inherit', 'inherit'] });
  // A hook may exit without reading all of stdin; its exit status decides.
  if (!result.error || (result.status !== null && isBrokenPipe(result.error))) {
    return { status: result.status, signal: result.signal };
  }
  return { status: result.status, signal: result.signal, error: result.error };
}

function isBrokenPipe(error: Error): boolean {
  return 'code' in error && error.code === 'EPIPE';
}

/**
 * Order the account's hooks into stages. `post_post` is planned only
 * when the account defines it.
 */
export function planStages(raw: Buffer, account: Account): StagePlan[] {
  const stages: StagePlan[] = [
    { stage: 'send', command: account.sendmail, input: raw },
    { stage: 'post_send', command: account.postSendmail, input: raw },
  ];
  if (account.postPost) {
    stages.push({ stage: 'post_post', command: account.postPost });
  }
  return stages;
}

function failureMessage(plan: StagePlan, outcome: CommandOutcome): string {
  const label = `${plan.stage} command '${formatCommand(plan.command)}'`;
  if (outcome.error) {
    return `Failed to start ${label}: ${outcome.error.message}`;
  }
  if (outcome.signal) {
    return `The ${label} was terminated by ${outcome.signal}`;
  }
  return `The ${label} exited with status ${String(outcome.status)}`;
}

/**
 * Run the account's hook stages in order against the raw message.
 *
 * The first failing stage throws and no later stage runs. Stages that
 * already ran are not undone.
 *
 * @returns The stages that ran, in order
 * @throws ExecutionError for a spawn failure, a signal or a non-zero exit
 */
export function dispatchMessage(
  raw: Buffer,
  account: Account,
  runner: CommandRunner = spawnCommand,
): DispatchStage[] {
  const completed: DispatchStage[] = [];

  for (const plan of planStages(raw, account)) {
    const startedAtNs = process.hrtime.bigint();
    const outcome = runner(plan.command, plan.input);
    const durationMs = Number(process.hrtime.bigint() - startedAtNs) / 1_000_000;
    const succeeded = !outcome.error && outcome.signal === null && outcome.status === 0;

    logEvent(succeeded ? 'info' : 'error', 'stage_finished', {
      account: account.name,
      stage: plan.stage,
      argv: redactArgv(plan.command),
      status: outcome.status,
      signal: outcome.signal,
      duration_ms: Math.round(durationMs),
    });

    if (!succeeded) {
      throw new ExecutionError(
        plan.stage,
        plan.command,
        outcome.status,
        failureMessage(plan, outcome),
        outcome.error ? { cause: outcome.error } : undefined,
      );
    }
    completed.push(plan.stage);
  }

  return completed;
}
