import type { DispatchStage } from './contracts.js';

/**
 * Base class for every failure that should end the invocation with a
 * user-facing message and a non-zero exit status.
 */
export class DispatchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed section names, unreadable files or invalid account sections. */
export class ConfigError extends DispatchError {}

/** The message on stdin has no usable `From` address. */
export class MessageError extends DispatchError {}

/** No configured account matches the sender address. */
export class ResolutionError extends DispatchError {}

/** Invalid command line flags. */
export class UsageError extends DispatchError {}

/**
 * A hook command could not be started, was killed by a signal, or exited
 * with a non-zero status. Earlier stages have already run.
 */
export class ExecutionError extends DispatchError {
  readonly stage: DispatchStage;
  readonly command: readonly string[];
  readonly status: number | null;

  constructor(
    stage: DispatchStage,
    command: readonly string[],
    status: number | null,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.stage = stage;
    this.command = command;
    this.status = status;
  }
}

/**
 * Render any thrown value as a single message line.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
