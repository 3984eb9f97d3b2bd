export class UnknownCommandError extends Error {
  constructor(public readonly commandName: string) {
    super(`Unknown or unsupported command type: ${commandName}`);
    this.name = 'UnknownCommandError';
  }
}

/**
 * Rejection for a request whose cancellation signal fired before a tick
 * claimed it. Distinct from an error response: the caller abandoned the
 * command, it did not fail.
 */
export class CommandCancelledError extends Error {
  constructor(public readonly requestID: string) {
    super(`Command ${requestID} was cancelled before execution`);
    this.name = 'CommandCancelledError';
  }
}

export class CommandTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms`);
    this.name = 'CommandTimeoutError';
  }
}

export class SchedulerStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchedulerStateError';
  }
}

export function isCommandCancelledError(error: unknown): error is CommandCancelledError {
  return error instanceof CommandCancelledError;
}

export function isCommandTimeoutError(error: unknown): error is CommandTimeoutError {
  return error instanceof CommandTimeoutError;
}
