import { CommandTimeoutError } from '../errors.ts';
import type { CommandExecutor } from '../scheduler/types.ts';

export interface ExecuteWithTimeoutOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Races a command against a timer. When the timer wins the request's signal
 * is aborted, so an unclaimed request never runs; a request that was already
 * claimed finishes and its response is dropped. Submission errors are thrown
 * synchronously, as `executeCommand` throws them.
 */
export function executeWithTimeout(
  executor: CommandExecutor,
  commandText: string,
  options: ExecuteWithTimeoutOptions,
): Promise<string> {
  const controller = new AbortController();
  const outerSignal = options.signal;
  const forwardAbort = (): void => controller.abort();

  if (outerSignal?.aborted) {
    controller.abort();
  } else {
    outerSignal?.addEventListener('abort', forwardAbort, { once: true });
  }

  let execution: Promise<string>;
  try {
    execution = executor.executeCommand(commandText, controller.signal);
  } catch (error: unknown) {
    outerSignal?.removeEventListener('abort', forwardAbort);
    throw error;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      // Reject first so the race settles with the timeout, not the cancellation.
      reject(new CommandTimeoutError(options.timeoutMs));
      controller.abort();
    }, options.timeoutMs);
  });

  return Promise.race([execution, timeout]).finally(() => {
    clearTimeout(timer);
    outerSignal?.removeEventListener('abort', forwardAbort);
  });
}
