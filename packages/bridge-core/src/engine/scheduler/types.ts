import type { Logger } from '../create-logger.ts';
import type { Host } from '../host/types.ts';
import type { CommandRegistry } from '../registry/types.ts';

export type SchedulerState = 'idle' | 'running' | 'stopped';

export interface SchedulerStatus {
  state: SchedulerState;
  hookAttached: boolean;
  pendingCount: number;
  succeeded: number;
  failed: number;
  cancelled: number;
}

export type StatusListener = (status: SchedulerStatus, previous: SchedulerStatus) => void;

/**
 * The contract every transport consumes. The resolved string is a JSON
 * response envelope; cancellation rejects with `CommandCancelledError`.
 */
export interface CommandExecutor {
  executeCommand: (commandText: string, signal?: AbortSignal) => Promise<string>;
}

export interface DispatchScheduler extends CommandExecutor {
  start: () => void;
  stop: () => void;
  drainOnce: () => void;
  getStatus: () => SchedulerStatus;
  subscribe: (listener: StatusListener) => () => void;
}

export interface DispatchSchedulerDeps {
  registry: CommandRegistry;
  host: Host;
  logger: Logger;
}
