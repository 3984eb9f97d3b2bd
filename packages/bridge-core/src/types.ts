import type { LogLevel } from './engine/create-logger.ts';
import type { CommandHandlerUnit } from './engine/registry/types.ts';
import type { CommandExecutor, SchedulerStatus } from './engine/scheduler/types.ts';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface BridgeConfig {
  logLevel?: LogLevel; // default: 'info'
  tickInterval?: number; // milliseconds between host ticks, default: 16
  commandTimeout?: number; // milliseconds, default: 0 (no timeout)
  handlers?: CommandHandlerUnit[]; // registered after the built-ins, default: []
}

// ---------------------------------------------------------------------------
// Bridge Interface
// ---------------------------------------------------------------------------

// Lifecycle contract: executeCommand throws SchedulerStateError before start()
// and after stop(). stop() cancels commands no tick has claimed yet; claimed
// deferred commands still resolve.
export interface Bridge extends CommandExecutor {
  start: () => void;
  stop: () => void;
  getStatus: () => SchedulerStatus;
  listCommands: () => string[];
}
