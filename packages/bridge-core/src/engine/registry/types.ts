import type { Logger } from '../create-logger.ts';
import type { CommandParams } from '../envelope/types.ts';

// --- Handler contract ---

export interface ImmediateResult {
  kind: 'immediate';
  value: unknown;
}

export interface DeferredResult {
  kind: 'deferred';
  promise: Promise<unknown>;
}

export type HandlerResult = ImmediateResult | DeferredResult;

export type CommandHandler = (params: CommandParams) => HandlerResult;

/**
 * One discoverable handler. `identifier` is the unit's own PascalCase name and
 * supplies the command name when `commandName` is omitted.
 */
export interface CommandHandlerUnit {
  identifier: string;
  commandName?: string;
  handleCommand?: CommandHandler;
}

export type DiscoverHandlers = () => CommandHandlerUnit[];

// --- Registry ---

export interface CommandRegistryConfig {
  discover: DiscoverHandlers;
  logger: Logger;
}

export interface CommandRegistry {
  initialize: () => void;
  isInitialized: () => boolean;
  getHandler: (commandName: string) => CommandHandler;
  hasHandler: (commandName: string) => boolean;
  listCommands: () => string[];
}
