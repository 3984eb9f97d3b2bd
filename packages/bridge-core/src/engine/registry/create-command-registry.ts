import { UnknownCommandError } from '../errors.ts';
import { toSnakeCase } from './to-snake-case.ts';
import type {
  CommandHandler,
  CommandHandlerUnit,
  CommandRegistry,
  CommandRegistryConfig,
} from './types.ts';

export function createCommandRegistry(config: CommandRegistryConfig): CommandRegistry {
  const handlers = new Map<string, CommandHandler>();
  let initialized = false;

  function registerUnit(unit: CommandHandlerUnit): void {
    const commandName =
      unit.commandName !== undefined && unit.commandName !== ''
        ? unit.commandName
        : toSnakeCase(unit.identifier);

    if (typeof unit.handleCommand !== 'function') {
      config.logger.warn('handler unit has no handleCommand function', {
        identifier: unit.identifier,
        commandName,
      });
      return;
    }

    // Last registration wins so user-supplied units can replace built-ins.
    if (handlers.has(commandName)) {
      config.logger.warn('duplicate command name, overriding previous handler', {
        commandName,
        identifier: unit.identifier,
      });
    }

    handlers.set(commandName, unit.handleCommand);
  }

  function discoverUnits(): CommandHandlerUnit[] {
    try {
      return config.discover();
    } catch (error: unknown) {
      config.logger.error('failed to discover command handlers', {
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  return {
    initialize(): void {
      if (initialized) {
        return;
      }

      for (const unit of discoverUnits()) {
        registerUnit(unit);
      }

      initialized = true;
      config.logger.info('auto-discovered command handlers', { count: handlers.size });
    },

    isInitialized(): boolean {
      return initialized;
    },

    getHandler(commandName: string): CommandHandler {
      const handler = handlers.get(commandName);
      if (handler === undefined) {
        throw new UnknownCommandError(commandName);
      }
      return handler;
    },

    hasHandler(commandName: string): boolean {
      return handlers.has(commandName);
    },

    listCommands(): string[] {
      return [...handlers.keys()];
    },
  };
}
