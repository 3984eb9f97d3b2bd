import type { Bridge, BridgeConfig } from '../types.ts';
import {
  collectCommandNames,
  createBuiltinHandlers,
} from './builtins/create-builtin-handlers.ts';
import { buildResolvedConfig } from './config/build-resolved-config.ts';
import { validateConfig } from './config/validate-config.ts';
import type { Logger } from './create-logger.ts';
import { createLogger } from './create-logger.ts';
import { createIntervalHost } from './host/create-interval-host.ts';
import type { Host } from './host/types.ts';
import { createCommandRegistry } from './registry/create-command-registry.ts';
import type { CommandHandlerUnit } from './registry/types.ts';
import { createDispatchScheduler } from './scheduler/create-dispatch-scheduler.ts';
import type { SchedulerStatus } from './scheduler/types.ts';
import { executeWithTimeout } from './timeout/execute-with-timeout.ts';

export interface BridgeDeps {
  host?: Host;
  logger?: Logger;
}

export function createBridge(config: BridgeConfig, deps?: BridgeDeps): Bridge {
  validateConfig(config);
  const resolved = buildResolvedConfig(config);
  const logger = deps?.logger ?? createLogger(resolved);
  const host = deps?.host ?? createIntervalHost({ tickInterval: resolved.tickInterval, logger });

  // Built-ins come first so a configured unit with the same name replaces them.
  function discoverHandlers(): CommandHandlerUnit[] {
    const builtins = createBuiltinHandlers({
      host,
      getCommandNames: () => registry.listCommands(),
    });
    return [...builtins, ...resolved.handlers];
  }

  const registry = createCommandRegistry({ discover: discoverHandlers, logger });
  const scheduler = createDispatchScheduler({ registry, host, logger });

  return {
    start(): void {
      scheduler.start();
    },

    stop(): void {
      scheduler.stop();
    },

    executeCommand(commandText: string, signal?: AbortSignal): Promise<string> {
      if (resolved.commandTimeout === 0) {
        return scheduler.executeCommand(commandText, signal);
      }
      return executeWithTimeout(scheduler, commandText, {
        timeoutMs: resolved.commandTimeout,
        signal,
      });
    },

    getStatus(): SchedulerStatus {
      return scheduler.getStatus();
    },

    listCommands(): string[] {
      registry.initialize();
      return collectCommandNames(registry.listCommands());
    },
  };
}
