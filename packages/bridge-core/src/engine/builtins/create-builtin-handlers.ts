import { z } from 'zod';
import type { Host } from '../host/types.ts';
import { defineCommandHandler } from '../registry/define-command-handler.ts';
import { deferred, immediate } from '../registry/handler-result.ts';
import type { CommandHandlerUnit, HandlerResult } from '../registry/types.ts';
import { buildErrorResponse, buildSuccessResponse } from './handler-responses.ts';

const RESERVED_COMMANDS = ['ping'];

export const MAX_WAIT_TICKS = 600;

const WaitForTicksParamsSchema = z.object({
  ticks: z.number().int().min(1).max(MAX_WAIT_TICKS).default(1),
});

export interface BuiltinHandlersDeps {
  host: Host;
  getCommandNames: () => string[];
}

export function createBuiltinHandlers(deps: BuiltinHandlersDeps): CommandHandlerUnit[] {
  function listCommands(): HandlerResult {
    return immediate({ commands: collectCommandNames(deps.getCommandNames()) });
  }

  function waitForTicks(params: Record<string, unknown>): HandlerResult {
    const parsed = WaitForTicksParamsSchema.safeParse(params);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => issue.message).join('; ');
      return immediate(buildErrorResponse(`Invalid parameters: ${issues}`));
    }

    const { ticks } = parsed.data;
    return deferred(
      new Promise((resolve) => {
        let remaining = ticks;
        const onTick = (): void => {
          remaining -= 1;
          if (remaining > 0) {
            return;
          }
          deps.host.removeTickListener(onTick);
          resolve(buildSuccessResponse(`Waited ${ticks} tick(s)`, { ticks }));
        };
        deps.host.addTickListener(onTick);
      }),
    );
  }

  return [
    defineCommandHandler({ identifier: 'ListCommands', handleCommand: listCommands }),
    defineCommandHandler({ identifier: 'WaitForTicks', handleCommand: waitForTicks }),
  ];
}

/** Registered names plus the reserved ones, deduplicated and sorted. */
export function collectCommandNames(registered: string[]): string[] {
  return [...new Set([...registered, ...RESERVED_COMMANDS])].sort();
}
