import { vi } from 'vitest';
import { immediate } from '../engine/registry/handler-result.ts';
import type { CommandHandler, CommandHandlerUnit } from '../engine/registry/types.ts';

interface HandlerUnitOverrides {
  identifier?: string;
  commandName?: string;
  handleCommand?: CommandHandler;
}

export function buildHandlerUnit(overrides: HandlerUnitOverrides = {}): CommandHandlerUnit {
  const unit: CommandHandlerUnit = {
    identifier: overrides.identifier ?? 'ManageEditor',
    handleCommand: overrides.handleCommand ?? vi.fn<CommandHandler>(() => immediate({ ok: true })),
  };
  if (overrides.commandName !== undefined) {
    unit.commandName = overrides.commandName;
  }
  return unit;
}
