import type { CommandHandler, CommandHandlerUnit } from './types.ts';

interface CommandHandlerDefinition {
  identifier: string;
  commandName?: string;
  handleCommand: CommandHandler;
}

export function defineCommandHandler(definition: CommandHandlerDefinition): CommandHandlerUnit {
  return { ...definition };
}
