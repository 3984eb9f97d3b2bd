import type { LogLevel } from '../create-logger.ts';
import type { CommandHandlerUnit } from '../registry/types.ts';

export interface ResolvedBridgeConfig {
  logLevel: LogLevel;
  tickInterval: number;
  commandTimeout: number;
  handlers: CommandHandlerUnit[];
}
