import type { BridgeConfig } from '../../types.ts';
import type { ResolvedBridgeConfig } from './types.ts';

const DEFAULTS = {
  logLevel: 'info' as const,
  tickInterval: 16,
  commandTimeout: 0,
};

export function buildResolvedConfig(config: BridgeConfig): ResolvedBridgeConfig {
  return {
    logLevel: config.logLevel ?? DEFAULTS.logLevel,
    tickInterval: config.tickInterval ?? DEFAULTS.tickInterval,
    commandTimeout: config.commandTimeout ?? DEFAULTS.commandTimeout,
    handlers: config.handlers ?? [],
  };
}
