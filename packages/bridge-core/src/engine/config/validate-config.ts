import type { BridgeConfig } from '../../types.ts';

const VALID_LOG_LEVELS: Set<string> = new Set(['debug', 'info', 'warn', 'error']);

// Node timers replace any larger delay with 1ms.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function validateConfig(config: unknown): asserts config is BridgeConfig {
  if (!isRecord(config)) {
    throw new Error('Config must be a non-null object');
  }

  if (
    config.logLevel !== undefined &&
    (typeof config.logLevel !== 'string' || !VALID_LOG_LEVELS.has(config.logLevel))
  ) {
    throw new Error(
      `Invalid logLevel: '${String(config.logLevel)}'. Must be one of: debug, info, warn, error`,
    );
  }

  if (
    config.tickInterval !== undefined &&
    !(isFiniteNumber(config.tickInterval) && config.tickInterval > 0)
  ) {
    throw new Error(
      `Invalid tickInterval: '${String(config.tickInterval)}'. Must be a positive number`,
    );
  }

  if (
    config.commandTimeout !== undefined &&
    !(isFiniteNumber(config.commandTimeout) && config.commandTimeout >= 0)
  ) {
    throw new Error(
      `Invalid commandTimeout: '${String(config.commandTimeout)}'. Must be a non-negative number`,
    );
  }

  for (const key of ['tickInterval', 'commandTimeout']) {
    const value = config[key];
    if (isFiniteNumber(value) && value > MAX_TIMER_DELAY_MS) {
      throw new Error(`Invalid ${key}: '${String(value)}'. Must not exceed ${MAX_TIMER_DELAY_MS}`);
    }
  }

  if (config.handlers !== undefined && !Array.isArray(config.handlers)) {
    throw new Error('Invalid handlers: must be an array');
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
