import { vi } from 'vitest';
import type { Logger, LogLevel } from '../engine/create-logger.ts';

interface MockLogMessage {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export interface MockLoggerResult {
  logger: Logger;
  messages: MockLogMessage[];
}

export function createMockLogger(): MockLoggerResult {
  const messages: MockLogMessage[] = [];

  function record(level: LogLevel): Logger[LogLevel] {
    return vi.fn().mockImplementation((message: string, data?: Record<string, unknown>) => {
      messages.push(buildLogMessage(level, message, data));
    });
  }

  const logger: Logger = {
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };

  return { logger, messages };
}

function buildLogMessage(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
): MockLogMessage {
  if (data === undefined) {
    return { level, message };
  }
  return { level, message, data };
}
