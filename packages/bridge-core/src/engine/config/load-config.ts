import { resolve } from 'node:path';
import process from 'node:process';
import { buildResolvedConfig } from './build-resolved-config.ts';
import type { ResolvedBridgeConfig } from './types.ts';
import { validateConfig } from './validate-config.ts';

const DEFAULT_CONFIG_FILE = 'bridge.config.ts';

export type LogError = (message: string) => void;

export interface LoadConfigOptions {
  configPath?: string;
  logError?: LogError;
}

export async function loadConfig(options?: LoadConfigOptions): Promise<ResolvedBridgeConfig> {
  const configPath = resolve(options?.configPath ?? DEFAULT_CONFIG_FILE);
  // biome-ignore lint/suspicious/noConsole: fallback logger when none is injected
  const logError = options?.logError ?? ((msg: string): void => console.error(msg));
  const configModule = await importConfigFile(configPath, logError);
  const config = readDefaultExport(configModule, configPath);

  validateConfig(config);

  return buildResolvedConfig(config);
}

function readDefaultExport(configModule: unknown, configPath: string): unknown {
  if (!isRecord(configModule) || configModule.default === undefined) {
    throw new Error(`Config file must have a default export: ${configPath}`);
  }
  return configModule.default;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

async function importConfigFile(configPath: string, logError: LogError): Promise<unknown> {
  try {
    return await import(configPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logError(`Failed to load bridge config: ${configPath}\n${message}`);
    return process.exit(1);
  }
}
