import process from 'node:process';
import { fileURLToPath } from 'node:url';
import { expect, test, vi } from 'vitest';
import { loadConfig } from './load-config.ts';

function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

test('it loads, validates, and resolves the default export of a config file', async () => {
  const config = await loadConfig({ configPath: fixturePath('custom.config.ts') });

  expect(config).toStrictEqual({
    logLevel: 'debug',
    tickInterval: 50,
    commandTimeout: 2000,
    handlers: [],
  });
});

test('it throws when the config file has no default export', async () => {
  const configPath = fixturePath('named-export.config.ts');

  await expect(loadConfig({ configPath })).rejects.toThrow(
    `Config file must have a default export: ${configPath}`,
  );
});

test('it surfaces validation errors from the loaded config', async () => {
  await expect(loadConfig({ configPath: fixturePath('invalid.config.ts') })).rejects.toThrow(
    "Invalid tickInterval: '-5'. Must be a positive number",
  );
});

test('it logs and exits the process when the config file does not exist', async () => {
  const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
    throw new Error('process.exit called');
  });
  const logError = vi.fn();

  await expect(
    loadConfig({ configPath: '/nonexistent/bridge.config.ts', logError }),
  ).rejects.toThrow('process.exit called');

  expect(exitSpy).toHaveBeenCalledWith(1);
  expect(logError).toHaveBeenCalledWith(
    expect.stringContaining('Failed to load bridge config: /nonexistent/bridge.config.ts'),
  );
});

test('it loads the package bridge config', async () => {
  const configPath = fileURLToPath(new URL('../../../bridge.config.ts', import.meta.url));

  const config = await loadConfig({ configPath });

  expect(config.commandTimeout).toBe(30_000);
  expect(config.handlers.map((unit) => unit.identifier)).toStrictEqual(['Echo']);
});
