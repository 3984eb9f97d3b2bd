import { expect, test, vi } from 'vitest';
import { buildHandlerUnit } from '../test-utils/build-handler-unit.ts';
import { createManualHost, type ManualHost } from '../test-utils/create-manual-host.ts';
import { createMockLogger } from '../test-utils/create-mock-logger.ts';
import type { Bridge, BridgeConfig } from '../types.ts';
import { createBridge } from './create-bridge.ts';
import type { Logger } from './create-logger.ts';
import { CommandCancelledError, CommandTimeoutError, SchedulerStateError } from './errors.ts';
import { immediate } from './registry/handler-result.ts';

const PONG = '{"status":"success","result":{"message":"pong"}}';

interface TestContext {
  bridge: Bridge;
  host: ManualHost;
  logger: Logger;
}

function setupTest(config: BridgeConfig = {}): TestContext {
  const host = createManualHost();
  const { logger } = createMockLogger();
  const bridge = createBridge(config, { host, logger });
  bridge.start();
  return { bridge, host, logger };
}

test('it executes a configured handler end to end', async () => {
  const { bridge, host } = setupTest({
    handlers: [
      buildHandlerUnit({
        identifier: 'ManageEditor',
        handleCommand: () => immediate({ playing: false }),
      }),
    ],
  });

  const response = bridge.executeCommand(
    '{"type":"manage_editor","params":{"action":"get_state"}}',
  );
  host.tick();

  await expect(response).resolves.toBe('{"status":"success","result":{"playing":false}}');
});

test('it lists built-in and configured commands', () => {
  const { bridge } = setupTest({ handlers: [buildHandlerUnit({ identifier: 'ManageScene' })] });

  expect(bridge.listCommands()).toStrictEqual([
    'list_commands',
    'manage_scene',
    'ping',
    'wait_for_ticks',
  ]);
});

test('it lets a configured handler replace a built-in of the same name', async () => {
  const { bridge, host, logger } = setupTest({
    handlers: [
      buildHandlerUnit({
        identifier: 'CustomListing',
        commandName: 'list_commands',
        handleCommand: () => immediate('custom'),
      }),
    ],
  });

  const response = bridge.executeCommand('{"type":"list_commands"}');
  host.tick();

  await expect(response).resolves.toBe('{"status":"success","result":"custom"}');
  expect(logger.warn).toHaveBeenCalledWith('duplicate command name, overriding previous handler', {
    commandName: 'list_commands',
    identifier: 'CustomListing',
  });
});

test('it rejects with a timeout error when a command timeout is configured', async () => {
  vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
  const { bridge } = setupTest({ commandTimeout: 1000 });

  const response = bridge.executeCommand('ping');
  vi.advanceTimersByTime(1000);

  await expect(response).rejects.toBeInstanceOf(CommandTimeoutError);
  expect(bridge.getStatus()).toMatchObject({ pendingCount: 0, cancelled: 1 });
});

test('it does not start a timer when no command timeout is configured', async () => {
  vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
  const { bridge, host } = setupTest();

  const response = bridge.executeCommand('ping');

  expect(vi.getTimerCount()).toBe(0);
  host.tick();
  await expect(response).resolves.toBe(PONG);
});

test('it drives commands from an interval host when no host is injected', async () => {
  vi.useFakeTimers({
    toFake: ['setInterval', 'clearInterval', 'setImmediate', 'clearImmediate'],
  });
  const { logger } = createMockLogger();
  const bridge = createBridge({ tickInterval: 20 }, { logger });
  bridge.start();

  const response = bridge.executeCommand('ping');
  vi.advanceTimersByTime(20);

  await expect(response).resolves.toBe(PONG);
  expect(vi.getTimerCount()).toBe(0);
});

test('it cancels queued commands and refuses new ones after stop', async () => {
  const { bridge } = setupTest();

  const response = bridge.executeCommand('ping');
  bridge.stop();

  await expect(response).rejects.toBeInstanceOf(CommandCancelledError);
  expect(bridge.getStatus().state).toBe('stopped');
  expect(() => bridge.executeCommand('ping')).toThrow(SchedulerStateError);
});

test('it refuses commands before start', () => {
  const host = createManualHost();
  const { logger } = createMockLogger();
  const bridge = createBridge({}, { host, logger });

  expect(() => bridge.executeCommand('ping')).toThrow(
    'Cannot accept commands while the scheduler is idle',
  );
});

test('it validates the config it is given', () => {
  const host = createManualHost();
  const { logger } = createMockLogger();

  expect(() => createBridge({ tickInterval: 0 }, { host, logger })).toThrow(
    "Invalid tickInterval: '0'. Must be a positive number",
  );
  expect(() => createBridge({ commandTimeout: 3_000_000_000 }, { host, logger })).toThrow(
    "Invalid commandTimeout: '3000000000'. Must not exceed 2147483647",
  );
});
