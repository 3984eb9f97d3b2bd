import { expect, test, vi } from 'vitest';
import { createMockLogger } from '../../test-utils/create-mock-logger.ts';
import { createIntervalHost } from './create-interval-host.ts';

const TICK_INTERVAL_MS = 16;

function setupTest(): {
  host: ReturnType<typeof createIntervalHost>;
  logger: ReturnType<typeof createMockLogger>['logger'];
} {
  vi.useFakeTimers({
    toFake: ['setInterval', 'clearInterval', 'setImmediate', 'clearImmediate'],
  });
  const { logger } = createMockLogger();
  const host = createIntervalHost({ tickInterval: TICK_INTERVAL_MS, logger });
  return { host, logger };
}

test('it does not tick while no listener is attached', () => {
  const { host } = setupTest();

  expect(host.isTicking()).toBe(false);
});

test('it invokes an attached listener once per interval', () => {
  const { host } = setupTest();
  const listener = vi.fn();

  host.addTickListener(listener);
  vi.advanceTimersByTime(TICK_INTERVAL_MS * 3);

  expect(listener).toHaveBeenCalledTimes(3);
});

test('it stops ticking when the last listener is removed', () => {
  const { host } = setupTest();
  const listener = vi.fn();

  host.addTickListener(listener);
  vi.advanceTimersByTime(TICK_INTERVAL_MS);
  host.removeTickListener(listener);
  vi.advanceTimersByTime(TICK_INTERVAL_MS * 5);

  expect(listener).toHaveBeenCalledTimes(1);
  expect(host.isTicking()).toBe(false);
});

test('it keeps ticking while another listener remains', () => {
  const { host } = setupTest();
  const first = vi.fn();
  const second = vi.fn();

  host.addTickListener(first);
  host.addTickListener(second);
  host.removeTickListener(first);
  vi.advanceTimersByTime(TICK_INTERVAL_MS);

  expect(first).not.toHaveBeenCalled();
  expect(second).toHaveBeenCalledTimes(1);
  expect(host.isTicking()).toBe(true);
});

test('it treats adding the same listener twice as a single attachment', () => {
  const { host } = setupTest();
  const listener = vi.fn();

  host.addTickListener(listener);
  host.addTickListener(listener);
  vi.advanceTimersByTime(TICK_INTERVAL_MS);

  expect(listener).toHaveBeenCalledTimes(1);
});

test('it defers a listener added during a tick to the next tick', () => {
  const { host } = setupTest();
  const late = vi.fn();
  const first = vi.fn(() => {
    host.addTickListener(late);
  });

  host.addTickListener(first);
  vi.advanceTimersByTime(TICK_INTERVAL_MS);

  expect(late).not.toHaveBeenCalled();

  vi.advanceTimersByTime(TICK_INTERVAL_MS);

  expect(late).toHaveBeenCalledTimes(1);
});

test('it logs a failing listener and keeps running the others', () => {
  const { host, logger } = setupTest();
  const failing = vi.fn(() => {
    throw new Error('listener exploded');
  });
  const healthy = vi.fn();

  host.addTickListener(failing);
  host.addTickListener(healthy);
  vi.advanceTimersByTime(TICK_INTERVAL_MS);

  expect(healthy).toHaveBeenCalledTimes(1);
  expect(logger.error).toHaveBeenCalledWith('tick listener failed', { error: 'listener exploded' });
});

test('it runs a delayed call on the next turn of the loop', async () => {
  const { host } = setupTest();
  const callback = vi.fn();

  host.delayCall(callback);

  expect(callback).not.toHaveBeenCalled();

  await vi.runAllTimersAsync();

  expect(callback).toHaveBeenCalledTimes(1);
});

test('it clears listeners and stops ticking when disposed', () => {
  const { host } = setupTest();
  const listener = vi.fn();

  host.addTickListener(listener);
  host.dispose();
  vi.advanceTimersByTime(TICK_INTERVAL_MS * 2);

  expect(listener).not.toHaveBeenCalled();
  expect(host.isTicking()).toBe(false);
});
