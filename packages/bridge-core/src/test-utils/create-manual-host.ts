import type { Host, TickListener } from '../engine/host/types.ts';

export interface ManualHost extends Host {
  tick: () => void;
  listenerCount: () => number;
  delayedCallCount: () => number;
}

/**
 * Host driven by the test. Each `tick()` first flushes the calls delayed
 * before it, then runs a snapshot of the tick listeners.
 */
export function createManualHost(): ManualHost {
  const listeners = new Set<TickListener>();
  let delayedCalls: Array<() => void> = [];

  return {
    addTickListener(listener: TickListener): void {
      listeners.add(listener);
    },

    removeTickListener(listener: TickListener): void {
      listeners.delete(listener);
    },

    delayCall(callback: () => void): void {
      delayedCalls.push(callback);
    },

    tick(): void {
      const due = delayedCalls;
      delayedCalls = [];
      for (const callback of due) {
        callback();
      }
      for (const listener of [...listeners]) {
        listener();
      }
    },

    listenerCount(): number {
      return listeners.size;
    },

    delayedCallCount(): number {
      return delayedCalls.length;
    },
  };
}
