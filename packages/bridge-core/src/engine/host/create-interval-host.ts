import type { IntervalHost, IntervalHostConfig, TickListener } from './types.ts';

export function createIntervalHost(config: IntervalHostConfig): IntervalHost {
  const listeners = new Set<TickListener>();
  let timer: ReturnType<typeof setInterval> | null = null;

  function runListener(listener: TickListener): void {
    try {
      listener();
    } catch (error: unknown) {
      config.logger.error('tick listener failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  function tick(): void {
    // Snapshot: listeners added during this tick first run on the next one.
    for (const listener of [...listeners]) {
      runListener(listener);
    }
  }

  function startTimer(): void {
    if (timer === null) {
      timer = setInterval(tick, config.tickInterval);
    }
  }

  function stopTimer(): void {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
    }
  }

  return {
    addTickListener(listener: TickListener): void {
      listeners.add(listener);
      startTimer();
    },

    removeTickListener(listener: TickListener): void {
      listeners.delete(listener);
      if (listeners.size === 0) {
        stopTimer();
      }
    },

    delayCall(callback: () => void): void {
      setImmediate(() => {
        runListener(callback);
      });
    },

    isTicking(): boolean {
      return timer !== null;
    },

    dispose(): void {
      listeners.clear();
      stopTimer();
    },
  };
}
