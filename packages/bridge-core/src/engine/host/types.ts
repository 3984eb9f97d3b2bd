import type { Logger } from '../create-logger.ts';

export type TickListener = () => void;

/**
 * The cooperative loop that owns host mutation. Tick listeners run once per
 * host iteration; `delayCall` defers a callback to the loop's next turn.
 */
export interface Host {
  addTickListener: (listener: TickListener) => void;
  removeTickListener: (listener: TickListener) => void;
  delayCall: (callback: () => void) => void;
}

export interface IntervalHostConfig {
  tickInterval: number;
  logger: Logger;
}

export interface IntervalHost extends Host {
  isTicking: () => boolean;
  dispose: () => void;
}
