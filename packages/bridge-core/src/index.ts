// biome-ignore lint/performance/noBarrelFile: public API entrypoint for the bridge package
export * from './engine/index.ts';
export type { Bridge, BridgeConfig } from './types.ts';
