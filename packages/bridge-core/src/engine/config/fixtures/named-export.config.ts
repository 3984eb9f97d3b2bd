import type { BridgeConfig } from '../../../types.ts';

export const config: BridgeConfig = { logLevel: 'warn' };
