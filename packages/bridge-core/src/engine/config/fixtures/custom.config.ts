import type { BridgeConfig } from '../../../types.ts';

const config: BridgeConfig = {
  logLevel: 'debug',
  tickInterval: 50,
  commandTimeout: 2000,
};

// biome-ignore lint/style/noDefaultExport: config files use default export by convention
export default config;
