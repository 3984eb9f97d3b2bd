import { defineCommandHandler } from './src/engine/registry/define-command-handler.ts';
import { immediate } from './src/engine/registry/handler-result.ts';
import type { BridgeConfig } from './src/types.ts';

// ---------------------------------------------------------------------------
// Host handlers
// ---------------------------------------------------------------------------

const echo = defineCommandHandler({
  identifier: 'Echo',
  handleCommand: (params) => immediate({ params }),
});

// ---------------------------------------------------------------------------
// Config export
// ---------------------------------------------------------------------------

const config: BridgeConfig = {
  // Optional: Logging verbosity (default: 'info')
  // logLevel: 'debug',

  // Optional: Milliseconds between host ticks (default: 16)
  // tickInterval: 16,

  // Optional: Milliseconds before a command is abandoned, 0 disables (default: 0)
  commandTimeout: 30_000,

  handlers: [echo],
};

// biome-ignore lint/style/noDefaultExport: config files use default export by convention
export default config;
