// biome-ignore lint/performance/noBarrelFile: public API entrypoint for the bridge package
export type { BuiltinHandlersDeps } from './builtins/create-builtin-handlers.ts';
export { createBuiltinHandlers } from './builtins/create-builtin-handlers.ts';
export type {
  ErrorHandlerResponse,
  HandlerResponse,
  SuccessHandlerResponse,
} from './builtins/handler-responses.ts';
export { buildErrorResponse, buildSuccessResponse } from './builtins/handler-responses.ts';
export type { ResolvedBridgeConfig } from './config/types.ts';
export type { LoadConfigOptions, LogError } from './config/load-config.ts';
export { loadConfig } from './config/load-config.ts';
export { validateConfig } from './config/validate-config.ts';
export type { BridgeDeps } from './create-bridge.ts';
export { createBridge } from './create-bridge.ts';
export type { LogEntry, Logger, LogLevel, LogWriter } from './create-logger.ts';
export { createLogger } from './create-logger.ts';
export type {
  CommandEnvelope,
  CommandParams,
  ErrorResponse,
  ResponseEnvelope,
  SuccessResponse,
} from './envelope/types.ts';
export {
  CommandCancelledError,
  CommandTimeoutError,
  isCommandCancelledError,
  isCommandTimeoutError,
  SchedulerStateError,
  UnknownCommandError,
} from './errors.ts';
export { createIntervalHost } from './host/create-interval-host.ts';
export type { Host, IntervalHost, IntervalHostConfig, TickListener } from './host/types.ts';
export { createCommandRegistry } from './registry/create-command-registry.ts';
export { defineCommandHandler } from './registry/define-command-handler.ts';
export { deferred, immediate } from './registry/handler-result.ts';
export { toSnakeCase } from './registry/to-snake-case.ts';
export type {
  CommandHandler,
  CommandHandlerUnit,
  CommandRegistry,
  DeferredResult,
  DiscoverHandlers,
  HandlerResult,
  ImmediateResult,
} from './registry/types.ts';
export { createDispatchScheduler } from './scheduler/create-dispatch-scheduler.ts';
export type {
  CommandExecutor,
  DispatchScheduler,
  DispatchSchedulerDeps,
  SchedulerState,
  SchedulerStatus,
  StatusListener,
} from './scheduler/types.ts';
export type { ExecuteWithTimeoutOptions } from './timeout/execute-with-timeout.ts';
export { executeWithTimeout } from './timeout/execute-with-timeout.ts';
