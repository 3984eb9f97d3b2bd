import { randomUUID } from 'node:crypto';
import invariant from 'tiny-invariant';
import { match } from 'ts-pattern';
import {
  buildErrorEnvelope,
  buildInvalidJsonEnvelope,
  buildSuccessEnvelope,
  PONG_RESPONSE,
  serializeResponse,
} from '../envelope/build-response.ts';
import { isPingCommand } from '../envelope/is-ping-command.ts';
import { isValidJson } from '../envelope/is-valid-json.ts';
import { parseCommandEnvelope } from '../envelope/parse-command-envelope.ts';
import type { CommandEnvelope, ResponseEnvelope } from '../envelope/types.ts';
import { CommandCancelledError, SchedulerStateError } from '../errors.ts';
import { createSchedulerStore } from './create-scheduler-store.ts';
import type {
  DispatchScheduler,
  DispatchSchedulerDeps,
  SchedulerStatus,
  StatusListener,
} from './types.ts';

interface PendingRequest {
  id: string;
  commandText: string;
  signal: AbortSignal | undefined;
  onAbort: (() => void) | null;
  claimed: boolean;
  settled: boolean;
  resolve: (payload: string) => void;
  reject: (error: unknown) => void;
}

export function createDispatchScheduler(deps: DispatchSchedulerDeps): DispatchScheduler {
  const pending = new Map<string, PendingRequest>();
  const store = createSchedulerStore();

  // ---------------------------------------------------------------------------
  // Hook bookkeeping
  // ---------------------------------------------------------------------------

  function hookTick(): void {
    if (store.getState().hookAttached) {
      return;
    }
    deps.host.addTickListener(drainOnce);
    store.setState({ hookAttached: true });
  }

  function unhookTick(): void {
    if (!store.getState().hookAttached) {
      return;
    }
    deps.host.removeTickListener(drainOnce);
    store.setState({ hookAttached: false });
  }

  function unhookTickIfIdle(): void {
    if (pending.size > 0) {
      return;
    }
    unhookTick();
  }

  // ---------------------------------------------------------------------------
  // Request lifecycle
  // ---------------------------------------------------------------------------

  function removePending(request: PendingRequest): void {
    pending.delete(request.id);
    if (request.signal !== undefined && request.onAbort !== null) {
      request.signal.removeEventListener('abort', request.onAbort);
      request.onAbort = null;
    }
    store.setState({ pendingCount: pending.size });
    unhookTickIfIdle();
  }

  function settleWithResponse(request: PendingRequest, envelope: ResponseEnvelope): void {
    if (request.settled) {
      return;
    }
    request.settled = true;

    const payload = serializeOrFallback(envelope);
    const failed = payload.envelope.status === 'error';
    store.setState((status) =>
      failed ? { failed: status.failed + 1 } : { succeeded: status.succeeded + 1 },
    );
    request.resolve(payload.text);
  }

  function settleAsCancelled(request: PendingRequest): void {
    if (request.settled) {
      return;
    }
    request.settled = true;
    store.setState((status) => ({ cancelled: status.cancelled + 1 }));
    request.reject(new CommandCancelledError(request.id));
  }

  function complete(request: PendingRequest, envelope: ResponseEnvelope): void {
    settleWithResponse(request, envelope);
    removePending(request);
  }

  function cancelPending(request: PendingRequest): void {
    if (request.claimed) {
      deps.logger.debug('cancellation ignored for claimed command', { requestID: request.id });
      return;
    }
    removePending(request);
    settleAsCancelled(request);
  }

  function serializeOrFallback(envelope: ResponseEnvelope): {
    envelope: ResponseEnvelope;
    text: string;
  } {
    try {
      return { envelope, text: serializeResponse(envelope) };
    } catch (error: unknown) {
      const fallback = buildErrorEnvelope(
        `Failed to serialize command result: ${describeError(error)}`,
      );
      return { envelope: fallback, text: serializeResponse(fallback) };
    }
  }

  // ---------------------------------------------------------------------------
  // Drain
  // ---------------------------------------------------------------------------

  function drainOnce(): void {
    const ready: PendingRequest[] = [];
    for (const request of pending.values()) {
      if (request.claimed) {
        continue;
      }
      request.claimed = true;
      ready.push(request);
    }

    if (ready.length === 0) {
      unhookTickIfIdle();
      return;
    }

    deps.logger.debug('draining claimed commands', { count: ready.length });
    for (const request of ready) {
      processRequest(request);
    }
  }

  function processRequest(request: PendingRequest): void {
    invariant(request.claimed, `request ${request.id} must be claimed before processing`);

    if (request.signal?.aborted) {
      removePending(request);
      settleAsCancelled(request);
      return;
    }

    const commandText = request.commandText.trim();
    if (commandText === '') {
      complete(request, buildErrorEnvelope('Empty command received'));
      return;
    }

    if (isPingCommand(commandText)) {
      complete(request, PONG_RESPONSE);
      return;
    }

    if (!isValidJson(commandText)) {
      complete(request, buildInvalidJsonEnvelope(commandText));
      return;
    }

    try {
      match(parseCommandEnvelope(commandText))
        .with({ outcome: 'ping' }, () => complete(request, PONG_RESPONSE))
        .with({ outcome: 'emptyType' }, () =>
          complete(request, buildErrorEnvelope('Command type cannot be empty')),
        )
        .with({ outcome: 'invalid' }, ({ reason }) =>
          complete(request, buildErrorEnvelope(`Invalid command envelope: ${reason}`)),
        )
        .with({ outcome: 'parsed' }, ({ envelope }) => executeEnvelope(request, envelope))
        .exhaustive();
    } catch (error: unknown) {
      fail(request, error, null);
    }
  }

  function executeEnvelope(request: PendingRequest, envelope: CommandEnvelope): void {
    try {
      deps.registry.initialize();
      const handler = deps.registry.getHandler(envelope.type);
      const result = handler(envelope.params);

      match(result)
        .with({ kind: 'immediate' }, ({ value }) => {
          complete(request, buildSuccessEnvelope(value));
        })
        .with({ kind: 'deferred' }, ({ promise }) => {
          awaitDeferred(request, envelope.type, promise);
        })
        .exhaustive();
    } catch (error: unknown) {
      fail(request, error, envelope.type);
    }
  }

  function awaitDeferred(
    request: PendingRequest,
    commandType: string,
    promise: Promise<unknown>,
  ): void {
    deps.logger.debug('command deferred', { requestID: request.id, command: commandType });
    promise
      .then(
        (value: unknown) => {
          settleWithResponse(request, buildSuccessEnvelope(value));
        },
        (error: unknown) => {
          deps.logger.error('deferred command failed', {
            requestID: request.id,
            command: commandType,
            error: describeError(error),
          });
          settleWithResponse(request, buildThrownErrorEnvelope(error, commandType));
        },
      )
      .finally(() => {
        // Removal runs on the host's own loop, never from the promise callback.
        deps.host.delayCall(() => {
          removePending(request);
        });
      })
      .catch((error: unknown) => {
        deps.logger.error('deferred command cleanup failed', {
          requestID: request.id,
          error: describeError(error),
        });
      });
  }

  function fail(request: PendingRequest, error: unknown, commandType: string | null): void {
    deps.logger.error('error processing command', {
      requestID: request.id,
      command: commandType,
      error: describeError(error),
    });
    complete(request, buildThrownErrorEnvelope(error, commandType));
  }

  // ---------------------------------------------------------------------------
  // Public interface
  // ---------------------------------------------------------------------------

  return {
    executeCommand(commandText: string, signal?: AbortSignal): Promise<string> {
      if (typeof commandText !== 'string') {
        throw new TypeError('commandText must be a string');
      }

      const { state } = store.getState();
      if (state !== 'running') {
        throw new SchedulerStateError(`Cannot accept commands while the scheduler is ${state}`);
      }

      const id = randomUUID();
      if (signal?.aborted) {
        store.setState((status) => ({ cancelled: status.cancelled + 1 }));
        return Promise.reject(new CommandCancelledError(id));
      }

      return new Promise<string>((resolve, reject) => {
        const request: PendingRequest = {
          id,
          commandText,
          signal,
          onAbort: null,
          claimed: false,
          settled: false,
          resolve,
          reject,
        };

        if (signal !== undefined) {
          const onAbort = (): void => cancelPending(request);
          request.onAbort = onAbort;
          signal.addEventListener('abort', onAbort, { once: true });
        }

        pending.set(id, request);
        store.setState({ pendingCount: pending.size });
        hookTick();
        deps.logger.debug('command queued', { requestID: id });
      });
    },

    start(): void {
      const { state } = store.getState();
      if (state === 'running') {
        return;
      }
      if (state === 'stopped') {
        throw new SchedulerStateError('Cannot restart a stopped scheduler');
      }
      store.setState({ state: 'running' });
      deps.logger.info('dispatch scheduler started');
    },

    stop(): void {
      if (store.getState().state === 'stopped') {
        return;
      }
      store.setState({ state: 'stopped' });

      const unclaimed = [...pending.values()].filter((request) => !request.claimed);
      for (const request of unclaimed) {
        removePending(request);
        settleAsCancelled(request);
      }
      unhookTick();
      deps.logger.info('dispatch scheduler stopped', {
        cancelled: unclaimed.length,
        inFlight: pending.size,
      });
    },

    drainOnce,

    getStatus(): SchedulerStatus {
      return store.getState();
    },

    subscribe(listener: StatusListener): () => void {
      return store.subscribe(listener);
    },
  };
}

function buildThrownErrorEnvelope(error: unknown, commandType: string | null): ResponseEnvelope {
  const options: { command?: string; stackTrace?: string } = {};
  if (commandType !== null) {
    options.command = commandType;
  }
  if (error instanceof Error && error.stack !== undefined) {
    options.stackTrace = error.stack;
  }
  return buildErrorEnvelope(describeError(error), options);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
