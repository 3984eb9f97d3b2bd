import type { DeferredResult, ImmediateResult } from './types.ts';

export function immediate(value: unknown): ImmediateResult {
  return { kind: 'immediate', value };
}

export function deferred(promise: Promise<unknown>): DeferredResult {
  return { kind: 'deferred', promise };
}
