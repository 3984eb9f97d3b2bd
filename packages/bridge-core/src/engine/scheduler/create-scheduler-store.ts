import { createStore, type StoreApi } from 'zustand/vanilla';
import type { SchedulerStatus } from './types.ts';

export function createSchedulerStore(): StoreApi<SchedulerStatus> {
  return createStore<SchedulerStatus>(() => ({
    state: 'idle',
    hookAttached: false,
    pendingCount: 0,
    succeeded: 0,
    failed: 0,
    cancelled: 0,
  }));
}
