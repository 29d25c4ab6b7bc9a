import { createStore } from 'zustand/vanilla';
import type { SyncStateSnapshot } from './types';

export interface SyncStateActions {
  /** Test-and-set on the in-flight flag. Returns false when a cycle is already running. */
  beginCycle: () => boolean;
  completeCycle: (atIso: string) => void;
  failCycle: () => number;
  scheduleNext: (atIso: string | null) => void;
  markStopped: () => void;
  markIdle: () => void;
  setQueueDepth: (depth: number) => void;
  reset: () => void;
}

export type SyncStateStore = ReturnType<typeof createSyncStateStore>;

const defaultState = (): SyncStateSnapshot => ({
  isSyncing: false,
  phase: 'idle',
  consecutiveFailures: 0,
  lastSuccessfulSyncAtIso: null,
  nextSyncAtIso: null,
  queueDepth: 0,
});

export const createSyncStateStore = () => {
  return createStore<SyncStateSnapshot & SyncStateActions>()((set, get) => ({
    ...defaultState(),
    beginCycle: () => {
      if (get().isSyncing) return false;
      set(() => ({
        isSyncing: true,
        phase: 'syncing',
      }));
      return true;
    },
    completeCycle: (atIso) =>
      set((state) => ({
        isSyncing: false,
        phase: state.phase === 'stopped' ? 'stopped' : 'idle',
        consecutiveFailures: 0,
        lastSuccessfulSyncAtIso: atIso,
      })),
    failCycle: () => {
      set((state) => ({
        isSyncing: false,
        phase: state.phase === 'stopped' ? 'stopped' : 'backoff',
        consecutiveFailures: state.consecutiveFailures + 1,
      }));
      return get().consecutiveFailures;
    },
    scheduleNext: (atIso) =>
      set(() => ({
        nextSyncAtIso: atIso,
      })),
    markStopped: () =>
      set(() => ({
        phase: 'stopped',
        nextSyncAtIso: null,
      })),
    markIdle: () =>
      set((state) => ({
        phase: state.isSyncing ? 'syncing' : state.consecutiveFailures > 0 ? 'backoff' : 'idle',
      })),
    setQueueDepth: (depth) =>
      set(() => ({
        queueDepth: Math.max(0, Math.floor(depth)),
      })),
    reset: () => set(() => defaultState()),
  }));
};

export const readSyncState = (store: SyncStateStore): SyncStateSnapshot => {
  const state = store.getState();
  return {
    isSyncing: state.isSyncing,
    phase: state.phase,
    consecutiveFailures: state.consecutiveFailures,
    lastSuccessfulSyncAtIso: state.lastSuccessfulSyncAtIso,
    nextSyncAtIso: state.nextSyncAtIso,
    queueDepth: state.queueDepth,
  };
};
