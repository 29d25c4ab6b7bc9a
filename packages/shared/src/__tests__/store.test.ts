import { describe, expect, it } from 'vitest';
import { createSyncStateStore, readSyncState } from '../store';

describe('sync state store', () => {
  it('starts idle with no history', () => {
    const store = createSyncStateStore();

    expect(readSyncState(store)).toEqual({
      isSyncing: false,
      phase: 'idle',
      consecutiveFailures: 0,
      lastSuccessfulSyncAtIso: null,
      nextSyncAtIso: null,
      queueDepth: 0,
    });
  });

  it('lets only one cycle begin at a time', () => {
    const store = createSyncStateStore();

    expect(store.getState().beginCycle()).toBe(true);
    expect(store.getState().beginCycle()).toBe(false);
    expect(store.getState().phase).toBe('syncing');
  });

  it('counts failures and clears them on success', () => {
    const store = createSyncStateStore();
    store.getState().beginCycle();
    expect(store.getState().failCycle()).toBe(1);
    store.getState().beginCycle();
    expect(store.getState().failCycle()).toBe(2);
    expect(store.getState().phase).toBe('backoff');

    store.getState().beginCycle();
    store.getState().completeCycle('2026-03-01T12:00:00.000Z');

    expect(readSyncState(store)).toMatchObject({
      isSyncing: false,
      phase: 'idle',
      consecutiveFailures: 0,
      lastSuccessfulSyncAtIso: '2026-03-01T12:00:00.000Z',
    });
  });

  it('stays stopped when a cycle ends after stop', () => {
    const store = createSyncStateStore();
    store.getState().beginCycle();
    store.getState().scheduleNext('2026-03-01T12:05:00.000Z');
    store.getState().markStopped();
    store.getState().completeCycle('2026-03-01T12:00:00.000Z');

    expect(store.getState().phase).toBe('stopped');
    expect(store.getState().nextSyncAtIso).toBeNull();
    expect(store.getState().isSyncing).toBe(false);
  });

  it('restarts into backoff while failures are outstanding', () => {
    const store = createSyncStateStore();
    store.getState().beginCycle();
    store.getState().failCycle();
    store.getState().markStopped();

    store.getState().markIdle();

    expect(store.getState().phase).toBe('backoff');
  });

  it('floors the queue depth at zero and resets', () => {
    const store = createSyncStateStore();
    store.getState().setQueueDepth(-4);
    expect(store.getState().queueDepth).toBe(0);
    store.getState().setQueueDepth(7);
    store.getState().beginCycle();

    store.getState().reset();

    expect(readSyncState(store)).toMatchObject({ queueDepth: 0, isSyncing: false, phase: 'idle' });
  });

  it('notifies subscribers of transitions', () => {
    const store = createSyncStateStore();
    const phases: string[] = [];
    const unsubscribe = store.subscribe((state) => phases.push(state.phase));

    store.getState().beginCycle();
    store.getState().completeCycle('2026-03-01T12:00:00.000Z');
    unsubscribe();

    expect(phases).toEqual(['syncing', 'idle']);
  });
});
