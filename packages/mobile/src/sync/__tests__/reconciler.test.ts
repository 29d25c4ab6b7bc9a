import { describe, expect, it } from 'vitest';
import { createInMemoryCoreRepository, createInMemoryRemoteState } from '../memoryPorts';
import { createReconciler } from '../reconciler';
import { createSyncLogger } from '../telemetry';
import type { CoreRecord } from '../../../../shared/src/types';
import { makeRecord } from './fixtures';

const T1 = '2026-03-01T08:00:00.000Z';
const T2 = '2026-03-01T09:00:00.000Z';
const T3 = '2026-03-01T10:00:00.000Z';

const setup = (queued: Map<string, CoreRecord> = new Map()) => {
  const repository = createInMemoryCoreRepository([
    makeRecord('optimism', T1),
    makeRecord('resilience', T1, { value: { level: 0.3 } }),
    makeRecord('clarity', T1),
  ]);
  const remote = createInMemoryRemoteState([
    makeRecord('optimism', T1),
    makeRecord('resilience', T2, { value: { level: 0.6 } }),
    makeRecord('focus', T1),
  ]);
  const logger = createSyncLogger({ silent: true });
  const reconciler = createReconciler({
    repository,
    remote,
    peekQueued: (targetId) => queued.get(targetId) ?? null,
    logger,
  });
  return { repository, remote, logger, reconciler };
};

describe('reconciler', () => {
  it('sorts remote state into arrivals, conflicts and unpushed records', async () => {
    const { reconciler } = setup();

    const diff = await reconciler.pullAndDiff();

    expect(diff.arrivals.map((record) => record.id)).toEqual(['focus']);
    expect([...diff.conflicts.keys()]).toEqual(['resilience']);
    expect(diff.conflicts.get('resilience')?.map((record) => record.value)).toEqual([
      { level: 0.3 },
      { level: 0.6 },
    ]);
    expect(diff.unpushed.map((record) => record.id)).toEqual(['clarity']);
  });

  it('adds the queued version of a conflicting record as a candidate', async () => {
    const queuedVersion = makeRecord('resilience', T3, { value: { level: 0.9 } });
    const { reconciler } = setup(new Map([['resilience', queuedVersion]]));

    const diff = await reconciler.pullAndDiff();

    expect(diff.conflicts.get('resilience')).toHaveLength(3);
    expect(diff.conflicts.get('resilience')?.[2]).toEqual(queuedVersion);
  });

  it('delegates change detection to the remote', async () => {
    const { reconciler } = setup();

    expect(await reconciler.hasRemoteChanges(null)).toBe(true);
    await reconciler.pullAndDiff();
    expect(await reconciler.hasRemoteChanges(T1)).toBe(false);
  });

  it('stops offering a pushed record that later disappears remotely', async () => {
    const { reconciler, logger } = setup();

    reconciler.markPushed(['clarity']);
    const diff = await reconciler.pullAndDiff();

    expect(reconciler.isKnownRemotely('clarity')).toBe(true);
    expect(diff.unpushed).toEqual([]);
    expect(
      logger.list().filter((entry) => entry.level === 'warn').map((entry) => entry.payload)
    ).toEqual([{ targetId: 'clarity' }]);
  });

  it('remembers every id seen remotely', async () => {
    const { reconciler } = setup();

    await reconciler.pullAndDiff();

    expect(reconciler.isKnownRemotely('focus')).toBe(true);
    expect(reconciler.isKnownRemotely('clarity')).toBe(false);
  });
});
