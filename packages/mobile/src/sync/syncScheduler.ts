import type { CoreRecord } from '../../../shared/src/types';
import type { SyncStateStore } from '../../../shared/src/store';
import { computeSyncInterval } from './backoff';
import { normalizeInsights, resolveConflictSet } from './conflictResolver';
import { describeError, RecordNotFoundError, SyncCycleError } from './errors';
import type { SyncEventBus } from './eventBus';
import type { Reconciler } from './reconciler';
import type { SyncLogger } from './telemetry';
import { createQueuedUpdate, type UpdateQueue } from './updateQueue';
import type {
  ConflictSet,
  CoreRepositoryPort,
  QueuedUpdate,
  RemoteStatePort,
  SyncConfig,
  SyncCycleStage,
  SyncTrigger,
} from './types';

type ConflictSource = 'reconciler' | 'external';

interface DrainOutcome {
  applied: number;
  retried: number;
  deferred: number;
  dropped: number;
}

export interface SyncSchedulerDeps {
  config: SyncConfig;
  store: SyncStateStore;
  queue: UpdateQueue;
  reconciler: Reconciler;
  repository: CoreRepositoryPort;
  remote: RemoteStatePort;
  bus: SyncEventBus;
  logger: SyncLogger;
  now: () => number;
  /** Gate for timer-driven cycles, e.g. connectivity. */
  canRun?: () => boolean;
  onQueueChanged?: () => void;
}

const toIso = (ms: number): string => new Date(ms).toISOString();

const runStage = async <T>(stage: SyncCycleStage, operation: () => Promise<T>): Promise<T> => {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof SyncCycleError) throw error;
    throw new SyncCycleError(stage, error);
  }
};

/**
 * Drives sync cycles: idle -> syncing -> (idle | backoff). Owns the timer and
 * every transition of the shared sync state.
 */
export class SyncScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private nextRunAtMs: number | null = null;
  private running = false;
  private inFlight: Promise<void> | null = null;
  private readonly staged = new Map<string, CoreRecord[]>();

  constructor(private readonly deps: SyncSchedulerDeps) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    this.deps.store.getState().markIdle();
    this.arm(this.currentIntervalMs());
  }

  stop(): void {
    this.running = false;
    this.clearTimer();
    this.deps.store.getState().markStopped();
  }

  isRunning(): boolean {
    return this.running;
  }

  currentIntervalMs(): number {
    return computeSyncInterval(this.deps.store.getState().consecutiveFailures, this.deps.config);
  }

  nextRunAt(): number | null {
    return this.nextRunAtMs;
  }

  whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  /** Holds externally observed candidates until the next cycle resolves them. */
  stageConflict(targetId: string, candidates: ReadonlyArray<CoreRecord>): void {
    const existing = this.staged.get(targetId) ?? [];
    this.staged.set(targetId, [...existing, ...candidates]);
  }

  /** Starts a cycle unless one is active. Resolves once that cycle has finished. */
  async runCycle(trigger: SyncTrigger): Promise<boolean> {
    if (!this.deps.store.getState().beginCycle()) {
      this.deps.logger.debug('Sync cycle already active', { trigger });
      return false;
    }

    this.clearTimer();
    const cycle = this.executeCycle(trigger);
    this.inFlight = cycle;
    try {
      await cycle;
    } finally {
      this.inFlight = null;
    }
    return true;
  }

  private async executeCycle(trigger: SyncTrigger): Promise<void> {
    const { bus, logger, queue, store } = this.deps;
    const startedAtMs = this.deps.now();
    const conflicts: ConflictSet = new Map();
    const sources = new Map<string, ConflictSource>();
    for (const [targetId, candidates] of this.staged) {
      conflicts.set(targetId, candidates);
      sources.set(targetId, 'external');
    }
    this.staged.clear();

    try {
      bus.publish('syncStarted', { trigger, queueSize: queue.size() });
      logger.info('Sync cycle started', { trigger, queueSize: queue.size() });
      const drain = await this.drainQueue();
      const lastSuccessIso = store.getState().lastSuccessfulSyncAtIso;

      let arrivalsCount = 0;
      const hasChanges = await runStage('reconcile', () =>
        this.deps.reconciler.hasRemoteChanges(lastSuccessIso)
      );
      if (hasChanges) {
        const diff = await runStage('reconcile', () => this.deps.reconciler.pullAndDiff());
        for (const record of diff.arrivals) {
          await runStage('reconcile', () => this.deps.repository.put(record));
          arrivalsCount += 1;
        }
        for (const [targetId, candidates] of diff.conflicts) {
          conflicts.set(targetId, [...(conflicts.get(targetId) ?? []), ...candidates]);
          if (!sources.has(targetId)) {
            sources.set(targetId, 'reconciler');
            bus.publish('conflictDetected', {
              targetId,
              candidateCount: candidates.length,
              source: 'reconciler',
            });
          }
        }
        this.enqueueUnpushed(diff.unpushed);
      }

      const resolvedCount = await this.resolveConflicts(conflicts, sources);

      const finishedAtMs = this.deps.now();
      store.getState().completeCycle(toIso(finishedAtMs));
      bus.publish('syncCompleted', {
        appliedCount: drain.applied,
        retriedCount: drain.retried + drain.deferred,
        droppedCount: drain.dropped,
        arrivalsCount,
        conflictsResolved: resolvedCount,
        durationMs: Math.max(0, finishedAtMs - startedAtMs),
      });
      logger.info('Sync cycle completed', {
        trigger,
        applied: drain.applied,
        retried: drain.retried,
        deferred: drain.deferred,
        dropped: drain.dropped,
        arrivals: arrivalsCount,
        conflictsResolved: resolvedCount,
      });
      this.arm(this.currentIntervalMs());
    } catch (error) {
      for (const [targetId, candidates] of conflicts) {
        if (sources.get(targetId) === 'external') {
          this.stageConflict(targetId, candidates);
        }
      }
      const stage = error instanceof SyncCycleError ? error.stage : 'reconcile';
      const consecutiveFailures = store.getState().failCycle();
      const nextIntervalMs = this.currentIntervalMs();
      bus.publish('syncFailed', {
        consecutiveFailures,
        stage,
        message: describeError(error),
        nextIntervalMs,
      });
      logger.error('Sync cycle failed', {
        trigger,
        stage,
        consecutiveFailures,
        nextIntervalMs,
        message: describeError(error),
      });
      this.arm(nextIntervalMs);
    }
  }

  private async drainQueue(): Promise<DrainOutcome> {
    const { bus, config, logger, queue } = this.deps;
    const drained = queue.drainAll();
    this.deps.onQueueChanged?.();

    const outcome: DrainOutcome = { applied: 0, retried: 0, deferred: 0, dropped: 0 };
    const blockedTargets = new Set<string>();
    const requeue: QueuedUpdate[] = [];

    for (const update of drained) {
      // Keep same-target order: nothing overtakes an entry waiting on retry.
      if (blockedTargets.has(update.targetId)) {
        requeue.push(update);
        outcome.deferred += 1;
        continue;
      }

      try {
        const pushedIds = await this.applyUpdate(update);
        this.deps.reconciler.markPushed(pushedIds);
        outcome.applied += 1;
      } catch (error) {
        const retryCount = update.retryCount + 1;
        const attempted: QueuedUpdate = {
          ...update,
          retryCount,
          lastAttemptAtIso: toIso(this.deps.now()),
        };

        if (retryCount >= config.maxRetries) {
          outcome.dropped += 1;
          bus.publish('updateFailed', {
            updateId: update.id,
            targetId: update.targetId,
            retryCount,
            message: describeError(error),
          });
          logger.error('Update dropped after exhausting retries', {
            updateId: update.id,
            targetId: update.targetId,
            retryCount,
            message: describeError(error),
          });
          continue;
        }

        requeue.push(attempted);
        blockedTargets.add(update.targetId);
        outcome.retried += 1;
        logger.warn('Update failed to apply, will retry', {
          updateId: update.id,
          targetId: update.targetId,
          retryCount,
          message: describeError(error),
        });
      }
    }

    queue.requeue(requeue);
    this.deps.onQueueChanged?.();
    return outcome;
  }

  private async applyUpdate(update: QueuedUpdate): Promise<string[]> {
    const { remote, repository } = this.deps;

    switch (update.kind) {
      case 'record': {
        await repository.put(update.payload.record);
        await remote.push([update.payload.record]);
        return [update.payload.record.id];
      }
      case 'batch': {
        for (const record of update.payload.records) {
          await repository.put(record);
        }
        await remote.push(update.payload.records);
        return update.payload.records.map((record) => record.id);
      }
      case 'metadata': {
        const existing = await repository.get(update.targetId);
        if (!existing) {
          throw new RecordNotFoundError(update.targetId);
        }
        const merged: CoreRecord = {
          ...existing,
          auxiliaryInsights: normalizeInsights(
            [...existing.auxiliaryInsights, ...update.payload.auxiliaryInsights],
            this.deps.config.insightCap
          ),
        };
        await repository.put(merged);
        await remote.push([merged]);
        return [merged.id];
      }
    }
  }

  private async resolveConflicts(
    conflicts: ConflictSet,
    sources: Map<string, ConflictSource>
  ): Promise<number> {
    const { bus, config, logger, queue, remote, repository } = this.deps;
    const resolvedSet = await runStage('resolve', async () =>
      resolveConflictSet(conflicts, { insightCap: config.insightCap })
    );
    let resolvedCount = 0;

    for (const [targetId, resolved] of resolvedSet) {
      const candidateCount = conflicts.get(targetId)?.length ?? 0;
      await runStage('resolve', () => repository.put(resolved));
      await runStage('push', () => remote.push([resolved]));
      this.deps.reconciler.markPushed([resolved.id]);
      conflicts.delete(targetId);
      resolvedCount += 1;

      const superseded = queue.supersede(resolved);
      if (superseded > 0) {
        logger.info('Queued versions superseded by resolution', { targetId, superseded });
        this.deps.onQueueChanged?.();
      }

      bus.publish('conflictResolved', {
        targetId,
        lastUpdatedAtIso: resolved.lastUpdatedAtIso,
        insightCount: resolved.auxiliaryInsights.length,
      });
      logger.info('Conflict resolved', {
        targetId,
        source: sources.get(targetId) ?? 'reconciler',
        candidateCount,
      });
    }

    return resolvedCount;
  }

  private enqueueUnpushed(records: ReadonlyArray<CoreRecord>): void {
    const { bus, logger, queue } = this.deps;
    let enqueued = 0;

    for (const record of records) {
      if (queue.peekLatest(record.id)) continue;
      const update = createQueuedUpdate(
        { kind: 'record', targetId: record.id, payload: { record } },
        toIso(this.deps.now())
      );
      queue.enqueue(update);
      enqueued += 1;
      bus.publish('updateQueued', {
        updateId: update.id,
        targetId: update.targetId,
        queueSize: queue.size(),
      });
    }

    if (enqueued > 0) {
      logger.info('Local-only records queued for push', { count: enqueued });
      this.deps.onQueueChanged?.();
    }
  }

  private arm(delayMs: number): void {
    this.clearTimer();
    if (!this.running) return;

    const runAtMs = this.deps.now() + delayMs;
    this.nextRunAtMs = runAtMs;
    this.deps.store.getState().scheduleNext(toIso(runAtMs));
    this.timer = setTimeout(() => {
      this.timer = null;
      this.nextRunAtMs = null;
      this.onTimer();
    }, delayMs);
  }

  private onTimer(): void {
    if (!this.running) return;
    if (this.deps.canRun && !this.deps.canRun()) {
      this.deps.logger.info('Skipping scheduled sync while offline');
      this.arm(this.currentIntervalMs());
      return;
    }
    void this.runCycle('timer');
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRunAtMs = null;
  }
}
