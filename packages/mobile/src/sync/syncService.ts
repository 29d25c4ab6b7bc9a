import type { CoreRecord } from '../../../shared/src/types';
import { createSyncStateStore, readSyncState, type SyncStateStore } from '../../../shared/src/store';
import type { SyncStateSnapshot } from '../../../shared/src/types';
import { resolveSyncConfig } from './config';
import { describeError, EmptyConflictSetError } from './errors';
import { createSyncEventBus, type SyncEventBus, type SyncEventListener, type SyncEventStream } from './eventBus';
import { createReconciler } from './reconciler';
import { SyncScheduler } from './syncScheduler';
import { createSyncLogger, type SyncLogger } from './telemetry';
import { createQueuedUpdate, createUpdateQueue, type UpdateQueue } from './updateQueue';
import type {
  ConnectivityPort,
  CoreRepositoryPort,
  QueuedUpdate,
  QueuedUpdateInput,
  QueueSnapshot,
  QueueStatus,
  QueueStoragePort,
  RemoteStatePort,
  SyncConfig,
  SyncStatistics,
  SyncTrigger,
} from './types';

export interface CoreSyncServiceOptions {
  repository: CoreRepositoryPort;
  remote: RemoteStatePort;
  storage?: QueueStoragePort;
  connectivity?: ConnectivityPort;
  config?: Partial<SyncConfig>;
  store?: SyncStateStore;
  logger?: SyncLogger;
  now?: () => number;
}

const toIso = (ms: number): string => new Date(ms).toISOString();

const isQueuedUpdate = (value: QueuedUpdate | QueuedUpdateInput): value is QueuedUpdate => 'id' in value;

/**
 * Background synchronization of core records. Construct one per process and
 * pass it to callers; `initialize` and `stop` are explicit.
 */
export class CoreSyncService {
  readonly config: SyncConfig;
  readonly store: SyncStateStore;
  readonly logger: SyncLogger;

  private readonly queue: UpdateQueue;
  private readonly bus: SyncEventBus;
  private readonly scheduler: SyncScheduler;
  private readonly storage: QueueStoragePort | null;
  private readonly connectivity: ConnectivityPort | null;
  private readonly now: () => number;

  private initialized = false;
  private initializing: Promise<void> | null = null;
  private disposed = false;
  private unsubscribeConnectivity: (() => void) | null = null;
  private persistChain: Promise<void> = Promise.resolve();
  /** Bumped by every stop(); a start() that sees it change gives up. */
  private generation = 0;

  constructor(options: CoreSyncServiceOptions) {
    this.config = resolveSyncConfig(options.config);
    this.store = options.store ?? createSyncStateStore();
    this.logger = options.logger ?? createSyncLogger({ scope: 'core-sync' });
    this.now = options.now ?? (() => Date.now());
    this.storage = options.storage ?? null;
    this.connectivity = options.connectivity ?? null;

    this.bus = createSyncEventBus({
      bufferSize: this.config.eventBufferSize,
      now: () => toIso(this.now()),
      logger: this.logger.child('events'),
    });

    this.queue = createUpdateQueue({
      maxQueueSize: this.config.maxQueueSize,
      onEvict: (update, queueSize) => {
        this.logger.warn('Queue full, evicted oldest update', {
          updateId: update.id,
          targetId: update.targetId,
          queueSize,
        });
        this.bus.publish('updateEvicted', {
          updateId: update.id,
          targetId: update.targetId,
          queueSize,
        });
      },
    });

    const reconciler = createReconciler({
      repository: options.repository,
      remote: options.remote,
      peekQueued: (targetId) => this.queue.peekLatest(targetId),
      logger: this.logger.child('reconciler'),
    });

    this.scheduler = new SyncScheduler({
      config: this.config,
      store: this.store,
      queue: this.queue,
      reconciler,
      repository: options.repository,
      remote: options.remote,
      bus: this.bus,
      logger: this.logger.child('scheduler'),
      now: this.now,
      canRun: () => this.isOnline(),
      onQueueChanged: () => this.onQueueChanged(),
    });
  }

  /** Idempotent. Restores a persisted queue, arms the timer and publishes `initialized`. */
  async initialize(): Promise<void> {
    if (this.disposed) {
      this.logger.warn('initialize() called on a disposed sync service');
      return;
    }
    if (this.initialized) return;
    if (this.initializing) return this.initializing;

    this.initializing = this.start();
    try {
      await this.initializing;
    } finally {
      this.initializing = null;
    }
  }

  enqueueUpdate(update: QueuedUpdate | QueuedUpdateInput): QueuedUpdate {
    const entry = isQueuedUpdate(update) ? update : createQueuedUpdate(update, toIso(this.now()));
    this.queue.enqueue(entry);
    const queueSize = this.queue.size();

    this.bus.publish('updateQueued', {
      updateId: entry.id,
      targetId: entry.targetId,
      queueSize,
    });
    this.logger.debug('Update queued', { updateId: entry.id, kind: entry.kind, queueSize });
    this.onQueueChanged();

    if (this.config.drainOnEnqueue) {
      this.triggerCycle('enqueue');
    }
    return entry;
  }

  /** Resolves false at once when a cycle is active or the service is not running. */
  async forceSync(): Promise<boolean> {
    if (!this.initialized || !this.scheduler.isRunning()) {
      this.logger.debug('forceSync() ignored, service not running');
      return false;
    }
    return this.scheduler.runCycle('force');
  }

  /**
   * Feeds externally observed versions of one record to the resolver. The
   * next cycle resolves and writes them.
   */
  addConflict(targetId: string, candidates: ReadonlyArray<CoreRecord>): void {
    if (candidates.length === 0) {
      throw new EmptyConflictSetError(targetId);
    }

    this.scheduler.stageConflict(targetId, candidates);
    this.bus.publish('conflictDetected', {
      targetId,
      candidateCount: candidates.length,
      source: 'external',
    });
    this.triggerCycle('conflict');
  }

  getStatistics(): SyncStatistics {
    const state = this.store.getState();
    return {
      lastSuccessfulSyncAtIso: state.lastSuccessfulSyncAtIso,
      consecutiveFailures: state.consecutiveFailures,
      queueSize: this.queue.size(),
      isSyncing: state.isSyncing,
      nextSyncEstimateIso: this.estimateNextSync(),
    };
  }

  getState(): SyncStateSnapshot {
    return readSyncState(this.store);
  }

  getQueueStatus(): QueueStatus {
    return this.queue.status();
  }

  listQueued(): QueuedUpdate[] {
    return this.queue.list();
  }

  removeUpdate(updateId: string): boolean {
    const removed = this.queue.remove(updateId);
    if (removed) this.onQueueChanged();
    return removed;
  }

  clearQueue(): void {
    this.queue.clear();
    this.logger.info('Update queue cleared');
    this.onQueueChanged();
  }

  snapshotQueue(): QueueSnapshot {
    return this.queue.snapshot();
  }

  restoreQueue(snapshot: unknown): number {
    const before = this.queue.size();
    this.queue.restore(snapshot);
    this.onQueueChanged();
    return Math.max(0, this.queue.size() - before);
  }

  subscribe(listener: SyncEventListener): () => void {
    return this.bus.subscribe(listener);
  }

  events(options?: { bufferSize?: number }): SyncEventStream {
    return this.bus.stream(options);
  }

  whenIdle(): Promise<void> {
    return this.scheduler.whenIdle();
  }

  /** Resolves once every queued snapshot write has settled. */
  whenPersisted(): Promise<void> {
    return this.persistChain;
  }

  /** Cancels the timer. An in-flight cycle is left to finish. */
  stop(): void {
    this.generation += 1;
    if (!this.initialized && !this.scheduler.isRunning()) return;
    this.scheduler.stop();
    this.unsubscribeConnectivity?.();
    this.unsubscribeConnectivity = null;
    this.initialized = false;
    this.logger.info('Sync service stopped', { queueSize: this.queue.size() });
  }

  dispose(): void {
    if (this.disposed) return;
    this.stop();
    this.bus.close();
    this.disposed = true;
  }

  private async start(): Promise<void> {
    const generation = this.generation;
    if (this.storage) {
      try {
        const persisted = await this.storage.load();
        if (persisted !== null && persisted !== undefined) {
          const restored = this.restoreQueue(persisted);
          this.logger.info('Restored persisted updates', { restored });
        }
      } catch (error) {
        this.bus.publish('error', { stage: 'restore', message: describeError(error) });
        this.logger.error('Could not restore persisted queue', { message: describeError(error) });
      }
    }

    if (generation !== this.generation) {
      this.scheduler.stop();
      this.logger.info('Initialization abandoned, stop() was called', {
        queueSize: this.queue.size(),
      });
      return;
    }

    this.scheduler.start();
    if (this.connectivity) {
      this.unsubscribeConnectivity = this.connectivity.onChange((online) => {
        if (online && this.queue.size() > 0) {
          this.logger.info('Connectivity restored, draining queue', { queueSize: this.queue.size() });
          this.triggerCycle('connectivity');
        }
      });
    }
    this.initialized = true;

    this.bus.publish('initialized', { queueSize: this.queue.size() });
    this.logger.info('Sync service initialized', {
      queueSize: this.queue.size(),
      baseIntervalMs: this.config.baseIntervalMs,
    });
  }

  /** Enqueue and conflict triggers wait out a backoff; a reconnect does not. */
  private triggerCycle(trigger: SyncTrigger): void {
    if (!this.initialized || !this.scheduler.isRunning()) return;
    if (!this.isOnline()) return;
    const phase = this.store.getState().phase;
    if (phase !== 'idle' && !(trigger === 'connectivity' && phase === 'backoff')) return;
    void this.scheduler.runCycle(trigger);
  }

  private isOnline(): boolean {
    return this.connectivity ? this.connectivity.isOnline() : true;
  }

  private onQueueChanged(): void {
    this.store.getState().setQueueDepth(this.queue.size());
    this.persistQueue();
  }

  private persistQueue(): void {
    const storage = this.storage;
    if (!storage) return;
    const snapshot = this.queue.snapshot();
    this.persistChain = this.persistChain
      .then(() => storage.save(snapshot))
      .catch((error: unknown) => {
        this.logger.warn('Could not persist update queue', { message: describeError(error) });
      });
  }

  private estimateNextSync(): string {
    const scheduled = this.scheduler.nextRunAt();
    if (scheduled !== null) return toIso(scheduled);

    const lastSuccess = this.store.getState().lastSuccessfulSyncAtIso;
    if (lastSuccess) {
      const lastMs = Date.parse(lastSuccess);
      if (!Number.isNaN(lastMs)) return toIso(lastMs + this.config.baseIntervalMs);
    }
    return toIso(this.now() + this.scheduler.currentIntervalMs());
  }
}
