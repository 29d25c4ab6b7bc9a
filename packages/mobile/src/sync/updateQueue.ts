import { v4 as uuidv4 } from 'uuid';
import type { CoreRecord } from '../../../shared/src/types';
import { parseQueueSnapshot } from './queueSnapshot';
import type { QueuedUpdate, QueuedUpdateInput, QueueSnapshot, QueueStatus } from './types';

export interface UpdateQueue {
  /** Appends to the tail, evicting from the head past the bound. Returns the evicted entries. */
  enqueue: (update: QueuedUpdate) => QueuedUpdate[];
  /** Returns the current contents in order and leaves the queue empty. */
  drainAll: () => QueuedUpdate[];
  /** Puts entries back at the head in their given order. Returns the evicted entries. */
  requeue: (updates: ReadonlyArray<QueuedUpdate>) => QueuedUpdate[];
  peekLatest: (targetId: string) => CoreRecord | null;
  size: () => number;
  list: () => QueuedUpdate[];
  remove: (updateId: string) => boolean;
  clear: () => void;
  status: () => QueueStatus;
  snapshot: () => QueueSnapshot;
  restore: (snapshot: unknown) => QueuedUpdate[];
  /**
   * Replaces queued versions of `resolved.id` that are not newer than it:
   * record entries are removed, batch entries carry `resolved` instead.
   * Returns the number of entries touched.
   */
  supersede: (resolved: CoreRecord) => number;
}

export const createQueuedUpdate = (input: QueuedUpdateInput, nowIso: string): QueuedUpdate => {
  const base = {
    id: `update-${uuidv4()}`,
    targetId: input.targetId,
    createdAtIso: nowIso,
    lastAttemptAtIso: null,
    retryCount: 0,
  };

  switch (input.kind) {
    case 'record':
      return { ...base, kind: 'record', payload: input.payload };
    case 'batch':
      return { ...base, kind: 'batch', payload: input.payload };
    case 'metadata':
      return { ...base, kind: 'metadata', payload: input.payload };
  }
};

const recordFor = (update: QueuedUpdate, targetId: string): CoreRecord | null => {
  switch (update.kind) {
    case 'record':
      return update.payload.record.id === targetId ? update.payload.record : null;
    case 'batch':
      return update.payload.records.find((record) => record.id === targetId) ?? null;
    case 'metadata':
      return null;
  }
};

const toMs = (iso: string): number => {
  const parsed = Date.parse(iso);
  return Number.isNaN(parsed) ? 0 : parsed;
};

const laterIso = (left: string | null, right: string | null): string | null => {
  if (!left) return right;
  if (!right) return left;
  return Date.parse(right) > Date.parse(left) ? right : left;
};

export const createUpdateQueue = (options: {
  maxQueueSize: number;
  onEvict?: (update: QueuedUpdate, queueSize: number) => void;
}): UpdateQueue => {
  const maxQueueSize = Math.max(1, Math.floor(options.maxQueueSize));
  const queue: QueuedUpdate[] = [];

  const enforceBound = (): QueuedUpdate[] => {
    if (queue.length <= maxQueueSize) return [];
    const evicted = queue.splice(0, queue.length - maxQueueSize);
    for (const update of evicted) {
      options.onEvict?.(update, queue.length);
    }
    return evicted;
  };

  return {
    enqueue: (update) => {
      queue.push(update);
      return enforceBound();
    },
    drainAll: () => queue.splice(0, queue.length),
    requeue: (updates) => {
      if (updates.length === 0) return [];
      queue.unshift(...updates);
      return enforceBound();
    },
    peekLatest: (targetId) => {
      for (let index = queue.length - 1; index >= 0; index -= 1) {
        const record = recordFor(queue[index], targetId);
        if (record) return record;
      }
      return null;
    },
    size: () => queue.length,
    list: () => [...queue],
    remove: (updateId) => {
      const index = queue.findIndex((entry) => entry.id === updateId);
      if (index < 0) return false;
      queue.splice(index, 1);
      return true;
    },
    clear: () => {
      queue.splice(0, queue.length);
    },
    status: () => ({
      total: queue.length,
      pending: queue.filter((entry) => entry.retryCount === 0).length,
      retrying: queue.filter((entry) => entry.retryCount > 0).length,
      lastAttemptAtIso: queue.reduce<string | null>(
        (latest, entry) => laterIso(latest, entry.lastAttemptAtIso),
        null
      ),
    }),
    snapshot: () => ({
      version: 1,
      updates: queue.map((entry) => ({ ...entry })),
    }),
    restore: (snapshot) => {
      const parsed = parseQueueSnapshot(snapshot);
      const known = new Set(queue.map((entry) => entry.id));
      const restored = parsed.updates.filter((entry) => !known.has(entry.id));
      queue.unshift(...restored);
      return enforceBound();
    },
    supersede: (resolved) => {
      const resolvedMs = toMs(resolved.lastUpdatedAtIso);
      const covered = (record: CoreRecord) =>
        record.id === resolved.id && toMs(record.lastUpdatedAtIso) <= resolvedMs;
      let touched = 0;

      for (let index = queue.length - 1; index >= 0; index -= 1) {
        const entry = queue[index];
        if (entry.kind === 'record' && covered(entry.payload.record)) {
          queue.splice(index, 1);
          touched += 1;
        } else if (entry.kind === 'batch' && entry.payload.records.some(covered)) {
          queue[index] = {
            ...entry,
            payload: {
              records: entry.payload.records.map((record) => (covered(record) ? resolved : record)),
            },
          };
          touched += 1;
        }
      }
      return touched;
    },
  };
};
