import type { CoreInsight, CoreRecord } from '../../../shared/src/types';

export type UpdateKind = 'record' | 'batch' | 'metadata';

interface QueuedUpdateBase {
  id: string;
  targetId: string;
  createdAtIso: string;
  lastAttemptAtIso: string | null;
  retryCount: number;
}

export interface RecordUpdate extends QueuedUpdateBase {
  kind: 'record';
  payload: { record: CoreRecord };
}

export interface BatchUpdate extends QueuedUpdateBase {
  kind: 'batch';
  payload: { records: CoreRecord[] };
}

export interface MetadataUpdate extends QueuedUpdateBase {
  kind: 'metadata';
  payload: { auxiliaryInsights: CoreInsight[] };
}

export type QueuedUpdate = RecordUpdate | BatchUpdate | MetadataUpdate;

export type QueuedUpdateInput =
  | Pick<RecordUpdate, 'kind' | 'targetId' | 'payload'>
  | Pick<BatchUpdate, 'kind' | 'targetId' | 'payload'>
  | Pick<MetadataUpdate, 'kind' | 'targetId' | 'payload'>;

export interface QueueStatus {
  total: number;
  pending: number;
  retrying: number;
  lastAttemptAtIso: string | null;
}

export interface QueueSnapshot {
  version: 1;
  updates: QueuedUpdate[];
}

/** targetId -> every divergent version observed during one cycle. */
export type ConflictSet = Map<string, CoreRecord[]>;

export interface ReconcileDiff {
  conflicts: ConflictSet;
  arrivals: CoreRecord[];
  unpushed: CoreRecord[];
}

export interface CoreRepositoryPort {
  get: (id: string) => Promise<CoreRecord | null>;
  list: () => Promise<CoreRecord[]>;
  put: (record: CoreRecord) => Promise<void>;
}

export interface RemoteStatePort {
  hasUpdates: (sinceIso: string | null) => Promise<boolean>;
  fetchAll: () => Promise<CoreRecord[]>;
  push: (records: CoreRecord[]) => Promise<void>;
}

export interface QueueStoragePort {
  load: () => Promise<unknown>;
  save: (snapshot: QueueSnapshot) => Promise<void>;
}

export interface ConnectivityPort {
  isOnline: () => boolean;
  onChange: (listener: (online: boolean) => void) => () => void;
}

export type SyncEventType =
  | 'initialized'
  | 'syncStarted'
  | 'syncCompleted'
  | 'syncFailed'
  | 'updateQueued'
  | 'updateEvicted'
  | 'updateFailed'
  | 'conflictDetected'
  | 'conflictResolved'
  | 'error';

export type SyncEventPayload = Record<string, string | number | boolean | null>;

export interface SyncEvent {
  id: string;
  type: SyncEventType;
  createdAtIso: string;
  payload: SyncEventPayload;
}

export type SyncTrigger = 'timer' | 'force' | 'enqueue' | 'conflict' | 'connectivity';

export type SyncCycleStage = 'reconcile' | 'resolve' | 'push';

export interface SyncStatistics {
  lastSuccessfulSyncAtIso: string | null;
  consecutiveFailures: number;
  queueSize: number;
  isSyncing: boolean;
  nextSyncEstimateIso: string;
}

export interface SyncConfig {
  baseIntervalMs: number;
  maxIntervalMs: number;
  maxBackoffMultiplier: number;
  maxQueueSize: number;
  maxRetries: number;
  insightCap: number;
  eventBufferSize: number;
  drainOnEnqueue: boolean;
}
