import type { CoreRecord } from '../../../shared/src/types';
import type {
  ConnectivityPort,
  CoreRepositoryPort,
  QueueSnapshot,
  QueueStoragePort,
  RemoteStatePort,
} from './types';

const cloneRecord = (record: CoreRecord): CoreRecord => ({
  ...record,
  value: { ...record.value },
  auxiliaryInsights: record.auxiliaryInsights.map((insight) => ({ ...insight })),
});

export interface InMemoryCoreRepository extends CoreRepositoryPort {
  snapshot: () => CoreRecord[];
  reset: (records?: ReadonlyArray<CoreRecord>) => void;
}

export const createInMemoryCoreRepository = (
  seed: ReadonlyArray<CoreRecord> = []
): InMemoryCoreRepository => {
  const records = new Map<string, CoreRecord>();
  const load = (entries: ReadonlyArray<CoreRecord>) => {
    records.clear();
    for (const record of entries) {
      records.set(record.id, cloneRecord(record));
    }
  };
  load(seed);

  return {
    get: async (id) => {
      const record = records.get(id);
      return record ? cloneRecord(record) : null;
    },
    list: async () => [...records.values()].map(cloneRecord),
    put: async (record) => {
      records.set(record.id, cloneRecord(record));
    },
    snapshot: () => [...records.values()].map(cloneRecord),
    reset: (entries = []) => load(entries),
  };
};

export interface InMemoryRemoteState extends RemoteStatePort {
  /** Simulates a write made by another device. */
  seed: (record: CoreRecord) => void;
  snapshot: () => CoreRecord[];
  pushedBatches: () => CoreRecord[][];
}

/** Authoritative copy held in memory; `hasUpdates` reports writes not made through `push`. */
export const createInMemoryRemoteState = (
  initial: ReadonlyArray<CoreRecord> = []
): InMemoryRemoteState => {
  const records = new Map<string, CoreRecord>();
  const batches: CoreRecord[][] = [];
  let externalChanges = initial.length > 0;

  for (const record of initial) {
    records.set(record.id, cloneRecord(record));
  }

  return {
    hasUpdates: async () => externalChanges,
    fetchAll: async () => {
      externalChanges = false;
      return [...records.values()].map(cloneRecord);
    },
    push: async (incoming) => {
      batches.push(incoming.map(cloneRecord));
      for (const record of incoming) {
        records.set(record.id, cloneRecord(record));
      }
    },
    seed: (record) => {
      records.set(record.id, cloneRecord(record));
      externalChanges = true;
    },
    snapshot: () => [...records.values()].map(cloneRecord),
    pushedBatches: () => batches.map((batch) => batch.map(cloneRecord)),
  };
};

export interface InMemoryQueueStorage extends QueueStoragePort {
  current: () => QueueSnapshot | null;
}

export const createInMemoryQueueStorage = (initial: unknown = null): InMemoryQueueStorage => {
  let stored: unknown = initial;
  let lastSaved: QueueSnapshot | null = null;

  return {
    load: async () => stored,
    save: async (snapshot) => {
      lastSaved = {
        version: snapshot.version,
        updates: snapshot.updates.map((update) => ({ ...update })),
      };
      stored = lastSaved;
    },
    current: () => lastSaved,
  };
};

export interface ManualConnectivity extends ConnectivityPort {
  setOnline: (online: boolean) => void;
}

export const createManualConnectivity = (initiallyOnline = true): ManualConnectivity => {
  let online = initiallyOnline;
  const listeners = new Set<(online: boolean) => void>();

  return {
    isOnline: () => online,
    onChange: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    setOnline: (next) => {
      if (next === online) return;
      online = next;
      for (const listener of listeners) {
        listener(next);
      }
    },
  };
};
