import type { CoreRecord } from '../../../shared/src/types';
import type { SyncLogger } from './telemetry';
import type { ConflictSet, CoreRepositoryPort, ReconcileDiff, RemoteStatePort } from './types';

export interface Reconciler {
  hasRemoteChanges: (sinceIso: string | null) => Promise<boolean>;
  pullAndDiff: () => Promise<ReconcileDiff>;
  markPushed: (recordIds: ReadonlyArray<string>) => void;
  isKnownRemotely: (recordId: string) => boolean;
}

const sameVersion = (left: CoreRecord, right: CoreRecord): boolean => {
  const leftMs = Date.parse(left.lastUpdatedAtIso);
  const rightMs = Date.parse(right.lastUpdatedAtIso);
  if (Number.isNaN(leftMs) || Number.isNaN(rightMs)) {
    return left.lastUpdatedAtIso === right.lastUpdatedAtIso;
  }
  return leftMs === rightMs;
};

export const createReconciler = (payload: {
  repository: CoreRepositoryPort;
  remote: RemoteStatePort;
  /** Latest version of a record still waiting in the update queue. */
  peekQueued: (targetId: string) => CoreRecord | null;
  logger: SyncLogger;
}): Reconciler => {
  const knownRemotely = new Set<string>();

  return {
    hasRemoteChanges: (sinceIso) => payload.remote.hasUpdates(sinceIso),
    pullAndDiff: async () => {
      const remoteRecords = await payload.remote.fetchAll();
      const localRecords = await payload.repository.list();
      const localById = new Map(localRecords.map((record) => [record.id, record]));

      const conflicts: ConflictSet = new Map();
      const arrivals: CoreRecord[] = [];
      const remoteIds = new Set<string>();

      for (const remoteRecord of remoteRecords) {
        remoteIds.add(remoteRecord.id);
        knownRemotely.add(remoteRecord.id);

        const localRecord = localById.get(remoteRecord.id);
        if (!localRecord) {
          arrivals.push(remoteRecord);
          continue;
        }
        if (sameVersion(localRecord, remoteRecord)) continue;

        const candidates = [localRecord, remoteRecord];
        const queued = payload.peekQueued(remoteRecord.id);
        if (queued) candidates.push(queued);
        conflicts.set(remoteRecord.id, candidates);
      }

      const unpushed: CoreRecord[] = [];
      for (const localRecord of localRecords) {
        if (remoteIds.has(localRecord.id)) continue;
        if (knownRemotely.has(localRecord.id)) {
          payload.logger.warn('Local record missing remotely after a previous push', {
            targetId: localRecord.id,
          });
          continue;
        }
        unpushed.push(localRecord);
      }

      payload.logger.debug('Remote state diffed', {
        remoteCount: remoteRecords.length,
        localCount: localRecords.length,
        conflictCount: conflicts.size,
        arrivalCount: arrivals.length,
        unpushedCount: unpushed.length,
      });

      return { conflicts, arrivals, unpushed };
    },
    markPushed: (recordIds) => {
      for (const recordId of recordIds) {
        knownRemotely.add(recordId);
      }
    },
    isKnownRemotely: (recordId) => knownRemotely.has(recordId),
  };
};
