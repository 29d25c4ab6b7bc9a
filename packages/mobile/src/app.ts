import { createSyncStateStore, type SyncStateStore } from '../../shared/src/store';
import { readSyncConfigFromEnv } from './sync/config';
import { CoreSyncService } from './sync/syncService';
import { createSyncLogger, type SyncLogger } from './sync/telemetry';
import type {
  ConnectivityPort,
  CoreRepositoryPort,
  QueueStoragePort,
  RemoteStatePort,
  SyncConfig,
} from './sync/types';

export interface MobileAppRuntime {
  store: SyncStateStore;
  syncService: CoreSyncService;
  logger: SyncLogger;
}

/**
 * Composition root for the mobile shell. Config precedence: explicit
 * `config`, then `CORE_SYNC_*` environment variables, then defaults.
 */
export const createMobileAppRuntime = (payload: {
  repository: CoreRepositoryPort;
  remote: RemoteStatePort;
  storage?: QueueStoragePort;
  connectivity?: ConnectivityPort;
  config?: Partial<SyncConfig>;
  env?: Record<string, string | undefined>;
  now?: () => number;
  silentLogs?: boolean;
}): MobileAppRuntime => {
  const store = createSyncStateStore();
  const logger = createSyncLogger({
    scope: 'mobile.core-sync',
    silent: payload.silentLogs,
  });
  const syncService = new CoreSyncService({
    repository: payload.repository,
    remote: payload.remote,
    storage: payload.storage,
    connectivity: payload.connectivity,
    config: {
      ...readSyncConfigFromEnv(payload.env),
      ...payload.config,
    },
    store,
    logger,
    now: payload.now,
  });

  return {
    store,
    syncService,
    logger,
  };
};
