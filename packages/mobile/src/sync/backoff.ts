import type { SyncConfig } from './types';

type BackoffConfig = Pick<SyncConfig, 'baseIntervalMs' | 'maxIntervalMs' | 'maxBackoffMultiplier'>;

/** base × min(2^failures, maxBackoffMultiplier), clamped to maxIntervalMs. */
export const computeSyncInterval = (consecutiveFailures: number, config: BackoffConfig): number => {
  const failures = Math.max(0, Math.floor(consecutiveFailures));
  const multiplier = Math.min(2 ** Math.min(failures, 30), config.maxBackoffMultiplier);
  return Math.min(config.baseIntervalMs * multiplier, config.maxIntervalMs);
};
