import Ajv from 'ajv';
import { parse as parseYaml } from 'yaml';
import { SyncConfigError, toIssues, type SyncIssue } from './errors';
import type { SyncConfig } from './types';

export const DEFAULT_SYNC_CONFIG: SyncConfig = {
  baseIntervalMs: 5 * 60_000,
  maxIntervalMs: 30 * 60_000,
  maxBackoffMultiplier: 16,
  maxQueueSize: 100,
  maxRetries: 5,
  insightCap: 5,
  eventBufferSize: 256,
  drainOnEnqueue: true,
};

const MIN_BASE_INTERVAL_MS = 1_000;

export const syncConfigSchema = {
  $id: 'https://journal-core-sync.local/schemas/sync-config-v1.json',
  type: 'object',
  additionalProperties: false,
  properties: {
    baseIntervalMs: { type: 'number', minimum: MIN_BASE_INTERVAL_MS },
    maxIntervalMs: { type: 'number', minimum: MIN_BASE_INTERVAL_MS },
    maxBackoffMultiplier: { type: 'number', minimum: 1 },
    maxQueueSize: { type: 'integer', minimum: 1 },
    maxRetries: { type: 'integer', minimum: 1 },
    insightCap: { type: 'integer', minimum: 1 },
    eventBufferSize: { type: 'integer', minimum: 1 },
    drainOnEnqueue: { type: 'boolean' },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSyncConfigDocument = ajv.compile<Partial<SyncConfig>>(syncConfigSchema);

const clampInt = (value: number | undefined, fallback: number, min: number): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
  return Math.max(min, Math.floor(value));
};

export const resolveSyncConfig = (overrides: Partial<SyncConfig> = {}): SyncConfig => {
  const baseIntervalMs = clampInt(
    overrides.baseIntervalMs,
    DEFAULT_SYNC_CONFIG.baseIntervalMs,
    MIN_BASE_INTERVAL_MS
  );
  return {
    baseIntervalMs,
    maxIntervalMs: clampInt(
      overrides.maxIntervalMs,
      Math.max(baseIntervalMs, DEFAULT_SYNC_CONFIG.maxIntervalMs),
      baseIntervalMs
    ),
    maxBackoffMultiplier: clampInt(
      overrides.maxBackoffMultiplier,
      DEFAULT_SYNC_CONFIG.maxBackoffMultiplier,
      1
    ),
    maxQueueSize: clampInt(overrides.maxQueueSize, DEFAULT_SYNC_CONFIG.maxQueueSize, 1),
    maxRetries: clampInt(overrides.maxRetries, DEFAULT_SYNC_CONFIG.maxRetries, 1),
    insightCap: clampInt(overrides.insightCap, DEFAULT_SYNC_CONFIG.insightCap, 1),
    eventBufferSize: clampInt(overrides.eventBufferSize, DEFAULT_SYNC_CONFIG.eventBufferSize, 1),
    drainOnEnqueue:
      typeof overrides.drainOnEnqueue === 'boolean'
        ? overrides.drainOnEnqueue
        : DEFAULT_SYNC_CONFIG.drainOnEnqueue,
  };
};

const ENV_NUMBER_KEYS: ReadonlyArray<[string, Exclude<keyof SyncConfig, 'drainOnEnqueue'>]> = [
  ['CORE_SYNC_BASE_INTERVAL_MS', 'baseIntervalMs'],
  ['CORE_SYNC_MAX_INTERVAL_MS', 'maxIntervalMs'],
  ['CORE_SYNC_MAX_BACKOFF_MULTIPLIER', 'maxBackoffMultiplier'],
  ['CORE_SYNC_MAX_QUEUE_SIZE', 'maxQueueSize'],
  ['CORE_SYNC_MAX_RETRIES', 'maxRetries'],
  ['CORE_SYNC_INSIGHT_CAP', 'insightCap'],
  ['CORE_SYNC_EVENT_BUFFER_SIZE', 'eventBufferSize'],
];

const parseFlag = (raw: string | undefined): boolean | undefined => {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return undefined;
};

/** Reads overrides from `CORE_SYNC_*` variables. Unparsable values are ignored. */
export const readSyncConfigFromEnv = (
  env: Record<string, string | undefined> = typeof process === 'undefined' ? {} : process.env
): Partial<SyncConfig> => {
  const overrides: Partial<SyncConfig> = {};

  for (const [variable, key] of ENV_NUMBER_KEYS) {
    const raw = env[variable]?.trim();
    if (!raw) continue;
    const parsed = Number(raw);
    if (Number.isFinite(parsed)) {
      overrides[key] = parsed;
    }
  }

  const drainOnEnqueue = parseFlag(env.CORE_SYNC_DRAIN_ON_ENQUEUE);
  if (drainOnEnqueue !== undefined) {
    overrides.drainOnEnqueue = drainOnEnqueue;
  }

  return overrides;
};

export type SyncConfigParseResult =
  | { ok: true; config: SyncConfig }
  | { ok: false; errors: SyncIssue[] };

export const parseSyncConfigYaml = (content: string): SyncConfigParseResult => {
  let parsed: unknown;
  try {
    parsed = parseYaml(content) ?? {};
  } catch (error) {
    return {
      ok: false,
      errors: [
        {
          path: '/',
          message: error instanceof Error ? error.message : 'unreadable YAML document',
        },
      ],
    };
  }

  if (!validateSyncConfigDocument(parsed)) {
    return {
      ok: false,
      errors: toIssues(validateSyncConfigDocument.errors ?? []),
    };
  }

  return {
    ok: true,
    config: resolveSyncConfig(parsed),
  };
};

/** Throwing variant of `parseSyncConfigYaml` for startup paths. */
export const loadSyncConfigYaml = (content: string): SyncConfig => {
  const result = parseSyncConfigYaml(content);
  if (!result.ok) {
    throw new SyncConfigError(result.errors);
  }
  return result.config;
};
