export type SyncLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type SyncLogPayload = Record<string, string | number | boolean | null>;

export interface SyncLogEntry {
  level: SyncLogLevel;
  scope: string;
  message: string;
  createdAtIso: string;
  payload: SyncLogPayload;
}

export type SyncLogSink = (entry: SyncLogEntry) => void;

export interface SyncLogger {
  debug: (message: string, payload?: SyncLogPayload) => SyncLogEntry;
  info: (message: string, payload?: SyncLogPayload) => SyncLogEntry;
  warn: (message: string, payload?: SyncLogPayload) => SyncLogEntry;
  error: (message: string, payload?: SyncLogPayload) => SyncLogEntry;
  child: (scope: string) => SyncLogger;
  list: (limit?: number) => SyncLogEntry[];
  clear: () => void;
}

const DEFAULT_MAX_ENTRIES = 200;

const consoleSink: SyncLogSink = (entry) => {
  switch (entry.level) {
    case 'error':
      console.error('[sync]', entry);
      return;
    case 'warn':
      console.warn('[sync]', entry);
      return;
    case 'debug':
      console.debug('[sync]', entry);
      return;
    default:
      console.info('[sync]', entry);
  }
};

interface SharedLogBuffer {
  entries: SyncLogEntry[];
  maxEntries: number;
}

const buildLogger = (
  scope: string,
  buffer: SharedLogBuffer,
  sink: SyncLogSink | null,
  now: () => string
): SyncLogger => {
  const write = (level: SyncLogLevel, message: string, payload: SyncLogPayload = {}): SyncLogEntry => {
    const entry: SyncLogEntry = {
      level,
      scope,
      message,
      createdAtIso: now(),
      payload,
    };
    buffer.entries.push(entry);
    if (buffer.entries.length > buffer.maxEntries) {
      buffer.entries.splice(0, buffer.entries.length - buffer.maxEntries);
    }
    sink?.(entry);
    return entry;
  };

  return {
    debug: (message, payload) => write('debug', message, payload),
    info: (message, payload) => write('info', message, payload),
    warn: (message, payload) => write('warn', message, payload),
    error: (message, payload) => write('error', message, payload),
    child: (childScope) => buildLogger(`${scope}.${childScope}`, buffer, sink, now),
    list: (limit) => {
      if (limit === undefined) return [...buffer.entries];
      return buffer.entries.slice(-Math.max(1, limit));
    },
    clear: () => {
      buffer.entries.splice(0, buffer.entries.length);
    },
  };
};

/**
 * Structured logger for the sync engine. Entries go to the console (unless
 * `silent`) and to a bounded in-memory ring that diagnostics can read back.
 * Child loggers share the parent's ring.
 */
export const createSyncLogger = (options: {
  scope?: string;
  silent?: boolean;
  sink?: SyncLogSink;
  maxEntries?: number;
  now?: () => string;
} = {}): SyncLogger => {
  const buffer: SharedLogBuffer = {
    entries: [],
    maxEntries: Math.max(1, Math.floor(options.maxEntries ?? DEFAULT_MAX_ENTRIES)),
  };
  const sink = options.sink ?? (options.silent ? null : consoleSink);
  return buildLogger(
    options.scope ?? 'core-sync',
    buffer,
    sink,
    options.now ?? (() => new Date().toISOString())
  );
};
