import { v4 as uuidv4 } from 'uuid';
import type { SyncLogger } from './telemetry';
import type { SyncEvent, SyncEventPayload, SyncEventType } from './types';

export type SyncEventListener = (event: SyncEvent) => void;

export interface SyncEventStream extends AsyncIterable<SyncEvent> {
  readonly droppedCount: number;
  readonly closed: boolean;
  /** Events buffered but not yet consumed. */
  pending: () => number;
  close: () => void;
}

export interface SyncEventBus {
  publish: (type: SyncEventType, payload?: SyncEventPayload) => SyncEvent | null;
  subscribe: (listener: SyncEventListener) => () => void;
  stream: (options?: { bufferSize?: number }) => SyncEventStream;
  subscriberCount: () => number;
  close: () => void;
}

interface StreamHandle {
  push: (event: SyncEvent) => void;
  end: () => void;
}

const createStream = (bufferSize: number, detach: (handle: StreamHandle) => void) => {
  const buffer: SyncEvent[] = [];
  const waiting: Array<(result: IteratorResult<SyncEvent>) => void> = [];
  let droppedCount = 0;
  let closed = false;

  const handle: StreamHandle = {
    push: (event) => {
      if (closed) return;
      const next = waiting.shift();
      if (next) {
        next({ value: event, done: false });
        return;
      }
      buffer.push(event);
      if (buffer.length > bufferSize) {
        buffer.shift();
        droppedCount += 1;
      }
    },
    end: () => {
      if (closed) return;
      closed = true;
      for (const resolve of waiting.splice(0, waiting.length)) {
        resolve({ value: undefined, done: true });
      }
    },
  };

  const stream: SyncEventStream = {
    get droppedCount() {
      return droppedCount;
    },
    get closed() {
      return closed;
    },
    pending: () => buffer.length,
    close: () => {
      handle.end();
      detach(handle);
    },
    [Symbol.asyncIterator]: () => ({
      next: (): Promise<IteratorResult<SyncEvent>> => {
        const buffered = buffer.shift();
        if (buffered) {
          return Promise.resolve({ value: buffered, done: false });
        }
        if (closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          waiting.push(resolve);
        });
      },
      return: (): Promise<IteratorResult<SyncEvent>> => {
        stream.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    }),
  };

  return { handle, stream };
};

/**
 * Broadcast channel for sync lifecycle events. `publish` never waits on a
 * subscriber: listeners run on a microtask and streams buffer on their own.
 */
export const createSyncEventBus = (options: {
  bufferSize?: number;
  now?: () => string;
  logger?: SyncLogger;
} = {}): SyncEventBus => {
  const defaultBufferSize = Math.max(1, Math.floor(options.bufferSize ?? 256));
  const now = options.now ?? (() => new Date().toISOString());
  const listeners = new Set<SyncEventListener>();
  const streams = new Set<StreamHandle>();
  let closed = false;

  const deliver = (listener: SyncEventListener, event: SyncEvent) => {
    queueMicrotask(() => {
      if (!listeners.has(listener)) return;
      try {
        listener(event);
      } catch (error) {
        options.logger?.error('Sync event listener threw', {
          eventType: event.type,
          message: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    });
  };

  return {
    publish: (type, payload = {}) => {
      if (closed) return null;
      const event: SyncEvent = {
        id: `sync-event-${uuidv4()}`,
        type,
        createdAtIso: now(),
        payload,
      };
      for (const listener of listeners) {
        deliver(listener, event);
      }
      for (const stream of streams) {
        stream.push(event);
      }
      return event;
    },
    subscribe: (listener) => {
      if (closed) return () => undefined;
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    stream: (streamOptions) => {
      const size = Math.max(1, Math.floor(streamOptions?.bufferSize ?? defaultBufferSize));
      const { handle, stream } = createStream(size, (detached) => {
        streams.delete(detached);
      });
      if (closed) {
        handle.end();
      } else {
        streams.add(handle);
      }
      return stream;
    },
    subscriberCount: () => listeners.size + streams.size,
    close: () => {
      if (closed) return;
      closed = true;
      listeners.clear();
      for (const stream of streams) {
        stream.end();
      }
      streams.clear();
    },
  };
};
