export * from './types';
export * from './errors';
export * from './config';
export * from './telemetry';
export * from './backoff';
export * from './conflictResolver';
export * from './eventBus';
export * from './queueSnapshot';
export * from './updateQueue';
export * from './reconciler';
export * from './syncScheduler';
export * from './syncService';
export * from './memoryPorts';
