export * from './app';
export * from './sync';
