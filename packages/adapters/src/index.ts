/**
 * Snapshot provider adapters
 */
export * from './interfaces';
export * from './providers';
export * from './factory/adapter-factory';
