/**
 * Export all adapter interfaces
 */
export * from './snapshot-client';
