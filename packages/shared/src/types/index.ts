/**
 * Export all types
 */
export * from './provider';
export * from './report';
