/**
 * Shared types, configuration and utilities
 */
export * from './types';
export * from './config/schema';
export * from './utils/logger';
export * from './utils/helpers';
