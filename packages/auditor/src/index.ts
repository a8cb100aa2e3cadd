/**
 * Snapshot backup audit pipeline
 */
export * from './cache/lookup-cache';
export * from './clients/region-client-pool';
export * from './resolvers/attachment-resolver';
export * from './resolvers/instance-name-resolver';
export * from './audit/region-auditor';
export * from './audit/report-builder';
export * from './audit/create-report-builder';
export * from './report/report-writer';
export * from './cli/program';
