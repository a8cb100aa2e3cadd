/**
 * Export all provider implementations
 */
export * from './alibaba-ecs';
export * from './aws-ec2';
