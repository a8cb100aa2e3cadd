/**
 * Configuration schema and validation using Zod
 */
import { z } from 'zod';
import { CloudProvider } from '../types';
import { LogLevel } from '../utils/logger';

export const DEFAULT_REGIONS = ['cn-hangzhou', 'cn-shanghai'];
export const DEFAULT_LOOKBACK_HOURS = 24;
export const DEFAULT_PAGE_SIZE = 50;
/** One hundred years; larger windows push the cutoff outside the Date range */
export const MAX_LOOKBACK_HOURS = 24 * 365 * 100;

const PLACEHOLDER_PREFIX = 'YOUR_';

/**
 * Credential schema
 */
export const CredentialsConfigSchema = z.object({
  accessKeyId: z.string().default(`${PLACEHOLDER_PREFIX}MASTER_AK_ID`),
  accessKeySecret: z.string().default(`${PLACEHOLDER_PREFIX}MASTER_AK_SECRET`),
});

export type CredentialsConfig = z.infer<typeof CredentialsConfigSchema>;

/**
 * Main audit configuration schema
 */
export const AuditConfigSchema = z.object({
  provider: z.nativeEnum(CloudProvider).default(CloudProvider.ALIBABA),
  credentials: CredentialsConfigSchema,
  regions: z.array(z.string().min(1)).default(DEFAULT_REGIONS),
  lookbackHours: z.number().int().min(0).max(MAX_LOOKBACK_HOURS).default(DEFAULT_LOOKBACK_HOURS),
  pageSize: z.number().int().min(1).max(100).default(DEFAULT_PAGE_SIZE),
  regionConcurrency: z.number().int().min(1).default(1),
  requestTimeoutMs: z.number().int().positive().optional(),
  logLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;

/**
 * Unvalidated settings gathered from the environment or CLI flags
 */
export type RawAuditConfig = { [K in keyof AuditConfig]?: unknown };

/**
 * Validate configuration
 */
export function validateConfig(config: unknown): AuditConfig {
  return AuditConfigSchema.parse(config);
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse an integer setting, leaving anything unparseable for the schema to reject
 */
function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * Load configuration from environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RawAuditConfig {
  return {
    provider: env.CLOUD_PROVIDER ? env.CLOUD_PROVIDER.toUpperCase() : undefined,
    credentials: {
      accessKeyId: env.MASTER_ACCESS_KEY_ID,
      accessKeySecret: env.MASTER_ACCESS_KEY_SECRET,
    },
    regions: env.AUDIT_REGIONS !== undefined ? parseList(env.AUDIT_REGIONS) : undefined,
    lookbackHours: parseNumber(env.LOOKBACK_HOURS),
    pageSize: parseNumber(env.SNAPSHOT_PAGE_SIZE),
    regionConcurrency: parseNumber(env.REGION_CONCURRENCY),
    requestTimeoutMs: parseNumber(env.REQUEST_TIMEOUT_MS),
    logLevel: env.LOG_LEVEL ? env.LOG_LEVEL.toUpperCase() : undefined,
  };
}

/**
 * Overlay settings, ignoring keys left undefined in the overrides
 */
export function mergeConfig(base: RawAuditConfig, overrides: RawAuditConfig): RawAuditConfig {
  const merged: RawAuditConfig = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

/**
 * Whether either credential still holds its placeholder value
 */
export function hasPlaceholderCredentials(credentials: CredentialsConfig): boolean {
  return (
    credentials.accessKeyId.startsWith(PLACEHOLDER_PREFIX) ||
    credentials.accessKeySecret.startsWith(PLACEHOLDER_PREFIX)
  );
}
