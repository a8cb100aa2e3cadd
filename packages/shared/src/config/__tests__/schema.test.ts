import { describe, it, expect } from 'vitest';
import {
  DEFAULT_REGIONS,
  MAX_LOOKBACK_HOURS,
  hasPlaceholderCredentials,
  loadConfigFromEnv,
  mergeConfig,
  parseList,
  validateConfig,
} from '../schema';
import { CloudProvider } from '../../types';
import { LogLevel } from '../../utils/logger';

describe('loadConfigFromEnv', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = validateConfig(loadConfigFromEnv({}));

    expect(config).toEqual({
      provider: CloudProvider.ALIBABA,
      credentials: {
        accessKeyId: 'YOUR_MASTER_AK_ID',
        accessKeySecret: 'YOUR_MASTER_AK_SECRET',
      },
      regions: DEFAULT_REGIONS,
      lookbackHours: 24,
      pageSize: 50,
      regionConcurrency: 1,
      logLevel: LogLevel.INFO,
    });
  });

  it('reads every supported variable', () => {
    const config = validateConfig(
      loadConfigFromEnv({
        CLOUD_PROVIDER: 'aws',
        MASTER_ACCESS_KEY_ID: 'test-key-id',
        MASTER_ACCESS_KEY_SECRET: 'test-secret',
        AUDIT_REGIONS: 'us-east-1, eu-west-1,',
        LOOKBACK_HOURS: '48',
        SNAPSHOT_PAGE_SIZE: '20',
        REGION_CONCURRENCY: '3',
        REQUEST_TIMEOUT_MS: '5000',
        LOG_LEVEL: 'debug',
      })
    );

    expect(config).toEqual({
      provider: CloudProvider.AWS,
      credentials: { accessKeyId: 'test-key-id', accessKeySecret: 'test-secret' },
      regions: ['us-east-1', 'eu-west-1'],
      lookbackHours: 48,
      pageSize: 20,
      regionConcurrency: 3,
      requestTimeoutMs: 5000,
      logLevel: LogLevel.DEBUG,
    });
  });

  it('keeps an explicitly empty region list', () => {
    expect(validateConfig(loadConfigFromEnv({ AUDIT_REGIONS: '' })).regions).toEqual([]);
  });

  it('rejects non-integer lookback hours', () => {
    expect(() => validateConfig(loadConfigFromEnv({ LOOKBACK_HOURS: 'soon' }))).toThrow();
  });

  it('accepts lookback hours up to one hundred years', () => {
    expect(validateConfig(loadConfigFromEnv({ LOOKBACK_HOURS: '876000' })).lookbackHours).toBe(
      MAX_LOOKBACK_HOURS
    );
  });

  it('rejects lookback hours beyond one hundred years', () => {
    expect(() => validateConfig(loadConfigFromEnv({ LOOKBACK_HOURS: '876001' }))).toThrow();
  });

  it('rejects unknown providers', () => {
    expect(() => validateConfig(loadConfigFromEnv({ CLOUD_PROVIDER: 'azure' }))).toThrow();
  });
});

describe('mergeConfig', () => {
  it('overrides only defined keys', () => {
    const merged = mergeConfig(
      { lookbackHours: 24, regions: ['cn-hangzhou'] },
      { lookbackHours: 6, regions: undefined }
    );

    expect(merged).toEqual({ lookbackHours: 6, regions: ['cn-hangzhou'] });
  });
});

describe('parseList', () => {
  it('trims items and drops blanks', () => {
    expect(parseList(' a , ,b')).toEqual(['a', 'b']);
  });
});

describe('hasPlaceholderCredentials', () => {
  it('detects placeholder ids', () => {
    expect(
      hasPlaceholderCredentials({ accessKeyId: 'YOUR_MASTER_AK_ID', accessKeySecret: 'test-secret' })
    ).toBe(true);
  });

  it('detects placeholder secrets', () => {
    expect(
      hasPlaceholderCredentials({ accessKeyId: 'test-key-id', accessKeySecret: 'YOUR_SECRET' })
    ).toBe(true);
  });

  it('accepts real-looking values', () => {
    expect(
      hasPlaceholderCredentials({ accessKeyId: 'test-key-id', accessKeySecret: 'test-secret' })
    ).toBe(false);
  });
});
