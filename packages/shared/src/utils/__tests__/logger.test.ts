import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, LogLevel } from '../logger';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes JSON lines with context and metadata', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const log = createLogger({ region: 'cn-hangzhou' });

    log.info('Auditing region', { lookbackHours: 24 });

    expect(info).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(info.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'INFO',
      message: 'Auditing region',
      region: 'cn-hangzhou',
      lookbackHours: 24,
    });
  });

  it('applies a level set after creation', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const log = createLogger();

    log.setLevel(LogLevel.WARN);
    log.info('hidden');

    expect(info).not.toHaveBeenCalled();
  });

  it('suppresses messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = createLogger({}, LogLevel.WARN);

    log.debug('hidden');
    log.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('merges context into children and keeps the level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const child = createLogger({ provider: 'ALIBABA' }, LogLevel.ERROR).child({ region: 'cn-shanghai' });

    child.warn('Disk lookup failed');
    child.error('Region audit failed');

    expect(warn).not.toHaveBeenCalled();
    const entry: unknown = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry).toMatchObject({ provider: 'ALIBABA', region: 'cn-shanghai' });
  });
});
