import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadCodecConfig } from '../src/config/codecConfig';

describe('loadCodecConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('falls back to defaults', () => {
    expect(loadCodecConfig({})).toEqual({
      port: 3001,
      sessionTimeZone: 'UTC',
      columnNameOfCorruptRecord: '_corrupt_record',
      partitionConcurrency: 1,
      jobResultTtlMs: 3600000,
      verbose: false,
    });
  });

  it('reads the environment', () => {
    const config = loadCodecConfig({
      PORT: '8080',
      CSV_CODEC_SESSION_TIME_ZONE: 'Europe/Berlin',
      CSV_CODEC_CORRUPT_RECORD_COLUMN: '_bad',
      CSV_CODEC_PARTITION_CONCURRENCY: '4',
      CSV_CODEC_VERBOSE: 'true',
    });
    expect(config).toMatchObject({
      port: 8080,
      sessionTimeZone: 'Europe/Berlin',
      columnNameOfCorruptRecord: '_bad',
      partitionConcurrency: 4,
      verbose: true,
    });
  });

  it('ignores invalid numbers with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(loadCodecConfig({ PORT: 'abc' }).port).toBe(3001);
    expect(warn).toHaveBeenCalledWith('[Config] Ignoring invalid PORT=abc, using 3001');
  });

  it('runs at least one partition at a time', () => {
    expect(loadCodecConfig({ CSV_CODEC_PARTITION_CONCURRENCY: '0' }).partitionConcurrency).toBe(1);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(loadCodecConfig({}))).toBe(true);
  });
});
