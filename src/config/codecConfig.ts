/**
 * Process-level configuration, read once from the environment.
 */

export interface CodecConfig {
  /** HTTP port of the evaluation service */
  port: number;
  /** Zone given to expressions that were not bound to one explicitly */
  sessionTimeZone: string;
  /** Engine default for the corrupt-record column name */
  columnNameOfCorruptRecord: string;
  /** Number of partitions a job evaluates at the same time */
  partitionConcurrency: number;
  /** How long finished job results are kept */
  jobResultTtlMs: number;
  /** Log bind-time decisions and permissive recoveries */
  verbose: boolean;
}

/**
 * The session-level subset handed to expressions.
 */
export type SessionConf = Pick<CodecConfig, 'sessionTimeZone' | 'columnNameOfCorruptRecord' | 'verbose'>;

function intFromEnv(value: string | undefined, fallback: number, name: string): number {
  const parsed = Number.parseInt(value || String(fallback), 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    console.warn(`[Config] Ignoring invalid ${name}=${value}, using ${fallback}`);
    return fallback;
  }
  return parsed;
}

export function loadCodecConfig(env: NodeJS.ProcessEnv = process.env): CodecConfig {
  return Object.freeze({
    port: intFromEnv(env.PORT, 3001, 'PORT'),
    sessionTimeZone: env.CSV_CODEC_SESSION_TIME_ZONE || 'UTC',
    columnNameOfCorruptRecord: env.CSV_CODEC_CORRUPT_RECORD_COLUMN || '_corrupt_record',
    partitionConcurrency: Math.max(
      1,
      intFromEnv(env.CSV_CODEC_PARTITION_CONCURRENCY, 1, 'CSV_CODEC_PARTITION_CONCURRENCY'),
    ),
    jobResultTtlMs: intFromEnv(env.CSV_CODEC_JOB_RESULT_TTL_MS, 3600000, 'CSV_CODEC_JOB_RESULT_TTL_MS'),
    verbose: env.CSV_CODEC_VERBOSE === 'true',
  });
}

export const codecConfig: CodecConfig = loadCodecConfig();

export const defaultSessionConf: SessionConf = {
  sessionTimeZone: codecConfig.sessionTimeZone,
  columnNameOfCorruptRecord: codecConfig.columnNameOfCorruptRecord,
  verbose: codecConfig.verbose,
};
