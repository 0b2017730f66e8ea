import type { SessionConf } from '../src/config/codecConfig';
import type { EngineSettings } from '../src/types/csv';

export const testSession: SessionConf = {
  sessionTimeZone: 'UTC',
  columnNameOfCorruptRecord: '_corrupt_record',
  verbose: false,
};

export const utcSettings: EngineSettings = {
  columnPruning: true,
  defaultTimeZoneId: 'UTC',
  defaultColumnNameOfCorruptRecord: '_corrupt_record',
};
