export type EmptyRunPolicy = 'warn' | 'fail';

export interface StationConfig {
  stationId: string;
  sourceUrl: string;
  timeZone: string;
  userAgent: string;
  timeoutMs: number;
  sourceTag: string;
  hourlyPath: string;
  archivePath: string;
  statusJsonPath: string;
  statusCsvPath: string;
  emptyPolicy: EmptyRunPolicy;
}

export interface Observation {
  instant: Date;
  temperatureC: number;
}

export type DatetimeSource = 'combined' | 'split' | 'positional';

export interface ColumnRoles {
  datetimeIndex: number | null;
  dateIndex: number | null;
  timeIndex: number | null;
  temperatureIndex: number;
  datetimeSource: DatetimeSource;
}

export interface RawTable {
  headers: string[];
  rows: string[][];
}

export interface RawPair {
  rawDatetime: string;
  rawTemperature: string;
  rowNumber: number;
}

export type DropReason = 'datetime' | 'missing' | 'invalid';

export interface ExtractionStats {
  rows: number;
  skippedShort: number;
  dropped: Record<DropReason, number>;
}

export interface PersistedRow {
  date_local: string;
  time_local: string;
  datetime_utc: string;
  temp_c: string;
  source: string;
}

export const PERSISTED_COLUMNS = ['date_local', 'time_local', 'datetime_utc', 'temp_c', 'source'] as const;

export type SourceOrigin = 'html' | 'csv';
