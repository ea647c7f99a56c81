import fs from 'node:fs';
import path from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { formatLocalIso, formatUtcIso } from '../format';

export interface LastUpdateOptions {
  jsonPath: string;
  csvPath: string;
  timeZone: string;
  rowCount: number | null;
  now?: Date;
}

export interface LastUpdate {
  updated_utc: string;
  updated_local: string;
  tz_local: string;
  rows_last_run?: number;
}

export function buildLastUpdate(now: Date, timeZone: string, rowCount: number | null): LastUpdate {
  const seconds = new Date(Math.floor(now.getTime() / 1000) * 1000);
  const meta: LastUpdate = {
    updated_utc: formatUtcIso(seconds),
    updated_local: formatLocalIso(seconds, timeZone),
    tz_local: timeZone
  };
  if (rowCount !== null) {
    meta.rows_last_run = rowCount;
  }
  return meta;
}

/** Badge files read by the published page: a JSON document and the same fields as one CSV line. */
export function writeLastUpdate({ jsonPath, csvPath, timeZone, rowCount, now = new Date() }: LastUpdateOptions): LastUpdate {
  const meta = buildLastUpdate(now, timeZone, rowCount);

  fs.mkdirSync(path.dirname(jsonPath), { recursive: true });
  fs.writeFileSync(jsonPath, `${JSON.stringify(meta, null, 2)}\n`, 'utf-8');

  fs.mkdirSync(path.dirname(csvPath), { recursive: true });
  const csv = stringify([
    ['updated_local', 'updated_utc', 'tz_local', 'rows_last_run'],
    [meta.updated_local, meta.updated_utc, meta.tz_local, meta.rows_last_run ?? '']
  ]);
  fs.writeFileSync(csvPath, csv, 'utf-8');

  return meta;
}
