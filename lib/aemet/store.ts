import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { PERSISTED_COLUMNS, type PersistedRow } from './types';

const PersistedRowSchema = z.object({
  date_local: z.string().default(''),
  time_local: z.string().default(''),
  datetime_utc: z.string().trim().min(1, 'datetime_utc is required'),
  temp_c: z.string().trim().default(''),
  source: z.string().default('')
});

export interface ReadSeriesResult {
  rows: PersistedRow[];
  invalid: number;
}

export function readSeriesFile(filePath: string): ReadSeriesResult {
  if (!fs.existsSync(filePath)) {
    return { rows: [], invalid: 0 };
  }
  const raw = fs.readFileSync(filePath, 'utf-8');
  const records: unknown = parse(raw, {
    bom: true,
    columns: true,
    relax_column_count: true,
    skip_empty_lines: true
  });

  const rows: PersistedRow[] = [];
  let invalid = 0;
  for (const record of Array.isArray(records) ? records : []) {
    const result = PersistedRowSchema.safeParse(record);
    if (result.success) {
      rows.push(result.data);
    } else {
      invalid += 1;
    }
  }
  if (invalid > 0) {
    console.warn(`Ignored ${invalid} unreadable row${invalid === 1 ? '' : 's'} in ${filePath}`);
  }
  return { rows, invalid };
}

export function writeSeriesFile(filePath: string, rows: PersistedRow[]) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const content = stringify(rows, {
    header: true,
    columns: [...PERSISTED_COLUMNS]
  });
  fs.writeFileSync(filePath, content, 'utf-8');
}
