import { readSeriesFile, writeSeriesFile } from './store';
import type { PersistedRow } from './types';

/**
 * Same discipline as the hourly merge, but keyed on the `datetime_utc` text as written: rows are
 * carried over untouched and the hourly file wins on a shared key.
 */
export function mergeArchive(existingArchive: PersistedRow[], hourly: PersistedRow[]): PersistedRow[] {
  const byKey = new Map<string, PersistedRow>();
  for (const row of [...existingArchive, ...hourly]) {
    const key = row.datetime_utc.trim();
    if (!key) continue;
    byKey.set(key, row);
  }
  return Array.from(byKey.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, row]) => row);
}

export interface ArchivePaths {
  hourlyPath: string;
  archivePath: string;
}

export type ArchiveResult = { status: 'empty' } | { status: 'ok'; added: number; total: number };

export function updateArchive({ hourlyPath, archivePath }: ArchivePaths): ArchiveResult {
  const hourly = readSeriesFile(hourlyPath).rows;
  if (hourly.length === 0) {
    return { status: 'empty' };
  }
  const archive = readSeriesFile(archivePath).rows;
  const merged = mergeArchive(archive, hourly);
  writeSeriesFile(archivePath, merged);
  return { status: 'ok', added: hourly.length, total: merged.length };
}
