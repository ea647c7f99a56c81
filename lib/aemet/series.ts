import { isValid, parseISO } from 'date-fns';
import { formatLocalDate, formatLocalTime, formatTemperature, formatUtcIso } from '../format';
import type { Observation, PersistedRow } from './types';

export interface SeriesOptions {
  timeZone: string;
  sourceTag: string;
}

export function toPersistedRow(observation: Observation, options: SeriesOptions): PersistedRow {
  return {
    date_local: formatLocalDate(observation.instant, options.timeZone),
    time_local: formatLocalTime(observation.instant, options.timeZone),
    datetime_utc: formatUtcIso(observation.instant),
    temp_c: formatTemperature(observation.temperatureC),
    source: options.sourceTag
  };
}

export function fromPersistedRow(row: PersistedRow): Observation | null {
  const instant = parseISO(row.datetime_utc.trim());
  if (!isValid(instant)) return null;
  const raw = row.temp_c.trim();
  const temperatureC = raw ? Number(raw) : Number.NaN;
  if (!Number.isFinite(temperatureC)) return null;
  return { instant, temperatureC };
}

/**
 * Folds new observations over a persisted series. Keys are the UTC instants; a new value for an
 * hour already on file replaces it. The result is the whole file content, oldest first.
 */
export function mergeSeries(existing: PersistedRow[], observations: Observation[], options: SeriesOptions): PersistedRow[] {
  const byInstant = new Map<string, Observation>();

  for (const row of existing) {
    const observation = fromPersistedRow(row);
    if (!observation) continue;
    byInstant.set(formatUtcIso(observation.instant), observation);
  }

  for (const observation of observations) {
    byInstant.set(formatUtcIso(observation.instant), observation);
  }

  return Array.from(byInstant.values())
    .sort((a, b) => a.instant.getTime() - b.instant.getTime())
    .map((observation) => toPersistedRow(observation, options));
}
