import { TZDate, tz } from '@date-fns/tz';
import { format, isValid, parse } from 'date-fns';
import type { DropReason, Observation, RawPair } from './types';

// Day-first listings, with or without seconds and an optional hour unit; ISO-like dates last.
export const DATETIME_PATTERNS = [
  'dd/MM/yyyy HH:mm',
  'dd/MM/yyyy HH:mm:ss',
  "dd/MM/yyyy HH:mm 'h'",
  "dd/MM/yyyy HH:mm'h'",
  "dd/MM/yyyy HH:mm:ss 'h'",
  'yyyy-MM-dd HH:mm',
  'yyyy-MM-dd HH:mm:ss'
] as const;

const NO_DATA_SENTINELS = new Set(['', '-', 'nd']);
const DECIMAL_READING = /^[+-]?\d+(\.\d+)?$/;
const HOUR_MS = 3_600_000;

export type TemperatureParse = { ok: true; value: number } | { ok: false; reason: 'missing' | 'invalid' };

export type NormalizeResult = { ok: true; observation: Observation } | { ok: false; reason: DropReason };

export function parseLocalDateTime(raw: string, timeZone: string): Date | null {
  const value = raw.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();
  if (!value) return null;
  const reference = new TZDate(2000, 0, 1, timeZone);
  for (const pattern of DATETIME_PATTERNS) {
    const parsed = parse(value, pattern, reference, { in: tz(timeZone) });
    if (isValid(parsed)) {
      return firstOccurrence(new Date(parsed.getTime()), timeZone);
    }
  }
  return null;
}

function wallClock(instant: Date, timeZone: string) {
  return format(instant, 'yyyy-MM-dd HH:mm:ss.SSS', { in: tz(timeZone) });
}

/** A wall time repeated when clocks go back resolves to its first (summer-offset) instant. */
function firstOccurrence(instant: Date, timeZone: string): Date {
  const hourBefore = new Date(instant.getTime() - HOUR_MS);
  return wallClock(hourBefore, timeZone) === wallClock(instant, timeZone) ? hourBefore : instant;
}

/** Truncates to the start of the local hour and returns the absolute instant. */
export function alignToHourUtc(date: Date, timeZone: string): Date {
  const local = new TZDate(date.getTime(), timeZone);
  const intoHour = local.getMinutes() * 60_000 + local.getSeconds() * 1000 + local.getMilliseconds();
  return new Date(date.getTime() - intoHour);
}

export function parseTemperature(raw: string): TemperatureParse {
  const trimmed = raw.replace(/\u00a0/g, ' ').trim();
  if (NO_DATA_SENTINELS.has(trimmed.toLowerCase())) {
    return { ok: false, reason: 'missing' };
  }
  const decimal = trimmed.replace(',', '.');
  if (!DECIMAL_READING.test(decimal)) {
    return { ok: false, reason: 'invalid' };
  }
  return { ok: true, value: Number(decimal) };
}

export function normalizePair(pair: RawPair, timeZone: string): NormalizeResult {
  const local = parseLocalDateTime(pair.rawDatetime, timeZone);
  if (!local) {
    return { ok: false, reason: 'datetime' };
  }
  const temperature = parseTemperature(pair.rawTemperature);
  if (!temperature.ok) {
    return { ok: false, reason: temperature.reason };
  }
  return {
    ok: true,
    observation: {
      instant: alignToHourUtc(local, timeZone),
      temperatureC: temperature.value
    }
  };
}

export interface NormalizedBatch {
  observations: Observation[];
  dropped: Record<DropReason, number>;
}

export function normalizePairs(pairs: Iterable<RawPair>, timeZone: string): NormalizedBatch {
  const observations: Observation[] = [];
  const dropped: Record<DropReason, number> = { datetime: 0, missing: 0, invalid: 0 };
  for (const pair of pairs) {
    const result = normalizePair(pair, timeZone);
    if (result.ok) {
      observations.push(result.observation);
    } else {
      dropped[result.reason] += 1;
    }
  }
  return { observations, dropped };
}
