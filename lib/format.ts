import { tz } from '@date-fns/tz';
import { format, formatISO } from 'date-fns';

/** ISO-8601 in UTC with a literal Z and no fractional seconds, e.g. `2024-01-01T10:00:00Z`. */
export function formatUtcIso(instant: Date): string {
  return instant.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function formatLocalDate(instant: Date, timeZone: string): string {
  return format(instant, 'yyyy-MM-dd', { in: tz(timeZone) });
}

export function formatLocalTime(instant: Date, timeZone: string): string {
  return format(instant, 'HH:mm', { in: tz(timeZone) });
}

/** ISO-8601 with the zone's offset, e.g. `2024-03-05T14:00:00+01:00`. */
export function formatLocalIso(instant: Date, timeZone: string): string {
  return formatISO(instant, { in: tz(timeZone) });
}

/**
 * One decimal place. A value exactly halfway between two tenths (only multiples of 0.25 are, in
 * binary) rounds to the even tenth, so 0.25 becomes `0.2` and 0.75 becomes `0.8`.
 */
export function formatTemperature(value: number): string {
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const lower = Math.floor(value * 10);
    const tenths = lower % 2 === 0 ? lower : lower + 1;
    return (tenths / 10).toFixed(1);
  }
  return value.toFixed(1);
}
