import { HeaderResolutionError } from './errors';
import type { ColumnRoles } from './types';

export interface ClassifyOptions {
  /** Use the first two row fields as date and time when no labelled column exists. */
  positionalFallback?: boolean;
}

const TEMPERATURE_WORD = 'temp';
const EXCLUDED_SUBSTRINGS = ['max', 'min', 'suelo', 'soil', 'ground'];
const EXCLUDED_TOKENS = ['ts'];

export function normalizeHeader(label: string): string {
  return label
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[º°]/g, '°')
    .replace(/[().,/%\-[\]:;]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function tokensOf(normalized: string) {
  return normalized.split(' ').filter(Boolean);
}

function isExcluded(normalized: string) {
  if (EXCLUDED_SUBSTRINGS.some((marker) => normalized.includes(marker))) return true;
  const tokens = tokensOf(normalized);
  return EXCLUDED_TOKENS.some((marker) => tokens.includes(marker));
}

function referencesCelsius(normalized: string) {
  return normalized.includes('°c') || tokensOf(normalized).includes('c');
}

export function isAirTemperatureHeader(label: string): boolean {
  const normalized = normalizeHeader(label);
  if (isExcluded(normalized)) return false;
  return normalized.includes(TEMPERATURE_WORD) && referencesCelsius(normalized);
}

function findIndex(normalized: string[], predicate: (value: string) => boolean): number | null {
  const index = normalized.findIndex(predicate);
  return index === -1 ? null : index;
}

function quote(headers: string[]) {
  return headers.length ? headers.map((header) => `"${header}"`).join(', ') : '(none)';
}

/** The first two field positions that are not the temperature column. */
function positionalFields(temperatureIndex: number): [number, number] {
  const fields = [0, 1, 2].filter((index) => index !== temperatureIndex);
  return [fields[0], fields[1]];
}

export function classifyHeaders(headers: string[], options: ClassifyOptions = {}): ColumnRoles {
  const normalized = headers.map(normalizeHeader);

  const temperatureIndex = findIndex(headers, isAirTemperatureHeader);
  if (temperatureIndex === null) {
    throw new HeaderResolutionError(`No air temperature (°C) column found in headers: ${quote(headers)}`, {
      headers,
      missing: 'temperature'
    });
  }

  const combined = findIndex(normalized, (value) => value.includes('fecha') && value.includes('hora'));
  if (combined !== null) {
    return { datetimeIndex: combined, dateIndex: null, timeIndex: null, temperatureIndex, datetimeSource: 'combined' };
  }

  const dateIndex = findIndex(normalized, (value) => value.includes('fecha'));
  const timeIndex = findIndex(normalized, (value) => value.includes('hora'));
  if (dateIndex !== null && timeIndex !== null) {
    return { datetimeIndex: null, dateIndex, timeIndex, temperatureIndex, datetimeSource: 'split' };
  }

  // A lone fecha or hora column carries the full timestamp.
  const lone = dateIndex ?? timeIndex;
  if (lone !== null) {
    return { datetimeIndex: lone, dateIndex: null, timeIndex: null, temperatureIndex, datetimeSource: 'combined' };
  }

  if (options.positionalFallback) {
    const [first, second] = positionalFields(temperatureIndex);
    return { datetimeIndex: null, dateIndex: first, timeIndex: second, temperatureIndex, datetimeSource: 'positional' };
  }

  throw new HeaderResolutionError(`No date/time column found in headers: ${quote(headers)}`, {
    headers,
    missing: 'datetime'
  });
}

/** Number of cells a data row needs before the roles can be read from it. */
export function requiredWidth(roles: ColumnRoles): number {
  const indices = [roles.datetimeIndex, roles.dateIndex, roles.timeIndex, roles.temperatureIndex].filter(
    (value): value is number => value !== null
  );
  return Math.max(...indices) + 1;
}

function labelAt(headers: string[], index: number | null) {
  return index === null ? '?' : headers[index] ?? '?';
}

function fieldNumber(index: number | null) {
  return index === null ? '?' : String(index + 1);
}

export function describeRoles(headers: string[], roles: ColumnRoles): string {
  const temperature = `temp='${labelAt(headers, roles.temperatureIndex)}'`;
  switch (roles.datetimeSource) {
    case 'combined':
      return `${temperature}; datetime='${labelAt(headers, roles.datetimeIndex)}'`;
    case 'split':
      return `${temperature}; date='${labelAt(headers, roles.dateIndex)}' time='${labelAt(headers, roles.timeIndex)}'`;
    case 'positional':
      return `${temperature}; datetime=fields ${fieldNumber(roles.dateIndex)}+${fieldNumber(roles.timeIndex)}`;
  }
}
