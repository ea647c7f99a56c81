import { parse } from 'csv-parse/sync';
import { TableStructureError } from './errors';
import type { RawTable } from './types';

export const DELIMITER_CANDIDATES = [';', ',', '\t'] as const;
export type Delimiter = (typeof DELIMITER_CANDIDATES)[number];

const SNIFF_SAMPLE_LENGTH = 4000;
const FALLBACK_DELIMITER: Delimiter = ';';

export interface DelimitedTable extends RawTable {
  delimiter: Delimiter;
}

function countOutsideQuotes(line: string, delimiter: string) {
  let count = 0;
  let inQuotes = false;
  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      count += 1;
    }
  }
  return count;
}

/**
 * Picks the candidate that splits the most sample lines into the same number of fields.
 * Returns null when no candidate appears consistently.
 */
export function sniffDelimiter(text: string): Delimiter | null {
  const sample = text.slice(0, SNIFF_SAMPLE_LENGTH);
  let lines = sample.split(/\r?\n/);
  if (text.length > SNIFF_SAMPLE_LENGTH) {
    // the last line of a truncated sample is partial
    lines = lines.slice(0, -1);
  }
  lines = lines.filter((line) => line.trim().length > 0);
  if (lines.length === 0) return null;

  let best: { delimiter: Delimiter; score: number } | null = null;
  for (const delimiter of DELIMITER_CANDIDATES) {
    const frequencies = new Map<number, number>();
    for (const line of lines) {
      const count = countOutsideQuotes(line, delimiter);
      if (count > 0) {
        frequencies.set(count, (frequencies.get(count) ?? 0) + 1);
      }
    }
    const score = Math.max(0, ...frequencies.values());
    const consistent = lines.length === 1 ? score === 1 : score >= 2;
    if (consistent && (!best || score > best.score)) {
      best = { delimiter, score };
    }
  }
  return best?.delimiter ?? null;
}

function toRows(records: unknown): string[][] {
  if (!Array.isArray(records)) return [];
  return records
    .filter((record): record is unknown[] => Array.isArray(record))
    .map((record) => record.map((cell) => (typeof cell === 'string' ? cell.trim() : String(cell ?? '').trim())));
}

export function parseDelimitedText(text: string): DelimitedTable {
  const content = text.replace(/^\uFEFF/, '');
  if (content.trim().length === 0) {
    throw new TableStructureError('Delimited download is empty');
  }

  const delimiter = sniffDelimiter(content) ?? FALLBACK_DELIMITER;
  const records: unknown = parse(content, {
    delimiter,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true
  });
  const [headers = [], ...rows] = toRows(records);
  if (headers.length === 0) {
    throw new TableStructureError('Delimited download has no header row');
  }

  return { headers, rows, delimiter };
}
