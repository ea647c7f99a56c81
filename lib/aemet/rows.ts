import { requiredWidth } from './headers';
import type { ColumnRoles, RawPair, RawTable } from './types';

export interface ExtractPairsOptions {
  onSkip?: (rowNumber: number, cells: string[]) => void;
}

function datetimeOf(cells: string[], roles: ColumnRoles) {
  if (roles.datetimeIndex !== null) {
    return cells[roles.datetimeIndex].trim();
  }
  const date = roles.dateIndex !== null ? cells[roles.dateIndex].trim() : '';
  const time = roles.timeIndex !== null ? cells[roles.timeIndex].trim() : '';
  return `${date} ${time}`.trim();
}

/** Yields raw date/time and temperature cells in source order. Row numbers are 1-based within the body. */
export function* extractRawPairs(table: RawTable, roles: ColumnRoles, options: ExtractPairsOptions = {}): Generator<RawPair> {
  const width = requiredWidth(roles);
  let rowNumber = 0;
  for (const cells of table.rows) {
    rowNumber += 1;
    if (cells.length < width) {
      options.onSkip?.(rowNumber, cells);
      continue;
    }
    yield {
      rawDatetime: datetimeOf(cells, roles),
      rawTemperature: cells[roles.temperatureIndex],
      rowNumber
    };
  }
}
