import { load } from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { TableStructureError } from './errors';
import type { RawTable } from './types';

// Observation listings have shipped under each of these; tried in order.
const TABLE_SELECTORS = ['table#table', 'table.tabla_datos', 'table.table', 'table'];

export function extractTableFromHtml(html: string): RawTable {
  const $ = load(html);
  const table = findTable($);
  if (!table) {
    const count = $('table').length;
    throw new TableStructureError(
      count === 0
        ? 'No table found in the observation page'
        : `Found ${count} table${count === 1 ? '' : 's'} but none with both a header and a body section`
    );
  }

  const headerRows = table.find('thead tr');
  const headers = cellTexts($, headerRows.last());
  if (headers.length === 0) {
    throw new TableStructureError('Observation table header row has no cells');
  }

  const rows: string[][] = [];
  table.find('tbody tr').each((_, tr) => {
    rows.push(cellTexts($, $(tr)));
  });

  return { headers, rows };
}

function findTable($: CheerioAPI): Cheerio<Element> | null {
  for (const selector of TABLE_SELECTORS) {
    const candidates = $<Element, string>(selector).toArray();
    for (const candidate of candidates) {
      const table = $(candidate);
      if (table.find('thead').length > 0 && table.find('tbody').length > 0) {
        return table;
      }
    }
  }
  return null;
}

function cellTexts($: CheerioAPI, row: Cheerio<Element>): string[] {
  return row
    .children('th, td')
    .map((_, cell) => normalizeText($(cell).text()))
    .get();
}

function normalizeText(value: string) {
  return value.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();
}
