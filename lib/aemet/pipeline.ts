import { ObservationClient, findCsvLink } from './client';
import { parseDelimitedText } from './delimited';
import { EmptyExtractionError, TableStructureError } from './errors';
import { classifyHeaders, describeRoles } from './headers';
import { extractTableFromHtml } from './html-table';
import { normalizePairs } from './normalize';
import { extractRawPairs } from './rows';
import { mergeSeries } from './series';
import { writeLastUpdate } from './status';
import { readSeriesFile, writeSeriesFile } from './store';
import type { ColumnRoles, ExtractionStats, Observation, RawTable, SourceOrigin, StationConfig } from './types';

export interface CollectResult {
  observations: Observation[];
  stats: ExtractionStats;
  origin: SourceOrigin;
  headers: string[];
  roles: ColumnRoles;
}

export interface RunReport {
  status: 'ok' | 'empty';
  origin: SourceOrigin;
  extracted: number;
  total: number;
  stats: ExtractionStats;
}

export function observationsFromTable(
  table: RawTable,
  timeZone: string,
  positionalFallback: boolean
): Omit<CollectResult, 'origin'> {
  const roles = classifyHeaders(table.headers, { positionalFallback });
  let skippedShort = 0;
  const pairs = extractRawPairs(table, roles, {
    onSkip: () => {
      skippedShort += 1;
    }
  });
  const { observations, dropped } = normalizePairs(pairs, timeZone);
  return {
    observations,
    stats: { rows: table.rows.length, skippedShort, dropped },
    headers: table.headers,
    roles
  };
}

/**
 * Reads one observation page. The HTML table is the primary source; older layouts only link a
 * delimited download, which is read with the positional date/time fallback enabled.
 */
export async function collectObservations(client: ObservationClient, config: Pick<StationConfig, 'timeZone'>): Promise<CollectResult> {
  const html = await client.fetchPage();

  let htmlTable: RawTable;
  try {
    htmlTable = extractTableFromHtml(html);
  } catch (error) {
    const csvUrl = error instanceof TableStructureError ? findCsvLink(html, client.pageUrl) : null;
    if (!csvUrl) throw error;
    console.log(`No observation table on the page; reading ${csvUrl}`);
    const text = await client.fetchCsv(csvUrl);
    const table = parseDelimitedText(text);
    return { ...observationsFromTable(table, config.timeZone, true), origin: 'csv' };
  }

  return { ...observationsFromTable(htmlTable, config.timeZone, false), origin: 'html' };
}

export function totalDropped(stats: ExtractionStats) {
  return stats.skippedShort + stats.dropped.datetime + stats.dropped.missing + stats.dropped.invalid;
}

/**
 * One fetch, parse, merge and write cycle. Nothing is written when collection throws or when no
 * observation survives normalisation.
 */
export async function runCollector(config: StationConfig, client = new ObservationClient(config)): Promise<RunReport> {
  const collected = await collectObservations(client, config);
  const { observations, stats, origin } = collected;
  console.log(`Columns (${origin}): ${describeRoles(collected.headers, collected.roles)}`);

  const dropped = totalDropped(stats);
  if (dropped > 0) {
    console.warn({
      status: 'dropped-rows',
      rows: stats.rows,
      skippedShort: stats.skippedShort,
      ...stats.dropped
    });
  }

  if (observations.length === 0) {
    const message = `No observations extracted from ${stats.rows} source row${stats.rows === 1 ? '' : 's'}`;
    if (config.emptyPolicy === 'fail') {
      throw new EmptyExtractionError(message, { rows: stats.rows });
    }
    console.warn(`${message}. Leaving ${config.hourlyPath} untouched.`);
    return { status: 'empty', origin, extracted: 0, total: 0, stats };
  }

  const existing = readSeriesFile(config.hourlyPath).rows;
  const merged = mergeSeries(existing, observations, config);
  writeSeriesFile(config.hourlyPath, merged);
  writeLastUpdate({
    jsonPath: config.statusJsonPath,
    csvPath: config.statusCsvPath,
    timeZone: config.timeZone,
    rowCount: observations.length
  });

  return { status: 'ok', origin, extracted: observations.length, total: merged.length, stats };
}
