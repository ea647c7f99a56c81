import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import * as iconv from 'iconv-lite';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from 'undici';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { ObservationClient, decodeBody, findCsvLink } from '../lib/aemet/client';
import { EmptyExtractionError, HeaderResolutionError, SourceRequestError, TableStructureError } from '../lib/aemet/errors';
import { collectObservations, runCollector } from '../lib/aemet/pipeline';
import type { StationConfig } from '../lib/aemet/types';
import { resolveConfig } from '../lib/config';
import { main as fetchMain } from '../scripts/fetch-observations';
import { main as archiveMain } from '../scripts/update-archive';

const ORIGIN = 'https://observations.test';
const PAGE_PATH = '/station/9091R';
const FIXTURE_ROOT = path.join(process.cwd(), 'tests', 'fixtures');
const HEADER = 'date_local,time_local,datetime_utc,temp_c,source';

function readFixture(name: string) {
  return fs.readFileSync(path.join(FIXTURE_ROOT, name), 'utf-8');
}

function tableHtml(headers: string[], rows: string[][]) {
  const head = headers.map((header) => `<th>${header}</th>`).join('');
  const body = rows.map((row) => `<tr>${row.map((cell) => `<td>${cell}</td>`).join('')}</tr>`).join('');
  return `<html><body><table id="table"><thead><tr>${head}</tr></thead><tbody>${body}</tbody></table></body></html>`;
}

let agent: MockAgent;
let previousDispatcher: Dispatcher;
let dir: string;
let config: StationConfig;

beforeAll(() => {
  previousDispatcher = getGlobalDispatcher();
});

afterAll(() => {
  setGlobalDispatcher(previousDispatcher);
});

beforeEach(() => {
  agent = new MockAgent();
  agent.disableNetConnect();
  setGlobalDispatcher(agent);
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'station-run-'));
  config = resolveConfig({
    sourceUrl: `${ORIGIN}${PAGE_PATH}`,
    timeoutMs: 2000,
    hourlyPath: path.join(dir, 'hourly.csv'),
    archivePath: path.join(dir, 'history.csv'),
    statusJsonPath: path.join(dir, 'last_update.json'),
    statusCsvPath: path.join(dir, 'last_update.csv')
  });
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await agent.close();
  fs.rmSync(dir, { recursive: true, force: true });
});

function replyPage(body: string | Buffer, status = 200) {
  agent.get(ORIGIN).intercept({ path: PAGE_PATH, method: 'GET' }).reply(status, body, {
    headers: { 'content-type': 'text/html; charset=utf-8' }
  });
}

function writeConfigFile() {
  const configPath = path.join(dir, 'station.config.json');
  fs.writeFileSync(configPath, JSON.stringify(config));
  return configPath;
}

describe('client helpers', () => {
  it('finds and resolves the CSV download link', () => {
    expect(findCsvLink(readFixture('ultimosdatos-csv-link.html'), `${ORIGIN}${PAGE_PATH}`)).toBe(
      `${ORIGIN}/datos/observacion/9091R_datos_horarios.csv?k=pva`
    );
    expect(findCsvLink('<a href="/ayuda">Ayuda</a>', ORIGIN)).toBeNull();
  });

  it('decodes UTF-8 and falls back to Windows-1252', () => {
    expect(decodeBody(Buffer.from('Temperatura (ºC)', 'utf-8'))).toBe('Temperatura (ºC)');
    expect(decodeBody(iconv.encode('Temperatura (ºC)', 'win1252'))).toBe('Temperatura (ºC)');
  });

  it('sends the configured user agent', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: PAGE_PATH, method: 'GET', headers: { 'user-agent': config.userAgent } })
      .reply(200, '<html></html>');
    await expect(new ObservationClient(config).fetchPage()).resolves.toBe('<html></html>');
  });

  it('turns HTTP failures into source request errors', async () => {
    replyPage('unavailable', 503);
    const request = new ObservationClient(config).fetchPage();
    await expect(request).rejects.toBeInstanceOf(SourceRequestError);
    await expect(request).rejects.toMatchObject({ status: 503, url: `${ORIGIN}${PAGE_PATH}` });
  });

  it('turns network failures into source request errors', async () => {
    const request = new ObservationClient({ ...config, sourceUrl: 'https://unreachable.test/page' }).fetchPage();
    await expect(request).rejects.toBeInstanceOf(SourceRequestError);
    await expect(request).rejects.toMatchObject({ status: null, url: 'https://unreachable.test/page' });
  });
});

describe('collectObservations', () => {
  it('reads the HTML table and tallies dropped rows', async () => {
    replyPage(readFixture('ultimosdatos-9091R.html'));
    const result = await collectObservations(new ObservationClient(config), config);
    expect(result.origin).toBe('html');
    expect(result.roles.datetimeSource).toBe('combined');
    expect(result.observations).toEqual([
      { instant: new Date('2024-03-05T13:00:00Z'), temperatureC: 12.3 },
      { instant: new Date('2024-03-05T12:00:00Z'), temperatureC: 11.8 },
      { instant: new Date('2024-03-05T08:00:00Z'), temperatureC: 8.4 }
    ]);
    expect(result.stats).toEqual({ rows: 7, skippedShort: 1, dropped: { datetime: 1, missing: 2, invalid: 0 } });
  });

  it('follows the CSV download when the page has no table', async () => {
    replyPage(readFixture('ultimosdatos-csv-link.html'));
    agent
      .get(ORIGIN)
      .intercept({ path: '/datos/observacion/9091R_datos_horarios.csv?k=pva', method: 'GET' })
      .reply(200, iconv.encode(readFixture('datos-horarios.csv'), 'win1252'));

    const result = await collectObservations(new ObservationClient(config), config);
    expect(result.origin).toBe('csv');
    expect(result.headers[3]).toBe('Temperatura (ºC)');
    expect(result.observations).toEqual([
      { instant: new Date('2024-03-05T13:00:00Z'), temperatureC: 12.3 },
      { instant: new Date('2024-03-05T12:00:00Z'), temperatureC: 11.8 }
    ]);
    expect(result.stats).toEqual({ rows: 5, skippedShort: 1, dropped: { datetime: 0, missing: 1, invalid: 1 } });
  });

  it('fails when the page has neither a table nor a download', async () => {
    replyPage('<html><body><p>Servicio en mantenimiento</p></body></html>');
    await expect(collectObservations(new ObservationClient(config), config)).rejects.toBeInstanceOf(TableStructureError);
  });

  it('fails when the table has no air temperature column', async () => {
    replyPage(tableHtml(['Fecha y hora oficial', 'Temp. máx. (ºC)'], [['05/03/2024 14:00', '13,0']]));
    await expect(collectObservations(new ObservationClient(config), config)).rejects.toBeInstanceOf(HeaderResolutionError);
  });
});

describe('runCollector', () => {
  it('merges the extracted hours into the hourly file and writes the badge files', async () => {
    fs.writeFileSync(
      config.hourlyPath,
      [
        HEADER,
        '2024-03-05,00:00,2024-03-04T23:00:00Z,5.0,AEMET_ult24h',
        '2024-03-05,14:00,2024-03-05T13:00:00Z,10.0,AEMET_ult24h',
        ''
      ].join('\n')
    );
    replyPage(readFixture('ultimosdatos-9091R.html'));

    const report = await runCollector(config);
    expect(report).toEqual({
      status: 'ok',
      origin: 'html',
      extracted: 3,
      total: 4,
      stats: { rows: 7, skippedShort: 1, dropped: { datetime: 1, missing: 2, invalid: 0 } }
    });
    expect(fs.readFileSync(config.hourlyPath, 'utf-8')).toBe(
      [
        HEADER,
        '2024-03-05,00:00,2024-03-04T23:00:00Z,5.0,AEMET_ult24h',
        '2024-03-05,09:00,2024-03-05T08:00:00Z,8.4,AEMET_ult24h',
        '2024-03-05,13:00,2024-03-05T12:00:00Z,11.8,AEMET_ult24h',
        '2024-03-05,14:00,2024-03-05T13:00:00Z,12.3,AEMET_ult24h',
        ''
      ].join('\n')
    );
    const status = JSON.parse(fs.readFileSync(config.statusJsonPath, 'utf-8'));
    expect(status.rows_last_run).toBe(3);
    expect(status.tz_local).toBe('Europe/Madrid');
  });

  it('warns and writes nothing when every row is dropped', async () => {
    replyPage(tableHtml(['Fecha y hora oficial', 'Temperatura (ºC)'], [['05/03/2024 14:00', 'ND'], ['05/03/2024 13:00', '-']]));
    const report = await runCollector(config);
    expect(report.status).toBe('empty');
    expect(report.extracted).toBe(0);
    expect(fs.existsSync(config.hourlyPath)).toBe(false);
    expect(fs.existsSync(config.statusJsonPath)).toBe(false);
  });

  it('fails an empty run under the strict policy', async () => {
    replyPage(tableHtml(['Fecha y hora oficial', 'Temperatura (ºC)'], [['05/03/2024 14:00', 'ND']]));
    await expect(runCollector({ ...config, emptyPolicy: 'fail' })).rejects.toBeInstanceOf(EmptyExtractionError);
    expect(fs.existsSync(config.hourlyPath)).toBe(false);
  });
});

describe('fetch-observations CLI', () => {
  it('exits 0 after a successful run', async () => {
    replyPage(readFixture('ultimosdatos-9091R.html'));
    await expect(fetchMain(['--config', writeConfigFile()])).resolves.toBe(0);
    expect(fs.readFileSync(config.hourlyPath, 'utf-8').split('\n')).toHaveLength(5);
  });

  it('writes to the --out path', async () => {
    replyPage(readFixture('ultimosdatos-9091R.html'));
    const outPath = path.join(dir, 'elsewhere', 'series.csv');
    await expect(fetchMain(['--config', writeConfigFile(), '--out', outPath])).resolves.toBe(0);
    expect(fs.existsSync(outPath)).toBe(true);
    expect(fs.existsSync(config.hourlyPath)).toBe(false);
  });

  it('exits 0 on an empty run and 2 with --strict', async () => {
    const html = tableHtml(['Fecha y hora oficial', 'Temperatura (ºC)'], [['05/03/2024 14:00', 'ND']]);
    const configPath = writeConfigFile();
    replyPage(html);
    await expect(fetchMain(['--config', configPath])).resolves.toBe(0);
    replyPage(html);
    await expect(fetchMain(['--config', configPath, '--strict'])).resolves.toBe(2);
  });

  it('exits 2 when the table cannot be read', async () => {
    replyPage(tableHtml(['Estación', 'Temperatura (ºC)'], [['9091R', '12,3']]));
    await expect(fetchMain(['--config', writeConfigFile()])).resolves.toBe(2);
    expect(fs.existsSync(config.hourlyPath)).toBe(false);
  });

  it('exits 1 when the source cannot be fetched', async () => {
    replyPage('error', 500);
    await expect(fetchMain(['--config', writeConfigFile()])).resolves.toBe(1);
  });

  it('exits 1 on unknown arguments', async () => {
    await expect(fetchMain(['--station', '9091R'])).resolves.toBe(1);
  });
});

describe('update-archive CLI', () => {
  it('folds the hourly file into the archive', async () => {
    fs.writeFileSync(
      config.hourlyPath,
      [HEADER, '2024-03-05,14:00,2024-03-05T13:00:00Z,12.3,AEMET_ult24h', ''].join('\n')
    );
    fs.writeFileSync(
      config.archivePath,
      [
        HEADER,
        '2024-03-05,13:00,2024-03-05T12:00:00Z,11.8,AEMET_ult24h',
        '2024-03-05,14:00,2024-03-05T13:00:00Z,10.0,AEMET_ult24h',
        ''
      ].join('\n')
    );
    await expect(archiveMain(['--config', writeConfigFile()])).resolves.toBe(0);
    expect(fs.readFileSync(config.archivePath, 'utf-8')).toBe(
      [
        HEADER,
        '2024-03-05,13:00,2024-03-05T12:00:00Z,11.8,AEMET_ult24h',
        '2024-03-05,14:00,2024-03-05T13:00:00Z,12.3,AEMET_ult24h',
        ''
      ].join('\n')
    );
  });

  it('reads the hourly file named by --hourly', async () => {
    const hourlyPath = path.join(dir, 'other-hourly.csv');
    fs.writeFileSync(hourlyPath, [HEADER, '2024-03-05,09:00,2024-03-05T08:00:00Z,8.4,AEMET_ult24h', ''].join('\n'));
    fs.writeFileSync(
      config.hourlyPath,
      [HEADER, '2024-03-05,14:00,2024-03-05T13:00:00Z,12.3,AEMET_ult24h', ''].join('\n')
    );
    await expect(archiveMain(['--config', writeConfigFile(), '--hourly', hourlyPath])).resolves.toBe(0);
    expect(fs.readFileSync(config.archivePath, 'utf-8')).toBe(
      [HEADER, '2024-03-05,09:00,2024-03-05T08:00:00Z,8.4,AEMET_ult24h', ''].join('\n')
    );
  });

  it('exits 0 without writing when there is nothing to archive', async () => {
    await expect(
      archiveMain(['--config', writeConfigFile(), '--archive', path.join(dir, 'other-history.csv')])
    ).resolves.toBe(0);
    expect(fs.existsSync(path.join(dir, 'other-history.csv'))).toBe(false);
  });
});
