import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from './aemet/errors';
import type { StationConfig } from './aemet/types';

export const DEFAULT_STATION_ID = '9091R';
export const DEFAULT_CONFIG_FILE = 'station.config.yml';

export function defaultSourceUrl(stationId: string) {
  return `https://www.aemet.es/es/eltiempo/observacion/ultimosdatos?k=pva&l=${encodeURIComponent(stationId)}&w=0&datos=det&x=&f=temperatura`;
}

export function defaultConfig(stationId = DEFAULT_STATION_ID): StationConfig {
  return {
    stationId,
    sourceUrl: defaultSourceUrl(stationId),
    timeZone: 'Europe/Madrid',
    userAgent: 'Mozilla/5.0 (compatible; station-temperature-collector)',
    timeoutMs: 30_000,
    sourceTag: 'AEMET_ult24h',
    hourlyPath: path.join('data', `${stationId}_temp_hourly.csv`),
    archivePath: path.join('data', `${stationId}_temp_history.csv`),
    statusJsonPath: path.join('data', 'last_update.json'),
    statusCsvPath: path.join('data', 'last_update.csv'),
    emptyPolicy: 'warn'
  };
}

function isKnownTimeZone(value: string) {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const ConfigFileSchema = z
  .object({
    stationId: z.string().trim().min(1),
    sourceUrl: z.string().url('sourceUrl must be a valid URL'),
    timeZone: z.string().refine(isKnownTimeZone, 'timeZone must be an IANA time zone name'),
    userAgent: z.string().trim().min(1),
    timeoutMs: z.number().int().positive(),
    sourceTag: z.string().trim().min(1),
    hourlyPath: z.string().trim().min(1),
    archivePath: z.string().trim().min(1),
    statusJsonPath: z.string().trim().min(1),
    statusCsvPath: z.string().trim().min(1),
    emptyPolicy: z.enum(['warn', 'fail'])
  })
  .partial()
  .strict();

function resolvePath(candidate: string) {
  return path.isAbsolute(candidate) ? candidate : path.join(process.cwd(), candidate);
}

export function resolveConfig(overrides: unknown = {}): StationConfig {
  const parsed = ConfigFileSchema.safeParse(overrides);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  const values = parsed.data;
  const stationId = values.stationId ?? DEFAULT_STATION_ID;
  const config: StationConfig = { ...defaultConfig(stationId), ...values };
  return {
    ...config,
    hourlyPath: resolvePath(config.hourlyPath),
    archivePath: resolvePath(config.archivePath),
    statusJsonPath: resolvePath(config.statusJsonPath),
    statusCsvPath: resolvePath(config.statusCsvPath)
  };
}

/**
 * Reads a YAML or JSON config file over the defaults. The default file may be absent; a file named
 * explicitly (flag or STATION_CONFIG) must exist.
 */
export function loadConfig(configPath?: string | null): StationConfig {
  const named = configPath ?? process.env.STATION_CONFIG ?? null;
  const resolved = resolvePath(named ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolved)) {
    if (named) {
      throw new ConfigError(`Config file not found at ${resolved}`);
    }
    return resolveConfig();
  }

  let data: unknown;
  try {
    data = YAML.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not parse config file ${resolved}`, { cause: error });
  }
  if (data === null || data === undefined) {
    return resolveConfig();
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError(`Config file ${resolved} must contain a mapping of settings`);
  }
  return resolveConfig(data);
}
