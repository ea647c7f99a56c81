#!/usr/bin/env tsx
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { EmptyExtractionError, SourceRequestError, isExtractionError } from '../lib/aemet/errors';
import { runCollector } from '../lib/aemet/pipeline';
import { loadConfig, resolveConfig, DEFAULT_CONFIG_FILE } from '../lib/config';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_EXTRACTION_FAILED = 2;

interface CliOptions {
  configPath: string | null;
  outputPath: string | null;
  strict: boolean;
  helpRequested: boolean;
}

function parseArgs(argv: string[]): CliOptions {
  let configPath: string | null = null;
  let outputPath: string | null = null;
  let strict = false;
  let helpRequested = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
        configPath = requireValue(argv, ++i, '--config');
        break;
      case '--out':
        outputPath = requireValue(argv, ++i, '--out');
        break;
      case '--strict':
        strict = true;
        break;
      case '--help':
      case '-h':
        helpRequested = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return { configPath, outputPath, strict, helpRequested };
}

function requireValue(argv: string[], index: number, flag: string) {
  const value = argv[index];
  if (!value) {
    throw new Error(`${flag} flag requires a value`);
  }
  return value;
}

function printHelp() {
  console.log(`Usage: npm run fetch -- [options]

Fetches the station's last-24h observation table and merges it into the hourly CSV.

Options:
  --config <file>   YAML or JSON settings (default: ${DEFAULT_CONFIG_FILE} if present, or $STATION_CONFIG)
  --out <file>      Hourly CSV to update (overrides hourlyPath)
  --strict          Exit with code ${EXIT_EXTRACTION_FAILED} when no observation could be extracted
  -h, --help        Show this message
`);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    printHelp();
    return EXIT_FAILURE;
  }

  if (options.helpRequested) {
    printHelp();
    return EXIT_OK;
  }

  try {
    const base = loadConfig(options.configPath);
    const config = resolveConfig({
      ...base,
      hourlyPath: options.outputPath ? path.resolve(options.outputPath) : base.hourlyPath,
      emptyPolicy: options.strict ? 'fail' : base.emptyPolicy
    });

    const report = await runCollector(config);
    console.log({
      status: report.status,
      origin: report.origin,
      extracted: report.extracted,
      total: report.total,
      output: config.hourlyPath
    });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof SourceRequestError) {
      console.error(`Could not fetch observations: ${error.message}`);
      return EXIT_FAILURE;
    }
    if (isExtractionError(error) || error instanceof EmptyExtractionError) {
      console.error(`${error.name}: ${error.message}`);
      return EXIT_EXTRACTION_FAILED;
    }
    console.error(error instanceof Error ? error.message : error);
    return EXIT_FAILURE;
  }
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error(error);
      process.exit(EXIT_FAILURE);
    });
}
