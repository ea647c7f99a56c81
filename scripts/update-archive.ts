#!/usr/bin/env tsx
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { updateArchive } from '../lib/aemet/archive';
import { DEFAULT_CONFIG_FILE, loadConfig } from '../lib/config';

interface CliOptions {
  configPath: string | null;
  hourlyPath: string | null;
  archivePath: string | null;
  helpRequested: boolean;
}

function parseArgs(argv: string[]): CliOptions {
  let configPath: string | null = null;
  let hourlyPath: string | null = null;
  let archivePath: string | null = null;
  let helpRequested = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--config' || arg === '--hourly' || arg === '--archive') {
      const value = argv[i + 1];
      if (!value) {
        throw new Error(`${arg} flag requires a file path`);
      }
      if (arg === '--config') configPath = value;
      else if (arg === '--hourly') hourlyPath = path.resolve(value);
      else archivePath = path.resolve(value);
      i += 1;
    } else if (arg === '--help' || arg === '-h') {
      helpRequested = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return { configPath, hourlyPath, archivePath, helpRequested };
}

function printHelp() {
  console.log(`Usage: npm run archive -- [--config <file>] [--hourly <file>] [--archive <file>]

Folds the hourly CSV into the long-term archive CSV.

Options:
  --config <file>   YAML or JSON settings (default: ${DEFAULT_CONFIG_FILE} if present)
  --hourly <file>   Hourly CSV to read (overrides hourlyPath)
  --archive <file>  Archive CSV to update (overrides archivePath)
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
    return 1;
  }

  if (options.helpRequested) {
    printHelp();
    return 0;
  }

  try {
    const config = loadConfig(options.configPath);
    const hourlyPath = options.hourlyPath ?? config.hourlyPath;
    const archivePath = options.archivePath ?? config.archivePath;

    const result = updateArchive({ hourlyPath, archivePath });
    if (result.status === 'empty') {
      console.warn(`Hourly series ${hourlyPath} is empty; nothing to archive.`);
      return 0;
    }
    console.log(`Archive updated with ${result.added} new or refreshed row${result.added === 1 ? '' : 's'}; total=${result.total}`);
    return 0;
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    return 1;
  }
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error(error);
      process.exit(1);
    });
}
