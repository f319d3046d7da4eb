#!/usr/bin/env node
/**
 * County Health Lookup - Main Entry Point
 * Provides CLI for starting the lookup server and loading CSV data
 */

import { resolve } from 'path';
import { resolveConfig, parsePort, type AppConfig } from './config.js';
import { ApiServer } from './server/express.js';
import { loadCsvIntoDatabase } from './loader/csv-loader.js';

// ============================================
// CLI Arguments
// ============================================

interface CliArgs {
  command: 'serve' | 'load' | 'help';
  overrides: Partial<AppConfig>;
  /** Positional arguments after the command */
  positional: string[];
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    command: 'serve',
    overrides: {},
    positional: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (result.positional.length === 0 && (arg === 'serve' || arg === 'load' || arg === 'help')) {
      result.command = arg;
    } else if (arg === '--port' || arg === '-p') {
      result.overrides.port = parsePort(args[++i] ?? '');
    } else if (arg === '--host') {
      result.overrides.host = args[++i];
    } else if (arg === '--db') {
      result.overrides.databasePath = args[++i];
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else if (!arg.startsWith('-')) {
      result.positional.push(arg);
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
County Health Lookup - ZIP code to county health statistics

Usage: county-health [command] [options]

Commands:
  serve                  Start the lookup server (default)
  load <database> <csv>  Load a CSV file into a SQLite table named after the file
  help                   Show this help message

Options:
  -p, --port <port>   Server port (default: 8000, env PORT)
  --host <host>       Bind address (default: 0.0.0.0, env HOST)
  --db <path>         SQLite database (default: ./data.db, env COUNTY_DATA_DB)
  -h, --help          Show help

Examples:
  county-health                              Serve ./data.db on port 8000
  county-health serve --db data/health.db    Serve a specific database
  county-health load data.db zip_county.csv  Create table zip_county from a CSV
`);
}

// ============================================
// Commands
// ============================================

function runLoad(positional: string[]): void {
  const [database, csv] = positional;
  if (!database || !csv) {
    throw new Error('load requires <database> and <csv> arguments');
  }

  const result = loadCsvIntoDatabase(resolve(database), resolve(csv));
  console.log(`Loaded ${result.rowCount} rows into ${result.table} (${result.columns.length} columns)`);
}

async function runServe(overrides: Partial<AppConfig>): Promise<void> {
  const config = resolveConfig(process.env, overrides);
  console.log('Starting County Health Lookup...');
  console.log(`Database: ${config.databasePath}`);

  const server = new ApiServer(config);
  await server.start();
  console.log(`
Endpoints:
  POST /county_data       - Records for { zip, measure_name }
  POST /api/county_data   - Same, under /api
  GET  /api/measures      - Accepted measure names
  GET  /api/health        - Health check
  GET  /                  - Lookup form

Press Ctrl+C to stop
`);

  const shutdown = (): void => {
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error while stopping:', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  switch (args.command) {
    case 'help':
      printHelp();
      break;

    case 'load':
      runLoad(args.positional);
      break;

    case 'serve':
      await runServe(args.overrides);
      break;
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
