/**
 * CSV Loader
 * Loads a CSV file with a header row into an all-TEXT SQLite table named after the file
 */

import { readFileSync, existsSync } from 'fs';
import { parse as parsePath } from 'path';
import { parse } from 'csv-parse/sync';
import { withDatabase } from '../storage/sqlite.js';
import { CsvLoadError } from './errors.js';
import { validateIdentifier } from './identifiers.js';

// ============================================
// Types
// ============================================

export interface LoadResult {
  table: string;
  columns: string[];
  rowCount: number;
}

interface CsvContents {
  header: string[];
  rows: string[][];
}

// ============================================
// Parsing
// ============================================

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === 'string');
}

function readCsv(csvPath: string): CsvContents {
  let records: unknown;
  try {
    records = parse(readFileSync(csvPath), {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CsvLoadError(`Could not parse CSV file: ${reason}`, { cause: error });
  }

  if (!Array.isArray(records)) {
    throw new CsvLoadError('Could not parse CSV file: unexpected output');
  }

  const rows: string[][] = [];
  for (const record of records) {
    if (!isStringRow(record)) {
      throw new CsvLoadError('Could not parse CSV file: unexpected record shape');
    }
    rows.push(record);
  }

  const header = rows.shift();
  if (!header) {
    throw new CsvLoadError('CSV file is empty');
  }
  return { header, rows };
}

/** Column names from the header row, validated and unique */
export function columnsFromHeader(header: string[]): string[] {
  const columns = header.map((column) => validateIdentifier(column, 'Column name'));
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) {
      throw new CsvLoadError(`Column name '${column}' appears more than once`);
    }
    seen.add(column);
  }
  return columns;
}

// ============================================
// Loading
// ============================================

/**
 * Replace table `<file name>` in the database with the CSV contents.
 * Drop, create and insert run in one transaction.
 */
export function loadCsvIntoDatabase(databasePath: string, csvPath: string): LoadResult {
  if (!existsSync(csvPath)) {
    throw new CsvLoadError(`CSV file not found: ${csvPath}`);
  }

  const table = validateIdentifier(parsePath(csvPath).name, 'Table name');
  const { header, rows } = readCsv(csvPath);
  const columns = columnsFromHeader(header);

  rows.forEach((row, index) => {
    if (row.length !== columns.length) {
      throw new CsvLoadError(
        `Record ${index + 1} has ${row.length} values; expected ${columns.length}`
      );
    }
  });

  const columnDefinitions = columns.map((column) => `${column} TEXT`).join(', ');
  const placeholders = columns.map(() => '?').join(', ');

  withDatabase({ path: databasePath }, (db) => {
    db.transaction(() => {
      db.exec(`DROP TABLE IF EXISTS ${table};`);
      db.exec(`CREATE TABLE ${table} (${columnDefinitions});`);

      const insert = db.prepare<string[]>(
        `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${placeholders});`
      );
      for (const row of rows) {
        insert.run(...row);
      }
    })();
  });

  return { table, columns, rowCount: rows.length };
}
