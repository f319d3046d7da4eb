/**
 * SQL identifier checks for table and column names taken from CSV files
 */

import { CsvLoadError } from './errors.js';

const VALID_IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

/** Trim whitespace, drop a leading byte-order mark, lowercase */
export function normalizeIdentifier(value: string): string {
  return value.trim().replace(/^\uFEFF/, '').toLowerCase();
}

/**
 * Normalize `raw` and make sure it can be spliced into SQL as-is.
 * @param kind - used in the error message, e.g. "Table name"
 */
export function validateIdentifier(raw: string, kind: string): string {
  const value = normalizeIdentifier(raw);
  if (!value) {
    throw new CsvLoadError(`${kind} '${raw}' is empty after stripping whitespace`);
  }
  if (!VALID_IDENTIFIER.test(value)) {
    throw new CsvLoadError(`${kind} '${raw}' is not a valid SQL identifier`);
  }
  return value;
}
