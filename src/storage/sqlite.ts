/**
 * SQLite Database Infrastructure
 * Opens connections to the county data file and scopes their lifetime
 */

import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';

// ============================================
// Types
// ============================================

export interface DatabaseConfig {
  /** Path to SQLite database file */
  path: string;
  /** Open without write access; the file must already exist */
  readonly: boolean;
  /** Busy timeout in milliseconds */
  busyTimeout: number;
}

// ============================================
// Connections
// ============================================

/**
 * Open a connection. Writable connections create the parent directory
 * and the file when missing.
 */
export function openDatabase(config: Partial<DatabaseConfig> & { path: string }): DatabaseType {
  const resolved: DatabaseConfig = {
    readonly: false,
    busyTimeout: 5000,
    ...config,
  };

  if (!resolved.readonly) {
    const dbDir = dirname(resolved.path);
    if (dbDir && !existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }
  }

  const db = new Database(resolved.path, {
    readonly: resolved.readonly,
    fileMustExist: resolved.readonly,
  });

  if (resolved.busyTimeout) {
    db.pragma(`busy_timeout = ${resolved.busyTimeout}`);
  }

  return db;
}

/**
 * Run `fn` against a fresh connection, closing it on every exit path
 */
export function withDatabase<T>(
  config: Partial<DatabaseConfig> & { path: string },
  fn: (db: DatabaseType) => T
): T {
  const db = openDatabase(config);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}
