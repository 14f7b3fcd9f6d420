/**
 * @buildmeta/dialect-better-sqlite3 - better-sqlite3 dialect for the metadata store
 *
 * Provides a Kysely dialect for better-sqlite3 (Node.js).
 * SQLite-compatible — use with @buildmeta/server-dialect-sqlite.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';

export interface BetterSqlite3ConnectionTuning {
  /** Switch file databases to write-ahead logging (default true). */
  wal?: boolean;
  /** Milliseconds to wait on a locked database file (default 5000). */
  busyTimeoutMs?: number;
}

export interface BetterSqlite3PathOptions extends BetterSqlite3ConnectionTuning {
  /** Path to SQLite database file, or ':memory:' for in-memory */
  path: string;
}

export interface BetterSqlite3InstanceOptions {
  /** An existing better-sqlite3 Database instance, used as configured */
  database: BetterSqlite3Database;
}

export type BetterSqlite3Options =
  | BetterSqlite3PathOptions
  | BetterSqlite3InstanceOptions;

export function openBetterSqlite3Database(
  options: BetterSqlite3PathOptions
): BetterSqlite3Database {
  const database = new Database(options.path);
  database.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
  database.pragma('foreign_keys = ON');
  if ((options.wal ?? true) && !database.memory) {
    database.pragma('journal_mode = WAL');
  }
  return database;
}

/**
 * Create a Kysely instance with better-sqlite3 dialect.
 *
 * @example
 * const db = createBetterSqlite3Db<MetadataCoreDb>({ path: './metadata.db' });
 * const db = createBetterSqlite3Db<MetadataCoreDb>({ path: ':memory:' });
 */
export function createBetterSqlite3Db<T>(
  options: BetterSqlite3Options
): Kysely<T> {
  return new Kysely<T>({
    dialect: createBetterSqlite3Dialect(options),
  });
}

export function createBetterSqlite3Dialect(
  options: BetterSqlite3Options
): SqliteDialect {
  const database =
    'database' in options
      ? options.database
      : openBetterSqlite3Database(options);
  return new SqliteDialect({ database });
}
