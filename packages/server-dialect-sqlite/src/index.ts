/**
 * @buildmeta/server-dialect-sqlite - SQLite Server Metadata Dialect
 *
 * Works with any SQLite-compatible Kysely dialect (better-sqlite3, libsql,
 * etc.).
 *
 * Differences from server engines:
 * - No serial → INTEGER PRIMARY KEY AUTOINCREMENT
 * - No timestamptz → TEXT with ISO format
 * - No boolean → INTEGER 0/1
 */

import {
  BaseServerMetadataDialect,
  type DbExecutor,
  type MetadataCoreDb,
} from '@buildmeta/server';
import type { Kysely } from 'kysely';
import { sql } from 'kysely';

function createSavepointName(): string {
  const randomPart = Math.floor(Math.random() * 1_000_000_000).toString(36);
  return `buildmeta_sp_${Date.now().toString(36)}_${randomPart}`;
}

export class SqliteServerMetadataDialect extends BaseServerMetadataDialect<'sqlite'> {
  readonly family = 'sqlite' as const;

  async ensureMetadataSchema(db: Kysely<MetadataCoreDb>): Promise<void> {
    await db.schema
      .createTable('projects')
      .ifNotExists()
      .addColumn('project_id', 'integer', (col) =>
        col.primaryKey().autoIncrement()
      )
      .addColumn('stream', 'text', (col) => col.notNull())
      .addColumn('project', 'text', (col) => col.notNull())
      .execute();
    await sql`CREATE UNIQUE INDEX IF NOT EXISTS idx_projects_stream_project
      ON projects(stream, project)`.execute(db);

    await db.schema
      .createTable('badges')
      .ifNotExists()
      .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
      .addColumn('sequence', 'integer', (col) => col.notNull())
      .addColumn('change_number', 'integer', (col) => col.notNull())
      .addColumn('added_at', 'text', (col) => col.notNull())
      .addColumn('build_type', 'text', (col) => col.notNull())
      .addColumn('result', 'integer', (col) => col.notNull())
      .addColumn('url', 'text', (col) => col.notNull())
      .addColumn('project_id', 'integer', (col) =>
        col.notNull().references('projects.project_id')
      )
      .execute();
    await sql`CREATE INDEX IF NOT EXISTS idx_badges_project_sequence
      ON badges(project_id, sequence, change_number)`.execute(db);
    await sql`CREATE INDEX IF NOT EXISTS idx_badges_sequence
      ON badges(sequence)`.execute(db);

    await db.schema
      .createTable('user_events')
      .ifNotExists()
      .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
      .addColumn('project_id', 'integer', (col) =>
        col.notNull().references('projects.project_id')
      )
      .addColumn('change_number', 'integer', (col) => col.notNull())
      .addColumn('user_name', 'text', (col) => col.notNull())
      .addColumn('sequence', 'integer', (col) => col.notNull())
      .addColumn('updated_at', 'text', (col) => col.notNull())
      .addColumn('synced_at', 'text')
      .addColumn('vote', 'integer')
      .addColumn('investigating', 'integer')
      .addColumn('starred', 'integer')
      .addColumn('comment', 'text')
      .execute();
    await sql`CREATE INDEX IF NOT EXISTS idx_user_events_project_sequence
      ON user_events(project_id, sequence, change_number)`.execute(db);
    await sql`CREATE INDEX IF NOT EXISTS idx_user_events_sequence
      ON user_events(sequence)`.execute(db);
    await sql`CREATE UNIQUE INDEX IF NOT EXISTS idx_user_events_identity
      ON user_events(project_id, user_name, change_number)`.execute(db);
  }

  async executeInTransaction<T>(
    db: DbExecutor,
    fn: (executor: DbExecutor) => Promise<T>
  ): Promise<T> {
    if (db.isTransaction) {
      const savepoint = createSavepointName();
      await sql.raw(`SAVEPOINT ${savepoint}`).execute(db);
      try {
        const result = await fn(db);
        await sql.raw(`RELEASE SAVEPOINT ${savepoint}`).execute(db);
        return result;
      } catch (error) {
        await sql.raw(`ROLLBACK TO SAVEPOINT ${savepoint}`).execute(db);
        await sql.raw(`RELEASE SAVEPOINT ${savepoint}`).execute(db);
        throw error;
      }
    }
    return db.transaction().execute(fn);
  }

  booleanToDb(value: boolean | null): number | null {
    if (value === null) return null;
    return value ? 1 : 0;
  }

  dbToBoolean(value: unknown): boolean | null {
    if (value === null || value === undefined) return null;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value !== 0;
    if (typeof value === 'bigint') return value !== 0n;
    if (typeof value === 'string') return value === '1' || value === 'true';
    return null;
  }
}

export function createSqliteServerDialect(): SqliteServerMetadataDialect {
  return new SqliteServerMetadataDialect();
}
