/**
 * @buildmeta/server - Server Metadata Dialect Interface
 *
 * Abstracts database-specific operations: DDL, transaction control and value
 * encodings that differ between engines.
 */

import type { SqlFamily } from '@buildmeta/core';
import type { Kysely, Transaction } from 'kysely';
import type { MetadataCoreDb } from '../schema';

/**
 * Common database executor type that works with both Kysely and Transaction.
 */
export type DbExecutor<DB extends MetadataCoreDb = MetadataCoreDb> =
  | Kysely<DB>
  | Transaction<DB>;

export interface ServerMetadataDialect<F extends SqlFamily = SqlFamily> {
  readonly family: F;

  /** Create metadata tables + indexes (idempotent) */
  ensureMetadataSchema(db: Kysely<MetadataCoreDb>): Promise<void>;

  /** Execute callback in a transaction (a savepoint when already inside one). */
  executeInTransaction<T>(
    db: DbExecutor,
    fn: (executor: DbExecutor) => Promise<T>
  ): Promise<T>;

  /** Greatest sequence stored in badges or user_events (0 if none) */
  readMaxSequence(db: DbExecutor): Promise<number>;

  /** Encode an optional flag for a boolean column. */
  booleanToDb(value: boolean | null): number | null;

  /** Decode a boolean column value. */
  dbToBoolean(value: unknown): boolean | null;
}
