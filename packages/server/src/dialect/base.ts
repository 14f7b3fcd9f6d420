/**
 * @buildmeta/server - Base Server Metadata Dialect
 *
 * Implements the queries that are plain SQL on every engine. DDL,
 * transaction control and value encodings stay abstract.
 */

import type { SqlFamily } from '@buildmeta/core';
import type { Kysely } from 'kysely';
import { sql } from 'kysely';
import type { MetadataCoreDb } from '../schema';
import { coerceNumber } from './helpers';
import type { DbExecutor, ServerMetadataDialect } from './types';

export abstract class BaseServerMetadataDialect<F extends SqlFamily = SqlFamily>
  implements ServerMetadataDialect<F>
{
  abstract readonly family: F;

  abstract ensureMetadataSchema(db: Kysely<MetadataCoreDb>): Promise<void>;

  abstract executeInTransaction<T>(
    db: DbExecutor,
    fn: (executor: DbExecutor) => Promise<T>
  ): Promise<T>;

  abstract booleanToDb(value: boolean | null): number | null;
  abstract dbToBoolean(value: unknown): boolean | null;

  async readMaxSequence(db: DbExecutor): Promise<number> {
    const res = await sql<{ max_seq: unknown }>`
      SELECT max(seq) AS max_seq FROM (
        SELECT max(sequence) AS seq FROM badges
        UNION ALL
        SELECT max(sequence) AS seq FROM user_events
      ) AS sequences
    `.execute(db);

    return coerceNumber(res.rows[0]?.max_seq) ?? 0;
  }
}
