/**
 * @buildmeta/server - Schema setup
 */

import type { Kysely } from 'kysely';
import type { ServerMetadataDialect } from './dialect/types';
import type { MetadataCoreDb } from './schema';

/**
 * Ensures the metadata tables exist in the database.
 * Safe to call multiple times (idempotent).
 */
export async function ensureMetadataSchema(
  db: Kysely<MetadataCoreDb>,
  dialect: ServerMetadataDialect
): Promise<void> {
  await dialect.ensureMetadataSchema(db);
}
