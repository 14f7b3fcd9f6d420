import type { Dialect } from 'kysely';

/**
 * SQL families the server dialects target. Only SQLite ships today; the
 * family tag keeps dialect-specific value encoding explicit at call sites.
 */
export type SqlFamily = 'sqlite';

export interface MetadataDialectDescriptor<F extends SqlFamily = SqlFamily> {
  dialect: Dialect;
  family: F;
}
