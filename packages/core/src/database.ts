import { Kysely, type KyselyPlugin } from 'kysely';
import type { MetadataDialectDescriptor, SqlFamily } from './dialect';

export function createDatabase<T, F extends SqlFamily = SqlFamily>(
  options: MetadataDialectDescriptor<F> & {
    plugins?: KyselyPlugin[];
  }
): Kysely<T> {
  return new Kysely<T>({
    dialect: options.dialect,
    plugins: options.plugins,
  });
}
