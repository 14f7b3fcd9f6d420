/**
 * @buildmeta/server-app - Application assembly
 */

import {
  configureTelemetry,
  createDatabase,
  createDefaultTelemetry,
  ensureMetadataSchema,
  type MetadataCoreDb,
  type MetadataEngine,
} from '@buildmeta/server';
import { createBetterSqlite3Dialect } from '@buildmeta/dialect-better-sqlite3';
import { createSqliteServerDialect } from '@buildmeta/server-dialect-sqlite';
import { createMetadataServer } from '@buildmeta/server-hono';
import type { Hono } from 'hono';
import type { Kysely } from 'kysely';
import type { ServerConfig } from './config';

export interface ServerApp {
  app: Hono;
  db: Kysely<MetadataCoreDb>;
  engine: MetadataEngine;
  close(): Promise<void>;
}

export async function createServerApp(config: ServerConfig): Promise<ServerApp> {
  configureTelemetry(createDefaultTelemetry({ minLevel: config.log_level }));

  const dialect = createSqliteServerDialect();
  const db = createDatabase<MetadataCoreDb>({
    dialect: createBetterSqlite3Dialect({ path: config.database_path }),
    family: dialect.family,
  });
  await ensureMetadataSchema(db, dialect);

  const { app, engine } = createMetadataServer({
    db,
    dialect,
    requestRoot: config.request_root,
    userAuth: config.user_auth,
    ciAuth: config.ci_auth,
  });

  return {
    app,
    db,
    engine,
    close: () => db.destroy(),
  };
}
