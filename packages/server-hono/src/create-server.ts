/**
 * Server factory for Hono
 *
 * Wires the engine, both auth groups and the configured request root into
 * one app.
 */

import {
  createMetadataEngine,
  type MetadataCoreDb,
  type MetadataEngine,
  type ServerMetadataDialect,
} from '@buildmeta/server';
import { Hono } from 'hono';
import type { Kysely } from 'kysely';
import { createSharedSecretAuth } from './auth';
import { createMetadataRoutes } from './routes';

export interface MetadataServerOptions {
  /** Kysely database instance */
  db: Kysely<MetadataCoreDb>;

  /** Server metadata dialect */
  dialect: ServerMetadataDialect;

  /** Use an existing engine instead of creating one over `db`. */
  engine?: MetadataEngine;

  /** Path prefix for every route (default `/`). */
  requestRoot?: string;

  /** Shared Basic credential for client routes; `''` disables the check. */
  userAuth?: string;

  /** Shared Basic credential for badge submission; `''` disables the check. */
  ciAuth?: string;
}

export interface MetadataServerResult {
  app: Hono;
  engine: MetadataEngine;
}

/**
 * `/`, `''` and `/root/` → `/` and `/root`.
 */
export function normalizeRequestRoot(root: string | undefined): string {
  const trimmed = (root ?? '').trim().replace(/\/+$/, '');
  if (trimmed === '') return '/';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/**
 * @example
 * ```typescript
 * const { app } = createMetadataServer({
 *   db,
 *   dialect: createSqliteServerDialect(),
 *   requestRoot: '/buildmeta',
 *   ciAuth: 'ci:test-secret',
 * });
 * ```
 */
export function createMetadataServer(
  options: MetadataServerOptions
): MetadataServerResult {
  const engine =
    options.engine ??
    createMetadataEngine({ db: options.db, dialect: options.dialect });

  const routes = createMetadataRoutes({
    engine,
    userAuth: createSharedSecretAuth({
      group: 'user',
      credential: options.userAuth ?? '',
    }),
    ciAuth: createSharedSecretAuth({
      group: 'ci',
      credential: options.ciAuth ?? '',
    }),
  });

  const root = normalizeRequestRoot(options.requestRoot);
  const app = new Hono();
  app.route(root, routes);
  if (root !== '/') {
    // Load balancers check the bare path.
    app.get('/health', (c) => c.body(null, 200));
  }
  return { app, engine };
}
