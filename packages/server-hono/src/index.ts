/**
 * @buildmeta/server-hono - Hono adapter for the metadata server
 *
 * Keeps @buildmeta/server framework-agnostic.
 */

export * from './auth';

export {
  createMetadataServer,
  type MetadataServerOptions,
  type MetadataServerResult,
  normalizeRequestRoot,
} from './create-server';

export {
  type CreateMetadataRoutesOptions,
  createMetadataRoutes,
} from './routes';
