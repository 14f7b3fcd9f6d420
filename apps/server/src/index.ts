/**
 * @buildmeta/server-app - HTTP entry point
 */

import { captureMetadataException, logMetadataEvent } from '@buildmeta/core';
import { serve } from '@hono/node-server';
import { createServerApp } from './app';
import { loadServerConfig } from './config';

async function main(): Promise<void> {
  const config = await loadServerConfig();
  const { app, close } = await createServerApp(config);

  const server = serve(
    { fetch: app.fetch, port: config.port, hostname: config.host },
    (info) => {
      logMetadataEvent({
        event: 'metadata.server.listening',
        host: info.address,
        port: info.port,
        requestRoot: config.request_root,
        database: config.database_path,
      });
    }
  );

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logMetadataEvent({ event: 'metadata.server.stopping', signal });
    server.close(() => {
      close().then(
        () => process.exit(0),
        (error: unknown) => {
          captureMetadataException(error, { event: 'metadata.server.close' });
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  captureMetadataException(error, { event: 'metadata.server.start' });
  process.exit(1);
});
