import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from '@rgi-reader/backend/app';
import { getServerConfig } from '@rgi-reader/backend/config/env';
import { closeDb, getDb } from '@rgi-reader/backend/db';
import { MemoryResultCache, type ResultCache } from '@rgi-reader/backend/services/cache';
import { runMigrations } from '@rgi-reader/backend/services/migrations';
import { PgResultCache } from '@rgi-reader/backend/services/pgCache';
import { openRasterDocument } from '@rgi-reader/backend/services/pdf';

const { port, maxFileBytes, databaseUrl, memoryCacheEntries } = getServerConfig();

// Run database migrations on startup
await runMigrations(databaseUrl);

const cache: ResultCache = databaseUrl ? new PgResultCache(getDb(databaseUrl)) : new MemoryResultCache(memoryCacheEntries);

const app = createApp({
  cache,
  openDocument: openRasterDocument,
  maxFileBytes,
});

console.log(`Starting RGI reader backend on port ${port}...`);

const server = serve({ fetch: app.fetch, port });

const shutdown = (): void => {
  server.close();
  closeDb().catch((error: unknown) => {
    console.error('[Server] Error closing database connection:', error);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
