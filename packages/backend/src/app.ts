import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { healthRoutes } from '@rgi-reader/backend/routes/health';
import { optionsRoutes } from '@rgi-reader/backend/routes/options';
import { createExtractRoutes, type ExtractRouteDependencies } from '@rgi-reader/backend/routes/extract';
import { createResultRoutes } from '@rgi-reader/backend/routes/result';
import { readEnv } from '@rgi-reader/backend/config/env';

export type AppDependencies = ExtractRouteDependencies;

/**
 * Build the HTTP application
 * All endpoints are grouped under /api
 */
export const createApp = (deps: AppDependencies): Hono => {
  const app = new Hono();

  // Middleware
  app.use('/*', cors());
  app.use('/*', logger());

  const api = new Hono();
  api.route('/health', healthRoutes);
  api.route('/options', optionsRoutes);
  api.route('/extract', createExtractRoutes(deps));
  api.route('/result', createResultRoutes(deps.cache));

  // API error handling
  api.onError((err, c) => {
    console.error('API error:', err);
    return c.json(
      {
        success: false,
        error: 'Internal server error',
        details: readEnv('NODE_ENV') === 'development' ? err.message : undefined,
      },
      500,
    );
  });

  app.route('/api', api);

  // 404 handler; only the root app's notFound runs for mounted routes
  app.notFound((c) => {
    return c.json(
      {
        success: false,
        error: 'Not found',
      },
      404,
    );
  });

  return app;
};
