import { Hono } from 'hono';
import type { ExtractionOptions } from '@rgi-reader/shared';
import { getDefaultModel, getSupportedModels } from '@rgi-reader/backend/config/env';
import { DPI_RANGE } from '@rgi-reader/backend/config/extraction';

export const optionsRoutes = new Hono();

/**
 * Selectable models and DPI range
 * GET /options
 */
optionsRoutes.get('/', (c) => {
  const options: ExtractionOptions = {
    models: getSupportedModels(),
    defaultModel: getDefaultModel(),
    dpi: { ...DPI_RANGE },
  };
  return c.json(options);
});
