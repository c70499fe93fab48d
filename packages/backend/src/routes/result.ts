import { Hono } from 'hono';
import type { ExtractResponse, ExtractErrorResponse } from '@rgi-reader/shared';
import {
  SHORT_CODE_MAX_LENGTH,
  SHORT_CODE_MIN_LENGTH,
  type ResultCache,
} from '@rgi-reader/backend/services/cache';

const isValidCode = (code: string): boolean =>
  code.length >= SHORT_CODE_MIN_LENGTH && code.length <= SHORT_CODE_MAX_LENGTH;

const invalidCodeResponse: ExtractErrorResponse = {
  success: false,
  error: 'Invalid result code',
  details: `Result code must be between ${SHORT_CODE_MIN_LENGTH} and ${SHORT_CODE_MAX_LENGTH} characters`,
};

const notFoundResponse: ExtractErrorResponse = {
  success: false,
  error: 'Result not found',
  details: 'The result may have been cleared or the code is invalid',
};

export const createResultRoutes = (cache: ResultCache): Hono => {
  const resultRoutes = new Hono();

  /**
   * Get a stored extraction result by short code
   * GET /result/:code
   */
  resultRoutes.get('/:code', async (c) => {
    const code = c.req.param('code');
    if (!isValidCode(code)) {
      return c.json(invalidCodeResponse, 400);
    }

    console.log(`[Result] Looking up result: ${code}`);

    const cached = await cache.findByCode(code);
    if (!cached) {
      return c.json(notFoundResponse, 404);
    }

    const response: ExtractResponse = {
      success: true,
      data: cached.record,
      pageCount: cached.pageCount,
      resultCode: cached.code,
      cached: true,
    };
    return c.json(response);
  });

  /**
   * Clear a stored result ("new file")
   * DELETE /result/:code
   */
  resultRoutes.delete('/:code', async (c) => {
    const code = c.req.param('code');
    if (!isValidCode(code)) {
      return c.json(invalidCodeResponse, 400);
    }

    const deleted = await cache.deleteByCode(code);
    if (!deleted) {
      return c.json(notFoundResponse, 404);
    }

    console.log(`[Result] Cleared result: ${code}`);
    return c.json({ success: true });
  });

  return resultRoutes;
};
