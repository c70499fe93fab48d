import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import type { ExtractResponse, ExtractErrorResponse } from '@rgi-reader/shared';
import type { PageSource, RasterOptions } from '@rgi-reader/backend/types';
import { getDefaultModel, getSupportedModels } from '@rgi-reader/backend/config/env';
import { DPI_RANGE } from '@rgi-reader/backend/config/extraction';
import {
  BatchExtractionError,
  ConfigurationError,
  ExtractionError,
  PdfRenderError,
} from '@rgi-reader/backend/errors';
import type { ResultCache } from '@rgi-reader/backend/services/cache';
import { extractFromPages, type ChatCompletionsClient } from '@rgi-reader/backend/services/openai';
import { calculateMD5 } from '@rgi-reader/backend/utils/hash';

export interface ExtractRouteDependencies {
  cache: ResultCache;
  openDocument: (buffer: Uint8Array, options: RasterOptions) => PageSource;
  maxFileBytes: number;
  /** Defaults to a client built from the environment */
  client?: ChatCompletionsClient;
}

type ErrorStatus = 413 | 422 | 500 | 502 | 503;

/**
 * Room for multipart boundaries and the model/dpi fields on top of the file itself
 */
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

const noFileResponse: ExtractErrorResponse = {
  success: false,
  error: 'No PDF file provided',
  details: 'Expected multipart/form-data with a "pdf" file field',
};

const fileTooLargeResponse = (maxFileBytes: number): ExtractErrorResponse => ({
  success: false,
  error: 'File too large',
  details: `Maximum upload size is ${Math.floor(maxFileBytes / (1024 * 1024))} MB`,
});

/**
 * Map an extraction failure to an HTTP status and error body
 */
export const toErrorResponse = (error: unknown): { status: ErrorStatus; body: ExtractErrorResponse } => {
  if (error instanceof ConfigurationError) {
    return {
      status: 503,
      body: { success: false, error: 'Extraction service is not configured', details: error.message },
    };
  }

  if (error instanceof PdfRenderError) {
    return {
      status: 422,
      body: { success: false, error: 'Could not read PDF', details: error.message },
    };
  }

  if (error instanceof BatchExtractionError) {
    return {
      status: error.payloadTooLarge ? 413 : 502,
      body: {
        success: false,
        error: error.payloadTooLarge
          ? 'Page images too large for the model API, try a lower DPI'
          : 'Extraction failed',
        details: error.message,
        partial: error.partial,
      },
    };
  }

  if (error instanceof ExtractionError) {
    return {
      status: 502,
      body: { success: false, error: 'Extraction failed', details: error.message },
    };
  }

  return {
    status: 500,
    body: {
      success: false,
      error: 'Extraction failed',
      details: error instanceof Error ? error.message : 'Unknown error',
    },
  };
};

const readTextField = (value: unknown): string | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

/**
 * Extract a registry record from an uploaded PDF
 * POST /extract
 *
 * Request: multipart/form-data with a "pdf" file field and optional "model" and "dpi" fields
 * Response: MatriculaRecord JSON
 */
export const createExtractRoutes = (deps: ExtractRouteDependencies): Hono => {
  const extractRoutes = new Hono();

  // Reject oversized uploads before the body is buffered
  const uploadLimit = bodyLimit({
    maxSize: deps.maxFileBytes + MULTIPART_OVERHEAD_BYTES,
    onError: (c) => {
      console.log(`[Extract] Rejected upload over ${deps.maxFileBytes} bytes`);
      return c.json(fileTooLargeResponse(deps.maxFileBytes), 413);
    },
  });

  extractRoutes.post('/', uploadLimit, async (c) => {
    let formData: FormData;
    try {
      formData = await c.req.formData();
    } catch (error) {
      // bodyLimit reports a streamed body over the limit through this read
      if (error instanceof Error && error.name === 'BodyLimitError') {
        throw error;
      }
      console.log('[Extract] Could not parse form data:', error instanceof Error ? error.message : error);
      return c.json(noFileResponse, 400);
    }

    const file = formData.get('pdf');

    if (!file || typeof file === 'string') {
      return c.json(noFileResponse, 400);
    }

    // Validate file type
    if (file.type !== 'application/pdf') {
      const errorResponse: ExtractErrorResponse = {
        success: false,
        error: 'Invalid file type',
        details: `Expected application/pdf, got ${file.type || 'unknown'}`,
      };
      return c.json(errorResponse, 400);
    }

    if (file.size > deps.maxFileBytes) {
      return c.json(fileTooLargeResponse(deps.maxFileBytes), 413);
    }

    const model = readTextField(formData.get('model')) ?? getDefaultModel();
    const supportedModels = getSupportedModels();
    if (!supportedModels.includes(model)) {
      const errorResponse: ExtractErrorResponse = {
        success: false,
        error: 'Unsupported model',
        details: `Expected one of: ${supportedModels.join(', ')}`,
      };
      return c.json(errorResponse, 400);
    }

    const dpiField = readTextField(formData.get('dpi'));
    const dpi = dpiField === null ? DPI_RANGE.default : Number(dpiField);
    if (!Number.isInteger(dpi) || dpi < DPI_RANGE.min || dpi > DPI_RANGE.max) {
      const errorResponse: ExtractErrorResponse = {
        success: false,
        error: 'Invalid DPI',
        details: `DPI must be an integer between ${DPI_RANGE.min} and ${DPI_RANGE.max}`,
      };
      return c.json(errorResponse, 400);
    }

    console.log(`[Extract] Processing PDF: ${file.name} (${file.size} bytes, ${model}, ${dpi} DPI)`);

    try {
      const buffer = new Uint8Array(await file.arrayBuffer());
      const key = { checksum: calculateMD5(buffer), model, dpi };

      const cached = await deps.cache.find(key);
      if (cached) {
        console.log(`[Extract] Using cached result ${cached.code}`);
        const response: ExtractResponse = {
          success: true,
          data: cached.record,
          pageCount: cached.pageCount,
          resultCode: cached.code,
          cached: true,
        };
        return c.json(response);
      }

      const pages = deps.openDocument(buffer, { dpi, mimeType: file.type });
      const record = await extractFromPages(pages, {
        client: deps.client,
        model,
        onBatchComplete: ({ batch, totalBatches, pagesProcessed, totalPages }) => {
          console.log(`[Extract] ${file.name}: batch ${batch}/${totalBatches}, ${pagesProcessed}/${totalPages} pages`);
        },
      });
      console.log(
        `[Extract] Extracted ${record.registros.length} registro(s) and ${record.proprietarios.length} proprietario(s) from ${file.name}`,
      );

      const saved = await deps.cache.save(key, {
        filename: file.name,
        pageCount: pages.pageCount,
        record,
      });

      const response: ExtractResponse = {
        success: true,
        data: record,
        pageCount: pages.pageCount,
        resultCode: saved?.code ?? null,
        cached: false,
      };
      return c.json(response);
    } catch (error) {
      console.error('[Extract] Extraction error:', error);
      const { status, body } = toErrorResponse(error);
      return c.json(body, status);
    }
  });

  return extractRoutes;
};
