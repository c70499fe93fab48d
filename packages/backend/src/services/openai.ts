import OpenAI from 'openai';
import type { MatriculaRecord } from '@rgi-reader/shared';
import type { ImageProfile, PageImage, PageSource } from '@rgi-reader/backend/types';
import { getDefaultModel, getOpenAIConfig } from '@rgi-reader/backend/config/env';
import {
  LIGHT_PROFILE,
  PAGES_PER_BATCH,
  STANDARD_PROFILE,
  TEMPERATURE_MODEL_FAMILY,
} from '@rgi-reader/backend/config/extraction';
import { buildBatchContent } from '@rgi-reader/backend/prompts/matricula';
import { MATRICULA_SCHEMA_NAME, matriculaSchema } from '@rgi-reader/backend/schemas/matricula.schema';
import {
  coerceFragment,
  createEmptyRecord,
  finalizeRecord,
  isRecord,
  mergeFragment,
  type MatriculaFragment,
} from '@rgi-reader/backend/services/merge';
import { chunk } from '@rgi-reader/backend/utils/batch';
import { BatchExtractionError, ExtractionError, PdfRenderError } from '@rgi-reader/backend/errors';

type CompletionParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;
type MessageContent = OpenAI.Chat.Completions.ChatCompletionContentPart[];

/**
 * Subset of a chat completion response read by the extractor
 */
export interface ChatCompletionResult {
  choices: Array<{
    message: { content: string | null; refusal?: string | null };
    finish_reason?: string | null;
  }>;
}

/**
 * Subset of the OpenAI client used here, so tests can pass a stand-in
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create: (params: CompletionParams) => Promise<ChatCompletionResult>;
    };
  };
}

export interface BatchProgress {
  batch: number;
  totalBatches: number;
  pagesProcessed: number;
  totalPages: number;
}

/**
 * Options for page extraction
 */
export interface ExtractOptions {
  client?: ChatCompletionsClient;
  model?: string;
  /** Pages per request (default: PAGES_PER_BATCH) */
  batchSize?: number;
  onBatchComplete?: (progress: BatchProgress) => void;
}

const SIZE_ERROR_PATTERN =
  /too large|request entity|exceeds? (the )?(maximum|max|size|limit)|size limit/i;

/**
 * Create OpenAI client from environment variables
 */
export const createOpenAIClient = (): ChatCompletionsClient => {
  const { apiKey, baseURL } = getOpenAIConfig();
  return new OpenAI({ apiKey, baseURL });
};

/**
 * Only the gpt-4o family takes an explicit temperature; newer models reject it
 */
export const usesTemperature = (model: string): boolean =>
  model.toLowerCase().includes(TEMPERATURE_MODEL_FAMILY);

/**
 * Check whether an API failure was caused by the request size
 */
export const isPayloadTooLargeError = (error: unknown): boolean => {
  if (typeof error === 'object' && error !== null && 'status' in error && error.status === 413) {
    return true;
  }
  return error instanceof Error && SIZE_ERROR_PATTERN.test(error.message);
};

/**
 * Build chat completion parameters for one batch
 */
export const buildCompletionParams = (model: string, content: MessageContent): CompletionParams => {
  const params: CompletionParams = {
    model,
    messages: [{ role: 'user', content }],
    response_format: {
      type: 'json_schema',
      json_schema: {
        name: MATRICULA_SCHEMA_NAME,
        schema: matriculaSchema,
        strict: false,
      },
    },
  };

  if (usesTemperature(model)) {
    params.temperature = 0;
  }

  return params;
};

/**
 * Parse the model's answer for a batch into a fragment
 */
export const parseBatchResponse = (response: ChatCompletionResult, batchNumber: number): MatriculaFragment => {
  const choice = response.choices[0];
  const responseText = choice?.message.content;

  if (!responseText) {
    console.error(
      '[OpenAI] Response structure:',
      JSON.stringify({
        finish_reason: choice?.finish_reason,
        refusal: choice?.message.refusal,
      }),
    );
    throw new ExtractionError(
      `Empty response from AI model for batch ${batchNumber} (finish_reason: ${choice?.finish_reason})`,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(responseText);
  } catch (error) {
    throw new ExtractionError(`AI model returned invalid JSON for batch ${batchNumber}`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ExtractionError(`AI model returned a non-object JSON value for batch ${batchNumber}`);
  }

  return coerceFragment(parsed);
};

const renderBatch = (pages: PageSource, indices: number[], profile: ImageProfile): PageImage[] =>
  indices.map((index) => ({
    pageNumber: index + 1,
    url: pages.renderPage(index, profile),
  }));

const requestBatch = async (
  client: ChatCompletionsClient,
  model: string,
  images: PageImage[],
  batchNumber: number,
): Promise<MatriculaFragment> => {
  const response = await client.chat.completions.create(buildCompletionParams(model, buildBatchContent(images)));
  return parseBatchResponse(response, batchNumber);
};

/**
 * Send one batch, retrying once with the light profile when the payload is too large
 */
const extractBatch = async (
  client: ChatCompletionsClient,
  model: string,
  pages: PageSource,
  indices: number[],
  batchNumber: number,
): Promise<MatriculaFragment> => {
  try {
    return await requestBatch(client, model, renderBatch(pages, indices, STANDARD_PROFILE), batchNumber);
  } catch (error) {
    if (!isPayloadTooLargeError(error)) {
      throw error;
    }

    console.log(`[OpenAI] Batch ${batchNumber} too large, retrying with ${LIGHT_PROFILE.name} profile`);
    return await requestBatch(client, model, renderBatch(pages, indices, LIGHT_PROFILE), batchNumber);
  }
};

/**
 * Extract a registry record from rendered pages
 *
 * Pages are sent in batches, in order, and the partial results merged.
 * A document without pages yields the empty record without any API call.
 *
 * @param pages - Rasterized document
 * @param options - Client, model and batching options
 * @returns Merged and normalized record
 */
export const extractFromPages = async (
  pages: PageSource,
  options: ExtractOptions = {},
): Promise<MatriculaRecord> => {
  if (pages.pageCount === 0) {
    console.log('[OpenAI] Document has no pages, skipping extraction');
    return createEmptyRecord();
  }

  const model = options.model ?? getDefaultModel();
  const client = options.client ?? createOpenAIClient();
  const pageIndices = Array.from({ length: pages.pageCount }, (_, i) => i);
  const batches = chunk(pageIndices, options.batchSize ?? PAGES_PER_BATCH);

  console.log(`[OpenAI] Extracting ${pages.pageCount} page(s) in ${batches.length} batch(es) with model: ${model}`);

  let record = createEmptyRecord();
  let pagesProcessed = 0;

  for (const [i, indices] of batches.entries()) {
    const batchNumber = i + 1;

    let fragment: MatriculaFragment;
    try {
      fragment = await extractBatch(client, model, pages, indices, batchNumber);
    } catch (error) {
      if (error instanceof PdfRenderError) {
        throw error;
      }

      console.error(`[OpenAI] Batch ${batchNumber}/${batches.length} failed:`, error);
      throw new BatchExtractionError({
        batch: batchNumber,
        totalBatches: batches.length,
        payloadTooLarge: isPayloadTooLargeError(error),
        cause: error,
        partial: finalizeRecord(record, pagesProcessed),
      });
    }

    record = mergeFragment(record, fragment);
    pagesProcessed += indices.length;

    console.log(
      `[OpenAI] Batch ${batchNumber}/${batches.length} done (pages ${indices[0] + 1}-${indices[indices.length - 1] + 1})`,
    );
    options.onBatchComplete?.({
      batch: batchNumber,
      totalBatches: batches.length,
      pagesProcessed,
      totalPages: pages.pageCount,
    });
  }

  return finalizeRecord(record, pagesProcessed);
};
