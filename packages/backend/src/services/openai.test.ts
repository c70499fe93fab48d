import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ImageProfile, PageSource } from '@rgi-reader/backend/types';
import { BatchExtractionError, ExtractionError, PdfRenderError } from '@rgi-reader/backend/errors';
import { createEmptyRecord } from './merge';
import {
  buildCompletionParams,
  extractFromPages,
  isPayloadTooLargeError,
  parseBatchResponse,
  usesTemperature,
  type ChatCompletionResult,
  type ChatCompletionsClient,
} from './openai';

type CompletionParams = Parameters<ChatCompletionsClient['chat']['completions']['create']>[0];

const reply = (body: unknown): ChatCompletionResult => ({
  choices: [{ message: { content: JSON.stringify(body) }, finish_reason: 'stop' }],
});

/**
 * Page labels and image URLs sent in one request
 */
const sentParts = (params: CompletionParams): string[] => {
  const [message] = params.messages;
  const parts: string[] = [];
  if (!message || !Array.isArray(message.content)) {
    return parts;
  }

  for (const part of message.content) {
    if (part.type === 'image_url') {
      parts.push(part.image_url.url);
    } else if (part.type === 'text' && part.text.startsWith('Página')) {
      parts.push(part.text);
    }
  }
  return parts;
};

describe('usesTemperature', () => {
  it('matches the gpt-4o family only', () => {
    expect(usesTemperature('gpt-4o')).toBe(true);
    expect(usesTemperature('gpt-4o-mini')).toBe(true);
    expect(usesTemperature('GPT-4o-2024-08-06')).toBe(true);
    expect(usesTemperature('gpt-5')).toBe(false);
    expect(usesTemperature('gpt-5-mini')).toBe(false);
  });
});

describe('buildCompletionParams', () => {
  it('sets temperature 0 for gpt-4o models', () => {
    const params = buildCompletionParams('gpt-4o-mini', []);
    expect(params.temperature).toBe(0);
    expect(params.model).toBe('gpt-4o-mini');
  });

  it('omits temperature for other models', () => {
    const params = buildCompletionParams('gpt-5', []);
    expect('temperature' in params).toBe(false);
  });

  it('requests the registry JSON schema', () => {
    const params = buildCompletionParams('gpt-4o', []);
    expect(params.response_format).toMatchObject({
      type: 'json_schema',
      json_schema: { name: 'rgi_schema', strict: false },
    });
  });
});

describe('isPayloadTooLargeError', () => {
  it('recognizes HTTP 413 and size messages', () => {
    expect(isPayloadTooLargeError(Object.assign(new Error('failed'), { status: 413 }))).toBe(true);
    expect(isPayloadTooLargeError(new Error('Request too large for gpt-4o'))).toBe(true);
    expect(isPayloadTooLargeError(new Error('Image exceeds the maximum allowed size'))).toBe(true);
  });

  it('ignores other failures', () => {
    expect(isPayloadTooLargeError(Object.assign(new Error('Rate limit reached'), { status: 429 }))).toBe(false);
    expect(isPayloadTooLargeError('too large')).toBe(false);
  });
});

describe('parseBatchResponse', () => {
  it('rejects an empty answer', () => {
    expect(() => parseBatchResponse({ choices: [{ message: { content: null }, finish_reason: 'length' }] }, 2)).toThrow(
      'Empty response from AI model for batch 2 (finish_reason: length)',
    );
  });

  it('rejects JSON that is not an object', () => {
    expect(() => parseBatchResponse({ choices: [{ message: { content: '[1, 2]' } }] }, 1)).toThrow(ExtractionError);
  });
});

describe('extractFromPages', () => {
  const create = vi.fn<ChatCompletionsClient['chat']['completions']['create']>();
  const client: ChatCompletionsClient = { chat: { completions: { create } } };
  const renderPage = vi.fn((index: number, profile: ImageProfile) => `page-${index}-${profile.name}`);

  const pagesOf = (pageCount: number): PageSource => ({ pageCount, renderPage });

  beforeEach(() => {
    vi.resetAllMocks();
    renderPage.mockImplementation((index: number, profile: ImageProfile) => `page-${index}-${profile.name}`);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('sends pages two at a time, in order, and merges the answers', async () => {
    create
      .mockResolvedValueOnce(
        reply({
          document_metadata: { matricula: '555' },
          registros: [{ numero: 'R-1', pessoas_envovidas: [{ nome: 'Ana', relacao: 'herdeira' }] }],
        }),
      )
      .mockResolvedValueOnce(reply({ registros: [{ numero: 'AV-2' }] }));

    const record = await extractFromPages(pagesOf(3), { client, model: 'gpt-4o' });

    expect(create).toHaveBeenCalledTimes(2);
    expect(sentParts(create.mock.calls[0][0])).toEqual(['Página 1:', 'page-0-standard', 'Página 2:', 'page-1-standard']);
    expect(sentParts(create.mock.calls[1][0])).toEqual(['Página 3:', 'page-2-standard']);
    expect(create.mock.calls[0][0].temperature).toBe(0);

    expect(record.document_metadata).toEqual({ matricula: '555', paginas_processadas: 3 });
    expect(record.registros).toEqual([
      { numero: 'R-1', pessoas_envolvidas: [{ nome: 'Ana', relacao: 'herdeira' }] },
      { numero: 'AV-2' },
    ]);
  });

  it('does not send temperature for gpt-5', async () => {
    create.mockResolvedValueOnce(reply({}));

    await extractFromPages(pagesOf(1), { client, model: 'gpt-5' });

    expect(create.mock.calls[0][0].model).toBe('gpt-5');
    expect('temperature' in create.mock.calls[0][0]).toBe(false);
  });

  it('returns the empty record without calling the API when there are no pages', async () => {
    const record = await extractFromPages(pagesOf(0), { client, model: 'gpt-4o' });

    expect(record).toEqual(createEmptyRecord());
    expect(create).not.toHaveBeenCalled();
    expect(renderPage).not.toHaveBeenCalled();
  });

  it('retries a too-large batch once with the light profile', async () => {
    create
      .mockRejectedValueOnce(Object.assign(new Error('Request Entity Too Large'), { status: 413 }))
      .mockResolvedValueOnce(reply({ proprietarios: [{ nome: 'Pedro' }] }));

    const record = await extractFromPages(pagesOf(2), { client, model: 'gpt-4o' });

    expect(create).toHaveBeenCalledTimes(2);
    expect(sentParts(create.mock.calls[1][0])).toEqual(['Página 1:', 'page-0-light', 'Página 2:', 'page-1-light']);
    expect(record.proprietarios).toEqual([{ nome: 'Pedro' }]);
    expect(record.document_metadata.paginas_processadas).toBe(2);
  });

  it('fails with payloadTooLarge when the light retry is also too large', async () => {
    create.mockRejectedValue(Object.assign(new Error('Request Entity Too Large'), { status: 413 }));

    const error = await extractFromPages(pagesOf(2), { client, model: 'gpt-4o' }).catch((e: unknown) => e);

    expect(create).toHaveBeenCalledTimes(2);
    expect(error).toBeInstanceOf(BatchExtractionError);
    expect(error).toHaveProperty('batch', 1);
    expect(error).toHaveProperty('payloadTooLarge', true);
  });

  it('does not retry other API failures', async () => {
    create.mockRejectedValueOnce(new Error('Internal server error'));

    const error = await extractFromPages(pagesOf(2), { client, model: 'gpt-4o' }).catch((e: unknown) => e);

    expect(create).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(BatchExtractionError);
    expect(error).toHaveProperty('payloadTooLarge', false);
    expect(error).toHaveProperty('message', 'Batch 1/1 failed: Internal server error');
  });

  it('keeps the record merged from earlier batches when a later one fails', async () => {
    create
      .mockResolvedValueOnce(reply({ proprietarios: [{ nome: 'João', cpf: '111.222.333-44' }] }))
      .mockRejectedValueOnce(new Error('upstream timeout'));

    const error = await extractFromPages(pagesOf(4), { client, model: 'gpt-4o' }).catch((e: unknown) => e);

    if (!(error instanceof BatchExtractionError)) {
      throw new Error('expected a BatchExtractionError');
    }
    expect(error.message).toBe('Batch 2/2 failed: upstream timeout');
    expect(error.partial.proprietarios).toEqual([{ nome: 'João', cpf: '11122233344' }]);
    expect(error.partial.document_metadata.paginas_processadas).toBe(2);
  });

  it('reports invalid JSON as a batch failure', async () => {
    create.mockResolvedValueOnce({ choices: [{ message: { content: 'not json' } }] });

    await expect(extractFromPages(pagesOf(1), { client, model: 'gpt-4o' })).rejects.toThrow(
      'Batch 1/1 failed: AI model returned invalid JSON for batch 1',
    );
  });

  it('passes render failures through unchanged', async () => {
    renderPage.mockImplementation(() => {
      throw new PdfRenderError('Failed to render page 1: broken stream');
    });

    const error = await extractFromPages(pagesOf(1), { client, model: 'gpt-4o' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PdfRenderError);
    expect(error).not.toBeInstanceOf(BatchExtractionError);
    expect(create).not.toHaveBeenCalled();
  });

  it('reports progress after each batch', async () => {
    create.mockResolvedValue(reply({}));
    const onBatchComplete = vi.fn();

    await extractFromPages(pagesOf(3), { client, model: 'gpt-4o', onBatchComplete });

    expect(onBatchComplete.mock.calls).toEqual([
      [{ batch: 1, totalBatches: 2, pagesProcessed: 2, totalPages: 3 }],
      [{ batch: 2, totalBatches: 2, pagesProcessed: 3, totalPages: 3 }],
    ]);
  });
});
