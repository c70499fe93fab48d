import type { MatriculaRecord } from '@rgi-reader/shared';

/**
 * Missing or invalid settings (e.g., no API key)
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The input could not be opened or rasterized
 */
export class PdfRenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PdfRenderError';
  }
}

export class ExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

/**
 * A batch failed (after the light retry, where one applied)
 * `partial` holds the record merged from the batches that completed.
 */
export class BatchExtractionError extends ExtractionError {
  readonly batch: number;
  readonly totalBatches: number;
  readonly payloadTooLarge: boolean;
  readonly partial: MatriculaRecord;

  constructor(args: {
    batch: number;
    totalBatches: number;
    payloadTooLarge: boolean;
    cause: unknown;
    partial: MatriculaRecord;
  }) {
    const reason = args.cause instanceof Error ? args.cause.message : String(args.cause);
    super(`Batch ${args.batch}/${args.totalBatches} failed: ${reason}`, { cause: args.cause });
    this.name = 'BatchExtractionError';
    this.batch = args.batch;
    this.totalBatches = args.totalBatches;
    this.payloadTooLarge = args.payloadTooLarge;
    this.partial = args.partial;
  }
}
