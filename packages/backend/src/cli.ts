import 'dotenv/config';
import { readFile, writeFile } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import type { MatriculaRecord } from '@rgi-reader/shared';
import type { PageSource } from '@rgi-reader/backend/types';
import { getDefaultModel, getSupportedModels } from '@rgi-reader/backend/config/env';
import { DPI_RANGE } from '@rgi-reader/backend/config/extraction';
import { concatPageSources, openRasterDocument } from '@rgi-reader/backend/services/pdf';
import { extractFromPages } from '@rgi-reader/backend/services/openai';

const USAGE = `Usage: npm run extract -- <file.pdf | page images...> [--model <model>] [--dpi <dpi>] [--out <path|->]

  --model  One of: ${getSupportedModels().join(', ')} (default: ${getDefaultModel()})
  --dpi    Rasterization DPI, ${DPI_RANGE.min}-${DPI_RANGE.max} (default: ${DPI_RANGE.default})
  --out    Output JSON path, "-" for stdout (default: -)`;

const MIME_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

export interface CliOptions {
  files: string[];
  model: string;
  dpi: number;
  out: string;
}

/**
 * Resolve the MIME type of an input file from its extension
 */
export const detectMimeType = (path: string): string | null =>
  MIME_TYPES[extname(path).toLowerCase()] ?? null;

/**
 * Parse command line arguments
 * Image inputs are ordered by file name so "page-01.png, page-02.png" read in order.
 */
export const parseCliArgs = (argv: string[]): CliOptions => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      model: { type: 'string' },
      dpi: { type: 'string' },
      out: { type: 'string', default: '-' },
    },
  });

  if (positionals.length === 0) {
    throw new Error(`No input files given\n\n${USAGE}`);
  }

  for (const file of positionals) {
    if (!detectMimeType(file)) {
      throw new Error(`Unsupported input file: ${file} (expected .pdf, .png, .jpg or .jpeg)`);
    }
  }

  const pdfs = positionals.filter((file) => detectMimeType(file) === 'application/pdf');
  const images = positionals.filter((file) => detectMimeType(file) !== 'application/pdf');
  if (pdfs.length > 0 && images.length > 0) {
    throw new Error('Pass either one PDF or a set of page images, not both');
  }
  if (pdfs.length > 1) {
    throw new Error('Only one PDF can be processed at a time');
  }

  const model = values.model ?? getDefaultModel();
  if (!getSupportedModels().includes(model)) {
    throw new Error(`Unsupported model: ${model}\n\n${USAGE}`);
  }

  const dpi = values.dpi === undefined ? DPI_RANGE.default : Number(values.dpi);
  if (!Number.isInteger(dpi) || dpi < DPI_RANGE.min || dpi > DPI_RANGE.max) {
    throw new Error(`Invalid DPI: ${values.dpi} (expected an integer between ${DPI_RANGE.min} and ${DPI_RANGE.max})`);
  }

  const files = pdfs.length > 0 ? pdfs : [...images].sort((a, b) => basename(a).localeCompare(basename(b)));

  return { files, model, dpi, out: values.out ?? '-' };
};

const run = async (options: CliOptions): Promise<MatriculaRecord> => {
  const sources: PageSource[] = [];
  for (const file of options.files) {
    const buffer = await readFile(file);
    const mimeType = detectMimeType(file) ?? undefined;
    sources.push(openRasterDocument(new Uint8Array(buffer), { dpi: options.dpi, mimeType }));
  }
  const pages = sources.length === 1 ? sources[0] : concatPageSources(sources);

  console.error(`[CLI] Extracting ${pages.pageCount} page(s) with ${options.model} at ${options.dpi} DPI`);

  return extractFromPages(pages, {
    model: options.model,
    onBatchComplete: ({ batch, totalBatches, pagesProcessed, totalPages }) => {
      console.error(`[CLI] Batch ${batch}/${totalBatches} done (${pagesProcessed}/${totalPages} pages)`);
    },
  });
};

const main = async (): Promise<void> => {
  const options = parseCliArgs(process.argv.slice(2));
  const record = await run(options);
  const json = JSON.stringify(record, null, 2);

  if (options.out === '-') {
    process.stdout.write(`${json}\n`);
    return;
  }

  await writeFile(options.out, `${json}\n`, 'utf8');
  console.error(`[CLI] Wrote ${options.out}`);
};

if (process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1])) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
