import * as mupdf from 'mupdf';
import type { ImageProfile, PageSource, RasterOptions } from '@rgi-reader/backend/types';
import { PdfRenderError } from '@rgi-reader/backend/errors';

/**
 * PDF user space unit: 1 point = 1/72 inch
 */
const POINTS_PER_INCH = 72;

/**
 * Compute the render scale for a page
 *
 * Starts from the DPI and lowers it when the page would come out wider
 * than the profile allows.
 *
 * @param pageWidthPt - Page width in PDF points
 * @param dpi - Requested rasterization resolution
 * @param maxWidth - Maximum output width in pixels
 */
export const computeRenderScale = (pageWidthPt: number, dpi: number, maxWidth: number): number => {
  const scale = dpi / POINTS_PER_INCH;
  if (pageWidthPt <= 0 || pageWidthPt * scale <= maxWidth) {
    return scale;
  }
  return maxWidth / pageWidthPt;
};

/**
 * Render one page to a base64 JPEG data URL
 */
const renderPageToJpeg = (
  doc: mupdf.Document,
  index: number,
  dpi: number,
  profile: ImageProfile,
): string => {
  const page = doc.loadPage(index);
  const [x0, , x1] = page.getBounds();
  const scale = computeRenderScale(x1 - x0, dpi, profile.maxWidth);

  const pixmap = page.toPixmap(mupdf.Matrix.scale(scale, scale), mupdf.ColorSpace.DeviceRGB, false);
  const jpeg = pixmap.asJPEG(profile.quality, false);
  return `data:image/jpeg;base64,${Buffer.from(jpeg).toString('base64')}`;
};

const openDocument = (
  buffer: ArrayBuffer | Uint8Array,
  mimeType: string,
): { doc: mupdf.Document; pageCount: number } => {
  try {
    const doc = mupdf.Document.openDocument(buffer, mimeType);
    return { doc, pageCount: doc.countPages() };
  } catch (error) {
    throw new PdfRenderError(
      `Could not open ${mimeType} document: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
};

/**
 * Open a PDF (or a single page image) for rasterization
 *
 * Pages are rendered lazily so that a failed batch can be re-encoded
 * with a lighter profile without re-opening the document.
 *
 * @param buffer - File content
 * @param options - DPI and MIME type
 * @returns Page source backed by the opened document
 */
export const openRasterDocument = (buffer: ArrayBuffer | Uint8Array, options: RasterOptions): PageSource => {
  const mimeType = options.mimeType ?? 'application/pdf';

  const { doc, pageCount } = openDocument(buffer, mimeType);

  console.log(`[PDF] Opened ${mimeType} document with ${pageCount} page(s) at ${options.dpi} DPI`);

  return {
    pageCount,
    renderPage: (index, profile) => {
      if (index < 0 || index >= pageCount) {
        throw new PdfRenderError(`Page index ${index} out of range (document has ${pageCount} pages)`);
      }

      try {
        return renderPageToJpeg(doc, index, options.dpi, profile);
      } catch (error) {
        throw new PdfRenderError(
          `Failed to render page ${index + 1}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    },
  };
};

/**
 * Join several page sources into one, keeping their order
 * Used when a registry is supplied as individual page images.
 */
export const concatPageSources = (sources: PageSource[]): PageSource => {
  const offsets: number[] = [];
  let total = 0;
  for (const source of sources) {
    offsets.push(total);
    total += source.pageCount;
  }

  return {
    pageCount: total,
    renderPage: (index, profile) => {
      for (let i = sources.length - 1; i >= 0; i--) {
        if (index >= offsets[i] && index < offsets[i] + sources[i].pageCount) {
          return sources[i].renderPage(index - offsets[i], profile);
        }
      }
      throw new PdfRenderError(`Page index ${index} out of range (document has ${total} pages)`);
    },
  };
};
