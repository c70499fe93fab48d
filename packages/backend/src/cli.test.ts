import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { detectMimeType, parseCliArgs } from './cli';

describe('cli', () => {
  let savedModel: string | undefined;

  beforeEach(() => {
    savedModel = process.env.OPENAI_MODEL;
    delete process.env.OPENAI_MODEL;
  });

  afterEach(() => {
    if (savedModel === undefined) {
      delete process.env.OPENAI_MODEL;
    } else {
      process.env.OPENAI_MODEL = savedModel;
    }
  });

  describe('detectMimeType', () => {
    it('maps known extensions case-insensitively', () => {
      expect(detectMimeType('docs/matricula.PDF')).toBe('application/pdf');
      expect(detectMimeType('page-01.jpeg')).toBe('image/jpeg');
      expect(detectMimeType('page-01.png')).toBe('image/png');
      expect(detectMimeType('notes.txt')).toBeNull();
    });
  });

  describe('parseCliArgs', () => {
    it('applies defaults for a single PDF', () => {
      expect(parseCliArgs(['matricula.pdf'])).toEqual({
        files: ['matricula.pdf'],
        model: 'gpt-4o',
        dpi: 240,
        out: '-',
      });
    });

    it('reads model, DPI and output path', () => {
      expect(parseCliArgs(['matricula.pdf', '--model', 'gpt-5-mini', '--dpi', '180', '--out', 'out.json'])).toEqual({
        files: ['matricula.pdf'],
        model: 'gpt-5-mini',
        dpi: 180,
        out: 'out.json',
      });
    });

    it('orders page images by file name', () => {
      expect(parseCliArgs(['scans/page-03.png', 'scans/page-01.jpg', 'scans/page-02.png']).files).toEqual([
        'scans/page-01.jpg',
        'scans/page-02.png',
        'scans/page-03.png',
      ]);
    });

    it('rejects bad input', () => {
      expect(() => parseCliArgs([])).toThrow('No input files given');
      expect(() => parseCliArgs(['notes.txt'])).toThrow('Unsupported input file: notes.txt');
      expect(() => parseCliArgs(['a.pdf', 'b.png'])).toThrow('Pass either one PDF or a set of page images, not both');
      expect(() => parseCliArgs(['a.pdf', '--model', 'gpt-3.5-turbo'])).toThrow('Unsupported model: gpt-3.5-turbo');
      expect(() => parseCliArgs(['a.pdf', '--dpi', '301'])).toThrow('Invalid DPI: 301');
    });
  });
});
