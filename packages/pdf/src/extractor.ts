/**
 * PdfTextExtractor - extract the text layer of a local PDF
 */

import { readFile } from 'fs/promises';
import { createRequire } from 'module';
import { pino } from 'pino';
import type PdfParse from 'pdf-parse';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

// pdf-parse's entry point runs a self-test when it has no parent CommonJS
// module, which is the case under an ESM import. Loading it through
// require gives it one.
const require = createRequire(import.meta.url);

type PdfParseFn = typeof PdfParse;

let pdfParse: PdfParseFn | undefined;

function loadPdfParse(): PdfParseFn {
  if (!pdfParse) {
    const loaded: PdfParseFn = require('pdf-parse');
    pdfParse = loaded;
  }
  return pdfParse;
}

export interface PdfExtractionResult {
  text: string;
  pageCount: number;
  title?: string; // document info Title, when the PDF sets one
}

export type PdfParser = (data: Buffer) => Promise<{ text: string; numpages: number; info?: unknown }>;

function infoTitle(info: unknown): string | undefined {
  if (typeof info !== 'object' || info === null || !('Title' in info)) {
    return undefined;
  }
  return typeof info.Title === 'string' && info.Title.trim() ? info.Title.trim() : undefined;
}

export class PdfTextExtractor {
  private readonly parse: PdfParser;

  constructor(parser?: PdfParser) {
    this.parse = parser ?? ((data: Buffer) => loadPdfParse()(data));
  }

  /**
   * Extract text from a PDF file. Unreadable or text-less files yield empty text.
   */
  async extract(path: string): Promise<PdfExtractionResult> {
    let data: Buffer;
    try {
      data = await readFile(path);
    } catch (error: unknown) {
      logger.error(
        { event: 'pdf.read.fail', path, error: error instanceof Error ? error.message : String(error) },
        'Could not read PDF file'
      );
      return { text: '', pageCount: 0 };
    }

    try {
      const result = await this.parse(data);
      const text = result.text.trim();
      logger.info(
        { event: 'pdf.extract.success', path, pageCount: result.numpages, textLength: text.length },
        'Extracted PDF text'
      );
      return { text, pageCount: result.numpages, title: infoTitle(result.info) };
    } catch (error: unknown) {
      logger.error(
        { event: 'pdf.extract.fail', path, error: error instanceof Error ? error.message : String(error) },
        'PDF text extraction failed'
      );
      return { text: '', pageCount: 0 };
    }
  }
}
