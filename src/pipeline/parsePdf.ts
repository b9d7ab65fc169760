import fs from 'node:fs/promises';
import pdfParse from 'pdf-parse';

import { createLogger, describeError, Logger } from '../util/logger';

export type ParsedPdf = {
  text: string;
  pages: number;
};

/** Reads a document's text by path; null when it cannot be read. */
export type DocumentTextReader = (filePath: string) => Promise<string | null>;

export const parsePdf = async (filePath: string): Promise<ParsedPdf> => {
  const fileBuffer = await fs.readFile(filePath);
  const result = await pdfParse(fileBuffer);

  const text = (result.text ?? '').trim();
  const pages = typeof result.numpages === 'number' ? Math.max(0, Math.trunc(result.numpages)) : 0;

  return {
    text,
    pages,
  };
};

export const createPdfTextReader = (logger: Logger = createLogger('pdf-reader')): DocumentTextReader =>
  async (filePath) => {
    try {
      const { text, pages } = await parsePdf(filePath);
      logger.info(`Read ${pages} page(s) from ${filePath}.`);
      return text || null;
    } catch (error) {
      logger.error(`Failed to read or parse PDF '${filePath}': ${describeError(error)}`);
      return null;
    }
  };
