import { extname } from 'node:path';
import pdfParse from 'pdf-parse';

export class UnsupportedDocumentError extends Error {
  readonly filename: string;
  readonly extension: string;

  constructor(filename: string, extension: string) {
    super(`Unsupported reference document type "${extension || '(none)'}" for ${filename}; expected .pdf or .txt`);
    this.name = 'UnsupportedDocumentError';
    this.filename = filename;
    this.extension = extension;
  }
}

export const extractDocumentText = async (buffer: Buffer, filename: string): Promise<string> => {
  const extension = extname(filename).toLowerCase();
  let text: string;

  if (extension === '.pdf') {
    const parsed = await pdfParse(buffer);
    text = parsed.text.trim();
  } else if (extension === '.txt') {
    text = buffer.toString('utf-8').trim();
  } else {
    throw new UnsupportedDocumentError(filename, extension);
  }

  if (!text) {
    throw new Error(`Text extraction produced empty text for ${filename}`);
  }

  return text;
};
