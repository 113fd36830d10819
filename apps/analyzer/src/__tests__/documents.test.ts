import { beforeEach, describe, expect, it, vi } from 'vitest';

const { pdfParseMock } = vi.hoisted(() => ({
  pdfParseMock: vi.fn()
}));

vi.mock('pdf-parse', () => ({
  default: pdfParseMock
}));

import { extractDocumentText, UnsupportedDocumentError } from '../documents';

describe('extractDocumentText', () => {
  beforeEach(() => {
    pdfParseMock.mockReset();
  });

  it('reads PDF text through pdf-parse', async () => {
    pdfParseMock.mockResolvedValueOnce({ text: '\n  Section 4.2 Relief devices \n' });
    const buffer = Buffer.from('%PDF-1.4');

    await expect(extractDocumentText(buffer, 'API-520.PDF')).resolves.toBe('Section 4.2 Relief devices');
    expect(pdfParseMock).toHaveBeenCalledWith(buffer);
  });

  it('decodes plain text files as UTF-8', async () => {
    await expect(extractDocumentText(Buffer.from(' Ø 50 mm drain \n', 'utf-8'), 'notes.txt')).resolves.toBe(
      'Ø 50 mm drain'
    );
    expect(pdfParseMock).not.toHaveBeenCalled();
  });

  it('rejects other extensions', async () => {
    const failure = extractDocumentText(Buffer.from('x'), 'sheet.xlsx');

    await expect(failure).rejects.toBeInstanceOf(UnsupportedDocumentError);
    await expect(failure).rejects.toMatchObject({ filename: 'sheet.xlsx', extension: '.xlsx' });
  });

  it('rejects files without extractable text', async () => {
    pdfParseMock.mockResolvedValueOnce({ text: '   ' });

    await expect(extractDocumentText(Buffer.from('%PDF-1.4'), 'scan.pdf')).rejects.toThrow(
      'Text extraction produced empty text for scan.pdf'
    );
  });
});
