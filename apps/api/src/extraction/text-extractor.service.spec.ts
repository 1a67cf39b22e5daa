import pdfParse from 'pdf-parse';
import { TextExtractorService } from './text-extractor.service';
import {
  CorruptInputException,
  EmptyResultException,
  UnsupportedFormatException,
} from './extraction.exceptions';

jest.mock('pdf-parse', () => jest.fn());

const pdfParseMock = jest.mocked(pdfParse);

function pdfResult(text: string, numpages: number): Awaited<ReturnType<typeof pdfParse>> {
  return {
    numpages,
    numrender: numpages,
    info: {},
    metadata: null,
    version: 'default',
    text,
  };
}

describe('TextExtractorService', () => {
  const extractor = new TextExtractorService();

  beforeEach(() => {
    pdfParseMock.mockReset();
  });

  it('returns the page text of a PDF in document order', async () => {
    pdfParseMock.mockResolvedValue(
      pdfResult('\n\nFirst page text.\n\nSecond page text.', 2),
    );
    const bytes = Buffer.from('%PDF-1.4 two pages');

    const text = await extractor.extract(bytes, 'application/pdf');

    expect(text).toBe('\n\nFirst page text.\n\nSecond page text.');
    expect(pdfParseMock).toHaveBeenCalledWith(bytes);
  });

  it('decodes plain text and ignores content-type parameters', async () => {
    const text = await extractor.extract(
      Buffer.from('Grüße aus Köln', 'utf8'),
      'Text/Plain; charset=UTF-8',
    );

    expect(text).toBe('Grüße aus Köln');
  });

  it('rejects unsupported content types', async () => {
    await expect(
      extractor.extract(Buffer.from([1, 2, 3]), 'application/octet-stream'),
    ).rejects.toThrow(
      'Unsupported format: content type "application/octet-stream" cannot be extracted (supported: application/pdf, text/plain, text/markdown)',
    );
  });

  it('reports unparseable PDF bytes as corrupt input', async () => {
    pdfParseMock.mockRejectedValue(new Error('Invalid PDF structure'));

    const attempt = extractor.extract(Buffer.from('garbage'), 'application/pdf');

    await expect(attempt).rejects.toBeInstanceOf(CorruptInputException);
    await expect(attempt).rejects.toThrow(
      'Corrupt input: could not parse application/pdf content (Invalid PDF structure)',
    );
  });

  it('reports invalid UTF-8 as corrupt input', async () => {
    await expect(
      extractor.extract(Buffer.from([0x68, 0x69, 0xc3, 0x28]), 'text/plain'),
    ).rejects.toBeInstanceOf(CorruptInputException);
  });

  it('treats whitespace-only output as an empty result', async () => {
    pdfParseMock.mockResolvedValue(pdfResult('\n\n  \n', 3));

    await expect(
      extractor.extract(Buffer.from('%PDF-1.4 scanned'), 'application/pdf'),
    ).rejects.toBeInstanceOf(EmptyResultException);
  });

  it('rejects an image as a non-retryable unsupported format', async () => {
    const failure = await extractor
      .extract(Buffer.from([0x89, 0x50, 0x4e, 0x47]), 'image/png')
      .then(
        () => null,
        (error: unknown) => error,
      );

    expect(failure).toBeInstanceOf(UnsupportedFormatException);
    expect(failure).toMatchObject({ code: 'UNSUPPORTED_FORMAT', retryable: false });
  });
});
