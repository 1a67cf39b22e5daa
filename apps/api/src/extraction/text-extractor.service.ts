import { Injectable, Logger } from '@nestjs/common';
import pdfParse from 'pdf-parse';
import {
  CorruptInputException,
  EmptyResultException,
  UnsupportedFormatException,
} from './extraction.exceptions';

type Extractor = (bytes: Buffer) => Promise<string>;

/**
 * pdf-parse joins pages in document order, separated by blank lines.
 */
async function extractPdf(bytes: Buffer): Promise<string> {
  const result = await pdfParse(bytes);
  return result.text;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

async function extractUtf8Text(bytes: Buffer): Promise<string> {
  return utf8.decode(bytes);
}

/** Content types with an extractor, keyed by bare lower-case MIME type */
const EXTRACTORS: ReadonlyMap<string, Extractor> = new Map([
  ['application/pdf', extractPdf],
  ['text/plain', extractUtf8Text],
  ['text/markdown', extractUtf8Text],
]);

export const SUPPORTED_CONTENT_TYPES: readonly string[] = [...EXTRACTORS.keys()];

/** "Text/Plain; charset=UTF-8" → "text/plain" */
export function normalizeContentType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

/**
 * TextExtractorService — turns stored document bytes into plain text.
 *
 * Returns the raw extracted text; no de-hyphenation or layout cleanup.
 * Whitespace-only output counts as a failure (EmptyResultException).
 */
@Injectable()
export class TextExtractorService {
  private readonly logger = new Logger(TextExtractorService.name);

  async extract(bytes: Buffer, contentType: string): Promise<string> {
    const mimeType = normalizeContentType(contentType);
    const extractor = EXTRACTORS.get(mimeType);

    if (!extractor) {
      throw new UnsupportedFormatException(contentType, SUPPORTED_CONTENT_TYPES);
    }

    let text: string;
    try {
      text = await extractor(bytes);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`Extraction of ${mimeType} failed: ${cause.message}`);
      throw new CorruptInputException(mimeType, cause);
    }

    if (text.trim().length === 0) {
      throw new EmptyResultException(mimeType);
    }

    this.logger.debug(
      `Extracted ${text.length} characters from ${bytes.length} bytes of ${mimeType}`,
    );
    return text;
  }
}
