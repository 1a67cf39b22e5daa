/** Max length of the sanitized file name suffix in the key */
const MAX_FILENAME_LENGTH = 100;

/**
 * Builds the locator for a document's bytes.
 *
 * Pattern:  documents/{documentId}/{sanitized-filename}
 * Example:  documents/f3a2b1c0-…/my_report.pdf
 */
export function buildStorageKey(documentId: string, fileName: string): string {
  return `documents/${documentId}/${sanitizeFileName(fileName)}`;
}

/**
 * Replaces anything outside [a-zA-Z0-9._-] with "_", lower-cases and
 * truncates. A name reduced to dots only becomes "file".
 */
export function sanitizeFileName(fileName: string): string {
  const sanitized = fileName
    .replace(/[^a-zA-Z0-9._-]/g, '_')
    .slice(0, MAX_FILENAME_LENGTH)
    .toLowerCase();
  return /^\.*$/.test(sanitized) ? 'file' : sanitized;
}
