/**
 * Audit data stored next to a summary.
 *
 * `truncated` is true when the extracted text was longer than the model's
 * input window and only its longest fitting prefix was sent.
 */
export interface SummaryMetadata {
  modelId: string;
  maxTokens: number;
  truncated: boolean;
  /** Length of the extracted text, in UTF-16 code units */
  originalChars: number;
  /** Length of the text actually sent to the model */
  inputChars: number;
  /** ISO 8601 UTC */
  generatedAt: string;
}
