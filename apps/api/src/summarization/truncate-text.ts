export interface TruncatedText {
  text: string;
  truncated: boolean;
}

/**
 * Longest prefix of `text` no longer than `maxChars` UTF-16 code units.
 * Never ends on the high half of a surrogate pair.
 */
export function truncateToFit(text: string, maxChars: number): TruncatedText {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }

  let end = Math.max(0, maxChars);
  const last = text.charCodeAt(end - 1);
  if (end > 0 && last >= 0xd800 && last <= 0xdbff) {
    end -= 1;
  }

  return { text: text.slice(0, end), truncated: true };
}
