const EDGE_PUNCTUATION = /^[\s!.?,:;_-]+|[\s!.?,:;_-]+$/g;

/**
 * Normalize a free-text reply for exact and keyword matching:
 * lower-cased, trimmed, edge punctuation removed.
 */
export function canonicalizeReply(text: string): string {
  return text.toLowerCase().trim().replace(EDGE_PUNCTUATION, '');
}

/** True when the canonical reply equals one of the options. */
export function replyMatches(text: string, options: readonly string[]): boolean {
  const canonical = canonicalizeReply(text);
  return options.some((option) => canonicalizeReply(option) === canonical);
}
