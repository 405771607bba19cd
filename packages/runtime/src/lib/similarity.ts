/**
 * Lower-cased whitespace-split word set. Punctuation stays attached to its word.
 */
export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(word => word.length > 0));
}

/**
 * Jaccard similarity of two word sets; 0 when either side is empty.
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }

  let shared = 0;
  for (const word of a) {
    if (b.has(word)) {
      shared++;
    }
  }

  return shared / (a.size + b.size - shared);
}

export function textSimilarity(left: string, right: string): number {
  return jaccard(tokenize(left), tokenize(right));
}
