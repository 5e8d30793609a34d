const WORD_PATTERN = /[a-z0-9']+/g;

/**
 * Lowercase word tokens of `text` as a set.
 * Punctuation and most symbols act as separators; apostrophes stay inside tokens
 * ("don't" -> "don't").
 */
export function tokenize(text: unknown): Set<string> {
  if (typeof text !== "string" || !text) return new Set();
  // matchAll clones the regex, so lastIndex never leaks between calls
  return new Set(Array.from(text.toLowerCase().matchAll(WORD_PATTERN), m => m[0]));
}

const TERM_PATTERN = /\w+/g;

/**
 * Term-frequency counts over `\w+` runs. Case is kept as given.
 */
export function termFrequencies(text: unknown): Map<string, number> {
  const counts = new Map<string, number>();
  if (typeof text !== "string" || !text) return counts;
  for (const m of text.matchAll(TERM_PATTERN)) {
    counts.set(m[0], (counts.get(m[0]) ?? 0) + 1);
  }
  return counts;
}
