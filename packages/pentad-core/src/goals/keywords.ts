// Short entries never reach the lookup; only 'with' survives the length cut
const STOP_WORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by',
]);

const WORD_PATTERN = /\b[a-zA-Z]+\b/g;

/**
 * Lower-cased alphabetic tokens longer than 3 characters, minus stop words
 */
export function extractKeywords(text: string): Set<string> {
  const keywords = new Set<string>();
  for (const match of text.matchAll(WORD_PATTERN)) {
    const word = match[0].toLowerCase();
    if (word.length > 3 && !STOP_WORDS.has(word)) {
      keywords.add(word);
    }
  }
  return keywords;
}
