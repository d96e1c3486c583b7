const STOPWORDS = new Set([
  'a',
  'an',
  'the',
  'and',
  'or',
  'but',
  'so',
  'if',
  'to',
  'for',
  'of',
  'in',
  'on',
  'at',
  'by',
  'with',
  'about',
  'from',
  'into',
  'is',
  'are',
  'am',
  'was',
  'were',
  'be',
  'been',
  'it',
  'its',
  'this',
  'that',
  'i',
  'me',
  'my',
  'we',
  'our',
  'us',
  'you',
  'your',
  'do',
  'does',
  'can',
  'please',
]);

const WORD_REGEX = /[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*/gu;

/** Lowercase, trim and collapse internal whitespace. */
export function normalizeUtterance(text: string): string {
  return text.toLowerCase().trim().replace(/\s+/g, ' ');
}

/** Words in order, punctuation dropped. */
export function toWords(text: string): string[] {
  return text.toLowerCase().match(WORD_REGEX) ?? [];
}

/** Distinct content-bearing tokens: stopwords and single characters removed. */
export function contentTokens(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const word of toWords(text)) {
    if (word.length <= 1 || STOPWORDS.has(word)) continue;
    tokens.add(word);
  }
  return tokens;
}

/** Sørensen–Dice coefficient over token sets, in [0, 1]. */
export function diceCoefficient(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const token of a) {
    if (b.has(token)) shared++;
  }
  return (2 * shared) / (a.size + b.size);
}

export function jaccardIndex(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let shared = 0;
  for (const item of a) {
    if (b.has(item)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

/** Levenshtein distance, two-row variant. */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      const insertion = (current[j - 1] ?? 0) + 1;
      const deletion = (previous[j] ?? 0) + 1;
      current[j] = Math.min(substitution, insertion, deletion);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length] ?? 0;
}

/** True when `phrase` occurs in `words` as a contiguous whole-word run. */
export function containsPhrase(words: readonly string[], phrase: readonly string[]): boolean {
  if (phrase.length === 0 || phrase.length > words.length) return false;
  outer: for (let start = 0; start <= words.length - phrase.length; start++) {
    for (let offset = 0; offset < phrase.length; offset++) {
      if (words[start + offset] !== phrase[offset]) continue outer;
    }
    return true;
  }
  return false;
}

export function roundScore(value: number): number {
  return Math.round(value * 1000) / 1000;
}
