const CJK_CHAR_REGEX = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]/u;
const WORD_TOKEN_REGEX = /[a-z0-9]+/g;
const REGEX_SPECIAL_CHARS = /[.*+?^${}()|[\]\\]/g;

export function normalizeText(input: string): string {
  return input
    .trim()
    .replace(/\r\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n');
}

/**
 * Approximate on-screen width: every non-ASCII code point counts 1, everything
 * else 0.5, floored.
 */
export function visualLength(text: string): number {
  let count = 0;
  for (const char of text) {
    count += charWidth(char);
  }
  return Math.floor(count);
}

export function charWidth(char: string): number {
  const codePoint = char.codePointAt(0) ?? 0;
  return codePoint > 127 ? 1 : 0.5;
}

export function isCjkChar(char: string): boolean {
  return CJK_CHAR_REGEX.test(char);
}

/**
 * Word tokens for Latin letters and digits, then CJK unigrams, then CJK
 * bigrams over the CJK-only residue. Duplicates are kept.
 */
export function tokenize(input: string): string[] {
  const lowered = input.toLowerCase();
  const wordTokens = lowered.match(WORD_TOKEN_REGEX) ?? [];

  const cjkChars = [...lowered].filter(isCjkChar);
  const bigrams: string[] = [];
  for (let i = 0; i < cjkChars.length - 1; i += 1) {
    bigrams.push(`${cjkChars[i]}${cjkChars[i + 1]}`);
  }

  return [...wordTokens, ...cjkChars, ...bigrams];
}

export function countTerms(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

export function cosineSimilarity(vectorA: readonly number[], vectorB: readonly number[]): number {
  if (vectorA.length === 0 || vectorB.length === 0 || vectorA.length !== vectorB.length) {
    return 0;
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;

  for (let i = 0; i < vectorA.length; i += 1) {
    const a = vectorA[i];
    const b = vectorB[i];
    dot += a * b;
    magA += a * a;
    magB += b * b;
  }

  if (magA === 0 || magB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(magA) * Math.sqrt(magB));
}

export function escapeRegExp(input: string): string {
  return input.replace(REGEX_SPECIAL_CHARS, '\\$&');
}

export function capitalize(word: string): string {
  return word ? word.charAt(0).toUpperCase() + word.slice(1).toLowerCase() : word;
}
