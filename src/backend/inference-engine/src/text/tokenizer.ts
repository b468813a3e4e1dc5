/**
 * Tokenizer / N-gram Extractor
 *
 * Reproduces the analyzer the training pipeline fitted its vocabulary with:
 * lowercase, unicode accent stripping, tokens of two or more word
 * characters, and word n-grams joined by a single space.
 *
 * @tested tests/property/tokenizer.property.test.ts
 */

export type NgramRange = readonly [minN: number, maxN: number];

export interface TokenizerOptions {
  ngramRange: NgramRange;
  lowercase: boolean;
  stripAccents: boolean;
  /** Must carry the `g` flag */
  tokenPattern: RegExp;
}

/**
 * Letters, numbers and underscore; runs of two or more form a token
 */
export const DEFAULT_TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

export const DEFAULT_TOKENIZER_OPTIONS: TokenizerOptions = {
  ngramRange: [1, 3],
  lowercase: true,
  stripAccents: true,
  tokenPattern: DEFAULT_TOKEN_PATTERN,
};

const MARK = /\p{M}/gu;

// The only character with the highest canonical combining class (240)
const YPOGEGRAMMENI = '\u0345';

const combiningCache = new Map<string, boolean>();

/**
 * True when the mark has a nonzero canonical combining class. Canonical
 * ordering moves such a mark in front of U+0345, so NFD changes the pair;
 * a class-0 mark (a Devanagari vowel sign, for one) stays where it is.
 */
export function isCombining(mark: string): boolean {
  let combining = combiningCache.get(mark);
  if (combining === undefined) {
    const pair = YPOGEGRAMMENI + mark;
    combining = mark === YPOGEGRAMMENI || pair.normalize('NFD') !== pair;
    combiningCache.set(mark, combining);
  }
  return combining;
}

/**
 * Decomposes to NFKD and drops characters with a nonzero combining class.
 * Strings without any decomposable character are returned untouched.
 */
export function stripAccents(text: string): string {
  const decomposed = text.normalize('NFKD');
  if (decomposed === text) {
    return text;
  }
  return decomposed.replace(MARK, (mark) => (isCombining(mark) ? '' : mark));
}

export function normalizeText(
  text: string,
  options: Pick<TokenizerOptions, 'lowercase' | 'stripAccents'> = DEFAULT_TOKENIZER_OPTIONS
): string {
  let normalized = options.lowercase ? text.toLowerCase() : text;
  if (options.stripAccents) {
    normalized = stripAccents(normalized);
  }
  return normalized;
}

export function tokenize(
  text: string,
  options: TokenizerOptions = DEFAULT_TOKENIZER_OPTIONS
): string[] {
  const pattern = new RegExp(options.tokenPattern.source, options.tokenPattern.flags);
  return normalizeText(text, options).match(pattern) ?? [];
}

/**
 * Every contiguous n-gram for n in the inclusive range, unigrams first
 */
export function extractNgrams(tokens: readonly string[], ngramRange: NgramRange): string[] {
  const [minN, maxN] = ngramRange;
  const ngrams: string[] = [];

  for (let n = Math.max(1, minN); n <= Math.min(maxN, tokens.length); n++) {
    for (let i = 0; i + n <= tokens.length; i++) {
      ngrams.push(n === 1 ? tokens[i] : tokens.slice(i, i + n).join(' '));
    }
  }

  return ngrams;
}

/**
 * Full analyzer: raw text to an n-gram multiset
 */
export function analyze(
  text: string,
  options: TokenizerOptions = DEFAULT_TOKENIZER_OPTIONS
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const ngram of extractNgrams(tokenize(text, options), options.ngramRange)) {
    counts.set(ngram, (counts.get(ngram) ?? 0) + 1);
  }
  return counts;
}

/**
 * An exported `(text, n-grams)` pair recorded at training time
 */
export interface TokenizerFixture {
  text: string;
  ngrams: string[];
}

export interface TokenizerFixtureMismatch {
  text: string;
  missing: string[];
  unexpected: string[];
}

/**
 * Checks the analyzer against fixtures exported by the training job.
 * Compares n-gram sets; an empty result means full parity.
 */
export function verifyTokenizerFixtures(
  fixtures: readonly TokenizerFixture[],
  options: TokenizerOptions = DEFAULT_TOKENIZER_OPTIONS
): TokenizerFixtureMismatch[] {
  const mismatches: TokenizerFixtureMismatch[] = [];

  for (const fixture of fixtures) {
    const produced = new Set(analyze(fixture.text, options).keys());
    const expected = new Set(fixture.ngrams);

    const missing = [...expected].filter((ngram) => !produced.has(ngram)).sort();
    const unexpected = [...produced].filter((ngram) => !expected.has(ngram)).sort();

    if (missing.length > 0 || unexpected.length > 0) {
      mismatches.push({ text: fixture.text, missing, unexpected });
    }
  }

  return mismatches;
}
