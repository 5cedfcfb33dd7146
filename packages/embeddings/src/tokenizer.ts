import stopWordList from './stop-words.json';

export const DEFAULT_MIN_TOKEN_LENGTH = 3;

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

export interface TokenizerOptions {
  minTokenLength?: number;
  stopWords?: ReadonlySet<string>;
}

const DELIMITER = /[^a-z0-9]+/;
const DIGITS_ONLY = /^\d+$/;

/**
 * Lowercases `text`, splits on anything outside [a-z0-9] and drops short
 * tokens, stop words and bare numbers. Order and duplicates are kept so
 * callers can count term frequency.
 */
export function tokenize(text: string, options: TokenizerOptions = {}): string[] {
  const minTokenLength = options.minTokenLength ?? DEFAULT_MIN_TOKEN_LENGTH;
  const stopWords = options.stopWords ?? STOP_WORDS;

  return text
    .toLowerCase()
    .split(DELIMITER)
    .filter(
      (token) =>
        token.length >= minTokenLength && !stopWords.has(token) && !DIGITS_ONLY.test(token),
    );
}
