import { tokenize, type TokenizerOptions, DEFAULT_MIN_TOKEN_LENGTH, STOP_WORDS } from './tokenizer';

/**
 * Immutable snapshot of corpus-wide term statistics.
 *
 * A snapshot is produced once per indexing run and handed to the embedder
 * explicitly; queries keep using the last snapshot until the next run
 * replaces it, so relevance can drift between runs.
 */
export interface CorpusStatistics {
  /** Total number of documents N. */
  readonly documentCount: number;
  /** term -> ln((N+1)/(df+1)) + 1 */
  readonly idf: ReadonlyMap<string, number>;
  /** Epoch ms when the snapshot was built. */
  readonly builtAt: number;
}

export const EMPTY_CORPUS: CorpusStatistics = Object.freeze({
  documentCount: 0,
  idf: new Map<string, number>(),
  builtAt: 0,
});

export function inverseDocumentFrequency(documentCount: number, documentFrequency: number): number {
  return Math.log((documentCount + 1) / (documentFrequency + 1)) + 1;
}

/**
 * Computes document frequencies over every body in one pass and derives the
 * idf table. Accepts any iterable so callers can stream bodies from storage.
 */
export function buildCorpusStatistics(
  bodies: Iterable<string>,
  options: TokenizerOptions & { now?: () => number } = {},
): CorpusStatistics {
  const documentFrequency = new Map<string, number>();
  let documentCount = 0;

  for (const body of bodies) {
    documentCount++;
    for (const term of new Set(tokenize(body, options))) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const idf = new Map<string, number>();
  for (const [term, df] of documentFrequency) {
    idf.set(term, inverseDocumentFrequency(documentCount, df));
  }

  return Object.freeze({
    documentCount,
    idf,
    builtAt: (options.now ?? Date.now)(),
  });
}

/** Weight of `term`; terms the snapshot never saw weigh 1. */
export function idfOf(stats: CorpusStatistics, term: string): number {
  return stats.idf.get(term) ?? 1;
}

export interface CorpusDescription {
  documentCount: number;
  uniqueTerms: number;
  dimension: number;
  minTokenLength: number;
  stopWordCount: number;
  builtAt: string | null;
}

export function describeCorpus(
  stats: CorpusStatistics,
  dimension: number,
  options: TokenizerOptions = {},
): CorpusDescription {
  return {
    documentCount: stats.documentCount,
    uniqueTerms: stats.idf.size,
    dimension,
    minTokenLength: options.minTokenLength ?? DEFAULT_MIN_TOKEN_LENGTH,
    stopWordCount: (options.stopWords ?? STOP_WORDS).size,
    builtAt: stats.builtAt > 0 ? new Date(stats.builtAt).toISOString() : null,
  };
}
