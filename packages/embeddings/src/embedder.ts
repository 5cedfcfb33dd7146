import type { CorpusStatistics } from './corpus';

/**
 * Turns text into a fixed-width vector weighted by a corpus snapshot.
 * Embedding is pure computation, so the contract is synchronous.
 */
export interface Embedder {
  embed(text: string, stats: CorpusStatistics): Float32Array;
  embedTexts(texts: string[], stats: CorpusStatistics): Float32Array[];
  dims(): number;
  id(): string;
  /** Tag persisted next to every vector this embedder produced. */
  version(): number;
}
