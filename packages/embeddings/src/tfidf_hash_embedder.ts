import { EMBEDDING_DIMENSION } from '@recall/shared';
import type { Embedder } from './embedder';
import { idfOf, type CorpusStatistics } from './corpus';
import { bucketOf } from './hash';
import { l2Norm } from './similarity';
import { tokenize, type TokenizerOptions } from './tokenizer';

export const EMBEDDING_VERSION = 1;

export interface TfIdfHashEmbedderOptions extends TokenizerOptions {
  dimensions?: number;
  version?: number;
}

/**
 * TF-IDF weighted feature hashing: each term's tf × idf weight lands in
 * bucket stableHash(term) mod dimensions. Colliding terms share a bucket.
 */
export class TfIdfHashEmbedder implements Embedder {
  private readonly dimensions: number;
  private readonly embeddingVersion: number;
  private readonly tokenizerOptions: TokenizerOptions;

  constructor(options: TfIdfHashEmbedderOptions = {}) {
    this.dimensions = options.dimensions ?? EMBEDDING_DIMENSION;
    this.embeddingVersion = options.version ?? EMBEDDING_VERSION;
    this.tokenizerOptions = {
      minTokenLength: options.minTokenLength,
      stopWords: options.stopWords,
    };
  }

  embed(text: string, stats: CorpusStatistics): Float32Array {
    const vector = new Float32Array(this.dimensions);
    const tokens = tokenize(text, this.tokenizerOptions);
    if (tokens.length === 0) {
      return vector;
    }

    const counts = new Map<string, number>();
    for (const token of tokens) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    // Accumulate in doubles so the result does not depend on summation order rounding in float32.
    const accumulator = new Float64Array(this.dimensions);
    for (const [term, count] of counts) {
      const tf = count / tokens.length;
      accumulator[bucketOf(term, this.dimensions)] += tf * idfOf(stats, term);
    }

    const norm = l2Norm(accumulator);
    if (norm === 0) {
      return vector;
    }
    for (let i = 0; i < this.dimensions; i++) {
      vector[i] = accumulator[i] / norm;
    }
    return vector;
  }

  embedTexts(texts: string[], stats: CorpusStatistics): Float32Array[] {
    return texts.map((text) => this.embed(text, stats));
  }

  dims(): number {
    return this.dimensions;
  }

  id(): string {
    return `tfidf-hash:v${this.embeddingVersion}:${this.dimensions}`;
  }

  version(): number {
    return this.embeddingVersion;
  }
}
