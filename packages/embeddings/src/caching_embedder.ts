import { LRUCache } from '@recall/shared';
import { hash } from 'ohash';
import type { CorpusStatistics } from './corpus';
import type { Embedder } from './embedder';

/** Default number of query vectors kept (LRU eviction). */
export const QUERY_CACHE_MAX_SIZE = 256;

/**
 * Memoizes embeddings for the most recent corpus snapshot. Swapping the
 * snapshot drops every cached vector, since weights depend on it.
 */
export class CachingEmbedder implements Embedder {
  private readonly cache: LRUCache<string, Float32Array>;
  private snapshot: CorpusStatistics | undefined;

  constructor(
    private readonly underlyingEmbedder: Embedder,
    maxSize: number = QUERY_CACHE_MAX_SIZE,
  ) {
    this.cache = new LRUCache(maxSize);
  }

  embed(text: string, stats: CorpusStatistics): Float32Array {
    if (this.snapshot !== stats) {
      this.cache.clear();
      this.snapshot = stats;
    }
    const vector = this.cache.getOrCompute(hash(text), () =>
      this.underlyingEmbedder.embed(text, stats),
    );
    // Callers own the returned array; never hand out the cached instance.
    return vector.slice();
  }

  embedTexts(texts: string[], stats: CorpusStatistics): Float32Array[] {
    return texts.map((text) => this.embed(text, stats));
  }

  dims(): number {
    return this.underlyingEmbedder.dims();
  }

  id(): string {
    return `cached(${this.underlyingEmbedder.id()})`;
  }

  version(): number {
    return this.underlyingEmbedder.version();
  }

  cacheStats(): { hits: number; misses: number; size: number } {
    return this.cache.stats();
  }
}
