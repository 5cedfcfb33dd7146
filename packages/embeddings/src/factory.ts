import { ConfigError, type EmbeddingsConfig } from '@recall/shared';
import type { Embedder } from './embedder';
import { CachingEmbedder } from './caching_embedder';
import { TfIdfHashEmbedder } from './tfidf_hash_embedder';

/** Embedder used for indexing: no cache, every message is embedded once. */
export function createIndexEmbedder(config: EmbeddingsConfig): Embedder {
  switch (config.provider) {
    case 'tfidf-hash':
      return new TfIdfHashEmbedder({
        dimensions: config.dims,
        minTokenLength: config.minTokenLength,
        version: config.version,
      });
    default:
      throw new ConfigError(`Unsupported embedder provider: ${String(config.provider)}`);
  }
}

/** Embedder used for queries, wrapped in an LRU cache. */
export function createEmbedder(config: EmbeddingsConfig): Embedder {
  return new CachingEmbedder(createIndexEmbedder(config), config.queryCacheSize);
}
