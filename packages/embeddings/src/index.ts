export const name = '@recall/embeddings';

export * from './tokenizer';
export * from './hash';
export * from './corpus';
export * from './similarity';
export * from './codec';
export * from './embedder';
export * from './tfidf_hash_embedder';
export * from './caching_embedder';
export * from './factory';
