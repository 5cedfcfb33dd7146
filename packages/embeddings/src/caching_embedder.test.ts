import { vi } from 'vitest';
import { CachingEmbedder } from './caching_embedder';
import { buildCorpusStatistics, EMPTY_CORPUS, type CorpusStatistics } from './corpus';
import type { Embedder } from './embedder';

function fakeEmbedder() {
  const embed = vi.fn((text: string, _stats: CorpusStatistics) =>
    Float32Array.from([text.length, 1, 0]),
  );
  const embedder: Embedder = {
    embed,
    embedTexts: (texts, stats) => texts.map((text) => embed(text, stats)),
    dims: () => 3,
    id: () => 'underlying',
    version: () => 7,
  };
  return { embedder, embed };
}

describe('CachingEmbedder', () => {
  it('caches embeddings for identical inputs', () => {
    const underlying = fakeEmbedder();
    const embedder = new CachingEmbedder(underlying.embedder);

    const first = embedder.embed('hello', EMPTY_CORPUS);
    const second = embedder.embed('hello', EMPTY_CORPUS);

    expect(Array.from(second)).toEqual(Array.from(first));
    expect(underlying.embed).toHaveBeenCalledTimes(1);
    expect(embedder.cacheStats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it('recomputes once the snapshot changes', () => {
    const underlying = fakeEmbedder();
    const embedder = new CachingEmbedder(underlying.embedder);
    const next = buildCorpusStatistics(['hello world']);

    embedder.embed('hello', EMPTY_CORPUS);
    embedder.embed('hello', next);

    expect(underlying.embed).toHaveBeenCalledTimes(2);
    expect(underlying.embed).toHaveBeenLastCalledWith('hello', next);
  });

  it('hands out copies of cached vectors', () => {
    const embedder = new CachingEmbedder(fakeEmbedder().embedder);

    const first = embedder.embed('hello', EMPTY_CORPUS);
    first[0] = 99;

    expect(embedder.embed('hello', EMPTY_CORPUS)[0]).toBe(5);
  });

  it('evicts the least recently used entry', () => {
    const underlying = fakeEmbedder();
    const embedder = new CachingEmbedder(underlying.embedder, 1);

    embedder.embed('a', EMPTY_CORPUS);
    embedder.embed('b', EMPTY_CORPUS);
    embedder.embed('a', EMPTY_CORPUS);

    expect(underlying.embed).toHaveBeenCalledTimes(3);
  });

  it('delegates dims() and version() and wraps id()', () => {
    const embedder = new CachingEmbedder(fakeEmbedder().embedder);
    expect(embedder.dims()).toBe(3);
    expect(embedder.version()).toBe(7);
    expect(embedder.id()).toBe('cached(underlying)');
  });

  it('embeds batches through the cache', () => {
    const underlying = fakeEmbedder();
    const embedder = new CachingEmbedder(underlying.embedder);

    const vectors = embedder.embedTexts(['ab', 'ab', 'abc'], EMPTY_CORPUS);

    expect(vectors.map((vector) => vector[0])).toEqual([2, 2, 3]);
    expect(underlying.embed).toHaveBeenCalledTimes(2);
  });
});
