import { describe, it, expect } from 'vitest';
import {
  buildCorpusStatistics,
  describeCorpus,
  EMPTY_CORPUS,
  idfOf,
  inverseDocumentFrequency,
} from './corpus';

describe('buildCorpusStatistics', () => {
  const bodies = ['gate code is 4521', 'discuss roof repair budget', 'thanks for dinner', 'gate gate open'];

  it('counts documents and distinct terms', () => {
    const stats = buildCorpusStatistics(bodies, { now: () => 1000 });

    expect(stats.documentCount).toBe(4);
    expect([...stats.idf.keys()].sort()).toEqual(
      ['budget', 'code', 'dinner', 'discuss', 'gate', 'open', 'repair', 'roof', 'thanks'].sort(),
    );
    expect(stats.builtAt).toBe(1000);
  });

  it('counts a term once per document regardless of repetitions', () => {
    const stats = buildCorpusStatistics(bodies);
    // "gate" appears in two documents: ln(5/3) + 1
    expect(stats.idf.get('gate')).toBeCloseTo(Math.log(5 / 3) + 1, 12);
    // "roof" appears in one document: ln(5/2) + 1
    expect(stats.idf.get('roof')).toBeCloseTo(Math.log(5 / 2) + 1, 12);
  });

  it('gives rarer terms higher weight and never drops below 1', () => {
    const stats = buildCorpusStatistics(['alpha beta', 'alpha gamma', 'alpha delta']);
    const alpha = idfOf(stats, 'alpha');
    const beta = idfOf(stats, 'beta');

    expect(alpha).toBe(1);
    expect(beta).toBeGreaterThan(alpha);
  });

  it('accepts a generator so bodies can be streamed', () => {
    function* stream(): Generator<string> {
      yield 'first message';
      yield 'second message';
    }
    expect(buildCorpusStatistics(stream()).documentCount).toBe(2);
  });

  it('handles an empty corpus', () => {
    const stats = buildCorpusStatistics([]);
    expect(stats.documentCount).toBe(0);
    expect(stats.idf.size).toBe(0);
  });

  it('returns a frozen snapshot', () => {
    expect(Object.isFrozen(buildCorpusStatistics(bodies))).toBe(true);
  });
});

describe('idfOf', () => {
  it('defaults unseen terms to weight 1', () => {
    expect(idfOf(EMPTY_CORPUS, 'anything')).toBe(1);
    expect(idfOf(buildCorpusStatistics(['hello world']), 'missing')).toBe(1);
  });
});

describe('inverseDocumentFrequency', () => {
  it('follows ln((N+1)/(df+1)) + 1', () => {
    expect(inverseDocumentFrequency(3, 1)).toBeCloseTo(Math.log(2) + 1, 12);
    expect(inverseDocumentFrequency(10, 10)).toBe(1);
  });
});

describe('describeCorpus', () => {
  it('summarises a snapshot', () => {
    const stats = buildCorpusStatistics(['hello world', 'hello friend'], { now: () => 0 });
    expect(describeCorpus(stats, 384)).toEqual({
      documentCount: 2,
      uniqueTerms: 3,
      dimension: 384,
      minTokenLength: 3,
      stopWordCount: 100,
      builtAt: null,
    });
  });
});
