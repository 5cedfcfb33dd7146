import { buildCorpusStatistics, EMPTY_CORPUS } from '@recall/embeddings';
import { CorpusSnapshotHolder } from './snapshot';

describe('CorpusSnapshotHolder', () => {
  it('serves the empty corpus until a snapshot is published', () => {
    const holder = new CorpusSnapshotHolder();
    expect(holder.hasSnapshot()).toBe(false);
    expect(holder.current()).toBe(EMPTY_CORPUS);

    const stats = buildCorpusStatistics(['roof repair']);
    holder.publish(stats);

    expect(holder.hasSnapshot()).toBe(true);
    expect(holder.current()).toBe(stats);
  });

  it('builds on demand only once', () => {
    const holder = new CorpusSnapshotHolder();
    const build = vi.fn(() => buildCorpusStatistics(['roof repair']));

    const first = holder.ensure(build);
    const second = holder.ensure(build);

    expect(second).toBe(first);
    expect(build).toHaveBeenCalledTimes(1);
  });
});
