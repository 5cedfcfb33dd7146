import { EMPTY_CORPUS, type CorpusStatistics } from '@recall/embeddings';

/**
 * Holds the corpus snapshot shared by indexing and search. Indexing
 * publishes a new snapshot at the start of every run; queries read
 * whatever was published last, which may lag behind the store.
 */
export class CorpusSnapshotHolder {
  private snapshot: CorpusStatistics | null = null;

  constructor(initial?: CorpusStatistics) {
    this.snapshot = initial ?? null;
  }

  /** Last published snapshot, or the empty corpus before the first run. */
  current(): CorpusStatistics {
    return this.snapshot ?? EMPTY_CORPUS;
  }

  hasSnapshot(): boolean {
    return this.snapshot !== null;
  }

  publish(stats: CorpusStatistics): void {
    this.snapshot = stats;
  }

  /** Builds and publishes a snapshot only when none exists yet. */
  ensure(build: () => CorpusStatistics): CorpusStatistics {
    if (this.snapshot === null) {
      this.snapshot = build();
    }
    return this.snapshot;
  }
}
