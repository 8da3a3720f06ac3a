export const STAT_NAMES = [
  'tickets_processed',
  'requests_fetched',
  'comments_seen',
  'comments_filtered',
  'comments_kept',
  'fetch_failures',
] as const;

export type StatName = (typeof STAT_NAMES)[number];

export type StatsSnapshot = Record<StatName, number>;

/**
 * Monotonic counters for a single pipeline run.
 */
export class RunStatistics {
  private readonly counts = new Map<StatName, number>();

  increment(name: StatName, by: number = 1): void {
    if (!Number.isInteger(by) || by < 0) {
      throw new RangeError(`Counter "${name}" can only grow by a non-negative integer, got ${by}`);
    }
    this.counts.set(name, this.get(name) + by);
  }

  get(name: StatName): number {
    return this.counts.get(name) ?? 0;
  }

  /** All counters in a fixed order, zero-filled. */
  snapshot(): StatsSnapshot {
    return {
      tickets_processed: this.get('tickets_processed'),
      requests_fetched: this.get('requests_fetched'),
      comments_seen: this.get('comments_seen'),
      comments_filtered: this.get('comments_filtered'),
      comments_kept: this.get('comments_kept'),
      fetch_failures: this.get('fetch_failures'),
    };
  }
}
