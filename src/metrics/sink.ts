/**
 * Observability counters.
 *
 * Components never touch shared counter state. Each call receives a sink and
 * increments named counters on it; the caller owns the sink and decides how
 * snapshots from separate partitions are combined.
 */

export interface MetricsSink {
  increment(name: string, amount?: number): void;
}

/** Counter name → accumulated value */
export type MetricsSnapshot = Readonly<Record<string, number>>;

export interface CounterMetrics extends MetricsSink {
  /** Current value of one counter (0 if never incremented) */
  get(name: string): number;
  /** Copy of every counter, keys sorted */
  snapshot(): MetricsSnapshot;
}

/**
 * Sink that discards everything. Default for component calls.
 */
export const NOOP_METRICS: MetricsSink = {
  increment: () => undefined,
};

/**
 * Create an in-memory counting sink.
 */
export function createCounterMetrics(): CounterMetrics {
  const counters = new Map<string, number>();

  return {
    increment(name, amount = 1) {
      if (!Number.isInteger(amount) || amount < 0) {
        throw new RangeError(`Counter ${name} can only grow by a non-negative integer, got ${amount}`);
      }
      counters.set(name, (counters.get(name) ?? 0) + amount);
    },
    get(name) {
      return counters.get(name) ?? 0;
    },
    snapshot() {
      const out: Record<string, number> = {};
      for (const key of Array.from(counters.keys()).sort()) {
        out[key] = counters.get(key) ?? 0;
      }
      return out;
    },
  };
}

/**
 * Sum snapshots taken on independent partitions.
 */
export function mergeMetricSnapshots(...snapshots: MetricsSnapshot[]): MetricsSnapshot {
  const totals = new Map<string, number>();
  for (const snapshot of snapshots) {
    for (const [name, value] of Object.entries(snapshot)) {
      totals.set(name, (totals.get(name) ?? 0) + value);
    }
  }
  const out: Record<string, number> = {};
  for (const key of Array.from(totals.keys()).sort()) {
    out[key] = totals.get(key) ?? 0;
  }
  return out;
}
