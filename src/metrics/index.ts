/**
 * Metrics sinks passed explicitly into every component call.
 */

export {
  NOOP_METRICS,
  createCounterMetrics,
  mergeMetricSnapshots,
  type MetricsSink,
  type MetricsSnapshot,
  type CounterMetrics,
} from "./sink.js";
