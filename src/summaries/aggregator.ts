/**
 * Topology aggregator.
 *
 * Turns classified records into per-topology counter deltas and sums them.
 * combineSummaries is commutative and associative, and a bare row (all
 * counters zero) is its identity, so partitions can be summed in any order
 * and re-summed after a retry.
 */

import { isDeepStrictEqual } from "node:util";
import type { CanonicalRecord, Fate, TopologyDescriptor } from "../records/schema.js";
import { ReconciliationError, UnclassifiedRecordError } from "../records/errors.js";
import { NOOP_METRICS, type MetricsSink } from "../metrics/sink.js";
import {
  SUMMARY_COUNTER_FIELDS,
  type SummaryCounterField,
  type SummaryCounters,
  type TopologySummary,
} from "./schema.js";

export class SummaryMismatchError extends ReconciliationError {
  constructor(topologyId: number, otherTopologyId: number) {
    super(`Cannot combine summary of topology ${otherTopologyId} into ${topologyId}`, topologyId);
    this.name = "SummaryMismatchError";
  }
}

export function emptyCounters(): SummaryCounters {
  return {
    attempted: 0,
    keptGeometry: 0,
    duplicatesSameTopology: 0,
    duplicatesDifferentTopology: 0,
    failedGeometryOptimization: 0,
    missingCalculation: 0,
    calculationWithError: 0,
    calculationSuccess: 0,
    detectedMatchWithError: 0,
    detectedMatchSuccess: 0,
  };
}

/**
 * Zero-valued row for a topology from the bare enumeration.
 */
export function bareSummary(topology: TopologyDescriptor): TopologySummary {
  return { topology: structuredClone(topology), counters: emptyCounters() };
}

/** Counters bumped on the primary topology row, besides attempted */
const PRIMARY_FATE_COUNTERS: Readonly<Record<Exclude<Fate, "UNDEFINED">, readonly SummaryCounterField[]>> = {
  DUPLICATE_SAME_TOPOLOGY: ["duplicatesSameTopology"],
  DUPLICATE_DIFFERENT_TOPOLOGY: ["duplicatesDifferentTopology"],
  GEOMETRY_OPTIMIZATION_PROBLEM: ["failedGeometryOptimization"],
  DISASSOCIATED: ["failedGeometryOptimization"],
  FORCE_CONSTANT_FAILURE: ["failedGeometryOptimization"],
  DISCARDED_OTHER: ["failedGeometryOptimization"],
  NO_CALCULATION_RESULTS: ["keptGeometry", "missingCalculation"],
  CALCULATION_WITH_ERROR: ["keptGeometry", "calculationWithError"],
  SUCCESS: ["keptGeometry", "calculationSuccess"],
};

/** Counter bumped on each additional matched topology, if any */
const DETECTED_MATCH_COUNTER: Partial<Record<Fate, SummaryCounterField>> = {
  CALCULATION_WITH_ERROR: "detectedMatchWithError",
  SUCCESS: "detectedMatchSuccess",
};

/**
 * Summary deltas for one classified record: the primary (first) topology
 * first, then any additional matched topology. A record without topologies
 * yields nothing.
 *
 * @throws UnclassifiedRecordError if the record has no fate yet
 */
export function summariesForRecord(record: CanonicalRecord): TopologySummary[] {
  const { fate } = record;
  if (fate === "UNDEFINED") {
    throw new UnclassifiedRecordError(record.id);
  }

  const [primaryTopology, ...extraTopologies] = record.topologies;
  if (primaryTopology === undefined) {
    return [];
  }

  const primary = bareSummary(primaryTopology);
  primary.counters.attempted += 1;
  for (const field of PRIMARY_FATE_COUNTERS[fate]) {
    primary.counters[field] += 1;
  }

  const summaries = [primary];
  const detected = DETECTED_MATCH_COUNTER[fate];
  if (detected !== undefined) {
    for (const topology of extraTopologies) {
      const extra = bareSummary(topology);
      extra.counters[detected] += 1;
      summaries.push(extra);
    }
  }
  return summaries;
}

function descriptorOrder(a: TopologyDescriptor, b: TopologyDescriptor): number {
  const left = JSON.stringify(a);
  const right = JSON.stringify(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Field-wise sum of two summaries for the same topology id.
 *
 * When the descriptors differ (a recomputed canonical form, say) the
 * lexicographically smaller serialization is kept, so the pick does not
 * depend on argument order.
 *
 * @throws SummaryMismatchError when the topology ids differ
 */
export function combineSummaries(a: TopologySummary, b: TopologySummary): TopologySummary {
  if (a.topology.topologyId !== b.topology.topologyId) {
    throw new SummaryMismatchError(a.topology.topologyId, b.topology.topologyId);
  }

  const counters = emptyCounters();
  for (const field of SUMMARY_COUNTER_FIELDS) {
    counters[field] = a.counters[field] + b.counters[field];
  }

  const topology =
    isDeepStrictEqual(a.topology, b.topology) || descriptorOrder(a.topology, b.topology) <= 0
      ? a.topology
      : b.topology;
  return { topology: structuredClone(topology), counters };
}

/**
 * Header of the flattened summary rows.
 */
export const SUMMARY_HEADER: readonly string[] = [
  "topology_id",
  ...SUMMARY_COUNTER_FIELDS.map((field) => field.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`)),
];

export function summaryToRow(summary: TopologySummary): number[] {
  return [summary.topology.topologyId, ...SUMMARY_COUNTER_FIELDS.map((field) => summary.counters[field])];
}

/**
 * Running per-topology totals.
 *
 * @example
 *   const totals = TopologySummaryAccumulator.create(metrics);
 *   topologies.forEach((t) => totals.add(bareSummary(t)));
 *   records.forEach((r) => totals.addAll(summariesForRecord(r)));
 *   totals.values(); // ascending by topology id
 */
export class TopologySummaryAccumulator {
  /**
   * Index: topology id -> combined summary.
   */
  private readonly _byTopology = new Map<number, TopologySummary>();

  private readonly _metrics: MetricsSink;

  private constructor(metrics: MetricsSink) {
    this._metrics = metrics;
  }

  static create(metrics: MetricsSink = NOOP_METRICS): TopologySummaryAccumulator {
    return new TopologySummaryAccumulator(metrics);
  }

  add(summary: TopologySummary): void {
    const id = summary.topology.topologyId;
    const existing = this._byTopology.get(id);
    if (existing === undefined) {
      this._byTopology.set(id, { topology: structuredClone(summary.topology), counters: { ...summary.counters } });
      return;
    }
    this._byTopology.set(id, combineSummaries(existing, summary));
    this._metrics.increment("merged_summaries");
  }

  addAll(summaries: Iterable<TopologySummary>): void {
    for (const summary of summaries) {
      this.add(summary);
    }
  }

  /**
   * Fold another partition's totals into this one.
   */
  merge(other: TopologySummaryAccumulator): void {
    this.addAll(other.values());
  }

  get(topologyId: number): TopologySummary | undefined {
    return this._byTopology.get(topologyId);
  }

  get size(): number {
    return this._byTopology.size;
  }

  /**
   * Every summary, ascending by topology id.
   */
  values(): TopologySummary[] {
    return Array.from(this._byTopology.values()).sort(
      (a, b) => a.topology.topologyId - b.topology.topologyId
    );
  }
}
