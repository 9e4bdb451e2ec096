/**
 * In-process reconciliation runner.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * FLOW
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   partials ──group by id──▶ merge ──▶ classify ──▶ structure check
 *                                                        │
 *               ┌──────────group by duplicate key────────┘
 *               ▼
 *        duplicate resolution ──▶ summaries (+ bare topologies)
 *                              ├─▶ keyed stats
 *                              └─▶ complete / standard views
 *
 * Every group is processed independently. A structural error inside one group
 * either aborts the run or skips that group, per groupFailurePolicy. Data
 * conflicts never abort; they are collected as side outputs.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { CanonicalRecord, PartialRecord, TopologyDescriptor } from "../records/schema.js";
import { ReconciliationError } from "../records/errors.js";
import { DEFAULT_RECONCILE_CONFIG } from "../config/reconcile/defaults.js";
import type { ReconcileConfig } from "../config/reconcile/schema.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { createCounterMetrics, type CounterMetrics, type MetricsSnapshot } from "../metrics/sink.js";
import { mergePartialRecords, type MergeConflict } from "../merge/index.js";
import { withFate } from "../fate/index.js";
import { checkCanonicalStructure, type CanonicalMismatch, type StructureToolkit } from "../structure/index.js";
import { groupByDuplicateKey, resolveDuplicateGroup, type UnmatchedDuplicate } from "../duplicates/index.js";
import { bareSummary, summariesForRecord, TopologySummaryAccumulator, type TopologySummary } from "../summaries/index.js";
import { combineStatCounts, countStatValues, recordStatValues, type StatCounts } from "../stats/index.js";
import { toCompleteRecord, toStandardRecord } from "../availability/index.js";

export interface ReconciliationInput {
  /** Stage-1, stage-2 and duplicate-marker partials, in any order */
  partials: Iterable<PartialRecord>;
  /** Bare topology enumeration; each gets a summary row even if unobserved */
  topologies?: Iterable<TopologyDescriptor>;
}

export interface RunOptions {
  toolkit: StructureToolkit;
  config?: ReconcileConfig;
  logger?: Logger;
  metrics?: CounterMetrics;
}

export type GroupStage = "merge" | "duplicates";

export interface GroupFailure {
  stage: GroupStage;
  /** Conformer id (merge) or duplicate group key */
  key: number;
  error: ReconciliationError;
}

export interface ReconciliationOutput {
  /** Resolved records, every tier, ascending by id */
  records: CanonicalRecord[];
  complete: CanonicalRecord[];
  standard: CanonicalRecord[];
  conflicts: MergeConflict[];
  canonicalMismatches: CanonicalMismatch[];
  unmatchedDuplicates: UnmatchedDuplicate[];
  /** Ascending by topology id */
  summaries: TopologySummary[];
  stats: StatCounts;
  failures: GroupFailure[];
  metrics: MetricsSnapshot;
}

function groupById(partials: Iterable<PartialRecord>): Map<number, PartialRecord[]> {
  const groups = new Map<number, PartialRecord[]>();
  for (const partial of partials) {
    const bucket = groups.get(partial.id);
    if (bucket === undefined) {
      groups.set(partial.id, [partial]);
    } else {
      bucket.push(partial);
    }
  }
  return new Map(Array.from(groups.entries()).sort(([a], [b]) => a - b));
}

/**
 * Reconcile a complete batch of partial records.
 *
 * @throws ReconciliationError on the first structural error when groupFailurePolicy is "abort"
 */
export function runReconciliation(input: ReconciliationInput, options: RunOptions): ReconciliationOutput {
  const config = options.config ?? DEFAULT_RECONCILE_CONFIG;
  const logger = options.logger ?? createSilentLogger();
  const metrics = options.metrics ?? createCounterMetrics();
  const failures: GroupFailure[] = [];

  function runGroup<T>(stage: GroupStage, key: number, fn: () => T): T | undefined {
    try {
      return fn();
    } catch (error) {
      if (!(error instanceof ReconciliationError) || config.groupFailurePolicy === "abort") {
        throw error;
      }
      metrics.increment("group_failures");
      failures.push({ stage, key, error });
      logger.child({ stage, group: key }).warn(`Skipping ${stage} group ${key}`, { error: error.format() });
      return undefined;
    }
  }

  const partialGroups = groupById(input.partials);
  logger.info("Reconciliation started", { groups: partialGroups.size, policy: config.groupFailurePolicy });

  // Merge, classify, check structure
  const conflicts: MergeConflict[] = [];
  const canonicalMismatches: CanonicalMismatch[] = [];
  const classified: CanonicalRecord[] = [];

  for (const [id, partials] of partialGroups) {
    const checked = runGroup("merge", id, () => {
      const merged = mergePartialRecords(id, partials, { config, metrics });
      const structure = checkCanonicalStructure(withFate(merged.primary, metrics), options.toolkit, metrics);
      return { record: structure.primary, conflicts: merged.secondary, mismatches: structure.secondary };
    });
    if (checked === undefined) {
      continue;
    }
    classified.push(checked.record);
    conflicts.push(...checked.conflicts);
    canonicalMismatches.push(...checked.mismatches);
  }

  // Duplicate resolution
  const records: CanonicalRecord[] = [];
  const unmatchedDuplicates: UnmatchedDuplicate[] = [];

  for (const [key, members] of groupByDuplicateKey(classified)) {
    const resolved = runGroup("duplicates", key, () => resolveDuplicateGroup(key, members, { metrics }));
    if (resolved === undefined) {
      continue;
    }
    records.push(resolved.primary, ...resolved.secondary.absorbed);
    unmatchedDuplicates.push(...resolved.secondary.unmatchedCrossTopology);
  }
  records.sort((a, b) => a.id - b.id);

  // Aggregation and views
  const totals = TopologySummaryAccumulator.create(metrics);
  for (const topology of input.topologies ?? []) {
    totals.add(bareSummary(topology));
  }
  for (const record of records) {
    totals.addAll(summariesForRecord(record));
  }

  const stats = combineStatCounts(...records.map((record) => countStatValues(recordStatValues(record))));

  const complete = records.map((record) => toCompleteRecord(record, config, metrics));
  const standard: CanonicalRecord[] = [];
  for (const record of records) {
    const view = toStandardRecord(record, config, metrics);
    if (view !== null) {
      standard.push(view);
    }
  }

  logger.info("Reconciliation finished", {
    records: records.length,
    conflicts: conflicts.length,
    mismatches: canonicalMismatches.length,
    failures: failures.length,
  });

  return {
    records,
    complete,
    standard,
    conflicts,
    canonicalMismatches,
    unmatchedDuplicates,
    summaries: totals.values(),
    stats,
    failures,
    metrics: metrics.snapshot(),
  };
}
