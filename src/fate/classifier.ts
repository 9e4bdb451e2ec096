/**
 * Fate classifier.
 *
 * Rules, first match wins:
 *   1. duplicatedBy set, same topology       → DUPLICATE_SAME_TOPOLOGY
 *   2. duplicatedBy set                      → DUPLICATE_DIFFERENT_TOPOLOGY
 *   3. no stage-2 property at all            → NO_CALCULATION_RESULTS
 *   4. geometryStatus names a known failure  → see GEOMETRY_FAILURE_FATES
 *   5. any error field signals a fault       → CALCULATION_WITH_ERROR
 *   6. otherwise                             → SUCCESS
 */

import type { CanonicalRecord, Fate } from "../records/schema.js";
import { sameTopology } from "../records/ids.js";
import { NOOP_METRICS, type MetricsSink } from "../metrics/sink.js";
import { geometryFailureFate, hasCalculationErrors } from "./error-codes.js";

export function hasStage2Results(record: CanonicalRecord): boolean {
  return Object.values(record.properties).some((property) => property.source === "stage2");
}

/**
 * Determine the fate of a record. Pure; never reads record.fate.
 */
export function classify(record: CanonicalRecord): Fate {
  if (record.duplicatedBy !== undefined) {
    return sameTopology(record.duplicatedBy, record.id)
      ? "DUPLICATE_SAME_TOPOLOGY"
      : "DUPLICATE_DIFFERENT_TOPOLOGY";
  }

  if (!hasStage2Results(record)) {
    return "NO_CALCULATION_RESULTS";
  }

  const geometryFailure = geometryFailureFate(record.errors);
  if (geometryFailure !== undefined) {
    return geometryFailure;
  }

  return hasCalculationErrors(record.errors) ? "CALCULATION_WITH_ERROR" : "SUCCESS";
}

/**
 * Copy of the record with its fate assigned.
 */
export function withFate(record: CanonicalRecord, metrics: MetricsSink = NOOP_METRICS): CanonicalRecord {
  const fate = classify(record);
  metrics.increment("classified_records");
  return { ...record, fate };
}
