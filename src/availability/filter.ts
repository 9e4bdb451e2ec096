/**
 * Availability filter: tiered views of a canonical record.
 *
 * Only properties are filtered. Topology, geometry, error codes, duplicate
 * links and fate always survive.
 */

import type { CanonicalRecord, PropertyValue, Tier } from "../records/schema.js";
import { DEFAULT_RECONCILE_CONFIG } from "../config/reconcile/defaults.js";
import type { ReconcileConfig } from "../config/reconcile/schema.js";
import { NOOP_METRICS, type MetricsSink } from "../metrics/sink.js";

type TierSettings = Pick<ReconcileConfig, "completeTiers" | "standardTiers">;

/**
 * Copy of the record keeping only properties whose tier is allowed.
 */
export function projectByTier(record: CanonicalRecord, allowedTiers: Iterable<Tier>): CanonicalRecord {
  const allowed = new Set(allowedTiers);
  const properties: Record<string, PropertyValue> = {};
  for (const [name, property] of Object.entries(record.properties)) {
    if (allowed.has(property.tier)) {
      properties[name] = property;
    }
  }
  return { ...structuredClone(record), properties: structuredClone(properties) };
}

/**
 * Whether a record belongs in the standard view at all.
 */
export function isStandardEligible(record: CanonicalRecord): boolean {
  return record.fate !== "CALCULATION_WITH_ERROR" && record.duplicatedBy === undefined;
}

export function toCompleteRecord(
  record: CanonicalRecord,
  config: TierSettings = DEFAULT_RECONCILE_CONFIG,
  metrics: MetricsSink = NOOP_METRICS
): CanonicalRecord {
  metrics.increment("complete_records");
  return projectByTier(record, config.completeTiers);
}

/**
 * Standard view, or null when the record has a calculation error or was
 * absorbed into another record.
 */
export function toStandardRecord(
  record: CanonicalRecord,
  config: TierSettings = DEFAULT_RECONCILE_CONFIG,
  metrics: MetricsSink = NOOP_METRICS
): CanonicalRecord | null {
  if (!isStandardEligible(record)) {
    return null;
  }
  metrics.increment("standard_records");
  return projectByTier(record, config.standardTiers);
}
