/**
 * Canonical structure check.
 *
 * Recomputes the canonical form of a record's topology and compares it with
 * the form the producer supplied. Disagreements are reported on a side
 * channel and the record continues with the recomputed form.
 */

import { z } from "zod";
import type { CanonicalRecord, TopologyDescriptor } from "../records/schema.js";
import { NOOP_METRICS, type MetricsSink } from "../metrics/sink.js";
import type { StructureToolkit } from "./toolkit.js";

/**
 * MISSING  → the producer supplied no canonical form
 * MISMATCH → the supplied form differs from the recomputed one
 * MATCH    → they agree
 */
export const CanonicalCompareResult = z.enum(["MATCH", "MISMATCH", "MISSING"]);
export type CanonicalCompareResult = z.infer<typeof CanonicalCompareResult>;

export interface CanonicalComparison {
  result: CanonicalCompareResult;
  withHydrogens: string;
  withoutHydrogens: string;
}

/**
 * Side-channel row for a topology whose canonical form did not match.
 */
export interface CanonicalMismatch {
  readonly id: number;
  readonly result: Exclude<CanonicalCompareResult, "MATCH">;
  readonly given: string | null;
  readonly withHydrogens: string;
  readonly withoutHydrogens: string;
}

export const CANONICAL_MISMATCH_HEADER: readonly string[] = [
  "id",
  "compare",
  "given",
  "with_hydrogens",
  "without_hydrogens",
];

export function compareCanonical(
  topology: TopologyDescriptor,
  toolkit: StructureToolkit
): CanonicalComparison {
  const withHydrogens = toolkit.canonicalize(topology, true);
  const withoutHydrogens = toolkit.canonicalize(topology, false);

  let result: CanonicalCompareResult;
  if (topology.canonicalForm === undefined || topology.canonicalForm === "") {
    result = "MISSING";
  } else if (topology.canonicalForm !== withoutHydrogens) {
    result = "MISMATCH";
  } else {
    result = "MATCH";
  }

  return { result, withHydrogens, withoutHydrogens };
}

export interface StructureCheckResult {
  primary: CanonicalRecord;
  secondary: CanonicalMismatch[];
}

/**
 * Check the primary (first) topology of a record.
 *
 * Records without a topology (bare duplicate markers) pass through untouched.
 */
export function checkCanonicalStructure(
  record: CanonicalRecord,
  toolkit: StructureToolkit,
  metrics: MetricsSink = NOOP_METRICS
): StructureCheckResult {
  const [topology, ...others] = record.topologies;
  if (topology === undefined) {
    return { primary: record, secondary: [] };
  }

  const comparison = compareCanonical(topology, toolkit);
  if (comparison.result === "MATCH") {
    return { primary: record, secondary: [] };
  }

  metrics.increment("canonical_mismatch");
  const mismatch: CanonicalMismatch = {
    id: record.id,
    result: comparison.result,
    given: topology.canonicalForm ?? null,
    withHydrogens: comparison.withHydrogens,
    withoutHydrogens: comparison.withoutHydrogens,
  };
  return {
    primary: {
      ...record,
      topologies: [{ ...topology, canonicalForm: comparison.withoutHydrogens }, ...others],
    },
    secondary: [mismatch],
  };
}
