/**
 * Duplicate resolver.
 *
 * Second pass over classified records. Every record is keyed once, by the id
 * it points to through duplicatedBy or else by its own id. A group therefore
 * holds one primary (duplicatedBy unset) plus every record absorbed into it.
 *
 * The primary collects the absorbed ids and, for same-topology duplicates,
 * their first initial geometry. Geometry of a duplicate from another topology
 * cannot be transplanted without an atom correspondence, so those are only
 * counted and reported.
 */

import type { CanonicalRecord, Geometry } from "../records/schema.js";
import { sameTopology } from "../records/ids.js";
import { NOOP_METRICS, type MetricsSink } from "../metrics/sink.js";
import { DuplicateGroupError } from "./errors.js";

export interface UnmatchedDuplicate {
  readonly primaryId: number;
  readonly duplicateId: number;
}

export interface DuplicateResolution {
  primary: CanonicalRecord;
  secondary: {
    /** Absorbed records, unchanged, ascending by id */
    absorbed: CanonicalRecord[];
    unmatchedCrossTopology: UnmatchedDuplicate[];
  };
}

export interface ResolveOptions {
  metrics?: MetricsSink;
}

export function duplicateGroupKey(record: CanonicalRecord): number {
  return record.duplicatedBy ?? record.id;
}

/**
 * Fold the absorbed members of one group into its primary.
 *
 * @throws DuplicateGroupError on zero or several primaries, or a member keyed elsewhere
 */
export function resolveDuplicateGroup(
  key: number,
  members: Iterable<CanonicalRecord>,
  options: ResolveOptions = {}
): DuplicateResolution {
  const metrics = options.metrics ?? NOOP_METRICS;
  const all = Array.from(members).sort((a, b) => a.id - b.id);
  const ids = all.map((member) => member.id);

  const stray = all.find((member) => duplicateGroupKey(member) !== key);
  if (stray !== undefined) {
    throw new DuplicateGroupError(
      key,
      `Conformer ${stray.id} should have duplicatedBy ${key} but has ${stray.duplicatedBy ?? "none"}`,
      ids
    );
  }

  const primaries = all.filter((member) => member.duplicatedBy === undefined);
  const [primary] = primaries;
  if (primaries.length !== 1 || primary === undefined) {
    throw new DuplicateGroupError(
      key,
      `Expected 1 primary conformer with id ${key}, got ${primaries.length}`,
      ids
    );
  }

  const absorbed = all.filter((member) => member.duplicatedBy !== undefined);
  const duplicateOf = new Set(primary.duplicateOf);
  const initialGeometries: Geometry[] = [...primary.initialGeometries];
  const unmatchedCrossTopology: UnmatchedDuplicate[] = [];

  for (const duplicate of absorbed) {
    duplicateOf.add(duplicate.id);

    if (!sameTopology(duplicate.id, primary.id)) {
      // TODO: transplant geometry once an atom-correspondence solver exists
      metrics.increment("duplicate_different_topology_unmatched");
      unmatchedCrossTopology.push({ primaryId: primary.id, duplicateId: duplicate.id });
      continue;
    }

    const [geometry] = duplicate.initialGeometries;
    if (geometry === undefined) {
      metrics.increment("duplicate_same_topology_without_geometry");
      continue;
    }
    initialGeometries.push(structuredClone(geometry));
    metrics.increment("duplicate_same_topology");
  }

  return {
    primary: {
      ...primary,
      initialGeometries,
      duplicateOf: Array.from(duplicateOf).sort((a, b) => a - b),
    },
    secondary: { absorbed, unmatchedCrossTopology },
  };
}

/**
 * Bucket records by duplicate group key, keys ascending.
 */
export function groupByDuplicateKey(records: Iterable<CanonicalRecord>): Map<number, CanonicalRecord[]> {
  const groups = new Map<number, CanonicalRecord[]>();
  for (const record of records) {
    const key = duplicateGroupKey(record);
    const bucket = groups.get(key);
    if (bucket === undefined) {
      groups.set(key, [record]);
    } else {
      bucket.push(record);
    }
  }
  return new Map(Array.from(groups.entries()).sort(([a], [b]) => a - b));
}
