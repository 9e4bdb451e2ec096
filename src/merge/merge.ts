/**
 * Merge engine: folds every partial record sharing a conformer id into one
 * canonical record.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ORDER INDEPENDENCE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The runtime hands over the partials of a group in no particular order and
 * may re-execute a group. The reduction is therefore split in two:
 *
 *   1. combineMergeStates: commutative and associative. It only slots each
 *      stage record into its place and unions the duplicate links, failing
 *      when a stage shows up twice.
 *   2. finalizeMergeState: applied once to the reduced state. All
 *      stage-1/stage-2 rules (topology equality, tolerance checks, stage-2
 *      precedence) run here, so the record and the conflict list are the same
 *      for every pairing order.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { isDeepStrictEqual } from "node:util";
import {
  EMPTY_ERROR_CODES,
  type CanonicalRecord,
  type Geometry,
  type PartialRecord,
  type PropertyValue,
  type Stage,
} from "../records/schema.js";
import { topologyIdOf } from "../records/ids.js";
import { DEFAULT_RECONCILE_CONFIG } from "../config/reconcile/defaults.js";
import type { ReconcileConfig } from "../config/reconcile/schema.js";
import { NOOP_METRICS, type MetricsSink } from "../metrics/sink.js";
import {
  geometriesMatch,
  propertyValuesMatch,
  scalarsMatch,
  type ComparisonSettings,
} from "./compare.js";
import {
  STAGE1_ERROR_FIELDS,
  snapshotForConflict,
  type MergeConflict,
} from "./conflicts.js";
import {
  DuplicateSourceError,
  InvalidPartialRecordError,
  TopologyMismatchError,
} from "./errors.js";

/**
 * Intermediate reduction value for one conformer id.
 */
export interface MergeState {
  readonly id: number;
  readonly stage1?: PartialRecord;
  readonly stage2?: PartialRecord;
  /** Union of every part's duplicateOf, ascending */
  readonly duplicateOf: readonly number[];
  /** Every duplicatedBy seen, ascending */
  readonly duplicatedBy: readonly number[];
}

export interface MergeOptions {
  config?: Pick<ReconcileConfig, "tolerance" | "invalidSentinel">;
  metrics?: MetricsSink;
}

/**
 * A canonical record plus the conflicts found while building it.
 */
export interface MergeResult {
  primary: CanonicalRecord;
  secondary: MergeConflict[];
}

function sortedUnion(a: readonly number[], b: readonly number[]): number[] {
  return Array.from(new Set([...a, ...b])).sort((x, y) => x - y);
}

function checkStageRecord(record: PartialRecord): void {
  if (record.topologies.length > 1) {
    throw new InvalidPartialRecordError(
      record.id,
      `${record.origin} record carries ${record.topologies.length} topologies; expected at most 1`
    );
  }
  if (record.initialGeometries.length > 1) {
    throw new InvalidPartialRecordError(
      record.id,
      `${record.origin} record carries ${record.initialGeometries.length} initial geometries; expected at most 1`
    );
  }
  for (const [name, property] of Object.entries(record.properties)) {
    if (property.source !== record.origin) {
      throw new InvalidPartialRecordError(
        record.id,
        `${record.origin} record carries property ${name} from ${property.source}`
      );
    }
  }
}

function checkDuplicateMarker(record: PartialRecord): void {
  const carriesData =
    record.topologies.length > 0 ||
    record.initialGeometries.length > 0 ||
    record.optimizedGeometry !== undefined ||
    record.errors !== undefined ||
    Object.keys(record.properties).length > 0;
  if (carriesData) {
    throw new InvalidPartialRecordError(
      record.id,
      "Duplicate marker must carry only id, duplicateOf and duplicatedBy"
    );
  }
}

/**
 * Lift one partial record into a merge state.
 *
 * The partial is cloned so the state never aliases caller-owned data.
 */
export function toMergeState(partial: PartialRecord): MergeState {
  const owned = structuredClone(partial);
  const links = {
    id: owned.id,
    duplicateOf: sortedUnion(owned.duplicateOf, []),
    duplicatedBy: owned.duplicatedBy !== undefined ? [owned.duplicatedBy] : [],
  };

  switch (owned.origin) {
    case "stage1":
      checkStageRecord(owned);
      return { ...links, stage1: owned };
    case "stage2":
      checkStageRecord(owned);
      return { ...links, stage2: owned };
    case "duplicate":
      checkDuplicateMarker(owned);
      return links;
  }
}

function pickStage(
  id: number,
  stage: Stage,
  a: PartialRecord | undefined,
  b: PartialRecord | undefined
): PartialRecord | undefined {
  if (a !== undefined && b !== undefined) {
    throw new DuplicateSourceError(id, stage);
  }
  return a ?? b;
}

/**
 * Combine two merge states for the same id. Commutative and associative.
 *
 * @throws DuplicateSourceError if both states already hold the same stage
 */
export function combineMergeStates(a: MergeState, b: MergeState): MergeState {
  if (a.id !== b.id) {
    throw new InvalidPartialRecordError(a.id, `Cannot merge conformer ${b.id} into ${a.id}`);
  }
  const stage1 = pickStage(a.id, "stage1", a.stage1, b.stage1);
  const stage2 = pickStage(a.id, "stage2", a.stage2, b.stage2);
  return {
    id: a.id,
    ...(stage1 !== undefined && { stage1 }),
    ...(stage2 !== undefined && { stage2 }),
    duplicateOf: sortedUnion(a.duplicateOf, b.duplicateOf),
    duplicatedBy: sortedUnion(a.duplicatedBy, b.duplicatedBy),
  };
}

// A geometry reported by one stage only disagrees on presence.
function optionalGeometriesMatch(
  a: Geometry | undefined,
  b: Geometry | undefined,
  settings: ComparisonSettings
): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return geometriesMatch(a, b, settings);
}

/**
 * Names of every stage-1/stage-2 field pair that disagrees.
 */
function findConflictingFields(
  stage1: PartialRecord,
  stage2: PartialRecord,
  settings: ComparisonSettings
): string[] {
  const fields: string[] = [];

  if (stage1.errors !== undefined && stage2.errors !== undefined) {
    for (const field of STAGE1_ERROR_FIELDS) {
      if (!scalarsMatch(stage1.errors[field], stage2.errors[field], settings)) {
        fields.push(field);
      }
    }
  }

  for (const name of Object.keys(stage1.properties).sort()) {
    const before = stage1.properties[name];
    const after = stage2.properties[name];
    if (before === undefined || after === undefined) {
      continue;
    }
    if (!propertyValuesMatch(before.value, after.value, settings)) {
      fields.push(name);
    }
  }

  const initial1 = stage1.initialGeometries[0];
  const initial2 = stage2.initialGeometries[0];
  if (!optionalGeometriesMatch(initial1, initial2, settings)) {
    fields.push("initialGeometry");
  }

  const optimized1 = stage1.optimizedGeometry;
  const optimized2 = stage2.optimizedGeometry;
  if (!optionalGeometriesMatch(optimized1, optimized2, settings)) {
    fields.push("optimizedGeometry");
  }

  return fields;
}

function checkTopologies(id: number, stage1: PartialRecord | undefined, stage2: PartialRecord | undefined): void {
  if (stage1 !== undefined && stage2 !== undefined && !isDeepStrictEqual(stage1.topologies, stage2.topologies)) {
    throw new TopologyMismatchError(id, `Stage 1 and stage 2 topologies differ for conformer ${id}`);
  }
  const declared = (stage2 ?? stage1)?.topologies[0];
  if (declared !== undefined && declared.topologyId !== topologyIdOf(id)) {
    throw new TopologyMismatchError(
      id,
      `Conformer ${id} declares topology ${declared.topologyId}, expected ${topologyIdOf(id)}`
    );
  }
}

/**
 * Apply the stage precedence rules to a fully reduced state.
 */
export function finalizeMergeState(state: MergeState, options: MergeOptions = {}): MergeResult {
  const settings = options.config ?? DEFAULT_RECONCILE_CONFIG;
  const metrics = options.metrics ?? NOOP_METRICS;
  const { id, stage1, stage2 } = state;
  const conflicts: MergeConflict[] = [];

  checkTopologies(id, stage1, stage2);

  if (stage1 !== undefined && stage2 !== undefined) {
    const conflictingFields = findConflictingFields(stage1, stage2, settings);
    if (conflictingFields.length > 0) {
      conflicts.push({
        kind: "numeric",
        id,
        conflictingFields,
        stage1: snapshotForConflict(stage1),
        stage2: snapshotForConflict(stage2),
      });
    }
  }

  const [firstLink] = state.duplicatedBy;
  if (state.duplicatedBy.length > 1 && firstLink !== undefined) {
    conflicts.push({
      kind: "duplicate-link",
      id,
      candidates: state.duplicatedBy,
      kept: firstLink,
    });
  }

  // Stage 2 wins every field it reports; stage-1-only data is kept.
  const properties: Record<string, PropertyValue> = {
    ...stage1?.properties,
    ...stage2?.properties,
  };
  const initialGeometries =
    stage2 !== undefined && stage2.initialGeometries.length > 0
      ? stage2.initialGeometries
      : (stage1?.initialGeometries ?? []);
  const optimizedGeometry = stage2?.optimizedGeometry ?? stage1?.optimizedGeometry;

  const primary: CanonicalRecord = {
    id,
    topologies: (stage2 ?? stage1)?.topologies ?? [],
    initialGeometries,
    ...(optimizedGeometry !== undefined && { optimizedGeometry }),
    properties,
    errors: stage2?.errors ?? stage1?.errors ?? { ...EMPTY_ERROR_CODES },
    duplicateOf: state.duplicateOf,
    ...(firstLink !== undefined && { duplicatedBy: firstLink }),
    fate: "UNDEFINED",
  };

  metrics.increment("merged_records");
  if (conflicts.length > 0) {
    metrics.increment("merge_conflicts", conflicts.length);
  }

  return { primary, secondary: conflicts };
}

/**
 * Merge every partial record of one conformer id.
 *
 * @throws DuplicateSourceError, TopologyMismatchError, InvalidPartialRecordError
 */
export function mergePartialRecords(
  id: number,
  partials: Iterable<PartialRecord>,
  options: MergeOptions = {}
): MergeResult {
  let state: MergeState | undefined;
  for (const partial of partials) {
    if (partial.id !== id) {
      throw new InvalidPartialRecordError(id, `Group ${id} received a record for conformer ${partial.id}`);
    }
    const next = toMergeState(partial);
    state = state === undefined ? next : combineMergeStates(state, next);
  }
  if (state === undefined) {
    throw new InvalidPartialRecordError(id, `No partial records to merge for conformer ${id}`);
  }
  return finalizeMergeState(state, options);
}
