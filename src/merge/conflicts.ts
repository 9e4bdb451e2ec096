/**
 * Merge conflict reports.
 *
 * Conflicts are data-quality findings, not failures: the merge still
 * produces its record and the conflict goes to the audit side channel.
 */

import type { ErrorField, PartialRecord } from "../records/schema.js";

/**
 * Error fields both stages report. Only these are compared at merge.
 */
export const STAGE1_ERROR_FIELDS = [
  "geometryStatus",
  "chargeStatus",
  "thermochemistryStatus",
  "frequencies",
] as const satisfies readonly ErrorField[];

/**
 * Property names stage 1 fills in and stage 2 recomputes.
 */
export const INITIAL_GEOMETRY_ENERGY = "initialGeometryEnergy";
export const INITIAL_GEOMETRY_GRADIENT_NORM = "initialGeometryGradientNorm";
export const OPTIMIZED_GEOMETRY_ENERGY = "optimizedGeometryEnergy";
export const OPTIMIZED_GEOMETRY_GRADIENT_NORM = "optimizedGeometryGradientNorm";

/**
 * Columns of the conflict snapshot, in audit row order.
 */
export const MERGE_CONFLICT_FIELDS = [
  ...STAGE1_ERROR_FIELDS,
  INITIAL_GEOMETRY_ENERGY,
  INITIAL_GEOMETRY_GRADIENT_NORM,
  OPTIMIZED_GEOMETRY_ENERGY,
  OPTIMIZED_GEOMETRY_GRADIENT_NORM,
  "hasInitialGeometry",
  "hasOptimizedGeometry",
] as const;

export type MergeConflictField = (typeof MERGE_CONFLICT_FIELDS)[number];

/** null = the source did not report the field */
export type ConflictSnapshotValue = number | boolean | null;

export type ConflictSnapshot = Readonly<Record<MergeConflictField, ConflictSnapshotValue>>;

/**
 * Stage 1 and stage 2 disagree beyond tolerance on at least one field.
 */
export interface NumericMergeConflict {
  readonly kind: "numeric";
  readonly id: number;
  /** Every field that disagreed, in comparison order */
  readonly conflictingFields: readonly string[];
  readonly stage1: ConflictSnapshot;
  readonly stage2: ConflictSnapshot;
}

/**
 * Partials for one id point at different primaries. The smallest is kept.
 */
export interface DuplicateLinkConflict {
  readonly kind: "duplicate-link";
  readonly id: number;
  readonly candidates: readonly number[];
  readonly kept: number;
}

export type MergeConflict = NumericMergeConflict | DuplicateLinkConflict;

function scalarProperty(record: PartialRecord, name: string): number | null {
  const property = record.properties[name];
  return property !== undefined && typeof property.value === "number" ? property.value : null;
}

/**
 * Capture the audit columns of one stage record.
 */
export function snapshotForConflict(record: PartialRecord): ConflictSnapshot {
  const errors = record.errors;
  return {
    geometryStatus: errors?.geometryStatus ?? null,
    chargeStatus: errors?.chargeStatus ?? null,
    thermochemistryStatus: errors?.thermochemistryStatus ?? null,
    frequencies: errors?.frequencies ?? null,
    initialGeometryEnergy: scalarProperty(record, INITIAL_GEOMETRY_ENERGY),
    initialGeometryGradientNorm: scalarProperty(record, INITIAL_GEOMETRY_GRADIENT_NORM),
    optimizedGeometryEnergy: scalarProperty(record, OPTIMIZED_GEOMETRY_ENERGY),
    optimizedGeometryGradientNorm: scalarProperty(record, OPTIMIZED_GEOMETRY_GRADIENT_NORM),
    hasInitialGeometry: record.initialGeometries.length > 0,
    hasOptimizedGeometry: record.optimizedGeometry !== undefined,
  };
}

/**
 * Header for flattened conflict rows.
 */
export const MERGE_CONFLICT_HEADER: readonly string[] = [
  "id",
  ...MERGE_CONFLICT_FIELDS.map((field) => `${field}_stage1`),
  ...MERGE_CONFLICT_FIELDS.map((field) => `${field}_stage2`),
];

/**
 * Flatten a numeric conflict into (id, stage-1 fields..., stage-2 fields...).
 */
export function conflictToRow(conflict: NumericMergeConflict): ConflictSnapshotValue[] {
  return [
    conflict.id,
    ...MERGE_CONFLICT_FIELDS.map((field) => conflict.stage1[field]),
    ...MERGE_CONFLICT_FIELDS.map((field) => conflict.stage2[field]),
  ];
}
