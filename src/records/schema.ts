/**
 * Conformer record schema and type definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ONE CANONICAL RECORD PER CONFORMER ID
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Up to three independent sources describe the same conformer:
 *   1. Stage 1:   the first computation pass (initial geometry, few properties)
 *   2. Stage 2:   the refinement pass (full property set, normal modes, ...)
 *   3. Duplicate: markers read from the duplicate list (id + links only)
 *
 * Each source produces a PartialRecord. The merge engine folds every partial
 * sharing an id into exactly one CanonicalRecord, which then flows through
 * classification, duplicate resolution, aggregation and tiered projection.
 *
 * Records are plain immutable values. Every stage returns a new record; none
 * mutates the one it was given.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { z } from "zod";

/**
 * Where a partial record came from.
 */
export const RecordOrigin = z.enum(["stage1", "stage2", "duplicate"]);
export type RecordOrigin = z.infer<typeof RecordOrigin>;

/**
 * The two computation passes. Property values remember which one produced them.
 */
export const Stage = z.enum(["stage1", "stage2"]);
export type Stage = z.infer<typeof Stage>;

/**
 * Visibility tier of a computed property.
 *
 * STANDARD      → published in every view
 * COMPLETE      → published in the complete view only
 * INTERNAL_ONLY → never published
 */
export const Tier = z.enum(["STANDARD", "COMPLETE", "INTERNAL_ONLY"]);
export type Tier = z.infer<typeof Tier>;

/**
 * Terminal outcome of a record. UNDEFINED until the fate classifier runs.
 */
export const Fate = z.enum([
  "UNDEFINED",
  "DUPLICATE_SAME_TOPOLOGY",
  "DUPLICATE_DIFFERENT_TOPOLOGY",
  "GEOMETRY_OPTIMIZATION_PROBLEM",
  "DISASSOCIATED",
  "FORCE_CONSTANT_FAILURE",
  "DISCARDED_OTHER",
  "NO_CALCULATION_RESULTS",
  "CALCULATION_WITH_ERROR",
  "SUCCESS",
]);
export type Fate = z.infer<typeof Fate>;

/** Ids above 2^53 - 1 would be rounded, so they are rejected. */
export const EntityIdSchema = z.number().int().nonnegative().safe();

export const BondSchema = z
  .object({
    atomA: z.number().int().nonnegative(),
    atomB: z.number().int().nonnegative(),
    order: z.number().int().min(1).max(3),
  })
  .strict();

export type Bond = z.infer<typeof BondSchema>;

/**
 * Bonding/connectivity descriptor shared by every conformer of one topology.
 */
export const TopologyDescriptorSchema = z
  .object({
    topologyId: EntityIdSchema,
    /** Element symbols, one per atom (hydrogens included) */
    atoms: z.array(z.string().min(1)),
    bonds: z.array(BondSchema),
    /** Canonical string form as supplied by the producer, if any */
    canonicalForm: z.string().optional(),
  })
  .strict();

export type TopologyDescriptor = z.infer<typeof TopologyDescriptorSchema>;

export const Vector3Schema = z
  .object({
    x: z.number(),
    y: z.number(),
    z: z.number(),
  })
  .strict();

export type Vector3 = z.infer<typeof Vector3Schema>;

export const GeometrySchema = z
  .object({
    atoms: z.array(Vector3Schema),
  })
  .strict();

export type Geometry = z.infer<typeof GeometrySchema>;

/**
 * A computed property. Vectors hold per-mode or per-atom series (normal modes, charges).
 */
export const PropertyValueSchema = z
  .object({
    value: z.union([z.number(), z.array(z.number())]),
    tier: Tier,
    source: Stage,
  })
  .strict();

export type PropertyValue = z.infer<typeof PropertyValueSchema>;

/**
 * Integer status codes reported by the computations.
 *
 * Most fields report 0 for "no error". Two do not; see fate/error-codes.ts
 * for the per-field rule table.
 */
export const ErrorCodesSchema = z
  .object({
    geometryStatus: z.number().int(),
    chargeStatus: z.number().int(),
    thermochemistryStatus: z.number().int(),
    frequencies: z.number().int(),
    atomicAnalysis: z.number().int(),
    nmrAnalysis: z.number().int(),
    excitedStates: z.number().int(),
    singlePointCheck: z.number().int(),
  })
  .strict();

export type ErrorCodes = z.infer<typeof ErrorCodesSchema>;
export type ErrorField = keyof ErrorCodes;

/** Declared field order, used for stats and audit rows. */
export const ERROR_FIELDS: readonly ErrorField[] = ErrorCodesSchema.keyof().options;

/**
 * Error codes before any computation reported. Every field is zero.
 */
export const EMPTY_ERROR_CODES: Readonly<ErrorCodes> = Object.freeze({
  geometryStatus: 0,
  chargeStatus: 0,
  thermochemistryStatus: 0,
  frequencies: 0,
  atomicAnalysis: 0,
  nmrAnalysis: 0,
  excitedStates: 0,
  singlePointCheck: 0,
});

/**
 * One source's view of a conformer, as handed over by the parsers or the
 * duplicate-list reader.
 */
export const PartialRecordSchema = z
  .object({
    id: EntityIdSchema,
    origin: RecordOrigin,
    topologies: z.array(TopologyDescriptorSchema).default([]),
    initialGeometries: z.array(GeometrySchema).default([]),
    optimizedGeometry: GeometrySchema.optional(),
    properties: z.record(z.string(), PropertyValueSchema).default({}),
    errors: ErrorCodesSchema.optional(),
    duplicateOf: z.array(EntityIdSchema).default([]),
    duplicatedBy: EntityIdSchema.optional(),
  })
  .strict()
  .superRefine((record, ctx) => {
    for (const [name, property] of Object.entries(record.properties)) {
      if (property.source !== record.origin) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["properties", name, "source"],
          message: `Property from ${property.source} in a ${record.origin} record`,
        });
      }
    }
  });

export type PartialRecord = z.infer<typeof PartialRecordSchema>;

/**
 * The merged conformer.
 */
export interface CanonicalRecord {
  readonly id: number;
  readonly topologies: readonly TopologyDescriptor[];
  readonly initialGeometries: readonly Geometry[];
  readonly optimizedGeometry?: Geometry;
  readonly properties: Readonly<Record<string, PropertyValue>>;
  readonly errors: Readonly<ErrorCodes>;
  /** Ids absorbed into this record, ascending and unique */
  readonly duplicateOf: readonly number[];
  /** Set when this record was absorbed into another one */
  readonly duplicatedBy?: number;
  readonly fate: Fate;
}
