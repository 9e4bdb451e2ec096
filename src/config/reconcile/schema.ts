/**
 * Reconciliation configuration schema.
 *
 * The configuration is validated once, frozen, and handed to every component
 * that needs it. A run never changes it midway: merge tolerances and view
 * tiers must be the same for every partition of the same job.
 */

import { z } from "zod";
import { Tier } from "../../records/schema.js";

/**
 * What the in-process runner does with a group that hits a structural error.
 *
 * abort → rethrow and stop the run
 * skip  → log, record the failure, continue with the next group
 */
export const GroupFailurePolicy = z.enum(["abort", "skip"]);
export type GroupFailurePolicy = z.infer<typeof GroupFailurePolicy>;

export const ReconcileConfigSchema = z
  .object({
    /** Absolute tolerance for numeric comparisons during merge */
    tolerance: z
      .number()
      .nonnegative()
      .describe("Values closer than this are treated as equal when merging stages"),

    /** Stage-2 value that marks an intentionally invalid measurement */
    invalidSentinel: z
      .number()
      .describe("A stage-2 value equal to this is kept without a conflict check"),

    /** Tiers retained by the complete view */
    completeTiers: z.array(Tier).min(1),

    /** Tiers retained by the standard view */
    standardTiers: z.array(Tier).min(1),

    groupFailurePolicy: GroupFailurePolicy,
  })
  .strict();

export type ReconcileConfig = z.infer<typeof ReconcileConfigSchema>;
