/**
 * Per-topology summary shape.
 *
 * Counter order below is the declared order of every summary row.
 */

import { z } from "zod";
import { TopologyDescriptorSchema } from "../records/schema.js";

const counter = z.number().int().nonnegative();

export const SummaryCountersSchema = z
  .object({
    attempted: counter,
    keptGeometry: counter,
    duplicatesSameTopology: counter,
    duplicatesDifferentTopology: counter,
    failedGeometryOptimization: counter,
    missingCalculation: counter,
    calculationWithError: counter,
    calculationSuccess: counter,
    detectedMatchWithError: counter,
    detectedMatchSuccess: counter,
  })
  .strict();

export type SummaryCounters = z.infer<typeof SummaryCountersSchema>;
export type SummaryCounterField = keyof SummaryCounters;

export const SUMMARY_COUNTER_FIELDS: readonly SummaryCounterField[] = SummaryCountersSchema.keyof().options;

export const TopologySummarySchema = z
  .object({
    topology: TopologyDescriptorSchema,
    counters: SummaryCountersSchema,
  })
  .strict();

export type TopologySummary = z.infer<typeof TopologySummarySchema>;
