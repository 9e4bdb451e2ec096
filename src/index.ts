/**
 * Conformer record reconciliation.
 *
 * Merges stage-1, stage-2 and duplicate-list partials into one canonical
 * record per conformer, assigns each a fate, folds duplicates into their
 * primary, and produces per-topology summaries and tiered record views.
 *
 * @example
 *   const { reconcile, logger } = bootstrapReconciliation();
 *   const output = runReconciliation(
 *     { partials, topologies },
 *     { toolkit, config: reconcile, logger }
 *   );
 */

export * from "./records/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./metrics/index.js";
export * from "./merge/index.js";
export * from "./fate/index.js";
export * from "./structure/index.js";
export * from "./duplicates/index.js";
export * from "./summaries/index.js";
export * from "./availability/index.js";
export * from "./stats/index.js";
export * from "./ingest/index.js";
export * from "./pipeline/index.js";
