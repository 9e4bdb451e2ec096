/**
 * Default reconciliation configuration.
 */

import type { ReconcileConfig } from "./schema.js";

export const DEFAULT_RECONCILE_CONFIG: ReconcileConfig = {
  tolerance: 1e-6,
  invalidSentinel: -1,
  completeTiers: ["STANDARD", "COMPLETE"],
  standardTiers: ["STANDARD"],
  groupFailurePolicy: "abort",
};
