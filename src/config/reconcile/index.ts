/**
 * Reconciliation configuration module.
 *
 * Usage:
 *   import { loadReconcileConfig, DEFAULT_RECONCILE_CONFIG } from "./config/reconcile/index.js";
 *
 *   const config = loadReconcileConfig(DEFAULT_RECONCILE_CONFIG);
 *
 *   const loose = loadReconcileConfig({ ...DEFAULT_RECONCILE_CONFIG, tolerance: 1e-4 });
 */

export {
  ReconcileConfigSchema,
  GroupFailurePolicy,
  type ReconcileConfig,
} from "./schema.js";

export {
  loadReconcileConfig,
  validateReconcileConfig,
  reconcileConfigFromEnv,
  ReconcileConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_RECONCILE_CONFIG } from "./defaults.js";
