export {
  runReconciliation,
  type GroupFailure,
  type GroupStage,
  type ReconciliationInput,
  type ReconciliationOutput,
  type RunOptions,
} from "./runner.js";

export {
  bootstrapReconciliation,
  type BootstrapOptions,
  type ReconciliationRuntime,
} from "./bootstrap.js";
