/**
 * Canonical structure checks against the external toolkit.
 */

export type { StructureToolkit } from "./toolkit.js";
export {
  CanonicalCompareResult,
  CANONICAL_MISMATCH_HEADER,
  compareCanonical,
  checkCanonicalStructure,
  type CanonicalComparison,
  type CanonicalMismatch,
  type StructureCheckResult,
} from "./check.js";
