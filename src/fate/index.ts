/**
 * Fate classification.
 */

export { classify, withFate, hasStage2Results } from "./classifier.js";
export {
  ERROR_FIELD_RULES,
  GEOMETRY_FAILURE_FATES,
  geometryFailureFate,
  faultyErrorFields,
  hasCalculationErrors,
  type ErrorFieldRule,
} from "./error-codes.js";
