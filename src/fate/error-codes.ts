/**
 * Error code interpretation table.
 *
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║  LEGACY SEMANTICS: the two exceptions below are intentional. The codes    ║
 * ║  come from upstream computations that will not change; downstream data    ║
 * ║  depends on these readings. Do not normalise them.                        ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 *   geometryStatus    → success is 1, and 3 is ALSO success
 *   singlePointCheck  → inverted polarity: 0 is the error, nonzero is success
 *
 * Every other field reports 0 for success.
 */

import { ERROR_FIELDS, type ErrorCodes, type ErrorField, type Fate } from "../records/schema.js";

export interface ErrorFieldRule {
  /** Whether this value means the computation behind the field succeeded */
  isSuccess(value: number): boolean;
  description: string;
}

const ZERO_IS_SUCCESS: ErrorFieldRule = {
  isSuccess: (value) => value === 0,
  description: "0 is success",
};

export const ERROR_FIELD_RULES: Readonly<Record<ErrorField, ErrorFieldRule>> = {
  geometryStatus: {
    // 3 counts as success too (legacy)
    isSuccess: (value) => value === 1 || value === 3,
    description: "1 or 3 is success",
  },
  chargeStatus: ZERO_IS_SUCCESS,
  thermochemistryStatus: ZERO_IS_SUCCESS,
  frequencies: ZERO_IS_SUCCESS,
  atomicAnalysis: ZERO_IS_SUCCESS,
  nmrAnalysis: ZERO_IS_SUCCESS,
  excitedStates: ZERO_IS_SUCCESS,
  singlePointCheck: {
    // Inverted polarity (legacy)
    isSuccess: (value) => value !== 0,
    description: "nonzero is success, 0 is an error",
  },
};

/**
 * geometryStatus values naming a known geometry-optimization failure.
 */
export const GEOMETRY_FAILURE_FATES: ReadonlyMap<number, Fate> = new Map<number, Fate>([
  [2, "GEOMETRY_OPTIMIZATION_PROBLEM"],
  [4, "FORCE_CONSTANT_FAILURE"],
  [5, "DISASSOCIATED"],
  [6, "DISCARDED_OTHER"],
]);

export function geometryFailureFate(errors: ErrorCodes): Fate | undefined {
  return GEOMETRY_FAILURE_FATES.get(errors.geometryStatus);
}

/**
 * Fields whose value signals a fault, in declaration order.
 */
export function faultyErrorFields(errors: ErrorCodes): ErrorField[] {
  const faulty: ErrorField[] = [];
  for (const field of ERROR_FIELDS) {
    if (!ERROR_FIELD_RULES[field].isSuccess(errors[field])) {
      faulty.push(field);
    }
  }
  return faulty;
}

export function hasCalculationErrors(errors: ErrorCodes): boolean {
  return faultyErrorFields(errors).length > 0;
}
