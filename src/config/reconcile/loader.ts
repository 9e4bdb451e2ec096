/**
 * Reconciliation configuration loader and validator.
 *
 * Responsible for:
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 * - Overlaying environment overrides on the defaults
 */

import type { ZodIssue } from "zod";
import { ReconcileConfigSchema, type ReconcileConfig } from "./schema.js";
import { DEFAULT_RECONCILE_CONFIG } from "./defaults.js";
import { optionalEnv, optionalEnvInt, optionalEnvNumber } from "../env.js";

/**
 * Structured validation error for reconciliation configuration.
 */
export class ReconcileConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "ReconcileConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Reconciliation configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    // Symbols never appear in config paths
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load reconciliation configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen ReconcileConfig
 * @throws ReconcileConfigError if validation fails
 */
export function loadReconcileConfig(input: unknown): Readonly<ReconcileConfig> {
  const result = ReconcileConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ReconcileConfigError(
      `Invalid reconciliation configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate reconciliation configuration without loading.
 */
export function validateReconcileConfig(input: unknown): {
  success: boolean;
  config?: ReconcileConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = ReconcileConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Load configuration from the defaults plus environment overrides:
 *   RECONCILE_TOLERANCE, RECONCILE_INVALID_SENTINEL, RECONCILE_GROUP_FAILURE_POLICY
 */
export function reconcileConfigFromEnv(
  base: ReconcileConfig = DEFAULT_RECONCILE_CONFIG
): Readonly<ReconcileConfig> {
  return loadReconcileConfig({
    ...base,
    tolerance: optionalEnvNumber("RECONCILE_TOLERANCE", base.tolerance),
    invalidSentinel: optionalEnvInt("RECONCILE_INVALID_SENTINEL", base.invalidSentinel),
    groupFailurePolicy: optionalEnv("RECONCILE_GROUP_FAILURE_POLICY", base.groupFailurePolicy),
  });
}
