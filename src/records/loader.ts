/**
 * Partial record validation.
 *
 * Parsers and the duplicate-list reader hand over untyped objects. These are
 * checked against PartialRecordSchema before they enter the merge engine, so
 * every later stage can rely on the record shape.
 */

import type { ZodIssue } from "zod";
import { PartialRecordSchema, type PartialRecord } from "./schema.js";

/**
 * Individual schema issue.
 */
export interface RecordValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Structured validation error for partial records.
 */
export class PartialRecordValidationError extends Error {
  public readonly issues: RecordValidationIssue[];

  constructor(message: string, issues: RecordValidationIssue[]) {
    super(message);
    this.name = "PartialRecordValidationError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Partial record validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function toIssues(zodIssues: ZodIssue[]): RecordValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate one partial record.
 *
 * @throws PartialRecordValidationError if the input does not match the schema
 */
export function loadPartialRecord(input: unknown): PartialRecord {
  const result = PartialRecordSchema.safeParse(input);
  if (!result.success) {
    const issues = toIssues(result.error.issues);
    throw new PartialRecordValidationError(
      `Invalid partial record: ${issues.length} validation error(s)`,
      issues
    );
  }
  return result.data;
}

/**
 * Validate a partial record without throwing.
 */
export function validatePartialRecord(input: unknown): {
  success: boolean;
  record?: PartialRecord;
  errors?: RecordValidationIssue[];
} {
  const result = PartialRecordSchema.safeParse(input);
  if (result.success) {
    return { success: true, record: result.data };
  }
  return { success: false, errors: toIssues(result.error.issues) };
}
