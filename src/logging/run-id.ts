/**
 * Run ID for tracing log lines back to one reconciliation job.
 */

import { randomBytes } from "node:crypto";

const RUN_ID_PATTERN = /^[0-9]{8}-[0-9a-f]{6}$/;

/**
 * Generate a short run ID: date prefix + random suffix (e.g. "20240115-a1b2c3").
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this process.
 *
 * Workers re-executing a partition of an existing job pass that job's ID so
 * their log lines correlate with the original attempt.
 */
export function initRunId(existing?: string): string {
  if (existing !== undefined && !RUN_ID_PATTERN.test(existing)) {
    throw new Error(`Malformed run ID: ${existing}`);
  }
  currentRunId = existing ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
