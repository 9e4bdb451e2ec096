/**
 * Routing of parser output.
 *
 * The stage parsers yield, per entry, the raw text they read plus either a
 * record or the error they hit. Successes continue into the merge; known and
 * unknown failures go to separate audit sinks with their raw text intact.
 */

import {
  PartialRecordValidationError,
  validatePartialRecord,
} from "../records/loader.js";
import type { PartialRecord, Stage } from "../records/schema.js";
import { NOOP_METRICS, type MetricsSink } from "../metrics/sink.js";

/**
 * A failure the parser recognised and described (a malformed block, a
 * computation that wrote an error banner, ...).
 */
export class KnownParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "KnownParseError";
  }
}

export interface ParseOutcome {
  /** Entry text as read */
  raw: string;
  /** Unvalidated record, or the error the parser hit */
  result: unknown;
}

export interface ParsedEntry {
  raw: string;
  record: PartialRecord;
}

export interface FailedEntry {
  raw: string;
  error: Error;
}

export interface PartitionedOutcomes {
  success: ParsedEntry[];
  knownErrors: FailedEntry[];
  unknownErrors: FailedEntry[];
}

function classifyOutcome(stage: Stage, outcome: ParseOutcome): ParsedEntry | FailedEntry {
  const { raw, result } = outcome;
  if (result instanceof Error) {
    return { raw, error: result };
  }

  const validation = validatePartialRecord(result);
  if (!validation.success || validation.record === undefined) {
    return {
      raw,
      error: new PartialRecordValidationError("Parser produced an invalid record", validation.errors ?? []),
    };
  }
  if (validation.record.origin !== stage) {
    return {
      raw,
      error: new PartialRecordValidationError(`Expected a ${stage} record`, [
        { path: ["origin"], message: `Got ${validation.record.origin}`, code: "custom" },
      ]),
    };
  }
  return { raw, record: validation.record };
}

/**
 * Split parser outcomes for one stage into success, known and unknown errors.
 *
 * Records failing schema validation count as unknown errors.
 */
export function partitionParseOutcomes(
  stage: Stage,
  outcomes: Iterable<ParseOutcome>,
  metrics: MetricsSink = NOOP_METRICS
): PartitionedOutcomes {
  const partitioned: PartitionedOutcomes = { success: [], knownErrors: [], unknownErrors: [] };

  for (const outcome of outcomes) {
    const entry = classifyOutcome(stage, outcome);
    if ("record" in entry) {
      metrics.increment(`${stage}_parse_success`);
      partitioned.success.push(entry);
    } else if (entry.error instanceof KnownParseError) {
      metrics.increment(`${stage}_parse_known_error`);
      partitioned.knownErrors.push(entry);
    } else {
      metrics.increment(`${stage}_parse_unknown_error`);
      partitioned.unknownErrors.push(entry);
    }
  }

  return partitioned;
}
