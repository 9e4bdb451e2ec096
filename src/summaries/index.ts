export {
  SummaryCountersSchema,
  TopologySummarySchema,
  SUMMARY_COUNTER_FIELDS,
  type SummaryCounters,
  type SummaryCounterField,
  type TopologySummary,
} from "./schema.js";

export {
  bareSummary,
  combineSummaries,
  emptyCounters,
  summariesForRecord,
  summaryToRow,
  SUMMARY_HEADER,
  SummaryMismatchError,
  TopologySummaryAccumulator,
} from "./aggregator.js";
