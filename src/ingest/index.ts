/**
 * Ingest helpers: parser outcome routing and the duplicate list.
 */

export {
  partitionParseOutcomes,
  KnownParseError,
  type ParseOutcome,
  type ParsedEntry,
  type FailedEntry,
  type PartitionedOutcomes,
} from "./parse-outcomes.js";

export {
  parseDuplicateListLine,
  parseLongIdentifier,
  markerFromDuplicatePair,
  markersFromDuplicateList,
  DuplicateListError,
  type DuplicatePair,
  type LongIdentifier,
} from "./duplicate-list.js";
