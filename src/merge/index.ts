/**
 * Merge engine.
 */

export {
  mergePartialRecords,
  toMergeState,
  combineMergeStates,
  finalizeMergeState,
  type MergeState,
  type MergeOptions,
  type MergeResult,
} from "./merge.js";

export {
  MERGE_CONFLICT_FIELDS,
  MERGE_CONFLICT_HEADER,
  STAGE1_ERROR_FIELDS,
  INITIAL_GEOMETRY_ENERGY,
  INITIAL_GEOMETRY_GRADIENT_NORM,
  OPTIMIZED_GEOMETRY_ENERGY,
  OPTIMIZED_GEOMETRY_GRADIENT_NORM,
  conflictToRow,
  snapshotForConflict,
  type MergeConflict,
  type NumericMergeConflict,
  type DuplicateLinkConflict,
  type MergeConflictField,
  type ConflictSnapshot,
  type ConflictSnapshotValue,
} from "./conflicts.js";

export {
  scalarsMatch,
  propertyValuesMatch,
  geometriesMatch,
  type ComparisonSettings,
} from "./compare.js";

export {
  DuplicateSourceError,
  TopologyMismatchError,
  InvalidPartialRecordError,
} from "./errors.js";
