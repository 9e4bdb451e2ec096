/**
 * Conformer record model.
 */

export {
  RecordOrigin,
  Stage,
  Tier,
  Fate,
  EntityIdSchema,
  BondSchema,
  TopologyDescriptorSchema,
  Vector3Schema,
  GeometrySchema,
  PropertyValueSchema,
  ErrorCodesSchema,
  PartialRecordSchema,
  ERROR_FIELDS,
  EMPTY_ERROR_CODES,
  type Bond,
  type TopologyDescriptor,
  type Vector3,
  type Geometry,
  type PropertyValue,
  type ErrorCodes,
  type ErrorField,
  type PartialRecord,
  type CanonicalRecord,
} from "./schema.js";

export {
  CONFORMERS_PER_TOPOLOGY,
  topologyIdOf,
  withinTopologyIndexOf,
  makeEntityId,
  sameTopology,
} from "./ids.js";

export { ReconciliationError, UnclassifiedRecordError } from "./errors.js";

export {
  loadPartialRecord,
  validatePartialRecord,
  PartialRecordValidationError,
  type RecordValidationIssue,
} from "./loader.js";
