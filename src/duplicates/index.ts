export {
  duplicateGroupKey,
  groupByDuplicateKey,
  resolveDuplicateGroup,
  type DuplicateResolution,
  type ResolveOptions,
  type UnmatchedDuplicate,
} from "./resolver.js";

export { DuplicateGroupError } from "./errors.js";
