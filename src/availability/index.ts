export { isStandardEligible, projectByTier, toCompleteRecord, toStandardRecord } from "./filter.js";
