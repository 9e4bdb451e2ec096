export {
  combineStatCounts,
  countStatValues,
  recordStatValues,
  statCountRows,
  STAT_HEADER,
  type StatCount,
  type StatCounts,
  type StatValue,
} from "./stats.js";
