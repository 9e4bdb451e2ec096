/**
 * Keyed count statistics over final records.
 *
 * Each record yields (primaryKey, secondaryKey) pairs; counting them gives
 * (primaryKey, secondaryKey, count) rows. Counts from separate partitions
 * combine by summing, in any order.
 */

import { ERROR_FIELDS, type CanonicalRecord } from "../records/schema.js";

export type StatValue = readonly [primaryKey: string, secondaryKey: string | number];

export interface StatCount {
  readonly primaryKey: string;
  readonly secondaryKey: string | number;
  readonly count: number;
}

/** Counts indexed by encoded (primary, secondary) key */
export type StatCounts = ReadonlyMap<string, StatCount>;

export const STAT_HEADER: readonly string[] = ["primary_key", "secondary_key", "count"];

/**
 * Every error code with its value (zeros included), then the fate, the
 * number of initial geometries and the number of absorbed duplicates.
 */
export function recordStatValues(record: CanonicalRecord): StatValue[] {
  const values: StatValue[] = ERROR_FIELDS.map((field) => [field, record.errors[field]] as const);
  values.push(["fate", record.fate]);
  values.push(["num_initial_geometries", record.initialGeometries.length]);
  values.push(["num_duplicates", record.duplicateOf.length]);
  return values;
}

function statKey(primaryKey: string, secondaryKey: string | number): string {
  return JSON.stringify([primaryKey, secondaryKey]);
}

export function countStatValues(values: Iterable<StatValue>): StatCounts {
  const counts = new Map<string, StatCount>();
  for (const [primaryKey, secondaryKey] of values) {
    const key = statKey(primaryKey, secondaryKey);
    counts.set(key, { primaryKey, secondaryKey, count: (counts.get(key)?.count ?? 0) + 1 });
  }
  return counts;
}

/**
 * Sum count tables. Commutative and associative; the empty table is the identity.
 */
export function combineStatCounts(...tables: StatCounts[]): StatCounts {
  const totals = new Map<string, StatCount>();
  for (const table of tables) {
    for (const [key, entry] of table) {
      totals.set(key, { ...entry, count: (totals.get(key)?.count ?? 0) + entry.count });
    }
  }
  return totals;
}

/**
 * Rows sorted by primary key, then secondary key.
 */
export function statCountRows(counts: StatCounts): Array<[string, string | number, number]> {
  return Array.from(counts.values())
    .sort((a, b) => {
      if (a.primaryKey !== b.primaryKey) {
        return a.primaryKey < b.primaryKey ? -1 : 1;
      }
      return String(a.secondaryKey).localeCompare(String(b.secondaryKey), "en", { numeric: true });
    })
    .map((entry) => [entry.primaryKey, entry.secondaryKey, entry.count]);
}
