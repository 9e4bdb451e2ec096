/**
 * Tolerance comparisons between stage-1 and stage-2 values.
 *
 * A stage-2 value equal to the invalid sentinel always matches: it marks a
 * measurement stage 2 invalidated.
 */

import type { Geometry, PropertyValue } from "../records/schema.js";

export interface ComparisonSettings {
  readonly tolerance: number;
  readonly invalidSentinel: number;
}

export function scalarsMatch(
  stage1: number,
  stage2: number,
  settings: ComparisonSettings
): boolean {
  if (stage2 === settings.invalidSentinel) {
    return true;
  }
  return Math.abs(stage1 - stage2) <= settings.tolerance;
}

export function propertyValuesMatch(
  stage1: PropertyValue["value"],
  stage2: PropertyValue["value"],
  settings: ComparisonSettings
): boolean {
  if (typeof stage1 === "number" && typeof stage2 === "number") {
    return scalarsMatch(stage1, stage2, settings);
  }
  if (Array.isArray(stage1) && Array.isArray(stage2)) {
    return (
      stage1.length === stage2.length &&
      stage1.every((value, i) => scalarsMatch(value, stage2[i], settings))
    );
  }
  return false;
}

export function geometriesMatch(
  stage1: Geometry,
  stage2: Geometry,
  settings: ComparisonSettings
): boolean {
  if (stage1.atoms.length !== stage2.atoms.length) {
    return false;
  }
  return stage1.atoms.every((a, i) => {
    const b = stage2.atoms[i];
    return (
      b !== undefined &&
      Math.abs(a.x - b.x) <= settings.tolerance &&
      Math.abs(a.y - b.y) <= settings.tolerance &&
      Math.abs(a.z - b.z) <= settings.tolerance
    );
  });
}
