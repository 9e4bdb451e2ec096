/**
 * Fate classifier tests.
 *
 * Run: node --import tsx src/fate/classifier.test.ts
 *
 * The geometryStatus=3 success rule and the inverted singlePointCheck field
 * are legacy semantics; the tests below pin them down so nobody "fixes" them.
 */

import { strict as assert } from "node:assert";

import {
  classify,
  withFate,
  faultyErrorFields,
  hasCalculationErrors,
  GEOMETRY_FAILURE_FATES,
} from "./index.js";
import { createCounterMetrics } from "../metrics/index.js";
import { EMPTY_ERROR_CODES, Fate, type CanonicalRecord, type ErrorCodes } from "../records/index.js";
import { FIXTURE_ID, makeCanonical, makeErrors, makeStage1 } from "../testing/fixtures.js";
import { test, section, finish } from "../testing/harness.js";

/** Successful stage-2 error report with overrides */
function stage2Errors(overrides: Partial<ErrorCodes>): ErrorCodes {
  return makeErrors({ singlePointCheck: 1, ...overrides });
}

const STAGE1_ONLY_PROPERTIES = makeStage1().properties;

// ═══════════════════════════════════════════════════════════════════════════
// RULE ORDER
// ═══════════════════════════════════════════════════════════════════════════

section("Rule order");

test("duplicate of a conformer in the same topology", () => {
  assert.equal(classify(makeCanonical({ duplicatedBy: FIXTURE_ID + 1 })), "DUPLICATE_SAME_TOPOLOGY");
});

test("duplicate of a conformer in another topology", () => {
  assert.equal(classify(makeCanonical({ duplicatedBy: FIXTURE_ID + 1000 })), "DUPLICATE_DIFFERENT_TOPOLOGY");
});

test("duplicate rule wins over errors and missing results", () => {
  const record = makeCanonical({
    duplicatedBy: FIXTURE_ID + 2,
    properties: {},
    errors: stage2Errors({ geometryStatus: 2, frequencies: 9 }),
  });
  assert.equal(classify(record), "DUPLICATE_SAME_TOPOLOGY");
});

test("record without stage-2 properties has no calculation results", () => {
  assert.equal(classify(makeCanonical({ properties: STAGE1_ONLY_PROPERTIES })), "NO_CALCULATION_RESULTS");
  assert.equal(classify(makeCanonical({ properties: {} })), "NO_CALCULATION_RESULTS");
});

test("missing results are checked before geometry failures", () => {
  const record = makeCanonical({
    properties: STAGE1_ONLY_PROPERTIES,
    errors: makeErrors({ geometryStatus: 2 }),
  });
  assert.equal(classify(record), "NO_CALCULATION_RESULTS");
});

for (const [status, fate] of GEOMETRY_FAILURE_FATES) {
  test(`geometryStatus ${status} maps to ${fate}`, () => {
    assert.equal(classify(makeCanonical({ errors: stage2Errors({ geometryStatus: status }) })), fate);
  });
}

test("geometry failure wins over other faults", () => {
  const errors = stage2Errors({ geometryStatus: 5, frequencies: 1, singlePointCheck: 0 });
  assert.equal(classify(makeCanonical({ errors })), "DISASSOCIATED");
});

test("clean stage-2 record is a success", () => {
  assert.equal(classify(makeCanonical()), "SUCCESS");
});

// ═══════════════════════════════════════════════════════════════════════════
// ERROR FIELD QUIRKS
// ═══════════════════════════════════════════════════════════════════════════

section("Error field quirks");

test("geometryStatus 3 counts as success (legacy)", () => {
  assert.equal(classify(makeCanonical({ errors: stage2Errors({ geometryStatus: 3 }) })), "SUCCESS");
  assert.equal(hasCalculationErrors(stage2Errors({ geometryStatus: 3 })), false);
});

test("unknown geometryStatus is a calculation error", () => {
  assert.equal(classify(makeCanonical({ errors: stage2Errors({ geometryStatus: 999 }) })), "CALCULATION_WITH_ERROR");
  assert.deepEqual(faultyErrorFields(stage2Errors({ geometryStatus: 0 })), ["geometryStatus"]);
});

test("singlePointCheck of 0 is an error (inverted polarity, legacy)", () => {
  assert.equal(classify(makeCanonical({ errors: stage2Errors({ singlePointCheck: 0 }) })), "CALCULATION_WITH_ERROR");
  assert.deepEqual(faultyErrorFields(stage2Errors({ singlePointCheck: 0 })), ["singlePointCheck"]);
});

test("any nonzero singlePointCheck is success", () => {
  assert.equal(classify(makeCanonical({ errors: stage2Errors({ singlePointCheck: 7 }) })), "SUCCESS");
});

for (const field of ["chargeStatus", "thermochemistryStatus", "frequencies", "atomicAnalysis", "nmrAnalysis", "excitedStates"] as const) {
  test(`nonzero ${field} is a calculation error`, () => {
    const errors = stage2Errors({});
    errors[field] = 123;
    assert.deepEqual(faultyErrorFields(errors), [field]);
    assert.equal(classify(makeCanonical({ errors })), "CALCULATION_WITH_ERROR");
  });
}

test("empty error codes fault on both non-zero-success fields", () => {
  assert.deepEqual(faultyErrorFields(EMPTY_ERROR_CODES), ["geometryStatus", "singlePointCheck"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// TOTALITY AND PURITY
// ═══════════════════════════════════════════════════════════════════════════

section("Totality and purity");

test("every combination maps to exactly one defined fate, deterministically", () => {
  const seen = new Set<Fate>();
  const propertySets: CanonicalRecord["properties"][] = [{}, STAGE1_ONLY_PROPERTIES, makeCanonical().properties];
  for (const duplicatedBy of [undefined, FIXTURE_ID + 1, FIXTURE_ID + 1000]) {
    for (const properties of propertySets) {
      for (const geometryStatus of [0, 1, 2, 3, 4, 5, 6, 7, -1]) {
        for (const singlePointCheck of [0, 1]) {
          const record: CanonicalRecord = makeCanonical({
            properties,
            errors: makeErrors({ geometryStatus, singlePointCheck }),
            ...(duplicatedBy !== undefined && { duplicatedBy }),
          });
          const fate = classify(record);
          assert.ok(Fate.options.includes(fate));
          assert.notEqual(fate, "UNDEFINED");
          assert.equal(classify(record), fate);
          seen.add(fate);
        }
      }
    }
  }
  assert.equal(seen.size, Fate.options.length - 1);
});

test("withFate returns a new record and leaves the input untouched", () => {
  const metrics = createCounterMetrics();
  const record = makeCanonical();
  const classified = withFate(record, metrics);
  assert.equal(record.fate, "UNDEFINED");
  assert.equal(classified.fate, "SUCCESS");
  assert.deepEqual({ ...classified, fate: "UNDEFINED" }, record);
  assert.equal(metrics.get("classified_records"), 1);
});

test("classification ignores a previously assigned fate", () => {
  assert.equal(classify(makeCanonical({ fate: "DISASSOCIATED" })), "SUCCESS");
});

finish("Fate classifier");
