/**
 * Canonical structure check tests.
 *
 * Run: node --import tsx src/structure/check.test.ts
 */

import { strict as assert } from "node:assert";

import { checkCanonicalStructure, compareCanonical, CANONICAL_MISMATCH_HEADER } from "./index.js";
import { createCounterMetrics } from "../metrics/index.js";
import { FAKE_TOOLKIT, FIXTURE_ID, makeCanonical, makeTopology } from "../testing/fixtures.js";
import { test, section, finish } from "../testing/harness.js";

section("compareCanonical");

test("matching form without hydrogens is a MATCH", () => {
  assert.deepEqual(compareCanonical(makeTopology({ canonicalForm: "CNO" }), FAKE_TOOLKIT), {
    result: "MATCH",
    withHydrogens: "CNOHH",
    withoutHydrogens: "CNO",
  });
});

test("form with hydrogens does not count as a match", () => {
  assert.equal(compareCanonical(makeTopology({ canonicalForm: "CNOHH" }), FAKE_TOOLKIT).result, "MISMATCH");
});

test("absent or empty form is MISSING", () => {
  assert.equal(compareCanonical(makeTopology({ canonicalForm: undefined }), FAKE_TOOLKIT).result, "MISSING");
  assert.equal(compareCanonical(makeTopology({ canonicalForm: "" }), FAKE_TOOLKIT).result, "MISSING");
});

section("checkCanonicalStructure");

test("match leaves the record as it is", () => {
  const record = makeCanonical({ topologies: [makeTopology({ canonicalForm: "CNO" })] });
  const { primary, secondary } = checkCanonicalStructure(record, FAKE_TOOLKIT);
  assert.equal(primary, record);
  assert.deepEqual(secondary, []);
});

test("mismatch is reported and the recomputed form replaces the given one", () => {
  const metrics = createCounterMetrics();
  const record = makeCanonical();
  const { primary, secondary } = checkCanonicalStructure(record, FAKE_TOOLKIT, metrics);
  assert.deepEqual(secondary, [
    { id: FIXTURE_ID, result: "MISMATCH", given: "CN=O", withHydrogens: "CNOHH", withoutHydrogens: "CNO" },
  ]);
  assert.equal(primary.topologies[0]?.canonicalForm, "CNO");
  assert.equal(record.topologies[0]?.canonicalForm, "CN=O");
  assert.equal(metrics.get("canonical_mismatch"), 1);
  assert.equal(Object.keys(secondary[0] ?? {}).length, CANONICAL_MISMATCH_HEADER.length);
});

test("missing form is reported with a null given value", () => {
  const record = makeCanonical({ topologies: [makeTopology({ canonicalForm: undefined })] });
  const [mismatch] = checkCanonicalStructure(record, FAKE_TOOLKIT).secondary;
  assert.equal(mismatch?.result, "MISSING");
  assert.equal(mismatch?.given, null);
});

test("only the primary topology is checked", () => {
  const extra = makeTopology({ topologyId: 123, canonicalForm: "nonsense" });
  const record = makeCanonical({ topologies: [makeTopology({ canonicalForm: "CNO" }), extra] });
  assert.deepEqual(checkCanonicalStructure(record, FAKE_TOOLKIT).secondary, []);
});

test("record without topology passes through", () => {
  const record = makeCanonical({ topologies: [] });
  assert.deepEqual(checkCanonicalStructure(record, FAKE_TOOLKIT), { primary: record, secondary: [] });
});

finish("Structure check");
