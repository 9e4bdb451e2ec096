/**
 * Shared test fixtures: one conformer of topology 618451 as seen by each source.
 *
 * Builders return fresh objects on every call so tests can modify them freely.
 */

import {
  EMPTY_ERROR_CODES,
  type CanonicalRecord,
  type ErrorCodes,
  type Geometry,
  type PartialRecord,
  type TopologyDescriptor,
} from "../records/schema.js";

export const FIXTURE_TOPOLOGY_ID = 618451;
export const FIXTURE_ID = 618451001;

/** Stage-1 energy used across merge tests */
export const STAGE1_ENERGY = -406.51179;

export function makeTopology(overrides: Partial<TopologyDescriptor> = {}): TopologyDescriptor {
  return {
    topologyId: FIXTURE_TOPOLOGY_ID,
    atoms: ["C", "N", "O", "H", "H"],
    bonds: [
      { atomA: 0, atomB: 1, order: 1 },
      { atomA: 1, atomB: 2, order: 2 },
      { atomA: 0, atomB: 3, order: 1 },
      { atomA: 0, atomB: 4, order: 1 },
    ],
    canonicalForm: "CN=O",
    ...overrides,
  };
}

export function makeGeometry(offset = 0): Geometry {
  return {
    atoms: [
      { x: 0 + offset, y: 0, z: 0 },
      { x: 1.47 + offset, y: 0, z: 0 },
      { x: 2.1 + offset, y: 1.05, z: 0 },
      { x: -0.36 + offset, y: 1.02, z: 0 },
      { x: -0.36 + offset, y: -0.51, z: 0.88 },
    ],
  };
}

export function makeErrors(overrides: Partial<ErrorCodes> = {}): ErrorCodes {
  return { ...EMPTY_ERROR_CODES, geometryStatus: 1, ...overrides };
}

/**
 * Stage-1 partial carrying the four energies stage 2 recomputes.
 */
export function makeStage1(overrides: Partial<PartialRecord> = {}): PartialRecord {
  return {
    id: FIXTURE_ID,
    origin: "stage1",
    topologies: [makeTopology()],
    initialGeometries: [makeGeometry()],
    optimizedGeometry: makeGeometry(0.01),
    properties: {
      initialGeometryEnergy: { value: STAGE1_ENERGY, tier: "COMPLETE", source: "stage1" },
      initialGeometryGradientNorm: { value: 0.052254, tier: "INTERNAL_ONLY", source: "stage1" },
      optimizedGeometryEnergy: { value: -406.522079, tier: "STANDARD", source: "stage1" },
      optimizedGeometryGradientNorm: { value: 2.5e-5, tier: "INTERNAL_ONLY", source: "stage1" },
    },
    errors: makeErrors(),
    duplicateOf: [],
    ...overrides,
  };
}

/**
 * Stage-2 partial with the full property set and a clean error report.
 */
export function makeStage2(overrides: Partial<PartialRecord> = {}): PartialRecord {
  return {
    id: FIXTURE_ID,
    origin: "stage2",
    topologies: [makeTopology()],
    initialGeometries: [makeGeometry()],
    optimizedGeometry: makeGeometry(0.01),
    properties: {
      initialGeometryEnergy: { value: STAGE1_ENERGY, tier: "COMPLETE", source: "stage2" },
      initialGeometryGradientNorm: { value: 0.052254, tier: "INTERNAL_ONLY", source: "stage2" },
      optimizedGeometryEnergy: { value: -406.522079, tier: "STANDARD", source: "stage2" },
      optimizedGeometryGradientNorm: { value: 2.5e-5, tier: "INTERNAL_ONLY", source: "stage2" },
      singlePointEnergyPbe0: { value: -406.7, tier: "STANDARD", source: "stage2" },
      homoEnergy: { value: -0.29, tier: "COMPLETE", source: "stage2" },
      nuclearRepulsionEnergy: { value: 118.4, tier: "INTERNAL_ONLY", source: "stage2" },
      normalModes: { value: [412.3, 688.1, 1034.9], tier: "COMPLETE", source: "stage2" },
    },
    errors: makeErrors({ singlePointCheck: 1 }),
    duplicateOf: [],
    ...overrides,
  };
}

export function makeDuplicateMarker(
  id: number,
  overrides: Partial<PartialRecord> = {}
): PartialRecord {
  return {
    id,
    origin: "duplicate",
    topologies: [],
    initialGeometries: [],
    properties: {},
    duplicateOf: [],
    ...overrides,
  };
}

/**
 * Canonical record as produced by merging makeStage1() and makeStage2().
 */
export function makeCanonical(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  const stage2 = makeStage2();
  return {
    id: FIXTURE_ID,
    topologies: stage2.topologies,
    initialGeometries: stage2.initialGeometries,
    optimizedGeometry: stage2.optimizedGeometry,
    properties: stage2.properties,
    errors: makeErrors({ singlePointCheck: 1 }),
    duplicateOf: [],
    fate: "UNDEFINED",
    ...overrides,
  };
}

/**
 * Toolkit stand-in: joins element symbols, dropping hydrogens on request.
 */
export const FAKE_TOOLKIT = {
  canonicalize(topology: TopologyDescriptor, includeHydrogens: boolean): string {
    const atoms = includeHydrogens ? topology.atoms : topology.atoms.filter((atom) => atom !== "H");
    return atoms.join("");
  },
};
