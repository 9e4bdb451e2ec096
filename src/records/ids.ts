/**
 * Conformer id arithmetic.
 *
 * A conformer id encodes its parent topology: id = topologyId * 1000 + index.
 */

export const CONFORMERS_PER_TOPOLOGY = 1000;

export function topologyIdOf(entityId: number): number {
  return Math.floor(entityId / CONFORMERS_PER_TOPOLOGY);
}

export function withinTopologyIndexOf(entityId: number): number {
  return entityId % CONFORMERS_PER_TOPOLOGY;
}

/**
 * Build a conformer id from its topology id and index within the topology.
 */
export function makeEntityId(topologyId: number, index: number): number {
  if (!Number.isInteger(index) || index < 0 || index >= CONFORMERS_PER_TOPOLOGY) {
    throw new RangeError(
      `Conformer index must be an integer in [0, ${CONFORMERS_PER_TOPOLOGY}), got ${index}`
    );
  }
  const entityId = topologyId * CONFORMERS_PER_TOPOLOGY + index;
  if (!Number.isSafeInteger(entityId)) {
    throw new RangeError(`Conformer id for topology ${topologyId} exceeds the safe integer range`);
  }
  return entityId;
}

export function sameTopology(a: number, b: number): boolean {
  return topologyIdOf(a) === topologyIdOf(b);
}
