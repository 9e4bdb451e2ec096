/**
 * Duplicate list reader.
 *
 * Each line holds two long identifiers, the kept conformer first and the
 * discarded one second:
 *
 *   x07_c2n2o2fh3.224227.004 x07_c2n2o2fh3.224227.002
 *
 * A long identifier is <prefix>.<topologyId>.<index>. The discarded conformer
 * becomes a duplicate marker pointing at the kept one.
 */

import { CONFORMERS_PER_TOPOLOGY, makeEntityId } from "../records/ids.js";
import type { PartialRecord } from "../records/schema.js";

const LONG_IDENTIFIER = /^([^.\s]+)\.(\d+)\.(\d{1,3})$/;

export class DuplicateListError extends Error {
  public readonly line: string;

  constructor(message: string, line: string) {
    super(message);
    this.name = "DuplicateListError";
    this.line = line;
  }
}

export interface LongIdentifier {
  prefix: string;
  topologyId: number;
  index: number;
  entityId: number;
}

export interface DuplicatePair {
  kept: LongIdentifier;
  discarded: LongIdentifier;
}

export function parseLongIdentifier(text: string, line: string = text): LongIdentifier {
  const match = LONG_IDENTIFIER.exec(text);
  if (match === null) {
    throw new DuplicateListError(`Malformed long identifier: ${text}`, line);
  }
  const [, prefix = "", topologyText = "", indexText = ""] = match;
  const topologyId = parseInt(topologyText, 10);
  const index = parseInt(indexText, 10);
  if (!Number.isSafeInteger(topologyId * CONFORMERS_PER_TOPOLOGY + index)) {
    throw new DuplicateListError(`Long identifier out of range: ${text}`, line);
  }
  return { prefix, topologyId, index, entityId: makeEntityId(topologyId, index) };
}

/**
 * Parse one "kept discarded" line.
 *
 * @throws DuplicateListError when the line does not hold exactly two long identifiers
 */
export function parseDuplicateListLine(line: string): DuplicatePair {
  const fields = line.trim().split(/\s+/);
  const [keptText, discardedText] = fields;
  if (fields.length !== 2 || keptText === undefined || discardedText === undefined) {
    throw new DuplicateListError(`Expected 2 identifiers, got ${fields.length}`, line);
  }
  return {
    kept: parseLongIdentifier(keptText, line),
    discarded: parseLongIdentifier(discardedText, line),
  };
}

/**
 * Marker keyed by the discarded conformer, pointing at the kept one.
 */
export function markerFromDuplicatePair(pair: DuplicatePair): PartialRecord {
  return {
    id: pair.discarded.entityId,
    origin: "duplicate",
    topologies: [],
    initialGeometries: [],
    properties: {},
    duplicateOf: [],
    duplicatedBy: pair.kept.entityId,
  };
}

/**
 * Markers for every non-blank line of a duplicate list.
 */
export function markersFromDuplicateList(lines: Iterable<string>): PartialRecord[] {
  const markers: PartialRecord[] = [];
  for (const line of lines) {
    if (line.trim() === "") {
      continue;
    }
    markers.push(markerFromDuplicatePair(parseDuplicateListLine(line)));
  }
  return markers;
}
