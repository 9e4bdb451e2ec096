/**
 * Fatal merge failures. Each aborts the merge of one conformer id.
 */

import { ReconciliationError } from "../records/errors.js";
import type { Stage } from "../records/schema.js";

/**
 * Two partial records from the same stage arrived for one id.
 */
export class DuplicateSourceError extends ReconciliationError {
  public readonly stage: Stage;

  constructor(entityId: number, stage: Stage) {
    super(`Received more than one ${stage} record for conformer ${entityId}`, entityId);
    this.name = "DuplicateSourceError";
    this.stage = stage;
  }
}

/**
 * Stage records disagree on the structural topology, or the topology does
 * not belong to the conformer id.
 */
export class TopologyMismatchError extends ReconciliationError {
  constructor(entityId: number, detail: string) {
    super(detail, entityId);
    this.name = "TopologyMismatchError";
  }
}

/**
 * A partial record violates a structural precondition of the merge
 * (wrong id for its group, several topologies or initial geometries on a
 * stage record, data on a duplicate marker).
 */
export class InvalidPartialRecordError extends ReconciliationError {
  constructor(entityId: number, detail: string) {
    super(detail, entityId);
    this.name = "InvalidPartialRecordError";
  }
}
