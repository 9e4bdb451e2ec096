/**
 * Base class for structural failures that abort the processing of one group.
 *
 * Data-quality problems (numeric conflicts, canonical-form mismatches,
 * unmatched cross-topology duplicates) are never thrown; they travel as side
 * outputs. Only invariant violations use this hierarchy.
 */
export class ReconciliationError extends Error {
  public readonly entityId: number;

  constructor(message: string, entityId: number) {
    super(message);
    this.name = "ReconciliationError";
    this.entityId = entityId;
  }

  /**
   * Format for display.
   */
  format(): string {
    return `${this.name} [${this.entityId}]: ${this.message}`;
  }
}

/**
 * Raised when summarising a record whose fate was never assigned.
 */
export class UnclassifiedRecordError extends ReconciliationError {
  constructor(entityId: number) {
    super(`Record ${entityId} has no fate; classify it before aggregating`, entityId);
    this.name = "UnclassifiedRecordError";
  }
}
