import { ReconciliationError } from "../records/errors.js";

/**
 * Raised when a duplicate group does not have exactly one primary, or holds a
 * member that points at another group.
 */
export class DuplicateGroupError extends ReconciliationError {
  public readonly memberIds: readonly number[];

  constructor(groupKey: number, message: string, memberIds: readonly number[]) {
    super(message, groupKey);
    this.name = "DuplicateGroupError";
    this.memberIds = memberIds;
  }
}
