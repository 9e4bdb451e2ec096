/**
 * Cheminformatics collaborator.
 *
 * Canonical string generation lives in an external toolkit; this package only
 * sees it through this interface.
 */

import type { TopologyDescriptor } from "../records/schema.js";

export interface StructureToolkit {
  /**
   * Canonical string form of a topology, with or without explicit hydrogens.
   */
  canonicalize(topology: TopologyDescriptor, includeHydrogens: boolean): string;
}
