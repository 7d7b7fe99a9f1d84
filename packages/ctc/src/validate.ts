import type { Fst } from "@ctc-lattice/fst";
import { findCycle, findNonAcceptorArc } from "@ctc-lattice/fst";
import { CyclicLatticeError, NotAcceptorError } from "./errors.js";

/**
 * Check the structural preconditions of blank removal, in order: the lattice
 * is an acceptor, then it has no cycle reachable from its start state.
 * Throws `NotAcceptorError` or `CyclicLatticeError` naming `key`.
 */
export function validateLattice<W>(lattice: Fst<W>, key = "<unnamed>"): void {
  const offending = findNonAcceptorArc(lattice);
  if (offending) {
    throw new NotAcceptorError(key, offending.state, offending.arc);
  }
  const cycle = findCycle(lattice);
  if (cycle) {
    throw new CyclicLatticeError(key, cycle);
  }
}
