/**
 * @ctc-lattice/ctc: CTC blank removal for lattices.
 *
 * Composes an acyclic acceptor with a small filter transducer that deletes
 * blank symbols and collapses runs of repeated symbols, keeping every path
 * weight.
 *
 * @packageDocumentation
 */

export type { CtcErrorCode } from "./errors.js";
export {
  LatticeError,
  InvalidBlankError,
  NotAcceptorError,
  CyclicLatticeError,
} from "./errors.js";

export { collectAlphabet } from "./alphabet.js";
export { buildBlankFilter, BLANK_STATE } from "./filter.js";
export { validateLattice } from "./validate.js";

export type { Composer, RemoveBlankOptions } from "./remove-blank.js";
export { removeCtcBlank, parseBlankSymbol, checkBlankSymbol } from "./remove-blank.js";
