import type { Arc, StateId } from "@ctc-lattice/fst";

/** Codes of the errors raised by blank removal itself. */
export type CtcErrorCode = "invalid_blank" | "not_acceptor" | "cyclic_lattice";

/**
 * Base class for fatal lattice-processing errors. Each package narrows
 * `code` to its own union of string codes.
 */
export class LatticeError<C extends string = string> extends Error {
  constructor(
    readonly code: C,
    message: string
  ) {
    super(message);
    this.name = "LatticeError";
  }
}

/**
 * The blank symbol is epsilon (0), negative or not an integer. `value` is
 * the parsed number, when `input` parsed as one.
 */
export class InvalidBlankError extends LatticeError<"invalid_blank"> {
  constructor(
    readonly input: string,
    readonly value?: number
  ) {
    super(
      "invalid_blank",
      value === 0
        ? "Symbol 0 is reserved for epsilon and cannot be the blank symbol"
        : `String "${input}" is not a valid blank symbol (expected a positive integer)`
    );
    this.name = "InvalidBlankError";
  }
}

/** A lattice has an arc whose input and output labels differ. */
export class NotAcceptorError extends LatticeError<"not_acceptor"> {
  constructor(
    readonly key: string,
    readonly state: StateId,
    readonly arc: Arc<unknown>
  ) {
    super(
      "not_acceptor",
      `Lattice ${key} is not an acceptor: arc ${state} -> ${arc.nextstate} has labels ${arc.ilabel}:${arc.olabel}`
    );
    this.name = "NotAcceptorError";
  }
}

/** A lattice has a cycle reachable from its start state. */
export class CyclicLatticeError extends LatticeError<"cyclic_lattice"> {
  constructor(
    readonly key: string,
    readonly cycle: ReadonlyArray<StateId>
  ) {
    super("cyclic_lattice", `Lattice ${key} is not acyclic: cycle through states ${cycle.join(" -> ")}`);
    this.name = "CyclicLatticeError";
  }
}
