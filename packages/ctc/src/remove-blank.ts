import type { Fst, Label } from "@ctc-lattice/fst";
import { EPSILON, compose } from "@ctc-lattice/fst";
import { InvalidBlankError } from "./errors.js";
import { collectAlphabet } from "./alphabet.js";
import { buildBlankFilter } from "./filter.js";
import { validateLattice } from "./validate.js";

/**
 * Composition capability: the product of two weighted automata over a
 * shared label alphabet, matching `first`'s output labels against
 * `second`'s input labels and multiplying weights along matched arcs.
 */
export interface Composer {
  <W>(first: Fst<W>, second: Fst<W>): Fst<W>;
}

export interface RemoveBlankOptions {
  /** Name of the lattice, used in error messages. */
  readonly key?: string;
  /** Composition to use; defaults to `compose` from `@ctc-lattice/fst`. */
  readonly compose?: Composer;
}

const defaultComposer: Composer = (first, second) => compose(first, second);

/** Throw `InvalidBlankError` unless `blank` is a positive integer label. */
export function checkBlankSymbol(blank: Label): void {
  if (!Number.isSafeInteger(blank) || blank <= EPSILON) {
    throw new InvalidBlankError(String(blank), blank);
  }
}

/** Parse a command-line blank symbol, e.g. `"32"`. */
export function parseBlankSymbol(text: string): Label {
  const t = text.trim();
  if (!/^\+?\d+$/.test(t)) throw new InvalidBlankError(text);
  const blank = Number(t);
  if (!Number.isSafeInteger(blank) || blank === EPSILON) throw new InvalidBlankError(text, blank);
  return blank;
}

/**
 * Remove CTC blanks from the output labels of an acyclic acceptor and
 * collapse repeated symbols, keeping every path weight.
 *
 * The lattice is composed with the filter from `buildBlankFilter`, lattice
 * first, so the lattice's input labels survive untouched while its output
 * labels are rewritten.
 *
 * @example
 * ```ts
 * // blank = 5, path 5 3 3 5 3 5 4 becomes 3 3 4 on the output tape
 * const out = removeCtcBlank(lattice, 5, { key: "utt-1" });
 * ```
 */
export function removeCtcBlank<W>(
  lattice: Fst<W>,
  blank: Label,
  options: RemoveBlankOptions = {}
): Fst<W> {
  checkBlankSymbol(blank);
  validateLattice(lattice, options.key);
  const symbols = collectAlphabet(lattice, blank);
  const filter = buildBlankFilter(symbols, blank, lattice.semiring);
  return (options.compose ?? defaultComposer)(lattice, filter);
}
