/**
 * Blank-removal filter
 *
 * A transducer that performs CTC collapsing when composed on the right of a
 * lattice: blanks are deleted, and a symbol is written only when a run of it
 * begins. State 0 means "last symbol was a blank (or nothing yet)"; state k
 * means "inside a run of the symbol mapped to k".
 *
 *   0 --blank:ε--> 0
 *   0 --s:s-->     k        first s of a run
 *   k --s:ε-->     k        repeats of s
 *   k --blank:ε--> 0        a blank closes the run
 *   k --s2:s2-->   k2       a different symbol starts a new run
 *
 * Every state is final with weight one, and so is every arc, so composition
 * never changes a path's weight.
 */

import type { Label, Semiring, StateId } from "@ctc-lattice/fst";
import { EPSILON, VectorFst } from "@ctc-lattice/fst";

export const BLANK_STATE: StateId = 0;

/**
 * Build the filter for the symbols collected from one lattice. The result
 * has exactly `symbols.size + 1` states.
 */
export function buildBlankFilter<W>(
  symbols: ReadonlyMap<Label, StateId>,
  blank: Label,
  semiring: Semiring<W>
): VectorFst<W> {
  const filter = new VectorFst(semiring);
  const one = semiring.one();

  filter.addStates(symbols.size + 1);
  for (const s of filter.states()) filter.setFinal(s, one);
  filter.setStart(BLANK_STATE);

  filter.addArc(BLANK_STATE, { ilabel: blank, olabel: EPSILON, weight: one, nextstate: BLANK_STATE });

  for (const [symbol, state] of symbols) {
    filter.addArc(BLANK_STATE, { ilabel: symbol, olabel: symbol, weight: one, nextstate: state });
    filter.addArc(state, { ilabel: symbol, olabel: EPSILON, weight: one, nextstate: state });
    filter.addArc(state, { ilabel: blank, olabel: EPSILON, weight: one, nextstate: BLANK_STATE });
    for (const [other, otherState] of symbols) {
      if (other === symbol) continue;
      filter.addArc(state, { ilabel: other, olabel: other, weight: one, nextstate: otherState });
    }
  }

  return filter;
}
