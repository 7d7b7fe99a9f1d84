import type { Fst, Label, StateId } from "@ctc-lattice/fst";
import { EPSILON } from "@ctc-lattice/fst";

/**
 * Map every distinct output label of `lattice`, other than `blank` and
 * epsilon, to a filter state ordinal. Ordinals start at 1 (0 is the blank
 * state) and follow first appearance: states in ascending order, arcs in
 * stored order. The same lattice always yields the same map.
 */
export function collectAlphabet<W>(lattice: Fst<W>, blank: Label): Map<Label, StateId> {
  const symbols = new Map<Label, StateId>();
  for (const state of lattice.states()) {
    for (const a of lattice.arcs(state)) {
      const o = a.olabel;
      if (o !== blank && o !== EPSILON && !symbols.has(o)) {
        symbols.set(o, symbols.size + 1);
      }
    }
  }
  return symbols;
}
