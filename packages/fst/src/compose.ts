/**
 * Weighted composition.
 *
 * `compose(first, second)` builds the transducer that maps `x` to `z`
 * whenever `first` maps `x` to some `y` and `second` maps `y` to `z`, with
 * weights multiplied along the way. The product is explored on the fly from
 * the start pair, so only reachable state pairs are ever created.
 *
 * Epsilons are handled with a sequencing filter that admits exactly one
 * interleaving per pair of paths:
 *
 *   filter 0 --(match on a shared label)-->       0
 *   filter 0 --(first writes epsilon, alone)-->   0
 *   filter * --(second reads epsilon, alone)-->   1
 *
 * i.e. between two matches, epsilon moves of `first` come before those of
 * `second`. Simultaneous epsilon:epsilon moves are never taken.
 */

import type { Arc, Fst, Label, StateId } from "./types.js";
import { EPSILON, NO_STATE } from "./types.js";
import { VectorFst } from "./vector-fst.js";
import { connect as connectFst } from "./connect.js";

export interface ComposeOptions {
  /** Trim states that are not on a successful path (default: true). */
  readonly connect?: boolean;
}

type FilterState = 0 | 1;

interface PairState {
  readonly q1: StateId;
  readonly q2: StateId;
  readonly filter: FilterState;
}

export function compose<W>(
  first: Fst<W>,
  second: Fst<W>,
  options: ComposeOptions = {}
): VectorFst<W> {
  const semiring = first.semiring;
  const out = new VectorFst(semiring);
  if (first.start() === NO_STATE || second.start() === NO_STATE) return out;

  const ids = new Map<string, StateId>();
  const queue: PairState[] = [];

  const stateFor = (q1: StateId, q2: StateId, filter: FilterState): StateId => {
    const key = `${q1}:${q2}:${filter}`;
    const known = ids.get(key);
    if (known !== undefined) return known;
    const id = out.addState();
    ids.set(key, id);
    queue.push({ q1, q2, filter });
    return id;
  };

  const byInput = inputLabelIndex(second);

  out.setStart(stateFor(first.start(), second.start(), 0));

  for (let head = 0; head < queue.length; head++) {
    const { q1, q2, filter } = queue[head];
    const source = head;

    if (first.isFinal(q1) && second.isFinal(q2)) {
      out.setFinal(source, semiring.times(first.final(q1), second.final(q2)));
    }

    for (const a1 of first.arcs(q1)) {
      if (a1.olabel === EPSILON) {
        if (filter !== 0) continue;
        out.addArc(source, {
          ilabel: a1.ilabel,
          olabel: EPSILON,
          weight: a1.weight,
          nextstate: stateFor(a1.nextstate, q2, 0),
        });
        continue;
      }
      for (const a2 of byInput(q2, a1.olabel)) {
        out.addArc(source, {
          ilabel: a1.ilabel,
          olabel: a2.olabel,
          weight: semiring.times(a1.weight, a2.weight),
          nextstate: stateFor(a1.nextstate, a2.nextstate, 0),
        });
      }
    }

    for (const a2 of byInput(q2, EPSILON)) {
      out.addArc(source, {
        ilabel: EPSILON,
        olabel: a2.olabel,
        weight: a2.weight,
        nextstate: stateFor(q1, a2.nextstate, 1),
      });
    }
  }

  return options.connect === false ? out : connectFst(out);
}

/** Lazily built per-state index of `fst`'s arcs by input label. */
function inputLabelIndex<W>(fst: Fst<W>): (state: StateId, label: Label) => ReadonlyArray<Arc<W>> {
  const cache = new Map<StateId, Map<Label, Arc<W>[]>>();
  return (state, label) => {
    let index = cache.get(state);
    if (!index) {
      index = new Map();
      for (const a of fst.arcs(state)) {
        const bucket = index.get(a.ilabel);
        if (bucket) bucket.push(a);
        else index.set(a.ilabel, [a]);
      }
      cache.set(state, index);
    }
    return index.get(label) ?? [];
  };
}
