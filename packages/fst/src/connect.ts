import type { Fst, StateId } from "./types.js";
import { NO_STATE } from "./types.js";
import { accessibleStates } from "./properties.js";
import { VectorFst } from "./vector-fst.js";

/** States from which some final state can be reached. */
export function coaccessibleStates<W>(fst: Fst<W>): Set<StateId> {
  const reverse = new Map<StateId, StateId[]>();
  const queue: StateId[] = [];
  for (const s of fst.states()) {
    if (fst.isFinal(s)) queue.push(s);
    for (const a of fst.arcs(s)) {
      let preds = reverse.get(a.nextstate);
      if (!preds) {
        preds = [];
        reverse.set(a.nextstate, preds);
      }
      preds.push(s);
    }
  }

  const seen = new Set<StateId>(queue);
  for (let head = 0; head < queue.length; head++) {
    for (const p of reverse.get(queue[head]) ?? []) {
      if (!seen.has(p)) {
        seen.add(p);
        queue.push(p);
      }
    }
  }
  return seen;
}

/**
 * Return a copy of `fst` trimmed to the states that lie on some successful
 * path. Surviving states keep their relative order. If the start state does
 * not survive the result is the empty FST.
 */
export function connect<W>(fst: Fst<W>): VectorFst<W> {
  const out = new VectorFst(fst.semiring);
  const coaccessible = coaccessibleStates(fst);
  const keep = accessibleStates(fst)
    .filter((s) => coaccessible.has(s))
    .sort((a, b) => a - b);
  if (fst.start() === NO_STATE || !keep.includes(fst.start())) return out;

  const remap = new Map<StateId, StateId>();
  for (const s of keep) remap.set(s, out.addState());

  for (const s of keep) {
    const ns = remap.get(s) ?? NO_STATE;
    if (fst.isFinal(s)) out.setFinal(ns, fst.final(s));
    for (const a of fst.arcs(s)) {
      const next = remap.get(a.nextstate);
      if (next === undefined) continue;
      out.addArc(ns, { ...a, nextstate: next });
    }
  }
  out.setStart(remap.get(fst.start()) ?? NO_STATE);
  return out;
}
