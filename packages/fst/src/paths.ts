import type { Fst, Label, StateId } from "./types.js";
import { EPSILON, NO_STATE } from "./types.js";
import { findCycle, topologicalOrder } from "./properties.js";

/** One successful path, with epsilons removed from both tapes. */
export interface FstPath<W> {
  readonly ilabels: Label[];
  readonly olabels: Label[];
  readonly weight: W;
}

function assertAcyclic<W>(fst: Fst<W>, operation: string): void {
  const cycle = findCycle(fst);
  if (cycle) {
    throw new Error(`${operation} requires an acyclic FST; found cycle ${cycle.join(" -> ")}`);
  }
}

/**
 * Every successful path of an acyclic FST, in depth-first arc order.
 * The number of paths can be exponential in the size of the FST.
 */
export function enumeratePaths<W>(fst: Fst<W>): FstPath<W>[] {
  assertAcyclic(fst, "enumeratePaths");
  const { semiring } = fst;
  const paths: FstPath<W>[] = [];
  if (fst.start() === NO_STATE) return paths;

  function walk(state: StateId, ilabels: Label[], olabels: Label[], weight: W): void {
    if (fst.isFinal(state)) {
      paths.push({
        ilabels: [...ilabels],
        olabels: [...olabels],
        weight: semiring.times(weight, fst.final(state)),
      });
    }
    for (const a of fst.arcs(state)) {
      if (a.ilabel !== EPSILON) ilabels.push(a.ilabel);
      if (a.olabel !== EPSILON) olabels.push(a.olabel);
      walk(a.nextstate, ilabels, olabels, semiring.times(weight, a.weight));
      if (a.olabel !== EPSILON) olabels.pop();
      if (a.ilabel !== EPSILON) ilabels.pop();
    }
  }

  walk(fst.start(), [], [], semiring.one());
  return paths;
}

/**
 * The weighted language of an acyclic FST on one tape: each distinct label
 * string (space-separated, `""` for the empty string) with the `plus`-sum of
 * the weights of all paths that produce it.
 */
export function weightedLanguage<W>(
  fst: Fst<W>,
  tape: "input" | "output" = "output"
): Map<string, W> {
  const { semiring } = fst;
  const language = new Map<string, W>();
  for (const p of enumeratePaths(fst)) {
    const key = (tape === "input" ? p.ilabels : p.olabels).join(" ");
    const prev = language.get(key);
    language.set(key, prev === undefined ? p.weight : semiring.plus(prev, p.weight));
  }
  return language;
}

/**
 * `plus`-sum of the weights of all successful paths, computed in one pass
 * over a topological order. For the tropical semiring this is the cost of
 * the best path; `zero` when there is none.
 */
export function shortestDistance<W>(fst: Fst<W>): W {
  const { semiring } = fst;
  const order = topologicalOrder(fst);
  if (order === null) {
    throw new Error("shortestDistance requires an acyclic FST");
  }

  const dist = new Map<StateId, W>();
  if (fst.start() !== NO_STATE) dist.set(fst.start(), semiring.one());

  let total = semiring.zero();
  for (const s of order) {
    const d = dist.get(s);
    if (d === undefined) continue;
    if (fst.isFinal(s)) total = semiring.plus(total, semiring.times(d, fst.final(s)));
    for (const a of fst.arcs(s)) {
      const alt = semiring.times(d, a.weight);
      const prev = dist.get(a.nextstate);
      dist.set(a.nextstate, prev === undefined ? alt : semiring.plus(prev, alt));
    }
  }
  return total;
}
