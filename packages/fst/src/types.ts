import type { Semiring } from "./semiring.js";

/** Integer arc label. `0` is reserved for epsilon. */
export type Label = number;

/** Dense state identifier, `0..numStates() - 1`. */
export type StateId = number;

export const EPSILON: Label = 0;

/** Start state of an automaton that has none (e.g. an empty lattice). */
export const NO_STATE: StateId = -1;

/** A weighted transition: read `ilabel`, write `olabel`, go to `nextstate`. */
export interface Arc<W> {
  readonly ilabel: Label;
  readonly olabel: Label;
  readonly weight: W;
  readonly nextstate: StateId;
}

/** Read-only view of a weighted finite-state transducer. */
export interface Fst<W> {
  readonly semiring: Semiring<W>;
  /** The start state, or `NO_STATE` when the automaton is empty. */
  start(): StateId;
  /** Final weight of `state`; `semiring.zero()` when the state is not final. */
  final(state: StateId): W;
  isFinal(state: StateId): boolean;
  arcs(state: StateId): ReadonlyArray<Arc<W>>;
  numArcs(state: StateId): number;
  numStates(): number;
  states(): Iterable<StateId>;
}

/** An `Fst` that can be built up state by state. */
export interface MutableFst<W> extends Fst<W> {
  addState(): StateId;
  setStart(state: StateId): void;
  setFinal(state: StateId, weight?: W): void;
  addArc(state: StateId, arc: Arc<W>): void;
}
