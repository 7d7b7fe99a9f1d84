import type { Arc, MutableFst, StateId } from "./types.js";
import { NO_STATE } from "./types.js";
import type { Semiring } from "./semiring.js";
import type { LatticeWeight } from "./semiring.js";
import { latticeSemiring, tropical } from "./semiring.js";

interface VectorState<W> {
  final: W;
  readonly arcs: Arc<W>[];
}

/**
 * Array-backed mutable FST. States are dense integers handed out by
 * `addState`, arcs are kept per state in insertion order.
 */
export class VectorFst<W> implements MutableFst<W> {
  private readonly _states: VectorState<W>[] = [];
  private _start: StateId = NO_STATE;

  constructor(readonly semiring: Semiring<W>) {}

  /** An empty FST over the tropical semiring. */
  static tropical(): VectorFst<number> {
    return new VectorFst(tropical);
  }

  /** An empty FST over Kaldi `[graph, acoustic]` lattice weights. */
  static lattice(): VectorFst<LatticeWeight> {
    return new VectorFst(latticeSemiring);
  }

  start(): StateId {
    return this._start;
  }

  final(state: StateId): W {
    return this.stateAt(state).final;
  }

  isFinal(state: StateId): boolean {
    return !this.semiring.equals(this.final(state), this.semiring.zero());
  }

  arcs(state: StateId): ReadonlyArray<Arc<W>> {
    return this.stateAt(state).arcs;
  }

  numArcs(state: StateId): number {
    return this.stateAt(state).arcs.length;
  }

  numStates(): number {
    return this._states.length;
  }

  *states(): Iterable<StateId> {
    for (let s = 0; s < this._states.length; s++) yield s;
  }

  addState(): StateId {
    this._states.push({ final: this.semiring.zero(), arcs: [] });
    return this._states.length - 1;
  }

  /** Add `count` states, returning the id of the first one. */
  addStates(count: number): StateId {
    const first = this._states.length;
    for (let i = 0; i < count; i++) this.addState();
    return first;
  }

  setStart(state: StateId): void {
    this.stateAt(state);
    this._start = state;
  }

  setFinal(state: StateId, weight: W = this.semiring.one()): void {
    this.stateAt(state).final = weight;
  }

  addArc(state: StateId, arc: Arc<W>): void {
    this.stateAt(arc.nextstate);
    this.stateAt(state).arcs.push(arc);
  }

  private stateAt(state: StateId): VectorState<W> {
    const s = this._states[state];
    if (s === undefined) {
      throw new RangeError(`State ${state} does not exist (numStates = ${this._states.length})`);
    }
    return s;
  }
}

/** Shorthand for building an arc. */
export function arc<W>(ilabel: number, olabel: number, weight: W, nextstate: StateId): Arc<W> {
  return { ilabel, olabel, weight, nextstate };
}
