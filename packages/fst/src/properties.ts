import type { Arc, Fst, StateId } from "./types.js";
import { NO_STATE } from "./types.js";

/** An arc whose labels differ, if any; `undefined` when the FST is an acceptor. */
export function findNonAcceptorArc<W>(
  fst: Fst<W>
): { state: StateId; arc: Arc<W> } | undefined {
  for (const state of fst.states()) {
    for (const a of fst.arcs(state)) {
      if (a.ilabel !== a.olabel) return { state, arc: a };
    }
  }
  return undefined;
}

/** True if every arc has equal input and output labels. */
export function isAcceptor<W>(fst: Fst<W>): boolean {
  return findNonAcceptorArc(fst) === undefined;
}

/** States reachable from the start state (including it), in BFS order. */
export function accessibleStates<W>(fst: Fst<W>): StateId[] {
  const start = fst.start();
  if (start === NO_STATE) return [];
  const seen = new Set<StateId>([start]);
  const order: StateId[] = [start];
  for (let head = 0; head < order.length; head++) {
    for (const a of fst.arcs(order[head])) {
      if (!seen.has(a.nextstate)) {
        seen.add(a.nextstate);
        order.push(a.nextstate);
      }
    }
  }
  return order;
}

/**
 * Find a cycle reachable from the start state using an iterative DFS.
 * Returns the states along the cycle (first state repeated implicitly), or
 * null if the accessible part of the FST is acyclic. Self-loops count.
 */
export function findCycle<W>(fst: Fst<W>): StateId[] | null {
  const start = fst.start();
  if (start === NO_STATE) return null;

  const WHITE = 0,
    GRAY = 1,
    BLACK = 2;
  const color = new Map<StateId, number>();
  const stack: Array<{ state: StateId; idx: number }> = [{ state: start, idx: 0 }];
  color.set(start, GRAY);

  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    const arcs = fst.arcs(top.state);
    if (top.idx >= arcs.length) {
      color.set(top.state, BLACK);
      stack.pop();
      continue;
    }
    const next = arcs[top.idx].nextstate;
    top.idx++;
    const c = color.get(next) ?? WHITE;
    if (c === GRAY) {
      const cycle: StateId[] = [];
      for (let i = stack.length - 1; i >= 0; i--) {
        cycle.push(stack[i].state);
        if (stack[i].state === next) break;
      }
      return cycle.reverse();
    }
    if (c === WHITE) {
      color.set(next, GRAY);
      stack.push({ state: next, idx: 0 });
    }
  }
  return null;
}

/** True if no cycle is reachable from the start state. */
export function isAcyclic<W>(fst: Fst<W>): boolean {
  return findCycle(fst) === null;
}

/**
 * Topological order of the accessible states (Kahn's algorithm), or null
 * when they contain a cycle.
 */
export function topologicalOrder<W>(fst: Fst<W>): StateId[] | null {
  const accessible = accessibleStates(fst);
  const inDeg = new Map<StateId, number>();
  for (const s of accessible) inDeg.set(s, 0);
  for (const s of accessible) {
    for (const a of fst.arcs(s)) {
      inDeg.set(a.nextstate, (inDeg.get(a.nextstate) ?? 0) + 1);
    }
  }

  const queue: StateId[] = accessible.filter((s) => inDeg.get(s) === 0);
  const order: StateId[] = [];
  for (let head = 0; head < queue.length; head++) {
    const s = queue[head];
    order.push(s);
    for (const a of fst.arcs(s)) {
      const d = (inDeg.get(a.nextstate) ?? 1) - 1;
      inDeg.set(a.nextstate, d);
      if (d === 0) queue.push(a.nextstate);
    }
  }

  return order.length === accessible.length ? order : null;
}
