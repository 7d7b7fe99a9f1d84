import { describe, it, expect } from "vitest";
import {
  VectorFst,
  arc,
  tropical,
  latticeSemiring,
  NO_STATE,
  isAcceptor,
  findNonAcceptorArc,
  findCycle,
  isAcyclic,
  topologicalOrder,
  accessibleStates,
  connect,
  coaccessibleStates,
} from "../index.js";

/** A linear tropical acceptor over `labels`, one arc per label. */
function chain(labels: number[], weights: number[] = []): VectorFst<number> {
  const fst = VectorFst.tropical();
  fst.addStates(labels.length + 1);
  fst.setStart(0);
  labels.forEach((l, i) => fst.addArc(i, arc(l, l, weights[i] ?? 0, i + 1)));
  fst.setFinal(labels.length);
  return fst;
}

// ---------------------------------------------------------------------------
// Semiring
// ---------------------------------------------------------------------------

describe("tropical semiring", () => {
  it("uses min for plus and + for times", () => {
    expect(tropical.plus(3, 1.5)).toBe(1.5);
    expect(tropical.times(3, 1.5)).toBe(4.5);
    expect(tropical.zero()).toBe(Infinity);
    expect(tropical.one()).toBe(0);
  });

  it("zero annihilates and one is neutral", () => {
    expect(tropical.times(tropical.zero(), 2)).toBe(Infinity);
    expect(tropical.times(tropical.one(), 2)).toBe(2);
    expect(tropical.plus(tropical.zero(), 2)).toBe(2);
  });

  it("parses and formats weights", () => {
    expect(tropical.parse("0.25")).toBe(0.25);
    expect(tropical.parse("-1e2")).toBe(-100);
    expect(tropical.parse("inf")).toBe(Infinity);
    expect(tropical.parse("abc")).toBeUndefined();
    expect(tropical.parse("")).toBeUndefined();
    expect(tropical.format(1.5)).toBe("1.5");
    expect(tropical.format(Infinity)).toBe("Infinity");
  });
});

describe("lattice semiring", () => {
  it("adds cost pairs component-wise", () => {
    expect(latticeSemiring.times([1.5, 2.25], [0.5, 0.25])).toEqual([2, 2.5]);
    expect(latticeSemiring.times(latticeSemiring.one(), [1, 2])).toEqual([1, 2]);
    expect(latticeSemiring.times(latticeSemiring.zero(), [1, 2])).toEqual([Infinity, Infinity]);
  });

  it("keeps the pair with the lower total, then the lower graph cost", () => {
    expect(latticeSemiring.plus([1, 5], [3, 2])).toEqual([1, 5]);
    expect(latticeSemiring.plus([4, 1], [1, 3])).toEqual([1, 3]);
    expect(latticeSemiring.plus([3, 1], [1, 3])).toEqual([1, 3]);
    expect(latticeSemiring.plus(latticeSemiring.zero(), [0, 7])).toEqual([0, 7]);
  });

  it("reads and writes graph,acoustic text", () => {
    const w = latticeSemiring.parse("1.5,2.25");
    expect(w).toEqual([1.5, 2.25]);
    expect(w && latticeSemiring.format(w)).toBe("1.5,2.25");
    expect(latticeSemiring.format(latticeSemiring.one())).toBe("0,0");
    expect(latticeSemiring.parse("inf,inf")).toEqual([Infinity, Infinity]);
    expect(latticeSemiring.parse("1.5")).toBeUndefined();
    expect(latticeSemiring.parse("1,2,3_4")).toBeUndefined();
    expect(latticeSemiring.parse("1,x")).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// VectorFst
// ---------------------------------------------------------------------------

describe("VectorFst", () => {
  it("starts empty", () => {
    const fst = VectorFst.tropical();
    expect(fst.numStates()).toBe(0);
    expect(fst.start()).toBe(NO_STATE);
    expect([...fst.states()]).toEqual([]);
  });

  it("adds states, arcs and final weights", () => {
    const fst = chain([4, 5], [0.5, 0.25]);
    expect(fst.numStates()).toBe(3);
    expect(fst.start()).toBe(0);
    expect(fst.numArcs(0)).toBe(1);
    expect(fst.arcs(1)).toEqual([{ ilabel: 5, olabel: 5, weight: 0.25, nextstate: 2 }]);
    expect(fst.isFinal(2)).toBe(true);
    expect(fst.final(2)).toBe(0);
    expect(fst.isFinal(1)).toBe(false);
    expect(fst.final(1)).toBe(Infinity);
  });

  it("rejects unknown states", () => {
    const fst = VectorFst.tropical();
    fst.addState();
    expect(() => fst.setStart(3)).toThrow(RangeError);
    expect(() => fst.addArc(0, arc(1, 1, 0, 7))).toThrow(RangeError);
    expect(() => fst.arcs(-1)).toThrow(RangeError);
  });
});

// ---------------------------------------------------------------------------
// Properties
// ---------------------------------------------------------------------------

describe("properties", () => {
  it("detects acceptors", () => {
    const fst = chain([1, 2, 3]);
    expect(isAcceptor(fst)).toBe(true);
    fst.addArc(1, arc(2, 9, 0, 3));
    expect(isAcceptor(fst)).toBe(false);
    expect(findNonAcceptorArc(fst)).toEqual({
      state: 1,
      arc: { ilabel: 2, olabel: 9, weight: 0, nextstate: 3 },
    });
  });

  it("finds a reachable cycle", () => {
    const fst = chain([1, 2, 3]);
    expect(findCycle(fst)).toBeNull();
    expect(isAcyclic(fst)).toBe(true);
    fst.addArc(2, arc(7, 7, 0, 1));
    expect(findCycle(fst)).toEqual([1, 2]);
    expect(isAcyclic(fst)).toBe(false);
  });

  it("treats a self-loop as a cycle", () => {
    const fst = chain([1]);
    fst.addArc(1, arc(1, 1, 0, 1));
    expect(findCycle(fst)).toEqual([1]);
  });

  it("ignores cycles that cannot be reached from the start", () => {
    const fst = chain([1]);
    const a = fst.addState();
    const b = fst.addState();
    fst.addArc(a, arc(1, 1, 0, b));
    fst.addArc(b, arc(1, 1, 0, a));
    expect(isAcyclic(fst)).toBe(true);
    expect(accessibleStates(fst)).toEqual([0, 1]);
  });

  it("orders a diamond topologically", () => {
    const fst = VectorFst.tropical();
    fst.addStates(4);
    fst.setStart(0);
    fst.addArc(0, arc(1, 1, 0, 2));
    fst.addArc(0, arc(2, 2, 0, 1));
    fst.addArc(1, arc(3, 3, 0, 3));
    fst.addArc(2, arc(3, 3, 0, 3));
    fst.setFinal(3);
    expect(topologicalOrder(fst)).toEqual([0, 2, 1, 3]);
  });

  it("has no topological order when cyclic", () => {
    const fst = chain([1, 2]);
    fst.addArc(2, arc(1, 1, 0, 0));
    expect(topologicalOrder(fst)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Connect
// ---------------------------------------------------------------------------

describe("connect", () => {
  it("drops dead ends and unreachable states", () => {
    const fst = chain([1, 2]);
    const dead = fst.addState();
    fst.addArc(0, arc(3, 3, 0, dead));
    const orphan = fst.addState();
    fst.addArc(orphan, arc(4, 4, 0, 2));

    expect([...coaccessibleStates(fst)].sort()).toEqual([0, 1, 2, orphan]);

    const trimmed = connect(fst);
    expect(trimmed.numStates()).toBe(3);
    expect(trimmed.start()).toBe(0);
    expect(trimmed.numArcs(0)).toBe(1);
    expect(trimmed.arcs(0)[0].ilabel).toBe(1);
    expect(trimmed.isFinal(2)).toBe(true);
  });

  it("returns the empty FST when nothing is final", () => {
    const fst = VectorFst.tropical();
    fst.addStates(2);
    fst.setStart(0);
    fst.addArc(0, arc(1, 1, 0, 1));
    const trimmed = connect(fst);
    expect(trimmed.numStates()).toBe(0);
    expect(trimmed.start()).toBe(NO_STATE);
  });
});
