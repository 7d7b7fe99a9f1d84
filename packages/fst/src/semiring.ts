/**
 * Semirings
 *
 * An FST's weights live in a semiring: `times` extends a path by an arc,
 * `plus` merges alternative paths. The same role `Monoid` + `Ord` play for
 * graph path costs, with the extra structure composition needs.
 *
 * Laws:
 * - `(plus, zero)` is a commutative monoid, `(times, one)` a monoid
 * - `times` distributes over `plus`
 * - `zero` annihilates: `times(zero, a) === zero`
 */
export interface Semiring<W> {
  readonly name: string;
  zero(): W;
  one(): W;
  plus(a: W, b: W): W;
  times(a: W, b: W): W;
  equals(a: W, b: W): boolean;
  /** Text form used by the archive format. */
  format(w: W): string;
  /** Inverse of `format`; `undefined` when `text` is not a weight. */
  parse(text: string): W | undefined;
}

function formatCost(c: number): string {
  return c === Infinity ? "Infinity" : c === -Infinity ? "-Infinity" : String(c);
}

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * The tropical semiring `(min, +, +Infinity, 0)` over non-negative costs.
 * Weights are negated log-probabilities, so lower is better.
 */
export const tropical: Semiring<number> = {
  name: "tropical",
  zero: () => Infinity,
  one: () => 0,
  plus: (a, b) => Math.min(a, b),
  times: (a, b) => a + b,
  equals: (a, b) => a === b,
  format: formatCost,
  parse(text) {
    const t = text.trim();
    if (t === "inf" || t === "Infinity" || t === "+Infinity") return Infinity;
    if (t === "-inf" || t === "-Infinity") return -Infinity;
    if (!NUMBER_PATTERN.test(t)) return undefined;
    return Number(t);
  },
};

/** Kaldi lattice weight: a `[graph, acoustic]` cost pair. */
export type LatticeWeight = readonly [graph: number, acoustic: number];

/**
 * Pair weights ordered by total cost, ties broken by graph cost. `plus`
 * keeps the better of its arguments (the first on an exact tie), `times`
 * adds the components. Text form is `graph,acoustic`.
 */
export const latticeSemiring: Semiring<LatticeWeight> = {
  name: "lattice",
  zero: () => [Infinity, Infinity],
  one: () => [0, 0],
  plus(a, b) {
    const sa = a[0] + a[1];
    const sb = b[0] + b[1];
    if (sa !== sb) return sa < sb ? a : b;
    return b[0] < a[0] ? b : a;
  },
  times: (a, b) => [a[0] + b[0], a[1] + b[1]],
  equals: (a, b) => a[0] === b[0] && a[1] === b[1],
  format: (w) => `${formatCost(w[0])},${formatCost(w[1])}`,
  parse(text) {
    const parts = text.split(",");
    if (parts.length !== 2) return undefined;
    const graph = tropical.parse(parts[0]);
    const acoustic = tropical.parse(parts[1]);
    if (graph === undefined || acoustic === undefined) return undefined;
    return [graph, acoustic];
  },
};
