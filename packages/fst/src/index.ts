export type { Arc, Fst, MutableFst, Label, StateId } from "./types.js";
export { EPSILON, NO_STATE } from "./types.js";

export type { Semiring, LatticeWeight } from "./semiring.js";
export { tropical, latticeSemiring } from "./semiring.js";

export { VectorFst, arc } from "./vector-fst.js";

export {
  findNonAcceptorArc,
  isAcceptor,
  accessibleStates,
  findCycle,
  isAcyclic,
  topologicalOrder,
} from "./properties.js";

export { connect, coaccessibleStates } from "./connect.js";

export type { ComposeOptions } from "./compose.js";
export { compose } from "./compose.js";

export type { FstPath } from "./paths.js";
export { enumeratePaths, weightedLanguage, shortestDistance } from "./paths.js";
