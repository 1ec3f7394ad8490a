export type { GraphNode, DependencyGraph, DanglingEdge } from "./types.js";

export {
  buildGraph,
  compareIds,
  sortIds,
  prerequisites,
  isSettled,
} from "./build.js";

export {
  validateGraph,
  resolveAllIds,
  findDanglingEdges,
  checkAcyclic,
  detectCycle,
  assertValidGraph,
} from "./validator.js";

export {
  topoOrder,
  getTransitiveDeps,
  blockersOf,
  isUnlocked,
  findBlocked,
  milestoneProgress,
} from "./query.js";
export type { MilestoneProgress } from "./query.js";
