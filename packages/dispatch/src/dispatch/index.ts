/**
 * Pipeline partitioning analyses
 */

export {
  RoundRobinDispatchStage,
  PlaceholderStage,
  isRoundRobinDispatchStage,
  isPlaceholderStage,
} from "./stages.js";
export {
  DEFAULT_MAX_GRAPH_DEPTH,
  resolveAnalysisOptions,
  type AnalysisOptions,
  type ResolvedAnalysisOptions,
} from "./options.js";
export { findNonReplicableStages } from "./non-replicable.js";
export { computeCutPoint } from "./cut-point.js";
export { computeReplicableBranches } from "./replicable-branches.js";
