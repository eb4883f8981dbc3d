/**
 * Options shared by the graph analyses
 */

import { getContextLogger, type Logger } from "@stagecut/core";
import { isPlaceholderStage, isRoundRobinDispatchStage } from "./stages.js";

/**
 * Longest dependency chain the reductions descend by default
 */
export const DEFAULT_MAX_GRAPH_DEPTH = 10_000;

export interface AnalysisOptions<S extends object> {
  /**
   * Stages that force themselves and everything upstream to run once
   * @default instanceof RoundRobinDispatchStage
   */
  isNonReplicable?: (stage: S) => boolean;

  /**
   * Stages that mark a branch as not replicable
   * @default instanceof PlaceholderStage
   */
  isPlaceholder?: (stage: S) => boolean;

  /**
   * Maximum number of stages on one dependency chain
   * @default DEFAULT_MAX_GRAPH_DEPTH
   */
  maxDepth?: number;

  /**
   * Logger for debug output (defaults to the context logger)
   */
  logger?: Logger;
}

export type ResolvedAnalysisOptions<S extends object> = Required<AnalysisOptions<S>>;

export function resolveAnalysisOptions<S extends object>(
  options: AnalysisOptions<S> = {}
): ResolvedAnalysisOptions<S> {
  return {
    isNonReplicable: options.isNonReplicable ?? isRoundRobinDispatchStage,
    isPlaceholder: options.isPlaceholder ?? isPlaceholderStage,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_GRAPH_DEPTH,
    logger: options.logger ?? getContextLogger(),
  };
}
