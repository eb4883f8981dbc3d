/**
 * @stagecut/dispatch - Pipeline partitioning analysis
 *
 * Works out where a stage graph has to stop being replicated across
 * worker processes, and which of its branches can be copied per worker.
 */

// Graph model
export * from "./graph/index.js";

// Analyses
export * from "./dispatch/index.js";

// Configuration
export {
  DispatchConfigSchema,
  loadDispatchConfig,
  toAnalysisOptions,
  type DispatchConfig,
} from "./config.js";

// Errors
export { DispatchError, InvalidGraphShapeError, GraphDepthExceededError } from "./errors.js";
