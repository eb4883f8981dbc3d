/**
 * Stage graph model
 */

export type { StageId, StageGraph, StageGraphEntry, SourceAccessor } from "./types.js";
export { getStageId } from "./stage-id.js";
export { traverseStages } from "./traverse.js";
export {
  listKeyedEntries,
  listGraphEntries,
  listStages,
  findStages,
  getSourceGraph,
  getRootEntry,
} from "./list.js";
