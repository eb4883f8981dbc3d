/**
 * Non-Replicable Marking
 *
 * Collects the stages that must stay in the dispatching process: every
 * stage upstream of a non-replicable marker.
 */

import { getRootEntry, listKeyedEntries } from "../graph/index.js";
import type { StageGraph, StageId } from "../graph/types.js";
import { resolveAnalysisOptions, type AnalysisOptions } from "./options.js";

/**
 * Ids of all stages upstream of a non-replicable marker
 *
 * The markers themselves are not included, only their sources. A marker
 * that already sits upstream of another marker is skipped, since its
 * sources are in the set already.
 *
 * @throws {InvalidGraphShapeError} When the graph has zero or several roots
 */
export function findNonReplicableStages<S extends object>(
  graph: StageGraph<S>,
  options: AnalysisOptions<S> = {}
): Set<StageId> {
  getRootEntry(graph);
  const { isNonReplicable, logger } = resolveAnalysisOptions(options);

  const nonReplicable = new Set<StageId>();
  let markers = 0;

  for (const [id, entry] of listKeyedEntries(graph)) {
    if (nonReplicable.has(id) || !isNonReplicable(entry.stage)) {
      continue;
    }
    markers++;
    for (const [sourceId] of listKeyedEntries(entry.sources)) {
      nonReplicable.add(sourceId);
    }
  }

  logger.child({ step: "marking" }).debug(
    { markers, nonReplicable: nonReplicable.size },
    "Marked non-replicable stages"
  );

  return nonReplicable;
}
