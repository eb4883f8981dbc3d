/**
 * Graph Construction
 *
 * Takes a read-only snapshot of a live pipeline, starting at its output
 * stage and following each stage's sources upwards.
 */

import { getStageId } from "./stage-id.js";
import type { SourceAccessor, StageGraph, StageGraphEntry, StageId } from "./types.js";

interface MutableEntry<S extends object> {
  readonly stage: S;
  readonly sources: Map<StageId, StageGraphEntry<S>>;
}

/**
 * Build the rooted graph of `root`
 *
 * Each stage gets exactly one entry, shared by every parent that reads
 * from it. A source that points back at a stage already in the snapshot
 * links to that stage's entry, so cycles in the pipeline become cycles
 * in the graph instead of unbounded nesting.
 *
 * @param root - Output stage of the pipeline
 * @param getSources - Direct upstream stages of a stage, in order
 *
 * @example
 * ```typescript
 * const graph = traverseStages(output, (stage) => stage.sources);
 * ```
 */
export function traverseStages<S extends object>(
  root: S,
  getSources: SourceAccessor<S>
): StageGraph<S> {
  const entries = new Map<StageId, MutableEntry<S>>();
  const pending: MutableEntry<S>[] = [];

  const open = (stage: S): MutableEntry<S> => {
    const id = getStageId(stage);
    let entry = entries.get(id);
    if (!entry) {
      entry = { stage, sources: new Map() };
      entries.set(id, entry);
      pending.push(entry);
    }
    return entry;
  };

  const rootEntry = open(root);

  let entry = pending.pop();
  while (entry) {
    for (const source of getSources(entry.stage)) {
      entry.sources.set(getStageId(source), open(source));
    }
    entry = pending.pop();
  }

  return new Map([[getStageId(root), rootEntry]]);
}
