/**
 * Replicable Branch Extraction
 *
 * Splits the pipeline into the largest sub-graphs that contain no
 * placeholder stage. Each of them can be copied once per worker.
 */

import { getRootEntry } from "../graph/list.js";
import type { StageGraph, StageGraphEntry, StageId } from "../graph/types.js";
import { GraphDepthExceededError } from "../errors.js";
import { resolveAnalysisOptions, type AnalysisOptions } from "./options.js";

interface BranchFrame<S extends object> {
  readonly id: StageId;
  readonly sources: Iterator<[StageId, StageGraphEntry<S>]>;
  readonly visited: Array<[StageId, S]>;
}

type ClosedFrame<S extends object> = Pick<BranchFrame<S>, "id" | "visited">;

/**
 * Spread non-replicability to every reader of a non-replicable stage.
 *
 * Stages on a cycle close against the provisional `true` of an ancestor
 * that is still open; once that ancestor ends up `false`, they must too.
 * Without cycles nothing changes here.
 */
function settleCycles<S extends object>(
  replicable: Map<StageId, boolean>,
  closed: ReadonlyArray<ClosedFrame<S>>
): void {
  const readers = new Map<StageId, StageId[]>();
  for (const frame of closed) {
    for (const [sourceId] of frame.visited) {
      const list = readers.get(sourceId) ?? [];
      list.push(frame.id);
      readers.set(sourceId, list);
    }
  }

  const pending = [...replicable].filter(([, value]) => !value).map(([id]) => id);
  let id = pending.pop();
  while (id !== undefined) {
    for (const reader of readers.get(id) ?? []) {
      if (replicable.get(reader) === true) {
        replicable.set(reader, false);
        pending.push(reader);
      }
    }
    id = pending.pop();
  }
}

/**
 * Root stages of the maximal replicable sub-graphs
 *
 * Returns `[root]` when nothing upstream of the output is a placeholder,
 * and `[]` when no branch is replicable. A stage is listed where its
 * parent turns out to be non-replicable; placeholders are never listed.
 * Order follows the post-order visit, each stage at most once.
 *
 * @throws {InvalidGraphShapeError} When the graph has zero or several roots
 * @throws {GraphDepthExceededError} When a dependency chain exceeds `maxDepth`
 */
export function computeReplicableBranches<S extends object>(
  graph: StageGraph<S>,
  options: AnalysisOptions<S> = {}
): S[] {
  const [rootId, rootEntry] = getRootEntry(graph);
  const { isPlaceholder, maxDepth, logger } = resolveAnalysisOptions(options);
  const log = logger.child({ step: "replicable-branches" });

  const replicable = new Map<StageId, boolean>();
  const stack: BranchFrame<S>[] = [];
  const closed: Array<ClosedFrame<S>> = [];

  // Returns the result when it is known now, undefined when a frame was opened
  const enter = (id: StageId, entry: StageGraphEntry<S>): boolean | undefined => {
    const known = replicable.get(id);
    if (known !== undefined) {
      return known;
    }
    if (isPlaceholder(entry.stage)) {
      replicable.set(id, false);
      return false;
    }
    if (stack.length >= maxDepth) {
      throw new GraphDepthExceededError(maxDepth);
    }
    replicable.set(id, true);
    stack.push({ id, sources: entry.sources.entries(), visited: [] });
    return undefined;
  };

  enter(rootId, rootEntry);

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const next = frame.sources.next();
    if (!next.done) {
      const [id, entry] = next.value;
      frame.visited.push([id, entry.stage]);
      if (enter(id, entry) === false) {
        // keep going: every source still needs a result
        replicable.set(frame.id, false);
      }
      continue;
    }

    stack.pop();
    closed.push(frame);
    const parent = stack.at(-1);
    if (parent && replicable.get(frame.id) === false) {
      replicable.set(parent.id, false);
    }
  }

  settleCycles(replicable, closed);

  const listed = new Set<StageId>();
  const branches: S[] = [];
  for (const frame of closed) {
    if (replicable.get(frame.id) === true) {
      continue;
    }
    for (const [id, stage] of frame.visited) {
      if (replicable.get(id) === true && !listed.has(id)) {
        listed.add(id);
        branches.push(stage);
      }
    }
  }

  if (replicable.get(rootId) === true) {
    branches.push(rootEntry.stage);
  }

  log.debug(
    { visited: replicable.size, branches: branches.length },
    "Extracted replicable branches"
  );
  return branches;
}
