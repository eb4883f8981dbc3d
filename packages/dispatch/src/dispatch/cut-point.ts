/**
 * Cut Point Reduction
 *
 * Finds the lowest common ancestor of all non-replicable stages: the
 * stage below which the pipeline can be replicated per worker.
 *
 * Post-order fold from the output stage over an explicit work stack.
 * A stage's memo entry is written before its sources are visited; for
 * stages that are not themselves non-replicable that first entry is
 * `null`, so a source path leading back to the stage ends there.
 */

import { getRootEntry } from "../graph/list.js";
import type { StageGraph, StageGraphEntry, StageId } from "../graph/types.js";
import { GraphDepthExceededError } from "../errors.js";
import { findNonReplicableStages } from "./non-replicable.js";
import { resolveAnalysisOptions, type AnalysisOptions } from "./options.js";

interface CutPointFrame<S extends object> {
  readonly id: StageId;
  readonly stage: S;
  readonly sources: Iterator<[StageId, StageGraphEntry<S>]>;
  /** Non-null results of the sources visited so far */
  readonly found: S[];
}

/**
 * One distinct result passes through unchanged; two or more distinct
 * results meet at `stage`.
 */
function mergeSourceResults<S extends object>(stage: S, found: readonly S[]): S | null {
  if (found.length === 0) {
    return null;
  }
  const [first] = found;
  return found.every((candidate) => candidate === first) ? first : stage;
}

/**
 * Lowest common ancestor of every non-replicable stage, or null when the
 * whole pipeline is replicable
 *
 * Stages upstream of several markers are merged at the first stage where
 * their chains meet. When a non-replicable stage sits inside a cycle the
 * cycle is reduced once, from the stage it is first entered through.
 *
 * @throws {InvalidGraphShapeError} When the graph has zero or several roots
 * @throws {GraphDepthExceededError} When a dependency chain exceeds `maxDepth`
 */
export function computeCutPoint<S extends object>(
  graph: StageGraph<S>,
  options: AnalysisOptions<S> = {}
): S | null {
  const [rootId, rootEntry] = getRootEntry(graph);
  const resolved = resolveAnalysisOptions(options);
  const nonReplicable = findNonReplicableStages(graph, resolved);

  const memo = new Map<StageId, S | null>();
  const stack: CutPointFrame<S>[] = [];

  // Returns the result when it is known now, undefined when a frame was opened
  const enter = (id: StageId, entry: StageGraphEntry<S>): S | null | undefined => {
    if (memo.has(id)) {
      return memo.get(id) ?? null;
    }
    if (nonReplicable.has(id)) {
      memo.set(id, entry.stage);
      return entry.stage;
    }
    if (stack.length >= resolved.maxDepth) {
      throw new GraphDepthExceededError(resolved.maxDepth);
    }
    memo.set(id, null);
    stack.push({ id, stage: entry.stage, sources: entry.sources.entries(), found: [] });
    return undefined;
  };

  let result = enter(rootId, rootEntry);

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const next = frame.sources.next();
    if (!next.done) {
      const [id, entry] = next.value;
      const found = enter(id, entry);
      if (found) {
        frame.found.push(found);
      }
      continue;
    }

    stack.pop();
    const reduced = mergeSourceResults(frame.stage, frame.found);
    memo.set(frame.id, reduced);

    const parent = stack.at(-1);
    if (!parent) {
      result = reduced;
    } else if (reduced) {
      parent.found.push(reduced);
    }
  }

  const cutPoint = result ?? null;
  resolved.logger.child({ step: "cut-point" }).debug(
    { reduced: memo.size, found: cutPoint !== null },
    cutPoint ? "Found cut point" : "No cut point, pipeline is fully replicable"
  );
  return cutPoint;
}
