/**
 * Graph Flattening and Lookup
 *
 * All traversals here track visited stage ids, so shared entries are
 * reported once and reference cycles terminate.
 */

import { InvalidGraphShapeError } from "../errors.js";
import type { StageGraph, StageGraphEntry, StageId } from "./types.js";

/**
 * Every entry reachable from `graph` with its id, each stage exactly once
 *
 * Depth-first, each stage before its own sources. Callers should not rely
 * on the order beyond "each reachable stage appears once".
 */
export function listKeyedEntries<S extends object>(
  graph: StageGraph<S>
): Array<[StageId, StageGraphEntry<S>]> {
  const visited = new Set<StageId>();
  const result: Array<[StageId, StageGraphEntry<S>]> = [];
  const stack: Array<[StageId, StageGraphEntry<S>]> = [...graph].reverse();

  let next = stack.pop();
  while (next) {
    const [id, entry] = next;
    if (!visited.has(id)) {
      visited.add(id);
      result.push(next);
      const sources = [...entry.sources];
      for (let i = sources.length - 1; i >= 0; i--) {
        stack.push(sources[i]);
      }
    }
    next = stack.pop();
  }

  return result;
}

/**
 * Every entry reachable from `graph`, each stage exactly once
 */
export function listGraphEntries<S extends object>(graph: StageGraph<S>): StageGraphEntry<S>[] {
  return listKeyedEntries(graph).map(([, entry]) => entry);
}

/**
 * Every stage reachable from `graph`, each exactly once
 */
export function listStages<S extends object>(graph: StageGraph<S>): S[] {
  return listGraphEntries(graph).map((entry) => entry.stage);
}

/**
 * Reachable stages matching a predicate
 */
export function findStages<S extends object, T extends S>(
  graph: StageGraph<S>,
  predicate: (stage: S) => stage is T
): T[];
export function findStages<S extends object>(
  graph: StageGraph<S>,
  predicate: (stage: S) => boolean
): S[];
export function findStages<S extends object>(
  graph: StageGraph<S>,
  predicate: (stage: S) => boolean
): S[] {
  return listStages(graph).filter((stage) => predicate(stage));
}

/**
 * The graph of everything `stage` depends on, or undefined when the
 * stage is not part of `graph`
 */
export function getSourceGraph<S extends object>(
  graph: StageGraph<S>,
  stage: S
): StageGraph<S> | undefined {
  return listGraphEntries(graph).find((entry) => entry.stage === stage)?.sources;
}

/**
 * The single output entry of a rooted graph
 *
 * @throws {InvalidGraphShapeError} When the graph has zero or several roots
 */
export function getRootEntry<S extends object>(
  graph: StageGraph<S>
): [StageId, StageGraphEntry<S>] {
  const roots = [...graph];
  if (roots.length !== 1) {
    throw new InvalidGraphShapeError(roots.length);
  }
  return roots[0];
}
