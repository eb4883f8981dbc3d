/**
 * Test pipeline stages and graph builders
 */

import { getStageId } from "../graph/stage-id.js";
import { traverseStages } from "../graph/traverse.js";
import type { StageGraph, StageGraphEntry, StageId } from "../graph/types.js";
import { RoundRobinDispatchStage } from "../dispatch/stages.js";

export class TestStage {
  readonly sources: object[];

  constructor(
    readonly name: string,
    sources: object[] = []
  ) {
    this.sources = [...sources];
  }
}

export function sourcesOf(stage: object): object[] {
  if (stage instanceof RoundRobinDispatchStage) {
    return [stage.source];
  }
  if (stage instanceof TestStage) {
    return stage.sources;
  }
  return [];
}

export function graphOf(root: object): StageGraph<object> {
  return traverseStages(root, sourcesOf);
}

/**
 * Linear pipeline `stage-0 <- stage-1 <- ...`, output stage first
 */
export function chain(length: number): TestStage[] {
  const stages: TestStage[] = [];
  let source: TestStage | undefined;
  for (let i = length - 1; i >= 0; i--) {
    source = new TestStage(`stage-${i}`, source ? [source] : []);
    stages.unshift(source);
  }
  return stages;
}

/**
 * Sources map that counts how often an analysis walks it
 */
export class CountingSources<S extends object> extends Map<StageId, StageGraphEntry<S>> {
  reads = 0;

  override entries() {
    this.reads++;
    return super.entries();
  }
}

export function entryOf<S extends object>(
  stage: S,
  sources: ReadonlyArray<StageGraphEntry<S>> = [],
  into: Map<StageId, StageGraphEntry<S>> = new Map()
): StageGraphEntry<S> {
  for (const source of sources) {
    into.set(getStageId(source.stage), source);
  }
  return { stage, sources: into };
}

export function rooted<S extends object>(entry: StageGraphEntry<S>): StageGraph<S> {
  return new Map([[getStageId(entry.stage), entry]]);
}
