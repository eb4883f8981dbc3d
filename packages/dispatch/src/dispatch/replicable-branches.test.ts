import { describe, it, expect } from 'vitest';
import { computeReplicableBranches } from './replicable-branches.js';
import { PlaceholderStage, isPlaceholderStage } from './stages.js';
import { GraphDepthExceededError, InvalidGraphShapeError } from '../errors.js';
import { getSourceGraph, listStages } from '../graph/list.js';
import {
  CountingSources,
  TestStage,
  chain,
  entryOf,
  graphOf,
  rooted,
} from '../__fixtures__/stages.js';

describe('computeReplicableBranches', () => {
  it('returns the output stage when nothing is a placeholder', () => {
    const [output] = chain(3);
    expect(computeReplicableBranches(graphOf(output))).toEqual([output]);
  });

  it('returns nothing when the only source is a placeholder', () => {
    const output = new TestStage('output', [new PlaceholderStage()]);
    expect(computeReplicableBranches(graphOf(output))).toEqual([]);
  });

  it('returns nothing when the output stage is a placeholder', () => {
    expect(computeReplicableBranches(graphOf(new PlaceholderStage('queue')))).toEqual([]);
  });

  it('returns the replicable sibling of a non-replicable branch', () => {
    const blocked = new TestStage('blocked', [new PlaceholderStage()]);
    const sibling = new TestStage('sibling');
    const output = new TestStage('output', [blocked, sibling]);

    expect(computeReplicableBranches(graphOf(output))).toEqual([sibling]);
  });

  it('lists branch roots, not the stages they contain', () => {
    const reader = new TestStage('reader');
    const decoder = new TestStage('decoder', [reader]);
    const merge = new TestStage('merge', [decoder, new PlaceholderStage()]);
    const output = new TestStage('output', [merge]);

    expect(computeReplicableBranches(graphOf(output))).toEqual([decoder]);
  });

  it('keeps source order around a placeholder', () => {
    const first = new TestStage('first');
    const second = new TestStage('second');
    const zip = new TestStage('zip', [first, new PlaceholderStage(), second]);

    expect(computeReplicableBranches(graphOf(zip))).toEqual([first, second]);
  });

  it('lists a branch shared by two non-replicable stages once', () => {
    const shared = new TestStage('shared');
    const left = new TestStage('left', [shared, new PlaceholderStage('left-queue')]);
    const right = new TestStage('right', [shared, new PlaceholderStage('right-queue')]);
    const output = new TestStage('output', [left, right]);

    expect(computeReplicableBranches(graphOf(output))).toEqual([shared]);
  });

  it('accepts a custom placeholder predicate', () => {
    const queue = new TestStage('queue');
    const local = new TestStage('local');
    const output = new TestStage('output', [queue, local]);

    const branches = computeReplicableBranches(graphOf(output), {
      isPlaceholder: (stage) => stage instanceof TestStage && stage.name === 'queue',
    });
    expect(branches).toEqual([local]);
  });

  it('is deterministic across runs', () => {
    const sibling = new TestStage('sibling');
    const graph = graphOf(
      new TestStage('output', [new TestStage('blocked', [new PlaceholderStage()]), sibling])
    );

    expect(computeReplicableBranches(graph)).toEqual(computeReplicableBranches(graph));
    expect(computeReplicableBranches(graph)).toEqual([sibling]);
  });

  describe('shared sub-graphs', () => {
    it('visits a stage shared by two parents once', () => {
      const checked = new Map<object, number>();
      const isPlaceholder = (stage: object): boolean => {
        checked.set(stage, (checked.get(stage) ?? 0) + 1);
        return isPlaceholderStage(stage);
      };

      const reader = entryOf<object>(new TestStage('reader'));
      const sharedSources = new CountingSources<object>();
      const shared = entryOf<object>(new TestStage('shared'), [reader], sharedSources);
      const left = entryOf<object>(new TestStage('left'), [shared]);
      const right = entryOf<object>(new TestStage('right'), [shared]);
      const zip = entryOf<object>(new TestStage('zip'), [left, right]);

      expect(computeReplicableBranches(rooted(zip), { isPlaceholder })).toEqual([zip.stage]);
      expect(checked.get(shared.stage)).toBe(1);
      expect(sharedSources.reads).toBe(1);
    });
  });

  describe('cycles', () => {
    it('treats a cycle without placeholders as replicable', () => {
      const first = new TestStage('first');
      const second = new TestStage('second', [first]);
      first.sources.push(second);
      const output = new TestStage('output', [first]);

      expect(computeReplicableBranches(graphOf(output))).toEqual([output]);
    });

    it('does not list a stage on a cycle that reaches a placeholder', () => {
      const first = new TestStage('first');
      const second = new TestStage('second', [first, new PlaceholderStage()]);
      first.sources.push(second);
      const output = new TestStage('output', [first]);

      expect(computeReplicableBranches(graphOf(output))).toEqual([]);
    });

    it('does not list a stage that closed against an ancestor later found non-replicable', () => {
      const first = new TestStage('first');
      const second = new TestStage('second', [first]);
      first.sources.push(second, new PlaceholderStage());
      const output = new TestStage('output', [first]);
      const graph = graphOf(output);

      const secondSources = getSourceGraph(graph, second);
      expect(secondSources ? listStages(secondSources).some(isPlaceholderStage) : false).toBe(true);
      expect(computeReplicableBranches(graph)).toEqual([]);
    });

    it('still lists replicable siblings of such a cycle', () => {
      const first = new TestStage('first');
      const second = new TestStage('second', [first]);
      first.sources.push(second, new PlaceholderStage());
      const side = new TestStage('side');
      const output = new TestStage('output', [first, side]);

      expect(computeReplicableBranches(graphOf(output))).toEqual([side]);
    });
  });

  describe('errors', () => {
    it('rejects a graph with two outputs', () => {
      const graph = new Map([...graphOf(new TestStage('a')), ...graphOf(new TestStage('b'))]);
      expect(() => computeReplicableBranches(graph)).toThrow(InvalidGraphShapeError);
    });

    it('fails once a dependency chain exceeds maxDepth', () => {
      const [output] = chain(5);
      expect(() => computeReplicableBranches(graphOf(output), { maxDepth: 4 })).toThrow(
        GraphDepthExceededError
      );
    });

    it('walks chains deeper than the call stack allows', () => {
      const [output] = chain(20_000);
      expect(computeReplicableBranches(graphOf(output), { maxDepth: 50_000 })).toEqual([output]);
    });
  });
});
