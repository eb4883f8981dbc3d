/**
 * Stage kinds the analysis recognises by default.
 * Every other stage is opaque to it.
 */

/**
 * Fans the output of its source out to replicated workers, one item at a
 * time. The stage and everything upstream of it run once, in the
 * dispatching process.
 */
export class RoundRobinDispatchStage<S extends object = object> {
  constructor(public readonly source: S) {}
}

/**
 * Stands in for a branch that is not replicated. The loader swaps it for
 * the queue connection to the dispatching process.
 */
export class PlaceholderStage {
  constructor(public readonly label?: string) {}
}

export function isRoundRobinDispatchStage(stage: object): stage is RoundRobinDispatchStage {
  return stage instanceof RoundRobinDispatchStage;
}

export function isPlaceholderStage(stage: object): stage is PlaceholderStage {
  return stage instanceof PlaceholderStage;
}
