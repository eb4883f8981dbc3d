/**
 * Stage Graph Types
 *
 * A stage graph is a snapshot of a pipeline taken from its output stage
 * upwards. Every entry pairs a stage with the graph of stages it reads
 * from, so the structure nests one level per dependency.
 *
 * Entries may be shared between several parents (diamonds), and a stage
 * that is its own transitive source appears as a reference cycle.
 */

/**
 * Identity token of a stage object (see getStageId)
 */
export type StageId = number;

/**
 * One stage together with its direct sources
 */
export interface StageGraphEntry<S extends object> {
  readonly stage: S;
  readonly sources: StageGraph<S>;
}

/**
 * Direct sources of a stage, keyed by stage identity
 */
export type StageGraph<S extends object> = ReadonlyMap<StageId, StageGraphEntry<S>>;

/**
 * Returns the direct upstream stages of a live stage object
 */
export type SourceAccessor<S extends object> = (stage: S) => Iterable<S>;
