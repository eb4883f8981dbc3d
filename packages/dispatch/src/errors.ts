/**
 * Error classes for stage graph analysis
 */

/**
 * Base error class for dispatch analysis errors
 */
export class DispatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DispatchError";
  }
}

/**
 * Error thrown when a graph does not have exactly one output stage
 */
export class InvalidGraphShapeError extends DispatchError {
  constructor(public readonly rootCount: number) {
    super(`Invalid graph shape: expected a single output stage, found ${rootCount}`);
    this.name = "InvalidGraphShapeError";
  }
}

/**
 * Error thrown when a dependency chain is longer than the configured limit
 */
export class GraphDepthExceededError extends DispatchError {
  constructor(public readonly maxDepth: number) {
    super(`Stage graph is deeper than the maximum of ${maxDepth} stages`);
    this.name = "GraphDepthExceededError";
  }
}
