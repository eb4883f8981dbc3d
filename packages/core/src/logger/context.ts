/**
 * File: packages/core/src/logger/context.ts
 * Purpose: AsyncLocalStorage-based context propagation for analysis IDs and step names
 * Relationships: Provides context to all logger calls within an analysis run
 * Key Dependencies: async_hooks (Node.js native), factory.ts
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { Logger } from 'pino';
import { getLogger } from './factory.js';
import type { AnalysisContext } from './types.js';

const analysisContext = new AsyncLocalStorage<AnalysisContext>();

/**
 * Get the current analysis context from AsyncLocalStorage
 *
 * Returns undefined if called outside an analysis context.
 */
export function getContext(): AnalysisContext | undefined {
  return analysisContext.getStore();
}

/**
 * Get a logger with current analysis context
 *
 * Returns a child logger with analysisId and step bindings from
 * AsyncLocalStorage. If no context is available, returns the base logger.
 *
 * @example
 * ```typescript
 * runAnalysis('loader-1703251200000', () => {
 *   const logger = getContextLogger();
 *   logger.info('Planning workers');  // Includes analysisId
 * });
 * ```
 */
export function getContextLogger(): Logger {
  const context = getContext();
  if (context) {
    return getLogger().child(context);
  }
  return getLogger();
}

/**
 * Execute a function with custom context
 *
 * Works for synchronous and async callbacks alike: the context stays
 * active for everything the callback starts.
 *
 * @template T - Return type of the function
 */
export function runWithContext<T>(context: AnalysisContext, fn: () => T): T {
  return analysisContext.run(context, fn);
}

/**
 * Execute a function with analysis context (analysis ID)
 *
 * @example
 * ```typescript
 * const cut = runAnalysis(`loader-${Date.now()}`, () => computeCutPoint(graph));
 * ```
 */
export function runAnalysis<T>(analysisId: string, fn: () => T): T {
  return runWithContext({ analysisId }, fn);
}

/**
 * Execute a function with step context
 *
 * Must be called within a runAnalysis() context. Nested runStep() calls
 * replace the step name.
 *
 * @throws {Error} If called outside analysis context
 */
export function runStep<T>(stepName: string, fn: () => T): T {
  const context = getContext();
  if (!context) {
    throw new Error('runStep called outside analysis context. Must be called within runAnalysis()');
  }

  return analysisContext.run({ ...context, step: stepName }, fn);
}
