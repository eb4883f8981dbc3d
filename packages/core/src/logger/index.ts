/**
 * File: packages/core/src/logger/index.ts
 * Purpose: Public API exports for the stagecut logging system
 * Relationships: Entry point for all logger functionality
 * Key Dependencies: factory.ts, context.ts, types.ts
 */

// Logger factory functions
export { getLogger, createLogger, resetLogger } from './factory.js';

// Context management functions
export {
  getContext,
  getContextLogger,
  runAnalysis,
  runStep,
  runWithContext
} from './context.js';

// Type exports
export type {
  Logger,
  LogLevel,
  LoggerConfig,
  AnalysisContext,
  RotationConfig
} from './types.js';
