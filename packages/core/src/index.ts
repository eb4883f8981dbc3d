/**
 * @stagecut/core - Shared foundations for stagecut packages
 *
 * Provides logging and configuration for the analysis packages.
 */

// Logging
export {
  getLogger,
  createLogger,
  resetLogger,
  getContext,
  getContextLogger,
  runAnalysis,
  runStep,
  runWithContext
} from "./logger/index.js";
export type {
  Logger,
  LoggerConfig,
  AnalysisContext,
  RotationConfig,
  LogLevel
} from "./logger/index.js";

// Configuration
export { loadConfig, loadBaseConfig, toEnvKey, BaseConfigSchema } from "./config/index.js";
export type { BaseConfig, LoadConfigOptions } from "./config/index.js";
