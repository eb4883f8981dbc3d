/**
 * Dispatch analysis configuration
 */

import { BaseConfigSchema, createLogger, loadConfig } from "@stagecut/core";
import { z } from "zod";
import { DEFAULT_MAX_GRAPH_DEPTH, type AnalysisOptions } from "./dispatch/options.js";

export const DispatchConfigSchema = BaseConfigSchema.extend({
  /** Longest dependency chain the analyses accept (STAGECUT_MAX_GRAPH_DEPTH) */
  maxGraphDepth: z.coerce.number().int().positive().default(DEFAULT_MAX_GRAPH_DEPTH),
});

export type DispatchConfig = z.infer<typeof DispatchConfigSchema>;

/**
 * Load dispatch configuration from the environment
 */
export function loadDispatchConfig(env?: NodeJS.ProcessEnv): DispatchConfig {
  return loadConfig(DispatchConfigSchema, { env });
}

/**
 * Analysis options carrying the configured limits and log level
 */
export function toAnalysisOptions<S extends object>(config: DispatchConfig): AnalysisOptions<S> {
  return {
    maxDepth: config.maxGraphDepth,
    logger: createLogger({ level: config.logLevel }),
  };
}
