/**
 * Configuration management for stagecut packages
 */

import { z } from "zod";

/**
 * Base configuration schema that every package config extends
 */
export const BaseConfigSchema = z.object({
  /** Log level */
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export interface LoadConfigOptions {
  /** Environment to read from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Prefix for package-specific variables, e.g. STAGECUT_MAX_GRAPH_DEPTH */
  prefix?: string;
}

/**
 * camelCase key to the SCREAMING_SNAKE_CASE suffix of its variable
 */
export function toEnvKey(key: string, prefix: string): string {
  const snake = key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toUpperCase();
  return prefix ? `${prefix}_${snake}` : snake;
}

/**
 * Load configuration from environment variables
 *
 * LOG_LEVEL is read unprefixed; every other schema key is read from
 * `<PREFIX>_<KEY>`. Values arrive as strings, so numeric fields need
 * `z.coerce` in the schema. Throws ZodError on invalid values.
 */
export function loadConfig<T extends z.AnyZodObject>(
  schema: T,
  options: LoadConfigOptions = {}
): z.infer<T> {
  const env = options.env ?? process.env;
  const prefix = options.prefix ?? "STAGECUT";

  const configFromEnv: Record<string, unknown> = {};

  // Standard mappings
  if (env.LOG_LEVEL) configFromEnv.logLevel = env.LOG_LEVEL;

  for (const key of Object.keys(schema.shape)) {
    const value = env[toEnvKey(key, prefix)];
    if (value !== undefined && value !== "") {
      configFromEnv[key] = value;
    }
  }

  return schema.parse(configFromEnv);
}

/**
 * Load base configuration
 */
export function loadBaseConfig(env?: NodeJS.ProcessEnv): BaseConfig {
  return loadConfig(BaseConfigSchema, { env });
}
