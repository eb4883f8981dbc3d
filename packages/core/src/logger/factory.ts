/**
 * File: packages/core/src/logger/factory.ts
 * Purpose: Logger factory with singleton pattern and environment-based configuration
 * Relationships: Core logger creation, used by all components
 * Key Dependencies: pino, pino-pretty (dev), pino-roll (rotation)
 */

import pino, { type Logger, type LoggerOptions, type TransportTargetOptions } from 'pino';
import path from 'path';
import type { LoggerConfig, LogLevel } from './types.js';

type ResolvedLoggerConfig = Required<Omit<LoggerConfig, 'name' | 'rotation'>> & {
  name?: string;
  rotation: Required<NonNullable<LoggerConfig['rotation']>>;
};

const LOG_LEVEL_NAMES: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Singleton logger instance
 */
let instance: Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVEL_NAMES.some((level) => level === value);
}

/**
 * Build transport configuration based on environment and config
 */
export function buildTransportConfig(config: ResolvedLoggerConfig): LoggerOptions['transport'] {
  const targets: TransportTargetOptions[] = [];

  // File transport with rotation
  if (config.toFile && config.rotation.enabled) {
    targets.push({
      target: 'pino-roll',
      level: config.level,
      options: {
        file: path.resolve(config.filePath),
        frequency: config.rotation.frequency,
        size: config.rotation.maxSize,
        mkdir: true,
        limit: { count: config.rotation.retention }
      }
    });
  } else if (config.toFile) {
    targets.push({
      target: 'pino/file',
      level: config.level,
      options: { destination: path.resolve(config.filePath), mkdir: true }
    });
  }

  if (config.pretty) {
    targets.push({
      target: 'pino-pretty',
      level: config.level,
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
        singleLine: false
      }
    });
  } else if (targets.length > 0) {
    // Keep stdout alongside the file target
    targets.push({
      target: 'pino/file',
      level: config.level,
      options: { destination: 1 }
    });
  }

  if (targets.length === 0) {
    return undefined;
  }
  return { targets };
}

/**
 * Resolve configuration from environment and provided config
 */
export function resolveConfig(config?: LoggerConfig): ResolvedLoggerConfig {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const isTest = process.env.NODE_ENV === 'test';
  const envLevel = process.env.LOG_LEVEL;

  return {
    level: config?.level ?? (isLogLevel(envLevel) ? envLevel : isDevelopment ? 'debug' : 'info'),
    toFile: config?.toFile ?? (process.env.LOG_TO_FILE === 'true'),
    filePath: config?.filePath || process.env.LOG_FILE_PATH || './logs/stagecut.log',
    pretty: config?.pretty ?? (isDevelopment && !process.env.CI),
    rotation: {
      enabled: config?.rotation?.enabled ?? true,
      frequency: config?.rotation?.frequency || 'daily',
      maxSize: config?.rotation?.maxSize || '50m',
      retention: config?.rotation?.retention || 14
    },
    name: config?.name,
    enabled: config?.enabled ?? !isTest
  };
}

/**
 * Create a new logger with custom configuration
 *
 * Does not affect the singleton instance. Use for testing or
 * specialized logging scenarios.
 *
 * @example
 * ```typescript
 * const quiet = createLogger({ enabled: false });
 * const verbose = createLogger({ level: 'debug', pretty: true });
 * ```
 */
export function createLogger(config?: LoggerConfig): Logger {
  const resolvedConfig = resolveConfig(config);

  // Test mode: silent logging
  if (!resolvedConfig.enabled) {
    return pino({ level: 'silent', enabled: false });
  }

  const transport = buildTransportConfig(resolvedConfig);

  const options: LoggerOptions = {
    level: resolvedConfig.level,
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (resolvedConfig.name !== undefined) {
    options.name = resolvedConfig.name;
  }

  // Only add formatters when NOT using transports (they're incompatible)
  if (!transport) {
    options.formatters = {
      level: (label) => ({ level: label.toUpperCase() }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname
      })
    };
  } else {
    options.transport = transport;
  }

  return pino(options);
}

/**
 * Get the singleton logger instance
 *
 * Lazily creates logger on first call using environment configuration.
 * Subsequent calls return the same instance.
 *
 * @param config - Optional configuration (only used on first call)
 *
 * @example
 * ```typescript
 * import { getLogger } from '@stagecut/core/logger';
 *
 * const logger = getLogger();
 * logger.info({ stages: 12 }, 'Graph snapshot built');
 * ```
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!instance) {
    instance = createLogger(config);
  }
  return instance;
}

/**
 * Reset the singleton logger instance
 *
 * Primarily for testing. Clears the singleton so the next call to
 * getLogger() will create a fresh instance.
 */
export function resetLogger(): void {
  instance = null;
}
