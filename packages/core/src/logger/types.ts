/**
 * Logger types shared by factory.ts and context.ts
 */

import type { Logger as PinoLogger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface RotationConfig {
  /** Rotate the log file (only applies with toFile) */
  enabled?: boolean;
  frequency?: 'daily' | 'hourly';
  /** Size that triggers rotation, e.g. '50m' */
  maxSize?: string;
  /** Rotated files to keep */
  retention?: number;
}

export interface LoggerConfig {
  /** Falls back to LOG_LEVEL, then 'debug' in development and 'info' elsewhere */
  level?: LogLevel;
  /** Write to filePath as well (LOG_TO_FILE) */
  toFile?: boolean;
  filePath?: string;
  /** pino-pretty console output; on by default in development outside CI */
  pretty?: boolean;
  rotation?: RotationConfig;
  name?: string;
  /** Off by default under NODE_ENV=test */
  enabled?: boolean;
}

/**
 * Correlation bindings for one analysis run
 */
export interface AnalysisContext {
  analysisId: string;
  /** e.g. 'marking', 'cut-point', 'replicable-branches' */
  step?: string;
}

export type Logger = PinoLogger;
