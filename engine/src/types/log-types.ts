/**
 * Log types shared by the engine logger and its consumers.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

/**
 * Numeric severity for level filtering
 */
export const LogLevelSeverity: Readonly<Record<LogLevel, number>> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50,
};

/**
 * Level names accepted in configuration ('silent' disables logging)
 */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log categories (phase-based, not feature-based)
 *
 * - 'system': engine configuration and lifecycle
 * - 'analysis': parsing and validation
 * - 'runtime': run execution (nodes, retries, routing, pause/resume)
 */
export type LogCategory = 'system' | 'analysis' | 'runtime';

export type EngineLogFormat = 'text' | 'json';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  source: string;
  category: LogCategory;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
  };
}

/**
 * Receives each formatted line together with its structured entry
 */
export type LogSink = (line: string, entry: LogEntry) => void;

export interface EngineLoggerConfig {
  /** Minimum level to output */
  level: LogLevel;
  format?: EngineLogFormat;
  colors?: boolean;
  timestamp?: boolean;
  /** Source identifier printed with every line */
  source?: string;
  /** Category used when a call does not name one */
  category?: LogCategory;
  /** Output destination (default: stderr) */
  sink?: LogSink;
}

export function shouldLog(level: LogLevel, minimum: LogLevel): boolean {
  return LogLevelSeverity[level] >= LogLevelSeverity[minimum];
}
