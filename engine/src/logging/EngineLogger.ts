/**
 * Engine Logger
 *
 * Level-filtered logging in text or JSON lines, coloured with chalk.
 * Output goes to a pluggable sink (stderr by default) so that stdout stays
 * free for command results.
 *
 * @module logging
 */

import chalk from 'chalk';
import {
  LogLevel,
  shouldLog,
  type EngineLogFormat,
  type EngineLoggerConfig,
  type LogCategory,
  type LogEntry,
  type LogLevelName,
  type LogSink,
} from '../types/log-types.js';

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

type ResolvedConfig = Required<EngineLoggerConfig>;

export class EngineLogger {
  private readonly config: ResolvedConfig;
  private readonly paint: chalk.Chalk;

  constructor(config: EngineLoggerConfig) {
    this.config = {
      level: config.level,
      format: config.format ?? 'text',
      colors: config.colors ?? true,
      timestamp: config.timestamp ?? true,
      source: config.source ?? 'graphrun',
      category: config.category ?? 'runtime',
      sink: config.sink ?? stderrSink,
    };
    this.paint = this.config.colors ? chalk : new chalk.Instance({ level: 0 });
  }

  debug(message: string, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.DEBUG, message, context, undefined, category);
  }

  info(message: string, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.INFO, message, context, undefined, category);
  }

  warn(message: string, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.WARN, message, context, undefined, category);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.ERROR, message, context, error, category);
  }

  fatal(message: string, error?: unknown, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.FATAL, message, context, error, category);
  }

  willLog(level: LogLevel): boolean {
    return shouldLog(level, this.config.level);
  }

  /**
   * Logger with the same settings and another source tag
   */
  child(source: string): EngineLogger {
    return new EngineLogger({ ...this.config, source });
  }

  getConfig(): Readonly<ResolvedConfig> {
    return { ...this.config };
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown,
    category?: LogCategory
  ): void {
    if (!this.willLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      source: this.config.source,
      category: category ?? this.config.category,
    };
    if (context && Object.keys(context).length > 0) {
      entry.context = context;
    }
    if (error !== undefined) {
      entry.error = describeError(error);
    }

    this.config.sink(this.format(entry, this.config.format), entry);
  }

  private format(entry: LogEntry, format: EngineLogFormat): string {
    if (format === 'json') {
      return JSON.stringify({
        timestamp: entry.timestamp.toISOString(),
        level: entry.level,
        source: entry.source,
        category: entry.category,
        message: entry.message,
        ...(entry.context ? { context: entry.context } : {}),
        ...(entry.error ? { error: entry.error } : {}),
      });
    }

    const parts: string[] = [];
    if (this.config.timestamp) {
      parts.push(this.paint.gray(entry.timestamp.toISOString()));
    }
    parts.push(this.levelLabel(entry.level));
    parts.push(this.paint.dim(`[${entry.source}]`));
    parts.push(entry.message);

    for (const [key, value] of Object.entries(entry.context ?? {})) {
      parts.push(`${this.paint.cyan(key)}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
    }
    if (entry.error) {
      const code = entry.error.code ? ` (${entry.error.code})` : '';
      parts.push(this.paint.red(`error=${entry.error.name}: ${entry.error.message}${code}`));
    }

    return parts.join(' ');
  }

  private levelLabel(level: LogLevel): string {
    const label = level.toUpperCase().padEnd(5);
    switch (level) {
      case LogLevel.DEBUG:
        return this.paint.gray(label);
      case LogLevel.INFO:
        return this.paint.blue(label);
      case LogLevel.WARN:
        return this.paint.yellow(label);
      case LogLevel.ERROR:
        return this.paint.red(label);
      case LogLevel.FATAL:
        return this.paint.red.bold(label);
    }
  }
}

function describeError(error: unknown): NonNullable<LogEntry['error']> {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return code ? { name: error.name, message: error.message, code } : { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

/**
 * Create a logger from engine settings
 *
 * @returns null when the level is 'silent'
 */
export function createEngineLogger(
  logLevel: LogLevelName,
  verbose: boolean = false,
  options: Omit<Partial<EngineLoggerConfig>, 'level'> = {}
): EngineLogger | null {
  if (logLevel === 'silent') {
    return null;
  }

  const levelMap: Record<Exclude<LogLevelName, 'silent'>, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
  };

  return new EngineLogger({
    timestamp: verbose,
    ...options,
    level: verbose ? LogLevel.DEBUG : levelMap[logLevel],
  });
}
