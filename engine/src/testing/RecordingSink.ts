/**
 * Recording Sink
 *
 * Log sink that keeps every line and entry in memory.
 *
 * @module testing
 */

import type { LogEntry, LogLevel, LogSink } from '../types/log-types.js';

export class RecordingSink {
  readonly lines: string[] = [];
  readonly entries: LogEntry[] = [];

  readonly sink: LogSink = (line, entry) => {
    this.lines.push(line);
    this.entries.push(entry);
  };

  /**
   * Messages logged, optionally at one level only
   */
  messages(level?: LogLevel): string[] {
    return this.entries.filter(entry => level === undefined || entry.level === level).map(entry => entry.message);
  }

  clear(): void {
    this.lines.length = 0;
    this.entries.length = 0;
  }
}
