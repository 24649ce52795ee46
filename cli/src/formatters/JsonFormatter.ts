/**
 * JSON Formatter
 *
 * One JSON object per line (NDJSON) for machine parsing, log aggregation
 * and CI. Events and the final result share the stream; errors go to
 * stderr.
 */

import { GraphrunError, type EngineEvent, type RunResult, type StructuralError } from '@graphrun/engine';
import { consoleOutput, type Formatter, type FormatterOptions, type FormatterOutput } from './Formatter.js';

export class JsonFormatter implements Formatter {
  private readonly output: FormatterOutput;

  constructor(private readonly options: FormatterOptions = {}) {
    this.output = options.output ?? consoleOutput;
  }

  onEvent(event: EngineEvent): void {
    if (this.options.silent) {
      return;
    }

    this.write({
      type: event.type,
      timestamp: new Date(event.timestamp).toISOString(),
      runId: event.runId,
      ...(event.nodeId !== undefined ? { nodeId: event.nodeId } : {}),
      ...event.payload,
    });
  }

  showResult(result: RunResult): void {
    this.write({
      type: 'run.result',
      runId: result.runId,
      status: result.status,
      mock: result.mock,
      goalRef: result.goalRef,
      stepsExecuted: result.stepsExecuted,
      path: result.path,
      ...(result.output !== undefined ? { output: result.output } : {}),
      ...(result.error !== undefined ? { error: result.error } : {}),
      ...(result.pausedAt !== undefined ? { pausedAt: result.pausedAt } : {}),
      ...(this.options.verbose ? { attempts: result.attempts } : {}),
      usage: result.usage,
      startedAt: result.startedAt.toISOString(),
      completedAt: result.completedAt.toISOString(),
      durationMs: result.durationMs,
    });
  }

  showValidation(graphName: string, errors: readonly StructuralError[]): void {
    this.write({
      type: 'graph.validation',
      graph: graphName,
      valid: errors.length === 0,
      errors: errors.map(error => error.toSimpleObject()),
    });
  }

  showError(error: Error): void {
    const detail = error instanceof GraphrunError
      ? error.toJSON()
      : { name: error.name, message: error.message, ...(this.options.verbose ? { stack: error.stack } : {}) };

    this.output.err(JSON.stringify({ type: 'error', timestamp: new Date().toISOString(), error: detail }));
  }

  showWarning(message: string): void {
    this.write({ type: 'warning', timestamp: new Date().toISOString(), message });
  }

  showInfo(message: string): void {
    if (this.options.silent) {
      return;
    }
    this.write({ type: 'info', timestamp: new Date().toISOString(), message });
  }

  private write(record: Record<string, unknown>): void {
    this.output.out(JSON.stringify(record));
  }
}
