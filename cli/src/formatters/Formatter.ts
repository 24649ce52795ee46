/**
 * Base Formatter Interface
 *
 * Formatters are the only place where the CLI writes to the terminal.
 *
 * Flow:
 * 1. The engine emits events while a run walks the graph
 * 2. The command forwards each event to formatter.onEvent()
 * 3. The formatter renders it (or not) on its output
 * 4. showResult() renders the final run result once
 */

import type { EngineEvent, RunResult, StructuralError } from '@graphrun/engine';

/**
 * Where a formatter writes; one call per line
 */
export interface FormatterOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: FormatterOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface FormatterOptions {
  /** More details: retries, produced keys, stack traces */
  verbose?: boolean;

  /** Disable colors (for CI or terminals without color support) */
  noColor?: boolean;

  /** Only errors and the final result */
  silent?: boolean;

  output?: FormatterOutput;
}

export interface Formatter {
  /**
   * Called for every engine event of the run
   */
  onEvent(event: EngineEvent): void;

  /**
   * Called once when the run has stopped (any status)
   */
  showResult(result: RunResult): void;

  /**
   * Structural validation report of a graph
   */
  showValidation(graphName: string, errors: readonly StructuralError[]): void;

  /**
   * CLI-level errors: unreadable files, invalid graphs, bad options
   */
  showError(error: Error): void;

  showWarning(message: string): void;

  showInfo(message: string): void;
}
