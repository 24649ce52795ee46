/**
 * Null Formatter
 *
 * Produces no output. For scripting (only the exit code matters) and tests.
 */

import type { EngineEvent, RunResult, StructuralError } from '@graphrun/engine';
import type { Formatter } from './Formatter.js';

export class NullFormatter implements Formatter {
  onEvent(_event: EngineEvent): void {
    // no output
  }

  showResult(_result: RunResult): void {
    // no output
  }

  showValidation(_graphName: string, _errors: readonly StructuralError[]): void {
    // no output
  }

  showError(_error: Error): void {
    // no output
  }

  showWarning(_message: string): void {
    // no output
  }

  showInfo(_message: string): void {
    // no output
  }
}
