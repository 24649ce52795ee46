/**
 * Human-Readable Formatter
 *
 * Symbols and colors for scannable output.
 *
 * Symbols:
 * - ▶ Run started or resumed
 * - ● Node running
 * - ✔ Success
 * - ✖ Failure
 * - ↻ Retrying
 * - ⏸ Paused
 */

import type chalk from 'chalk';
import {
  EngineEventType,
  GraphrunError,
  RunStatus,
  type EngineEvent,
  type RunResult,
  type StructuralError,
} from '@graphrun/engine';
import { consoleOutput, type Formatter, type FormatterOptions, type FormatterOutput } from './Formatter.js';
import {
  StatusSymbols,
  createPainter,
  divider,
  formatDuration,
  formatSummary,
  formatValue,
  type SummaryRow,
} from '../utils/display.js';

export class HumanFormatter implements Formatter {
  private readonly output: FormatterOutput;
  private readonly paint: chalk.Chalk;

  constructor(private readonly options: FormatterOptions = {}) {
    this.output = options.output ?? consoleOutput;
    this.paint = createPainter(!options.noColor);
  }

  onEvent(event: EngineEvent): void {
    if (this.options.silent) {
      return;
    }

    const paint = this.paint;

    switch (event.type) {
      case EngineEventType.RUN_STARTED: {
        const { graphName, graphVersion, goalRef, mock } = event.payload;
        this.out('');
        this.out(paint.cyan(divider(60, '━')));
        this.out(paint.bold(`${StatusSymbols.started} ${graphName}@${graphVersion}`) + (mock ? paint.yellow(' [mock]') : ''));
        this.out(paint.dim(`   goal: ${goalRef}   run: ${event.runId}`));
        this.out(paint.cyan(divider(60, '━')));
        this.out('');
        break;
      }

      case EngineEventType.RUN_RESUMED: {
        const { graphName, graphVersion, pausedAt, stepsExecuted, mock } = event.payload;
        this.out('');
        this.out(paint.cyan(divider(60, '━')));
        this.out(paint.bold(`${StatusSymbols.started} ${graphName}@${graphVersion} resumed at ${pausedAt}`) + (mock ? paint.yellow(' [mock]') : ''));
        this.out(paint.dim(`   run: ${event.runId}   steps so far: ${stepsExecuted}`));
        this.out(paint.cyan(divider(60, '━')));
        this.out('');
        break;
      }

      case EngineEventType.NODE_STARTED:
        if (event.payload.attempt === 1) {
          this.out(`${paint.blue(StatusSymbols.running)} ${paint.bold(event.nodeId ?? '?')} ${paint.dim(`(${event.payload.nodeType}, step ${event.payload.step})`)}`);
        }
        break;

      case EngineEventType.NODE_RETRYING: {
        const { attempt, maxAttempts, delayMs, error } = event.payload;
        this.out(paint.yellow(`  ${StatusSymbols.retry} attempt ${attempt}/${maxAttempts} failed (${error.kind}), retrying after ${formatDuration(delayMs)}`));
        if (this.options.verbose) {
          this.out(paint.dim(`    ${error.message}`));
        }
        break;
      }

      case EngineEventType.NODE_COMPLETED: {
        const { attempts, durationMs, producedKeys } = event.payload;
        const tries = attempts > 1 ? ` after ${attempts} attempts` : '';
        this.out(`  ${paint.green(StatusSymbols.success)} ${paint.dim(`completed in ${formatDuration(durationMs)}${tries}`)}`);
        if (this.options.verbose && producedKeys.length > 0) {
          this.out(paint.dim(`    produced: ${producedKeys.join(', ')}`));
        }
        break;
      }

      case EngineEventType.NODE_FAILED: {
        const { attempts, durationMs, error } = event.payload;
        this.out(`  ${paint.red(StatusSymbols.failure)} ${paint.red(`${error.kind} after ${attempts} attempt${attempts === 1 ? '' : 's'} (${formatDuration(durationMs)})`)}`);
        this.out(paint.red(`    ${error.message}`));
        break;
      }

      case EngineEventType.RUN_PAUSED:
      case EngineEventType.RUN_SUCCEEDED:
      case EngineEventType.RUN_FAILED:
      case EngineEventType.RUN_BUDGET_EXCEEDED:
      case EngineEventType.RUN_CANCELLED:
        // Rendered by showResult()
        break;
    }
  }

  showResult(result: RunResult): void {
    const paint = this.paint;

    this.out('');
    this.out(paint.cyan(divider(60, '═')));
    switch (result.status) {
      case RunStatus.SUCCEEDED:
        this.out(paint.green.bold(`${StatusSymbols.success} Run succeeded`));
        break;
      case RunStatus.PAUSED:
        this.out(paint.yellow.bold(`${StatusSymbols.pause} Run paused at ${result.pausedAt ?? '?'}`));
        break;
      case RunStatus.BUDGET_EXCEEDED:
        this.out(paint.red.bold(`${StatusSymbols.failure} Step budget exceeded`));
        break;
      case RunStatus.CANCELLED:
        this.out(paint.yellow.bold(`${StatusSymbols.warning} Run cancelled`));
        break;
      case RunStatus.FAILED:
        this.out(paint.red.bold(`${StatusSymbols.failure} Run failed`));
        break;
    }
    if (result.mock) {
      this.out(paint.yellow('  mock run: model and tool nodes were not called'));
    }
    this.out(paint.cyan(divider(60, '═')));
    this.out('');

    const rows: SummaryRow[] = [
      { label: 'Run', value: result.runId },
      { label: 'Steps', value: result.stepsExecuted },
      { label: 'Path', value: result.path.join(' → ') || '(none)' },
      { label: 'Duration', value: formatDuration(result.durationMs) },
    ];
    if (result.usage.inputTokens > 0 || result.usage.outputTokens > 0) {
      rows.push({ label: 'Tokens', value: `${result.usage.inputTokens} in / ${result.usage.outputTokens} out` });
    }
    this.out(paint.bold('Summary:'));
    for (const line of formatSummary(rows)) {
      this.out(line);
    }

    if (result.error) {
      this.out('');
      const where = result.error.nodeId ? ` at ${result.error.nodeId}` : '';
      this.out(paint.red(`${paint.bold(result.error.kind)}${where}: ${result.error.message}`));
    }

    if (result.status === RunStatus.PAUSED) {
      this.out('');
      this.out(`Resume with: ${paint.bold(`graphrun resume ${result.runId} <graph>`)}`);
    }

    if (result.output) {
      this.out('');
      this.out(paint.bold('Output:'));
      for (const [key, value] of Object.entries(result.output)) {
        this.out(`  ${paint.cyan(key)} = ${formatValue(value)}`);
      }
    }

    this.out('');
  }

  showValidation(graphName: string, errors: readonly StructuralError[]): void {
    const paint = this.paint;

    if (errors.length === 0) {
      this.out(paint.green(`${StatusSymbols.success} ${graphName} is valid`));
      return;
    }

    this.out(paint.red.bold(`${StatusSymbols.failure} ${graphName} has ${errors.length} structural error${errors.length === 1 ? '' : 's'}`));
    this.out('');
    for (const error of errors) {
      const where = error.path ? paint.dim(` at ${error.path}`) : '';
      this.out(`  ${paint.red(StatusSymbols.failure)} ${paint.gray(`[${error.code}]`)} ${error.message}${where}`);
      if (error.hint) {
        this.out(paint.yellow(`      hint: ${error.hint}`));
      }
    }
  }

  showError(error: Error): void {
    const paint = this.paint;

    this.output.err('');
    if (error instanceof GraphrunError) {
      this.output.err(`${paint.red.bold(`${StatusSymbols.failure} ${error.name}`)} ${paint.gray(`[${error.code}]`)}`);
      this.output.err(`  ${error.message}`);
      if (error.path) {
        this.output.err(paint.dim(`  at ${error.path}`));
      }
      if (error.hint) {
        this.output.err(paint.yellow(`  hint: ${error.hint}`));
      }
    } else {
      this.output.err(`${paint.red.bold(`${StatusSymbols.failure} Error:`)} ${error.message}`);
    }

    if (this.options.verbose && error.stack) {
      this.output.err('');
      this.output.err(paint.gray(error.stack));
    }
  }

  showWarning(message: string): void {
    if (!this.options.silent) {
      this.output.err(`${this.paint.yellow(StatusSymbols.warning)} ${message}`);
    }
  }

  showInfo(message: string): void {
    if (!this.options.silent) {
      this.out(`${this.paint.blue(StatusSymbols.info)} ${message}`);
    }
  }

  private out(line: string): void {
    this.output.out(line);
  }
}
