/**
 * Resume Command
 *
 * Continues a paused run stored under the state directory, with extra
 * input merged into its context first. Mock mode, like `run`.
 *
 * Usage:
 *   graphrun resume run-123 graph.yaml --set approved=true
 */

import type { Command } from 'commander';
import { ExitCode, GraphLoader } from '@graphrun/engine';
import { createFormatter } from '../formatters/createFormatter.js';
import type { Formatter } from '../formatters/Formatter.js';
import { parsePositiveInt, type CliResumeOptions } from '../types/CliRunOptions.js';
import {
  DEFAULT_STATE_DIR,
  createCliEngine,
  exitCodeForError,
  exitCodeForResult,
  loadInput,
  toError,
} from '../utils/runSupport.js';

export function registerResumeCommand(program: Command): void {
  program
    .command('resume <runId> <graph>')
    .description('Resume a paused run')
    .option('-i, --input <json>', 'Additional input as a JSON object')
    .option('--input-file <path>', 'Load additional input from a JSON or YAML file')
    .option('-s, --set <key=value...>', 'Set additional input values')
    .option('-m, --max-steps <n>', 'Step budget', parsePositiveInt)
    .option('-o, --outcomes <path>', 'Scripted mock outcomes per node (JSON or YAML)')
    .option('--state-dir <dir>', 'Where paused runs are stored', DEFAULT_STATE_DIR)
    .option('-f, --format <format>', 'Output format (human|json|null)', 'human')
    .option('--verbose', 'Show detailed output and debug logs')
    .option('--silent', 'Only errors and the final result')
    .option('--no-color', 'Disable colored output')
    .action(async (runId: string, graphPath: string, options: CliResumeOptions) => {
      const formatter = createFormatter(options.format, {
        verbose: options.verbose,
        silent: options.silent,
        noColor: options.color === false,
      });
      process.exitCode = await resumeGraph(runId, graphPath, options, formatter);
    });
}

export async function resumeGraph(
  runId: string,
  graphPath: string,
  options: CliResumeOptions,
  formatter: Formatter
): Promise<ExitCode> {
  try {
    const graph = await GraphLoader.fromFile(graphPath);
    const input = await loadInput(options);
    const engine = await createCliEngine(options, formatter);

    const result = await engine.resumeRun(runId, graph, input);

    formatter.showResult(result);
    return exitCodeForResult(result);
  } catch (error) {
    formatter.showError(toError(error));
    return exitCodeForError(error);
  }
}
