/**
 * Run Command
 *
 * Runs a graph in mock mode: model and tool nodes return canned outcomes
 * (placeholders, or the scripted outcomes file), so a graph's routing,
 * retries, pauses and budget can be exercised without any external call.
 *
 * Usage:
 *   graphrun run graph.yaml
 *   graphrun run graph.yaml --input '{"ticket":"printer on fire"}'
 *   graphrun run graph.yaml --set priority=2 --outcomes outcomes.yaml
 *   graphrun run graph.yaml --max-steps 20 -f json
 *
 * Exit codes:
 *   0 - Succeeded or paused
 *   1 - Failed or cancelled
 *   2 - Invalid graph
 *   3 - Step budget exceeded
 *   4 - Internal error
 */

import type { Command } from 'commander';
import { ExitCode, GraphLoader } from '@graphrun/engine';
import { createFormatter } from '../formatters/createFormatter.js';
import type { Formatter } from '../formatters/Formatter.js';
import { parsePositiveInt, type CliRunOptions } from '../types/CliRunOptions.js';
import {
  DEFAULT_STATE_DIR,
  createCliEngine,
  exitCodeForError,
  exitCodeForResult,
  loadInput,
  toError,
} from '../utils/runSupport.js';

export function registerRunCommand(program: Command): void {
  program
    .command('run <graph>')
    .description('Run a graph in mock mode (no model or tool calls)')
    .option('-i, --input <json>', 'Run input as a JSON object')
    .option('--input-file <path>', 'Load run input from a JSON or YAML file')
    .option('-s, --set <key=value...>', 'Set input values (JSON values are decoded)')
    .option('-g, --goal <ref>', 'Goal reference for the run', 'cli')
    .option('--run-id <id>', 'Run id (default: generated)')
    .option('-m, --max-steps <n>', 'Step budget', parsePositiveInt)
    .option('-o, --outcomes <path>', 'Scripted mock outcomes per node (JSON or YAML)')
    .option('--state-dir <dir>', 'Where paused runs are stored', DEFAULT_STATE_DIR)
    .option('-f, --format <format>', 'Output format (human|json|null)', 'human')
    .option('--verbose', 'Show detailed output and debug logs')
    .option('--silent', 'Only errors and the final result')
    .option('--no-color', 'Disable colored output')
    .action(async (graphPath: string, options: CliRunOptions) => {
      const formatter = createFormatter(options.format, {
        verbose: options.verbose,
        silent: options.silent,
        noColor: options.color === false,
      });
      process.exitCode = await runGraph(graphPath, options, formatter);
    });
}

export async function runGraph(graphPath: string, options: CliRunOptions, formatter: Formatter): Promise<ExitCode> {
  try {
    const graph = await GraphLoader.fromFile(graphPath);
    const input = await loadInput(options);
    const engine = await createCliEngine(options, formatter);

    const result = await engine.execute(graph, options.goal ?? 'cli', input, { runId: options.runId });

    formatter.showResult(result);
    return exitCodeForResult(result);
  } catch (error) {
    formatter.showError(toError(error));
    return exitCodeForError(error);
  }
}
