/**
 * Validate Command
 *
 * Parses graph files and reports every structural error, without running
 * anything.
 *
 * Usage:
 *   graphrun validate graph.yaml
 *   graphrun validate a.yaml,b.yaml
 *   graphrun validate graph.yaml -f json
 *
 * Exit codes:
 *   0 - All graphs valid
 *   2 - A graph could not be parsed or has structural errors
 */

import type { Command } from 'commander';
import { ExitCode, GraphLoader, validate } from '@graphrun/engine';
import { createFormatter } from '../formatters/createFormatter.js';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliValidateOptions } from '../types/CliValidateOptions.js';
import { exitCodeForError, toError } from '../utils/runSupport.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <graph>')
    .description('Validate one or more graph files (comma-separated)')
    .option('-f, --format <format>', 'Output format (human|json|null)', 'human')
    .option('--verbose', 'Show stack traces for errors')
    .option('--silent', 'Minimal output')
    .option('--no-color', 'Disable colored output')
    .action(async (graphArg: string, options: CliValidateOptions) => {
      const formatter = createFormatter(options.format, {
        verbose: options.verbose,
        silent: options.silent,
        noColor: options.color === false,
      });
      process.exitCode = await validateGraphs(splitPaths(graphArg), formatter);
    });
}

/**
 * Comma-separated paths, trimmed, empties dropped
 */
export function splitPaths(arg: string): string[] {
  return arg.split(',').map(path => path.trim()).filter(path => path.length > 0);
}

/**
 * Validate each file in turn; every file is reported even after a failure
 */
export async function validateGraphs(paths: readonly string[], formatter: Formatter): Promise<ExitCode> {
  if (paths.length === 0) {
    formatter.showError(new Error('No graph paths provided'));
    return ExitCode.INVALID_GRAPH;
  }

  let exitCode = ExitCode.SUCCESS;

  for (const path of paths) {
    try {
      const graph = await GraphLoader.fromFile(path);
      const errors = validate(graph);
      formatter.showValidation(graph.name, errors);
      if (errors.length > 0) {
        exitCode = worst(exitCode, ExitCode.INVALID_GRAPH);
      }
    } catch (error) {
      formatter.showError(toError(error));
      exitCode = worst(exitCode, exitCodeForError(error));
    }
  }

  return exitCode;
}

function worst(a: ExitCode, b: ExitCode): ExitCode {
  return b > a ? b : a;
}
