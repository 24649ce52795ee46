#!/usr/bin/env node
/**
 * graphrun CLI
 *
 * Usage:
 *   graphrun validate <graph>          Report structural errors
 *   graphrun run <graph>               Run a graph in mock mode
 *   graphrun resume <runId> <graph>    Resume a paused run
 *   graphrun --version                 Show version
 */

import { Command } from 'commander';
import { ExitCode } from '@graphrun/engine';
import { registerRunCommand } from './commands/run.js';
import { registerResumeCommand } from './commands/resume.js';
import { registerValidateCommand } from './commands/validate.js';

const VERSION = '0.1.0';

function createProgram(): Command {
  const program = new Command();

  program
    .name('graphrun')
    .description('Validate and run goal-driven workflow graphs')
    .version(VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help');

  registerValidateCommand(program);
  registerRunCommand(program);
  registerResumeCommand(program);

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
  process.exit(ExitCode.INTERNAL_ERROR);
});
