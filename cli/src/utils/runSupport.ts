/**
 * Run support shared by the run and resume commands
 */

import { readFile } from 'fs/promises';
import { parse as parseYAML } from 'yaml';
import { z } from 'zod';
import {
  ConfigError,
  ExitCode,
  FileSnapshotStore,
  GraphEngine,
  GraphrunError,
  RunStatus,
  type ContextValues,
  type MockOutcomes,
  type NodeErrorKind,
  type RunResult,
} from '@graphrun/engine';
import type { Formatter } from '../formatters/Formatter.js';
import { parseKeyValuePairs, type CliExecutionOptions } from '../types/CliRunOptions.js';

export const DEFAULT_MAX_STEPS = 100;
export const DEFAULT_STATE_DIR = '.graphrun/state';

const NODE_ERROR_KINDS = [
  'Timeout',
  'AuthFailure',
  'RateLimited',
  'UpstreamFailure',
  'InvalidArgs',
  'NotFound',
  'InvalidOutput',
  'Cancelled',
] as const satisfies readonly NodeErrorKind[];

const MockOutcomeSchema = z.discriminatedUnion('status', [
  z
    .object({
      status: z.literal('success'),
      produced: z.record(z.unknown()).optional(),
      usage: z.object({ inputTokens: z.number(), outputTokens: z.number() }).strict().optional(),
    })
    .strict(),
  z
    .object({
      status: z.literal('failure'),
      kind: z.enum(NODE_ERROR_KINDS).optional(),
      message: z.string().optional(),
    })
    .strict(),
]);

export const MockOutcomesSchema = z.record(z.array(MockOutcomeSchema));

/**
 * Decode a JSON or YAML file by its extension
 */
async function readStructuredFile(path: string): Promise<unknown> {
  const content = await readFile(path, 'utf-8');
  try {
    return path.endsWith('.json') ? JSON.parse(content) : parseYAML(content);
  } catch (error) {
    throw new Error(`Cannot parse ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Run input from --input-file, then --input, then --set (later wins)
 */
export async function loadInput(options: Pick<CliExecutionOptions, 'input' | 'inputFile' | 'set'>): Promise<ContextValues> {
  const input: ContextValues = {};

  if (options.inputFile) {
    const fromFile = await readStructuredFile(options.inputFile);
    if (!isRecord(fromFile)) {
      throw new Error(`Input file ${options.inputFile} must contain an object`);
    }
    Object.assign(input, fromFile);
  }

  if (options.input) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(options.input);
    } catch (error) {
      throw new Error(`--input is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!isRecord(parsed)) {
      throw new Error('--input must be a JSON object');
    }
    Object.assign(input, parsed);
  }

  if (options.set) {
    Object.assign(input, parseKeyValuePairs(options.set));
  }

  return input;
}

/**
 * Scripted mock outcomes keyed by node id
 *
 * @throws ConfigError if the file does not match the outcomes format
 */
export async function loadMockOutcomes(path: string): Promise<MockOutcomes> {
  const raw = await readStructuredFile(path);
  const result = MockOutcomesSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw ConfigError.invalid('mockOutcomes', `${path} at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Mock-mode engine whose events feed the formatter and whose paused runs
 * are stored under the state directory
 */
export async function createCliEngine(options: CliExecutionOptions, formatter: Formatter): Promise<GraphEngine> {
  const engine = new GraphEngine({
    maxSteps: options.maxSteps ?? DEFAULT_MAX_STEPS,
    mode: 'mock',
    mockOutcomes: options.outcomes ? await loadMockOutcomes(options.outcomes) : undefined,
    snapshotStore: new FileSnapshotStore(options.stateDir),
    logLevel: options.verbose ? 'debug' : 'warn',
    verbose: options.verbose ?? false,
  });

  engine.events.on('*', (event) => formatter.onEvent(event));
  return engine;
}

export function exitCodeForResult(result: RunResult): ExitCode {
  switch (result.status) {
    case RunStatus.SUCCEEDED:
    case RunStatus.PAUSED:
      return ExitCode.SUCCESS;
    case RunStatus.BUDGET_EXCEEDED:
      return ExitCode.BUDGET_EXCEEDED;
    case RunStatus.FAILED:
    case RunStatus.CANCELLED:
      return ExitCode.RUN_FAILED;
  }
}

export function exitCodeForError(error: unknown): ExitCode {
  return error instanceof GraphrunError ? error.exitCode : ExitCode.INTERNAL_ERROR;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
