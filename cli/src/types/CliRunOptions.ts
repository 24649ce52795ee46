/**
 * CLI Run Options
 *
 * Command-line options for `graphrun run` and `graphrun resume`.
 */

import type { FormatterType } from '../formatters/createFormatter.js';

/**
 * Options shared by run and resume
 */
export interface CliExecutionOptions {
  /** Input as a JSON object */
  input?: string;

  /** Path to a JSON or YAML input file */
  inputFile?: string;

  /** Extra input as key=value pairs */
  set?: string[];

  /** Step budget */
  maxSteps?: number;

  /** Path to a JSON or YAML file of scripted mock outcomes */
  outcomes?: string;

  /** Directory where paused runs are stored */
  stateDir: string;

  format?: FormatterType;
  verbose?: boolean;
  silent?: boolean;

  /** commander sets this to false for --no-color */
  color?: boolean;
}

export interface CliRunOptions extends CliExecutionOptions {
  /** Goal reference for the run */
  goal?: string;

  /** Run id to use instead of a generated one */
  runId?: string;
}

export type CliResumeOptions = CliExecutionOptions;

/**
 * Parse key=value pairs into an object. Values that are valid JSON
 * (numbers, booleans, null, arrays, objects, quoted strings) are decoded,
 * anything else stays a string.
 */
export function parseKeyValuePairs(pairs: readonly string[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index === -1) {
      throw new Error(`Invalid key=value format: ${pair}`);
    }

    const key = pair.slice(0, index).trim();
    const value = pair.slice(index + 1).trim();

    if (!key) {
      throw new Error(`Empty key in: ${pair}`);
    }

    result[key] = decodeValue(value);
  }

  return result;
}

function decodeValue(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * Parse a positive integer option
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}
