/**
 * Base Graphrun Error Class
 *
 * Foundation for all engine errors with diagnostic capabilities.
 * Provides structured error information for the CLI and for programmatic callers.
 *
 * @module errors
 */

import {
  GraphrunErrorCode,
  ErrorSeverity,
  ExitCode,
  getErrorCategory,
  getErrorDescription,
  getExitCodeForError,
  getSuggestedAction,
  isUserError,
} from './ErrorCodes.js';

/**
 * Diagnostic error information
 */
export interface GraphrunErrorDiagnostic {
  /** Structured error code (e.g., GR-S-004) */
  code: GraphrunErrorCode;

  /** Human-readable error message */
  message: string;

  /** Process exit code (for CLI) */
  exitCode?: ExitCode;

  /** Path to the error location (e.g., "edges[3].target") */
  path?: string;

  /** Optional suggestion for fixing the error */
  hint?: string;

  /** Error severity */
  severity: ErrorSeverity;

  /** Additional context data for debugging */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all engine errors
 *
 * @example
 * ```typescript
 * throw new GraphrunError({
 *   code: GraphrunErrorCode.CONFIG_INVALID,
 *   message: 'maxSteps must be a positive integer',
 *   path: 'config.maxSteps',
 *   severity: ErrorSeverity.ERROR,
 * });
 * ```
 */
export class GraphrunError extends Error {
  public readonly diagnostic: Required<Pick<GraphrunErrorDiagnostic, 'exitCode' | 'hint'>> & GraphrunErrorDiagnostic;

  public readonly timestamp: Date;

  constructor(diagnostic: GraphrunErrorDiagnostic) {
    super(diagnostic.message);
    this.name = getErrorCategory(diagnostic.code).replace(/\s+/g, '');
    this.diagnostic = {
      ...diagnostic,
      exitCode: diagnostic.exitCode ?? getExitCodeForError(diagnostic.code),
      hint: diagnostic.hint ?? getSuggestedAction(diagnostic.code),
    };
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get code(): GraphrunErrorCode {
    return this.diagnostic.code;
  }

  get exitCode(): ExitCode {
    return this.diagnostic.exitCode;
  }

  get path(): string | undefined {
    return this.diagnostic.path;
  }

  get hint(): string {
    return this.diagnostic.hint;
  }

  get severity(): ErrorSeverity {
    return this.diagnostic.severity;
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  /**
   * True if user can fix by changing the graph or the run input
   */
  get isUserError(): boolean {
    return isUserError(this.code);
  }

  get category(): string {
    return getErrorCategory(this.code);
  }

  /**
   * Format error as string for logging/display
   */
  toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `: ${this.message}`;

    if (this.hint) {
      msg += `\n  Hint: ${this.hint}`;
    }

    return msg;
  }

  /**
   * Convert to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      path: this.path,
      hint: this.hint,
      severity: this.severity,
      context: this.diagnostic.context,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /**
   * Simplified error object for CLI display
   */
  toSimpleObject(): { code: string; message: string; hint?: string; path?: string } {
    return {
      code: this.code,
      message: this.message,
      hint: this.hint,
      path: this.path,
    };
  }
}
