/**
 * Execution State
 *
 * Run statuses and per-visit bookkeeping kept by the execution engine.
 *
 * @module state
 */

/**
 * Status of a run
 *
 * Paused is a suspension point with a defined resumption target, not a
 * terminal state.
 */
export enum RunStatus {
  RUNNING = 'Running',
  PAUSED = 'Paused',
  SUCCEEDED = 'Succeeded',
  FAILED = 'Failed',
  BUDGET_EXCEEDED = 'BudgetExceeded',
  CANCELLED = 'Cancelled',
}

/**
 * Statuses a finished run can report
 */
export type FinalRunStatus = Exclude<RunStatus, RunStatus.RUNNING>;

/**
 * Record of one node visit
 */
export interface NodeVisit {
  readonly nodeId: string;
  /** Invocation attempts made during the visit (1 + retries used) */
  readonly attempts: number;
  readonly status: 'success' | 'failure';
  readonly durationMs: number;
}
