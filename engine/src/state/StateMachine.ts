/**
 * State Machine
 *
 * Generic transition guard plus the run lifecycle built on it.
 *
 * @module state
 */

import { RunStatus } from './ExecutionState.js';

/**
 * State transition record for audit trail
 */
export interface StateTransition<T> {
  readonly from: T;
  readonly to: T;
  /** ms since epoch */
  readonly timestamp: number;
  readonly reason?: string;
}

export interface StateMachineConfig<T> {
  readonly initialState: T;
  /** from → allowed targets */
  readonly transitions: ReadonlyMap<T, readonly T[]>;
  readonly terminalStates: ReadonlySet<T>;
}

/**
 * Generic state machine for enforcing valid transitions
 */
export class StateMachine<T> {
  private currentState: T;
  private readonly history: StateTransition<T>[] = [];

  constructor(private readonly config: StateMachineConfig<T>) {
    this.currentState = config.initialState;
  }

  getState(): T {
    return this.currentState;
  }

  canTransition(to: T): boolean {
    if (this.config.terminalStates.has(this.currentState)) {
      return false;
    }
    return this.config.transitions.get(this.currentState)?.includes(to) ?? false;
  }

  /**
   * @throws Error if the transition is not allowed from the current state
   */
  transition(to: T, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid state transition: ${String(this.currentState)} → ${String(to)}`);
    }

    const from = this.currentState;
    this.currentState = to;
    this.history.push({ from, to, timestamp: Date.now(), reason });
  }

  isTerminal(): boolean {
    return this.config.terminalStates.has(this.currentState);
  }

  getAllowedTransitions(): readonly T[] {
    return this.config.transitions.get(this.currentState) ?? [];
  }

  getHistory(): readonly StateTransition<T>[] {
    return [...this.history];
  }
}

/**
 * Run lifecycle
 *
 * RUNNING → SUCCEEDED | FAILED | BUDGET_EXCEEDED | CANCELLED (end of run)
 * RUNNING → PAUSED (pause node reached)
 * PAUSED → RUNNING (resume)
 */
const RUN_TRANSITIONS = new Map<RunStatus, readonly RunStatus[]>([
  [RunStatus.RUNNING, [
    RunStatus.PAUSED,
    RunStatus.SUCCEEDED,
    RunStatus.FAILED,
    RunStatus.BUDGET_EXCEEDED,
    RunStatus.CANCELLED,
  ]],
  [RunStatus.PAUSED, [RunStatus.RUNNING]],
  [RunStatus.SUCCEEDED, []],
  [RunStatus.FAILED, []],
  [RunStatus.BUDGET_EXCEEDED, []],
  [RunStatus.CANCELLED, []],
]);

const RUN_TERMINAL_STATES = new Set<RunStatus>([
  RunStatus.SUCCEEDED,
  RunStatus.FAILED,
  RunStatus.BUDGET_EXCEEDED,
  RunStatus.CANCELLED,
]);

/**
 * Create a run state machine. Resumed runs start PAUSED and transition
 * to RUNNING once the snapshot has been accepted.
 */
export function createRunStateMachine(initialState: RunStatus = RunStatus.RUNNING): StateMachine<RunStatus> {
  return new StateMachine<RunStatus>({
    initialState,
    transitions: RUN_TRANSITIONS,
    terminalStates: RUN_TERMINAL_STATES,
  });
}

export function isRunTerminal(status: RunStatus): boolean {
  return RUN_TERMINAL_STATES.has(status);
}
