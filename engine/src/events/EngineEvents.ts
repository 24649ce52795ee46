/**
 * Run Events
 *
 * Events emitted at every lifecycle moment of a run. Consumers (the CLI,
 * loggers, metrics collectors, tests) subscribe through the EventBus and
 * narrow on `type`.
 */

import type { NodeErrorDetail, NodeType, RunError } from '../types/core-types.js';

export enum EngineEventType {
  RUN_STARTED = 'run.started',
  RUN_RESUMED = 'run.resumed',
  RUN_PAUSED = 'run.paused',
  RUN_SUCCEEDED = 'run.succeeded',
  RUN_FAILED = 'run.failed',
  RUN_BUDGET_EXCEEDED = 'run.budget_exceeded',
  RUN_CANCELLED = 'run.cancelled',

  NODE_STARTED = 'node.started',
  NODE_RETRYING = 'node.retrying',
  NODE_COMPLETED = 'node.completed',
  NODE_FAILED = 'node.failed',
}

/**
 * Payload per event type
 */
export interface EngineEventPayloads {
  [EngineEventType.RUN_STARTED]: {
    graphName: string;
    graphVersion: string;
    goalRef: string;
    entryPoint: string;
    mock: boolean;
  };
  [EngineEventType.RUN_RESUMED]: {
    graphName: string;
    graphVersion: string;
    goalRef: string;
    pausedAt: string;
    stepsExecuted: number;
    mock: boolean;
  };
  [EngineEventType.RUN_PAUSED]: {
    pausedAt: string;
    stepsExecuted: number;
  };
  [EngineEventType.RUN_SUCCEEDED]: {
    terminalNode: string;
    stepsExecuted: number;
    durationMs: number;
  };
  [EngineEventType.RUN_FAILED]: {
    error: RunError;
    stepsExecuted: number;
    durationMs: number;
  };
  [EngineEventType.RUN_BUDGET_EXCEEDED]: {
    maxSteps: number;
    stepsExecuted: number;
    nextNode: string;
  };
  [EngineEventType.RUN_CANCELLED]: {
    stepsExecuted: number;
  };
  [EngineEventType.NODE_STARTED]: {
    nodeType: NodeType;
    attempt: number;
    step: number;
  };
  [EngineEventType.NODE_RETRYING]: {
    attempt: number;
    maxAttempts: number;
    delayMs: number;
    error: NodeErrorDetail;
  };
  [EngineEventType.NODE_COMPLETED]: {
    attempts: number;
    durationMs: number;
    producedKeys: string[];
  };
  [EngineEventType.NODE_FAILED]: {
    attempts: number;
    durationMs: number;
    error: NodeErrorDetail;
  };
}

/**
 * Event of one type
 */
export interface GraphEvent<K extends EngineEventType> {
  readonly type: K;
  /** ms since epoch */
  readonly timestamp: number;
  readonly runId: string;
  readonly nodeId?: string;
  readonly payload: EngineEventPayloads[K];
}

/**
 * Any engine event, discriminated on `type`
 */
export type EngineEvent = { [K in EngineEventType]: GraphEvent<K> }[EngineEventType];

/**
 * Helper to create well-formed events
 */
export function createEvent<K extends EngineEventType>(
  type: K,
  payload: EngineEventPayloads[K],
  context: { runId: string; nodeId?: string }
): GraphEvent<K> {
  return {
    type,
    timestamp: Date.now(),
    runId: context.runId,
    ...(context.nodeId !== undefined ? { nodeId: context.nodeId } : {}),
    payload,
  };
}
