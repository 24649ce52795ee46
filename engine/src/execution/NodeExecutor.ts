/**
 * Node Executor
 *
 * One visit of one node: invokes it up to `maxRetries + 1` times against
 * the same input, waiting between attempts as the backoff strategy says.
 * Only the final outcome leaves the visit; failed attempts never touch the
 * run context.
 *
 * @module execution
 */

import type { ContextValues, NodeOutcome, NodeSpec } from '../types/core-types.js';
import { failureOutcome } from '../types/core-types.js';
import type { NodeInvoker } from './NodeInvoker.js';
import { isRetryable } from './ErrorClassifier.js';
import { BackoffStrategy, IMMEDIATE_BACKOFF } from '../automation/BackoffStrategy.js';
import { CancellationError, sleep } from '../automation/TimeoutManager.js';
import type { EventBus } from '../events/EventBus.js';
import { EngineEventType, createEvent } from '../events/EngineEvents.js';
import type { EngineLogger } from '../logging/EngineLogger.js';

/**
 * Final outcome of a visit
 */
export interface VisitResult {
  outcome: NodeOutcome;
  /** Attempts made (1 + retries used) */
  attempts: number;
  durationMs: number;
}

export interface VisitContext {
  runId: string;
  goalRef: string;
  /** Step number this visit will count as */
  step: number;
  signal?: AbortSignal;
}

export interface NodeExecutorOptions {
  invoker: NodeInvoker;
  events: EventBus;
  defaultTimeoutMs: number;
  backoff?: BackoffStrategy;
  logger?: EngineLogger | null;
}

export class NodeExecutor {
  private readonly backoff: BackoffStrategy;

  constructor(private readonly options: NodeExecutorOptions) {
    this.backoff = options.backoff ?? IMMEDIATE_BACKOFF;
  }

  async execute(node: NodeSpec, input: Readonly<ContextValues>, visit: VisitContext): Promise<VisitResult> {
    const startTime = Date.now();
    const maxAttempts = node.maxRetries + 1;
    const eventContext = { runId: visit.runId, nodeId: node.id };
    const logger = this.options.logger;

    let outcome: NodeOutcome = failureOutcome('UpstreamFailure', `Node "${node.id}" was not invoked`);
    let attempts = 0;

    for (attempts = 1; attempts <= maxAttempts; attempts++) {
      await this.options.events.emit(
        createEvent(EngineEventType.NODE_STARTED, { nodeType: node.nodeType, attempt: attempts, step: visit.step }, eventContext)
      );
      logger?.debug(`Invoking node ${node.id}`, { nodeType: node.nodeType, attempt: attempts, step: visit.step });

      // Each attempt gets its own copy so an attempt cannot leak into the next
      outcome = await this.options.invoker.invoke(node, structuredClone(input), {
        goalRef: visit.goalRef,
        timeoutMs: node.timeoutMs ?? this.options.defaultTimeoutMs,
        signal: visit.signal,
      });

      if (outcome.status === 'success') {
        const durationMs = Date.now() - startTime;
        await this.options.events.emit(
          createEvent(
            EngineEventType.NODE_COMPLETED,
            { attempts, durationMs, producedKeys: Object.keys(outcome.produced) },
            eventContext
          )
        );
        return { outcome, attempts, durationMs };
      }

      if (!isRetryable(outcome.error.kind) || attempts === maxAttempts) {
        break;
      }

      const delayMs = this.backoff.calculateDelay(attempts);
      logger?.warn(`Node ${node.id} failed, retrying`, {
        attempt: attempts,
        maxAttempts,
        kind: outcome.error.kind,
        delayMs,
      });
      await this.options.events.emit(
        createEvent(
          EngineEventType.NODE_RETRYING,
          { attempt: attempts, maxAttempts, delayMs, error: outcome.error },
          eventContext
        )
      );

      try {
        await sleep(delayMs, visit.signal);
      } catch (error) {
        if (error instanceof CancellationError) {
          outcome = failureOutcome('Cancelled', `Run was cancelled while waiting to retry node "${node.id}"`);
          break;
        }
        throw error;
      }
    }

    const durationMs = Date.now() - startTime;
    const attemptsMade = Math.min(attempts, maxAttempts);
    if (outcome.status === 'failure') {
      logger?.debug(`Node ${node.id} failed`, { attempts: attemptsMade, kind: outcome.error.kind });
      await this.options.events.emit(
        createEvent(
          EngineEventType.NODE_FAILED,
          { attempts: attemptsMade, durationMs, error: outcome.error },
          eventContext
        )
      );
    }
    return { outcome, attempts: attemptsMade, durationMs };
  }
}
