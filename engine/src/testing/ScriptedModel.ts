/**
 * Scripted Model
 *
 * Model capability for tests: replies are queued per node id and consumed
 * in order (the last one repeats). Records every request it receives.
 *
 * @module testing
 */

import type { ModelCapability, ModelRequest, ModelResponse } from '../capabilities/ModelCapability.js';
import { CapabilityError } from '../capabilities/CapabilityError.js';
import { sleep } from '../automation/TimeoutManager.js';

/**
 * Computes a reply from the request. The signal aborts when the attempt
 * times out or the run is cancelled.
 */
export type ReplyHandler<TRequest, TResponse> = (
  request: TRequest,
  signal: AbortSignal
) => TResponse | Promise<TResponse>;

export interface ScriptedCapabilityConfig {
  /** Simulated latency per call (ms); honours the abort signal */
  delay?: number;
}

function fixedReply<TRequest, TResponse>(reply: TResponse | Error): ReplyHandler<TRequest, TResponse> {
  return () => {
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  };
}

/**
 * Per-key reply queues shared by the scripted model and tool
 */
export class ReplyScript<TRequest, TResponse> {
  private readonly handlers = new Map<string, ReplyHandler<TRequest, TResponse>[]>();
  private readonly cursors = new Map<string, number>();

  /**
   * Queue fixed replies; an Error is thrown when its turn comes
   */
  add(key: string, replies: readonly (TResponse | Error)[]): void {
    this.addHandlers(key, replies.map(reply => fixedReply<TRequest, TResponse>(reply)));
  }

  addHandlers(key: string, handlers: readonly ReplyHandler<TRequest, TResponse>[]): void {
    this.handlers.set(key, [...(this.handlers.get(key) ?? []), ...handlers]);
  }

  /**
   * Next handler for a key, or undefined when none is scripted
   */
  next(key: string): ReplyHandler<TRequest, TResponse> | undefined {
    const queue = this.handlers.get(key);
    if (!queue || queue.length === 0) {
      return undefined;
    }
    const index = this.cursors.get(key) ?? 0;
    this.cursors.set(key, index + 1);
    return queue[Math.min(index, queue.length - 1)];
  }
}

export class ScriptedModel implements ModelCapability {
  private readonly script = new ReplyScript<ModelRequest, ModelResponse>();
  private readonly calls: Array<{ request: ModelRequest; timestamp: Date }> = [];

  constructor(
    replies: Record<string, readonly (ModelResponse | Error)[]> = {},
    private readonly config: ScriptedCapabilityConfig = {}
  ) {
    for (const [nodeId, queue] of Object.entries(replies)) {
      this.script.add(nodeId, queue);
    }
  }

  /**
   * Queue replies for a node
   */
  reply(nodeId: string, ...replies: (ModelResponse | Error)[]): this {
    this.script.add(nodeId, replies);
    return this;
  }

  /**
   * Queue a reply computed from the request
   */
  respond(nodeId: string, handler: ReplyHandler<ModelRequest, ModelResponse>): this {
    this.script.addHandlers(nodeId, [handler]);
    return this;
  }

  async complete(request: ModelRequest, signal: AbortSignal): Promise<ModelResponse> {
    this.calls.push({ request, timestamp: new Date() });

    if (this.config.delay) {
      await sleep(this.config.delay, signal);
    }

    const handler = this.script.next(request.nodeId);
    if (!handler) {
      throw new CapabilityError('upstream_failure', `No scripted reply for node "${request.nodeId}"`);
    }
    return handler(request, signal);
  }

  getCallCount(): number {
    return this.calls.length;
  }

  /**
   * Requests made for one node, in order
   */
  getCallsFor(nodeId: string): ModelRequest[] {
    return this.calls.filter(call => call.request.nodeId === nodeId).map(call => call.request);
  }

  reset(): void {
    this.calls.length = 0;
  }
}
