/**
 * Scripted Tool
 *
 * Tool capability for tests: results are queued per tool id and consumed
 * in order (the last one repeats).
 *
 * @module testing
 */

import type { ToolCapability } from '../capabilities/ToolCapability.js';
import { CapabilityError } from '../capabilities/CapabilityError.js';
import type { ContextValues } from '../types/core-types.js';
import { sleep } from '../automation/TimeoutManager.js';
import { ReplyScript, type ReplyHandler, type ScriptedCapabilityConfig } from './ScriptedModel.js';

export interface ToolCall {
  toolId: string;
  args: Readonly<ContextValues>;
}

export class ScriptedTool implements ToolCapability {
  private readonly script = new ReplyScript<ToolCall, unknown>();
  private readonly calls: Array<ToolCall & { timestamp: Date }> = [];

  constructor(
    results: Record<string, readonly unknown[]> = {},
    private readonly config: ScriptedCapabilityConfig = {}
  ) {
    for (const [toolId, queue] of Object.entries(results)) {
      this.script.add(toolId, queue);
    }
  }

  /**
   * Queue results for a tool
   */
  result(toolId: string, ...results: unknown[]): this {
    this.script.add(toolId, results);
    return this;
  }

  /**
   * Queue a result computed from the call
   */
  respond(toolId: string, handler: ReplyHandler<ToolCall, unknown>): this {
    this.script.addHandlers(toolId, [handler]);
    return this;
  }

  async call(toolId: string, args: Readonly<ContextValues>, signal: AbortSignal): Promise<unknown> {
    this.calls.push({ toolId, args, timestamp: new Date() });

    if (this.config.delay) {
      await sleep(this.config.delay, signal);
    }

    const handler = this.script.next(toolId);
    if (!handler) {
      throw new CapabilityError('not_found', `Tool "${toolId}" has no scripted result`);
    }
    return handler({ toolId, args }, signal);
  }

  getCallCount(toolId?: string): number {
    return toolId === undefined ? this.calls.length : this.calls.filter(call => call.toolId === toolId).length;
  }

  getCalls(): ToolCall[] {
    return this.calls.map(({ toolId, args }) => ({ toolId, args }));
  }
}
