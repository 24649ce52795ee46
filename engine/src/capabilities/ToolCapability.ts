/**
 * Tool Capability
 *
 * Boundary to external tools. A tool node calls exactly one tool per
 * attempt with its input keys as arguments.
 */

import type { ContextValues } from '../types/core-types.js';
import { CapabilityError } from './CapabilityError.js';

export interface ToolCapability {
  /**
   * Call a tool. Throw a CapabilityError to classify a failure.
   */
  call(toolId: string, args: Readonly<ContextValues>, signal: AbortSignal): Promise<unknown>;
}

export type ToolFunction = (args: Readonly<ContextValues>, signal: AbortSignal) => unknown | Promise<unknown>;

/**
 * Tool capability backed by registered functions
 *
 * @example
 * ```ts
 * const tools = new ToolRegistry()
 *   .register('weather_lookup', async ({ city }) => fetchWeather(city));
 * ```
 */
export class ToolRegistry implements ToolCapability {
  private readonly tools = new Map<string, ToolFunction>();

  constructor(initial: Record<string, ToolFunction> = {}) {
    for (const [toolId, fn] of Object.entries(initial)) {
      this.register(toolId, fn);
    }
  }

  /**
   * @throws Error if the tool id is already registered
   */
  register(toolId: string, fn: ToolFunction): this {
    if (this.tools.has(toolId)) {
      throw new Error(`Tool "${toolId}" is already registered`);
    }
    this.tools.set(toolId, fn);
    return this;
  }

  has(toolId: string): boolean {
    return this.tools.has(toolId);
  }

  list(): string[] {
    return [...this.tools.keys()];
  }

  async call(toolId: string, args: Readonly<ContextValues>, signal: AbortSignal): Promise<unknown> {
    const fn = this.tools.get(toolId);
    if (!fn) {
      throw new CapabilityError('not_found', `Tool "${toolId}" is not registered`);
    }
    return fn(args, signal);
  }
}
