/**
 * Node Invoker
 *
 * Runs one attempt of one node through the handler registered for its
 * type, under the node's deadline and the run's cancellation signal.
 * Always resolves to an outcome; nothing a handler throws escapes.
 *
 * @module execution
 */

import type { ContextValues, NodeOutcome, NodeSpec, NodeType } from '../types/core-types.js';
import { failureOutcome } from '../types/core-types.js';
import type { ModelCapability } from '../capabilities/ModelCapability.js';
import type { ToolCapability } from '../capabilities/ToolCapability.js';
import type { NodeHandler } from './NodeHandler.js';
import { TimeoutManager } from '../automation/TimeoutManager.js';
import { classifyError } from './ErrorClassifier.js';
import { assertJsonOutputs } from './OutputMapper.js';
import { ModelNodeHandler } from './handlers/ModelNodeHandler.js';
import { ToolNodeHandler } from './handlers/ToolNodeHandler.js';
import { ConditionalNodeHandler } from './handlers/ConditionalNodeHandler.js';
import { PassthroughNodeHandler } from './handlers/PassthroughNodeHandler.js';
import { MockNodeHandler, MockScript } from './handlers/MockNodeHandler.js';

export interface InvokeOptions {
  goalRef: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface NodeInvokerSetup {
  mode: 'live' | 'mock';
  model?: ModelCapability;
  tools?: ToolCapability;
  /** Outcome script for mock mode */
  mockScript?: MockScript;
}

export class NodeInvoker {
  private readonly handlers = new Map<NodeType, NodeHandler>();

  /**
   * Invoker with the built-in handlers for the given mode
   */
  static create(setup: NodeInvokerSetup): NodeInvoker {
    const invoker = new NodeInvoker();
    invoker.register(new ConditionalNodeHandler());
    invoker.register(new PassthroughNodeHandler());

    if (setup.mode === 'mock') {
      const script = setup.mockScript ?? new MockScript();
      invoker.register(new MockNodeHandler('model', script));
      invoker.register(new MockNodeHandler('tool', script));
    } else {
      if (setup.model) invoker.register(new ModelNodeHandler(setup.model));
      if (setup.tools) invoker.register(new ToolNodeHandler(setup.tools));
    }

    return invoker;
  }

  /**
   * @throws Error if a handler for the type is already registered
   */
  register(handler: NodeHandler): void {
    if (this.handlers.has(handler.nodeType)) {
      throw new Error(`Handler for node type '${handler.nodeType}' is already registered`);
    }
    this.handlers.set(handler.nodeType, handler);
  }

  has(nodeType: NodeType): boolean {
    return this.handlers.has(nodeType);
  }

  /**
   * Whether nodes of this type make an external call
   */
  isExternal(nodeType: NodeType): boolean {
    return this.handlers.get(nodeType)?.external ?? false;
  }

  /**
   * One attempt of a node
   */
  async invoke(node: NodeSpec, input: Readonly<ContextValues>, options: InvokeOptions): Promise<NodeOutcome> {
    const handler = this.handlers.get(node.nodeType);
    if (!handler) {
      return failureOutcome('InvalidArgs', `No handler registered for node type '${node.nodeType}'`);
    }

    try {
      const outcome = await TimeoutManager.execute(
        signal => handler.invoke({ node, input, goalRef: options.goalRef, signal }),
        { timeoutMs: options.timeoutMs, operation: `node ${node.id}`, signal: options.signal }
      );
      if (outcome.status === 'success') {
        assertJsonOutputs(node, outcome.produced);
      }
      return outcome;
    } catch (error) {
      const detail = classifyError(error);
      return failureOutcome(detail.kind, detail.message);
    }
  }
}
