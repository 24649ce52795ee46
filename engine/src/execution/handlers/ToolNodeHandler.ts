import type { NodeOutcome } from '../../types/core-types.js';
import { successOutcome } from '../../types/core-types.js';
import type { ToolCapability } from '../../capabilities/ToolCapability.js';
import type { InvocationRequest, NodeHandler } from '../NodeHandler.js';
import { mapToolResult } from '../OutputMapper.js';

/**
 * Calls the single tool a tool node references, with its inputs as arguments
 */
export class ToolNodeHandler implements NodeHandler {
  readonly nodeType = 'tool';
  readonly external = true;

  constructor(private readonly tools: ToolCapability) {}

  async invoke({ node, input, signal }: InvocationRequest): Promise<NodeOutcome> {
    const result = await this.tools.call(node.toolRefs[0], input, signal);
    return successOutcome(mapToolResult(node, result));
  }
}
