import type { NodeOutcome } from '../../types/core-types.js';
import { successOutcome } from '../../types/core-types.js';
import type { ModelCapability } from '../../capabilities/ModelCapability.js';
import type { InvocationRequest, NodeHandler } from '../NodeHandler.js';
import { mapModelResponse } from '../OutputMapper.js';

/**
 * Delegates a model node to the model capability
 */
export class ModelNodeHandler implements NodeHandler {
  readonly nodeType = 'model';
  readonly external = true;

  constructor(private readonly model: ModelCapability) {}

  async invoke({ node, input, goalRef, signal }: InvocationRequest): Promise<NodeOutcome> {
    const response = await this.model.complete(
      {
        nodeId: node.id,
        goalRef,
        instructions: node.instructions ?? '',
        context: input,
        toolRefs: node.toolRefs,
        outputKeys: node.outputKeys,
      },
      signal
    );
    return successOutcome(mapModelResponse(node, response), response.usage);
  }
}
