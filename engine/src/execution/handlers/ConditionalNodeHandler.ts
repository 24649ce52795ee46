import type { ContextValues, NodeOutcome, NodeSpec } from '../../types/core-types.js';
import { failureOutcome, successOutcome } from '../../types/core-types.js';
import { compileExpression } from '../../context/ExpressionEvaluator.js';
import type { InvocationRequest, NodeHandler } from '../NodeHandler.js';

/**
 * Pure branch selection over the node's inputs. The first rule whose
 * expression is truthy supplies the output; `otherwise` covers the rest.
 */
export class ConditionalNodeHandler implements NodeHandler {
  readonly nodeType = 'conditional';
  readonly external = false;

  async invoke({ node, input }: InvocationRequest): Promise<NodeOutcome> {
    for (const rule of node.rules ?? []) {
      if (compileExpression(rule.when).test(input)) {
        return successOutcome(declaredOnly(node, rule.output));
      }
    }

    if (node.otherwise) {
      return successOutcome(declaredOnly(node, node.otherwise));
    }

    return failureOutcome('InvalidArgs', `No rule of conditional node "${node.id}" matched and it has no otherwise branch`);
  }
}

function declaredOnly(node: NodeSpec, values: Readonly<ContextValues>): ContextValues {
  const produced: ContextValues = {};
  for (const key of node.outputKeys) {
    if (values[key] !== undefined) {
      produced[key] = structuredClone(values[key]);
    }
  }
  return produced;
}
