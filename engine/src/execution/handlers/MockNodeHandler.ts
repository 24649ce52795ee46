/**
 * Mock mode
 *
 * Stands in for model and tool nodes without any external call. Outcomes
 * come from a per-node script consumed in order (the last entry repeats);
 * unscripted nodes succeed with placeholder values.
 */

import type {
  ContextValues,
  NodeErrorKind,
  NodeOutcome,
  NodeSpec,
  NodeType,
  TokenUsage,
} from '../../types/core-types.js';
import { failureOutcome, successOutcome } from '../../types/core-types.js';
import type { InvocationRequest, NodeHandler } from '../NodeHandler.js';

export type MockOutcome =
  | { status: 'success'; produced?: ContextValues; usage?: TokenUsage }
  | { status: 'failure'; kind?: NodeErrorKind; message?: string };

/**
 * Scripted outcomes keyed by node id
 */
export type MockOutcomes = Readonly<Record<string, readonly MockOutcome[]>>;

export function placeholderValue(nodeId: string, key: string): string {
  return `<mock:${nodeId}.${key}>`;
}

/**
 * Per-run cursor over the scripted outcomes
 */
export class MockScript {
  private readonly cursors = new Map<string, number>();

  constructor(private readonly outcomes: MockOutcomes = {}) {}

  next(node: NodeSpec): NodeOutcome {
    const script = this.outcomes[node.id];
    if (!script || script.length === 0) {
      return successOutcome(this.placeholders(node));
    }

    const index = this.cursors.get(node.id) ?? 0;
    this.cursors.set(node.id, index + 1);
    const entry = script[Math.min(index, script.length - 1)];

    if (entry.status === 'failure') {
      return failureOutcome(entry.kind ?? 'UpstreamFailure', entry.message ?? `Scripted failure of node "${node.id}"`);
    }

    const produced = this.placeholders(node);
    for (const key of node.outputKeys) {
      const value = entry.produced?.[key];
      if (value !== undefined) {
        produced[key] = structuredClone(value);
      }
    }
    return successOutcome(produced, entry.usage);
  }

  private placeholders(node: NodeSpec): ContextValues {
    const produced: ContextValues = {};
    for (const key of node.outputKeys) {
      produced[key] = placeholderValue(node.id, key);
    }
    return produced;
  }
}

export class MockNodeHandler implements NodeHandler {
  readonly external = false;

  constructor(readonly nodeType: NodeType, private readonly script: MockScript) {}

  async invoke({ node }: InvocationRequest): Promise<NodeOutcome> {
    return this.script.next(node);
  }
}
