/**
 * Edge Router
 *
 * Picks the single edge taken after a node: edges from the source in
 * priority order (ties by declaration order), first match wins.
 *
 * @module execution
 */

import type { ContextValues, EdgeSpec, GraphDefinition, NodeOutcome } from '../types/core-types.js';
import { indexGraph } from '../graph/GraphIndex.js';
import { compileExpression } from '../context/ExpressionEvaluator.js';
import type { EngineLogger } from '../logging/EngineLogger.js';

/**
 * Scope a predicate is evaluated against: the context plus `outcome`
 */
export function predicateScope(outcome: NodeOutcome, context: Readonly<ContextValues>): Record<string, unknown> {
  return {
    ...context,
    outcome: outcome.status === 'success'
      ? { status: 'success', error: null, produced: outcome.produced }
      : { status: 'failure', error: { ...outcome.error }, produced: {} },
  };
}

export class EdgeRouter {
  constructor(private readonly graph: GraphDefinition, private readonly logger?: EngineLogger | null) {}

  /**
   * @returns The selected edge, or undefined when none matches
   */
  select(sourceId: string, outcome: NodeOutcome, context: Readonly<ContextValues>): EdgeSpec | undefined {
    const candidates = indexGraph(this.graph).outgoing.get(sourceId) ?? [];
    let scope: Record<string, unknown> | undefined;

    for (const edge of candidates) {
      switch (edge.condition) {
        case 'always':
          return edge;
        case 'on_success':
          if (outcome.status === 'success') return edge;
          break;
        case 'on_failure':
          if (outcome.status === 'failure') return edge;
          break;
        case 'predicate':
          scope ??= predicateScope(outcome, context);
          if (this.matches(edge, scope)) return edge;
          break;
      }
    }

    return undefined;
  }

  /**
   * Target node id of the selected edge
   */
  selectTarget(sourceId: string, outcome: NodeOutcome, context: Readonly<ContextValues>): string | undefined {
    return this.select(sourceId, outcome, context)?.target;
  }

  private matches(edge: EdgeSpec, scope: Record<string, unknown>): boolean {
    try {
      return compileExpression(edge.predicateExpr ?? '').test(scope);
    } catch (error) {
      this.logger?.warn('Predicate could not be evaluated; edge skipped', {
        edgeId: edge.id,
        expression: edge.predicateExpr,
        reason: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
