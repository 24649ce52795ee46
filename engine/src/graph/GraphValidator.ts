/**
 * GraphValidator
 *
 * Structural validation of a graph definition. Every defect is collected
 * into the returned list; nothing is thrown. Callers must check that the
 * list is empty before running the graph.
 *
 * Cycles are allowed. Looping runs are bounded by the step budget at run
 * time, not rejected here.
 */

import type { GraphDefinition, NodeSpec } from '../types/core-types.js';
import { EDGE_CONDITIONS, NODE_TYPES } from '../types/core-types.js';
import { StructuralError } from '../errors/GraphErrors.js';
import { Expression } from '../context/ExpressionEvaluator.js';

export class GraphValidator {
  /**
   * Validate a graph definition
   *
   * @returns Every structural error found, in graph order
   */
  static validate(graph: GraphDefinition): StructuralError[] {
    const errors: StructuralError[] = [];

    if (graph.nodes.length === 0) {
      errors.push(StructuralError.emptyGraph());
    }

    const nodeIds = new Set<string>();
    graph.nodes.forEach((node, index) => {
      if (nodeIds.has(node.id)) {
        errors.push(StructuralError.duplicateNode(node.id, index));
      }
      nodeIds.add(node.id);
      errors.push(...this.validateNode(node, index));
    });

    if (!nodeIds.has(graph.entryPoint)) {
      errors.push(StructuralError.unknownEntryPoint(graph.entryPoint));
    }

    const edgeIds = new Set<string>();
    graph.edges.forEach((edge, index) => {
      const path = `edges[${index}]`;

      if (edgeIds.has(edge.id)) {
        errors.push(StructuralError.duplicateEdge(edge.id, index));
      }
      edgeIds.add(edge.id);

      if (!nodeIds.has(edge.source)) {
        errors.push(StructuralError.danglingEdge(edge.id, 'source', edge.source, `${path}.source`));
      }
      if (!nodeIds.has(edge.target)) {
        errors.push(StructuralError.danglingEdge(edge.id, 'target', edge.target, `${path}.target`));
      }

      if (!EDGE_CONDITIONS.includes(edge.condition)) {
        errors.push(StructuralError.invalidExpression(
          `Edge "${edge.id}"`,
          `unknown condition "${String(edge.condition)}"`,
          `${path}.condition`
        ));
      } else if (edge.condition === 'predicate') {
        if (edge.predicateExpr === undefined || edge.predicateExpr.trim() === '') {
          errors.push(StructuralError.invalidExpression(
            `Edge "${edge.id}"`,
            'predicate edge has no predicateExpr',
            `${path}.predicateExpr`
          ));
        } else {
          const problem = Expression.check(edge.predicateExpr);
          if (problem) {
            errors.push(StructuralError.invalidExpression(`Edge "${edge.id}"`, problem, `${path}.predicateExpr`));
          }
        }
      } else if (edge.predicateExpr !== undefined) {
        errors.push(StructuralError.invalidExpression(
          `Edge "${edge.id}"`,
          `predicateExpr is only allowed on predicate edges, not "${edge.condition}"`,
          `${path}.predicateExpr`
        ));
      }

      if (!Number.isInteger(edge.priority)) {
        errors.push(StructuralError.invalidExpression(
          `Edge "${edge.id}"`,
          `priority must be an integer, got ${edge.priority}`,
          `${path}.priority`
        ));
      }
    });

    graph.pauseNodes.forEach((id, index) => {
      if (!nodeIds.has(id)) {
        errors.push(StructuralError.unknownMarker('pauseNodes', id, index));
      }
    });
    graph.terminalNodes.forEach((id, index) => {
      if (!nodeIds.has(id)) {
        errors.push(StructuralError.unknownMarker('terminalNodes', id, index));
      }
    });

    return errors;
  }

  /**
   * Checks that concern a single node
   */
  private static validateNode(node: NodeSpec, index: number): StructuralError[] {
    const errors: StructuralError[] = [];
    const path = `nodes[${index}]`;

    if (!NODE_TYPES.includes(node.nodeType)) {
      errors.push(StructuralError.invalidNode(
        node.id,
        `unknown node type "${String(node.nodeType)}"`,
        `${path}.nodeType`
      ));
    }

    if (!Number.isInteger(node.maxRetries) || node.maxRetries < 0) {
      errors.push(StructuralError.invalidNode(
        node.id,
        `maxRetries must be a non-negative integer, got ${node.maxRetries}`,
        `${path}.maxRetries`
      ));
    }

    if (node.timeoutMs !== undefined && (!Number.isFinite(node.timeoutMs) || node.timeoutMs <= 0)) {
      errors.push(StructuralError.invalidNode(
        node.id,
        `timeoutMs must be a positive number, got ${node.timeoutMs}`,
        `${path}.timeoutMs`
      ));
    }

    if (!node.overwrite) {
      const inputs = new Set(node.inputKeys);
      const overlap = node.outputKeys.filter(key => inputs.has(key));
      if (overlap.length > 0) {
        errors.push(StructuralError.keyOverlap(node.id, overlap, `${path}.outputKeys`));
      }
    }

    if (node.nodeType === 'tool' && node.toolRefs.length !== 1) {
      errors.push(StructuralError.invalidNode(
        node.id,
        `tool nodes must reference exactly one tool, found ${node.toolRefs.length}`,
        `${path}.toolRefs`
      ));
    }

    if (node.nodeType === 'conditional') {
      if (!node.rules || node.rules.length === 0) {
        errors.push(StructuralError.invalidNode(node.id, 'conditional nodes need at least one rule', `${path}.rules`));
      }
      if (node.maxRetries > 0) {
        errors.push(StructuralError.invalidNode(
          node.id,
          'conditional nodes are pure and must declare maxRetries: 0',
          `${path}.maxRetries`
        ));
      }
      node.rules?.forEach((rule, ruleIndex) => {
        const problem = Expression.check(rule.when);
        if (problem) {
          errors.push(StructuralError.invalidExpression(
            `Node "${node.id}" rule ${ruleIndex}`,
            problem,
            `${path}.rules[${ruleIndex}].when`
          ));
        }
      });
    }

    return errors;
  }
}

/**
 * Validate a graph definition
 */
export function validateGraph(graph: GraphDefinition): StructuralError[] {
  return GraphValidator.validate(graph);
}
