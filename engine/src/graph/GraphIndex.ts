/**
 * GraphIndex
 *
 * Read-only lookup structures built from a graph definition:
 * nodes by id, outgoing edges per source in routing order, and the
 * pause/terminal marker sets.
 *
 * Pure analysis. The index is cached per graph object, which is safe
 * because graph definitions never change after construction.
 */

import type { EdgeSpec, GraphDefinition, NodeSpec } from '../types/core-types.js';

export interface GraphIndex {
  /** Nodes by id (first declaration wins for duplicates) */
  readonly nodes: ReadonlyMap<string, NodeSpec>;
  /** Outgoing edges per source, sorted by priority then declaration order */
  readonly outgoing: ReadonlyMap<string, readonly EdgeSpec[]>;
  readonly pauseNodes: ReadonlySet<string>;
  readonly terminalNodes: ReadonlySet<string>;
}

const indexCache = new WeakMap<GraphDefinition, GraphIndex>();

/**
 * Edges from one source in the order the router evaluates them.
 * Array.prototype.sort is stable, so equal priorities keep declaration order.
 */
export function sortEdges(edges: readonly EdgeSpec[]): EdgeSpec[] {
  return [...edges].sort((a, b) => a.priority - b.priority);
}

export function indexGraph(graph: GraphDefinition): GraphIndex {
  const cached = indexCache.get(graph);
  if (cached) {
    return cached;
  }

  const nodes = new Map<string, NodeSpec>();
  for (const node of graph.nodes) {
    if (!nodes.has(node.id)) {
      nodes.set(node.id, node);
    }
  }

  const grouped = new Map<string, EdgeSpec[]>();
  for (const edge of graph.edges) {
    const list = grouped.get(edge.source);
    if (list) {
      list.push(edge);
    } else {
      grouped.set(edge.source, [edge]);
    }
  }

  const outgoing = new Map<string, readonly EdgeSpec[]>();
  for (const [source, edges] of grouped) {
    outgoing.set(source, Object.freeze(sortEdges(edges)));
  }

  const index: GraphIndex = {
    nodes,
    outgoing,
    pauseNodes: new Set(graph.pauseNodes),
    terminalNodes: new Set(graph.terminalNodes),
  };
  indexCache.set(graph, index);
  return index;
}
