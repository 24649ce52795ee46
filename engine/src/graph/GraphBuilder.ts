/**
 * GraphBuilder
 *
 * Fluent construction of graph definitions. `build()` fills defaults and
 * returns a deeply frozen definition; validation is a separate step.
 *
 * @example
 * ```ts
 * const graph = new GraphBuilder('triage', '1.0.0')
 *   .model('classify', { inputKeys: ['ticket'], outputKeys: ['category'], maxRetries: 2 })
 *   .passthrough('done')
 *   .edge('classify', 'done', 'on_success')
 *   .terminal('done')
 *   .build();
 * ```
 */

import type {
  ConditionalRule,
  EdgeCondition,
  EdgeSpec,
  GraphDefinition,
  NodeSpec,
  NodeType,
} from '../types/core-types.js';
import { deepFreeze } from '../utils/deepFreeze.js';

/**
 * Node fields with defaults filled in by the builder
 */
export type NodeInput = Pick<NodeSpec, 'id' | 'nodeType'> & Partial<Omit<NodeSpec, 'id' | 'nodeType'>>;

/**
 * Edge fields with defaults filled in by the builder
 */
export type EdgeInput = Pick<EdgeSpec, 'source' | 'target'> & Partial<Omit<EdgeSpec, 'source' | 'target'>>;

export type NodeOptions = Partial<Omit<NodeSpec, 'id' | 'nodeType'>>;

/**
 * Fill node defaults
 */
export function createNode(input: NodeInput): NodeSpec {
  const node: {
    -readonly [K in keyof NodeSpec]: NodeSpec[K];
  } = {
    id: input.id,
    nodeType: input.nodeType,
    inputKeys: [...(input.inputKeys ?? [])],
    outputKeys: [...(input.outputKeys ?? [])],
    toolRefs: [...(input.toolRefs ?? [])],
    maxRetries: input.maxRetries ?? 0,
    overwrite: input.overwrite ?? false,
  };

  if (input.name !== undefined) node.name = input.name;
  if (input.description !== undefined) node.description = input.description;
  if (input.instructions !== undefined) node.instructions = input.instructions;
  if (input.timeoutMs !== undefined) node.timeoutMs = input.timeoutMs;
  if (input.rules !== undefined) node.rules = input.rules.map(rule => ({ when: rule.when, output: { ...rule.output } }));
  if (input.otherwise !== undefined) node.otherwise = { ...input.otherwise };

  return node;
}

/**
 * Fill edge defaults
 *
 * @param index - Declaration index, used for the default id
 */
export function createEdge(input: EdgeInput, index: number): EdgeSpec {
  const edge: {
    -readonly [K in keyof EdgeSpec]: EdgeSpec[K];
  } = {
    id: input.id ?? `e${index + 1}`,
    source: input.source,
    target: input.target,
    condition: input.condition ?? 'always',
    priority: input.priority ?? 0,
  };

  if (input.predicateExpr !== undefined) edge.predicateExpr = input.predicateExpr;

  return edge;
}

export class GraphBuilder {
  private readonly nodes: NodeSpec[] = [];
  private readonly edges: EdgeSpec[] = [];
  private readonly pauseNodes: string[] = [];
  private readonly terminalNodes: string[] = [];
  private entryPoint?: string;
  private graphDescription?: string;

  constructor(private readonly name: string, private readonly version: string = '1.0.0') {}

  describe(description: string): this {
    this.graphDescription = description;
    return this;
  }

  node(input: NodeInput): this {
    this.nodes.push(createNode(input));
    return this;
  }

  model(id: string, options: NodeOptions = {}): this {
    return this.typed(id, 'model', options);
  }

  tool(id: string, toolRef: string, options: NodeOptions = {}): this {
    return this.typed(id, 'tool', { ...options, toolRefs: [toolRef] });
  }

  conditional(id: string, rules: readonly ConditionalRule[], options: NodeOptions = {}): this {
    return this.typed(id, 'conditional', { ...options, rules });
  }

  passthrough(id: string, options: NodeOptions = {}): this {
    return this.typed(id, 'terminal-pass', options);
  }

  /**
   * Add an edge. The first declared node is the entry point unless
   * `entry()` says otherwise.
   */
  edge(
    source: string,
    target: string,
    condition: EdgeCondition = 'always',
    options: Partial<Pick<EdgeSpec, 'id' | 'predicateExpr' | 'priority'>> = {}
  ): this {
    this.edges.push(createEdge({ source, target, condition, ...options }, this.edges.length));
    return this;
  }

  when(source: string, target: string, predicateExpr: string, priority = 0): this {
    return this.edge(source, target, 'predicate', { predicateExpr, priority });
  }

  entry(nodeId: string): this {
    this.entryPoint = nodeId;
    return this;
  }

  pause(...nodeIds: string[]): this {
    this.pauseNodes.push(...nodeIds);
    return this;
  }

  terminal(...nodeIds: string[]): this {
    this.terminalNodes.push(...nodeIds);
    return this;
  }

  build(): GraphDefinition {
    const graph: GraphDefinition = {
      name: this.name,
      version: this.version,
      ...(this.graphDescription !== undefined ? { description: this.graphDescription } : {}),
      nodes: this.nodes.map(node => structuredClone(node)),
      edges: this.edges.map(edge => ({ ...edge })),
      entryPoint: this.entryPoint ?? this.nodes[0]?.id ?? '',
      pauseNodes: [...this.pauseNodes],
      terminalNodes: [...this.terminalNodes],
    };
    return deepFreeze(graph);
  }

  private typed(id: string, nodeType: NodeType, options: NodeOptions): this {
    return this.node({ ...options, id, nodeType });
  }
}
