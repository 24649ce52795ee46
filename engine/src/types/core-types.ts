/**
 * Core graph and outcome types shared across the engine.
 *
 * Graph types are immutable descriptions created at build time; the engine
 * never mutates them while running.
 */

/**
 * How a node is executed
 */
export const NODE_TYPES = ['model', 'tool', 'conditional', 'terminal-pass'] as const;

export type NodeType = (typeof NODE_TYPES)[number];

/**
 * When an edge may be taken
 */
export const EDGE_CONDITIONS = ['always', 'on_success', 'on_failure', 'predicate'] as const;

export type EdgeCondition = (typeof EDGE_CONDITIONS)[number];

/**
 * Key/value state of one run
 */
export type ContextValues = Record<string, unknown>;

/**
 * One branch of a conditional node
 */
export interface ConditionalRule {
  /** Expression evaluated against the node's input view */
  readonly when: string;

  /** Values produced when the expression is truthy */
  readonly output: Readonly<ContextValues>;
}

/**
 * A unit of work in the graph
 */
export interface NodeSpec {
  readonly id: string;
  readonly nodeType: NodeType;
  readonly name?: string;
  readonly description?: string;

  /** Context keys that must be present before invocation */
  readonly inputKeys: readonly string[];

  /** Context keys populated on success */
  readonly outputKeys: readonly string[];

  /** Guidance handed to the model capability (model nodes) */
  readonly instructions?: string;

  /** External tool ids usable by the node (model and tool nodes) */
  readonly toolRefs: readonly string[];

  /** Additional attempts after the first failure */
  readonly maxRetries: number;

  /** Node may write keys it also reads */
  readonly overwrite: boolean;

  /** Per-invocation timeout; falls back to the engine default */
  readonly timeoutMs?: number;

  /** Ordered branches (conditional nodes) */
  readonly rules?: readonly ConditionalRule[];

  /** Values produced when no rule matches (conditional nodes) */
  readonly otherwise?: Readonly<ContextValues>;
}

/**
 * A directed, conditioned transition between two nodes
 */
export interface EdgeSpec {
  readonly id: string;
  readonly source: string;
  readonly target: string;
  readonly condition: EdgeCondition;

  /** Present only when condition is 'predicate' */
  readonly predicateExpr?: string;

  /** Lower value is evaluated first among edges sharing a source */
  readonly priority: number;
}

/**
 * Immutable description of a workflow version
 */
export interface GraphDefinition {
  readonly name: string;
  readonly version: string;
  readonly description?: string;

  /** Nodes in declaration order; ids are unique in a valid graph */
  readonly nodes: readonly NodeSpec[];

  /** Edges in declaration order */
  readonly edges: readonly EdgeSpec[];

  readonly entryPoint: string;
  readonly pauseNodes: readonly string[];
  readonly terminalNodes: readonly string[];
}

/**
 * Classified reason for a failed node attempt
 */
export type NodeErrorKind =
  | 'Timeout'
  | 'AuthFailure'
  | 'RateLimited'
  | 'UpstreamFailure'
  | 'InvalidArgs'
  | 'NotFound'
  | 'InvalidOutput'
  | 'Cancelled';

export interface NodeErrorDetail {
  readonly kind: NodeErrorKind;
  readonly message: string;
}

/**
 * Token accounting reported by the model capability
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * Result of one invocation attempt
 */
export type NodeOutcome =
  | {
      readonly status: 'success';
      readonly produced: Readonly<ContextValues>;
      readonly usage?: TokenUsage;
    }
  | {
      readonly status: 'failure';
      readonly error: NodeErrorDetail;
    };

/**
 * Why a run stopped without succeeding
 */
export type RunErrorKind =
  | NodeErrorKind
  | 'MissingKey'
  | 'MissingCredential'
  | 'NoMatchingEdge'
  | 'BudgetExceeded';

export interface RunError {
  readonly kind: RunErrorKind;
  readonly message: string;
  readonly nodeId?: string;
  readonly missingKeys?: readonly string[];
  readonly credential?: string;
}

export function successOutcome(produced: ContextValues, usage?: TokenUsage): NodeOutcome {
  return usage ? { status: 'success', produced, usage } : { status: 'success', produced };
}

export function failureOutcome(kind: NodeErrorKind, message: string): NodeOutcome {
  return { status: 'failure', error: { kind, message } };
}
