/**
 * Node Handler
 *
 * One handler per node type. Handlers either return an outcome or throw;
 * the invoker classifies anything thrown.
 */

import type { ContextValues, NodeOutcome, NodeSpec, NodeType } from '../types/core-types.js';

export interface InvocationRequest {
  readonly node: NodeSpec;
  /** Deep copy of the node's input keys */
  readonly input: Readonly<ContextValues>;
  readonly goalRef: string;
  /** Fires on timeout or run cancellation */
  readonly signal: AbortSignal;
}

export interface NodeHandler {
  readonly nodeType: NodeType;

  /** True when the handler calls an external capability */
  readonly external: boolean;

  invoke(request: InvocationRequest): Promise<NodeOutcome>;
}
