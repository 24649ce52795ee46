/**
 * Model Capability
 *
 * Boundary to the language model. The engine builds one request per
 * attempt of a model node and maps the response onto the node's output keys.
 */

import type { ContextValues, TokenUsage } from '../types/core-types.js';

export interface ModelRequest {
  readonly nodeId: string;
  /** Goal the run is driving toward */
  readonly goalRef: string;
  readonly instructions: string;
  /** Copy of the node's input keys */
  readonly context: Readonly<ContextValues>;
  readonly toolRefs: readonly string[];
  /** Keys the response is expected to fill */
  readonly outputKeys: readonly string[];
}

export interface ModelResponse {
  /** Free-text completion */
  text?: string;
  /** Structured completion keyed by output key */
  data?: ContextValues;
  /** Model that served the request */
  model?: string;
  usage?: TokenUsage;
}

export interface ModelCapability {
  /**
   * Complete one request. Throw a CapabilityError to classify a failure;
   * stop work when the signal aborts.
   */
  complete(request: ModelRequest, signal: AbortSignal): Promise<ModelResponse>;
}
