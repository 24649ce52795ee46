/**
 * Output Mapper
 *
 * Maps capability responses onto a node's declared output keys.
 * A response that cannot fill every output key is an InvalidOutput failure.
 */

import type { ContextValues, NodeSpec } from '../types/core-types.js';
import type { ModelResponse } from '../capabilities/ModelCapability.js';
import { NodeInvocationError } from '../errors/RunErrors.js';
import { findNonJsonValue } from '../utils/jsonValue.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick every output key from an object
 *
 * @throws NodeInvocationError (InvalidOutput) naming the absent keys
 */
export function pickOutputs(node: NodeSpec, source: Record<string, unknown>, what: string): ContextValues {
  const missing = node.outputKeys.filter(key => source[key] === undefined);
  if (missing.length > 0) {
    throw new NodeInvocationError(
      'InvalidOutput',
      `${what} for node "${node.id}" is missing output keys: ${missing.join(', ')}`,
      node.id
    );
  }

  const produced: ContextValues = {};
  for (const key of node.outputKeys) {
    produced[key] = source[key];
  }
  return produced;
}

/**
 * Produced values must survive being stored with a paused run
 *
 * @throws NodeInvocationError (InvalidOutput) naming the first value JSON cannot carry
 */
export function assertJsonOutputs(node: NodeSpec, produced: Readonly<ContextValues>): void {
  for (const [key, value] of Object.entries(produced)) {
    const found = findNonJsonValue(value, key);
    if (found) {
      throw new NodeInvocationError(
        'InvalidOutput',
        `Node "${node.id}" produced a ${found.type} at ${found.path}, which is not a JSON value`,
        node.id
      );
    }
  }
}

/**
 * Model response to produced values
 *
 * - structured `data`: every output key must be present
 * - `text` with one output key: the text itself
 * - `text` with several output keys: parsed as a JSON object
 */
export function mapModelResponse(node: NodeSpec, response: ModelResponse): ContextValues {
  if (node.outputKeys.length === 0) {
    return {};
  }

  if (response.data !== undefined) {
    return pickOutputs(node, response.data, 'Model data');
  }

  if (response.text === undefined) {
    throw new NodeInvocationError('InvalidOutput', `Model returned no text or data for node "${node.id}"`, node.id);
  }

  if (node.outputKeys.length === 1) {
    return { [node.outputKeys[0]]: response.text };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJson(response.text));
  } catch (error) {
    throw new NodeInvocationError(
      'InvalidOutput',
      `Model text for node "${node.id}" is not a JSON object: ${error instanceof Error ? error.message : String(error)}`,
      node.id
    );
  }
  if (!isRecord(parsed)) {
    throw new NodeInvocationError('InvalidOutput', `Model text for node "${node.id}" is not a JSON object`, node.id);
  }
  return pickOutputs(node, parsed, 'Model text');
}

/**
 * Tool result to produced values. One output key takes the whole result;
 * several require an object containing all of them.
 */
export function mapToolResult(node: NodeSpec, result: unknown): ContextValues {
  if (node.outputKeys.length === 0) {
    return {};
  }
  if (node.outputKeys.length === 1) {
    if (result === undefined) {
      throw new NodeInvocationError('InvalidOutput', `Tool for node "${node.id}" returned nothing`, node.id);
    }
    return { [node.outputKeys[0]]: result };
  }
  if (!isRecord(result)) {
    throw new NodeInvocationError(
      'InvalidOutput',
      `Tool for node "${node.id}" must return an object with keys: ${node.outputKeys.join(', ')}`,
      node.id
    );
  }
  return pickOutputs(node, result, 'Tool result');
}

/**
 * Strip a markdown code fence around JSON, if present
 */
function extractJson(text: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  return (fenced ? fenced[1] : text).trim();
}
