/**
 * Graph Schema
 *
 * Zod schema for graph files (YAML or JSON). Unknown fields are rejected.
 * Structural rules that need the whole graph (dangling edges, key overlap,
 * expression syntax) are left to the validator.
 *
 * @module parser
 */

import { z } from 'zod';
import { EDGE_CONDITIONS, NODE_TYPES } from '../types/core-types.js';

const nodeTypeSchema = z.enum(NODE_TYPES);
const edgeConditionSchema = z.enum(EDGE_CONDITIONS);

const keyListSchema = z.array(z.string().min(1)).default([]);

const valuesSchema = z.record(z.unknown());

export const ConditionalRuleSchema = z
  .object({
    when: z.string(),
    output: valuesSchema,
  })
  .strict();

export const NodeSchema = z
  .object({
    id: z.string().min(1),
    nodeType: nodeTypeSchema,
    name: z.string().optional(),
    description: z.string().optional(),
    inputKeys: keyListSchema,
    outputKeys: keyListSchema,
    instructions: z.string().optional(),
    toolRefs: keyListSchema,
    maxRetries: z.number().default(0),
    overwrite: z.boolean().default(false),
    timeoutMs: z.number().optional(),
    rules: z.array(ConditionalRuleSchema).optional(),
    otherwise: valuesSchema.optional(),
  })
  .strict();

export const EdgeSchema = z
  .object({
    id: z.string().min(1).optional(),
    source: z.string().min(1),
    target: z.string().min(1),
    condition: edgeConditionSchema.default('always'),
    predicateExpr: z.string().optional(),
    priority: z.number().default(0),
  })
  .strict();

export const GraphSchema = z
  .object({
    name: z.string().min(1),
    version: z.union([z.string().min(1), z.number()]).transform(String).default('1.0.0'),
    description: z.string().optional(),
    nodes: z.array(NodeSchema),
    edges: z.array(EdgeSchema).default([]),
    entryPoint: z.string().min(1).optional(),
    pauseNodes: z.array(z.string()).default([]),
    terminalNodes: z.array(z.string()).default([]),
  })
  .strict();

export type GraphFile = z.infer<typeof GraphSchema>;

/**
 * Allowed field names for the object at a schema path
 * (e.g. `['nodes', 2]` gives the node fields)
 */
export function fieldsAt(path: readonly (string | number)[]): readonly string[] {
  const named = path.filter((segment): segment is string => typeof segment === 'string');
  const last = named[named.length - 1];

  switch (last) {
    case undefined:
      return GraphSchema.keyof().options;
    case 'nodes':
      return NodeSchema.keyof().options;
    case 'edges':
      return EdgeSchema.keyof().options;
    case 'rules':
      return ConditionalRuleSchema.keyof().options;
    default:
      return [];
  }
}
