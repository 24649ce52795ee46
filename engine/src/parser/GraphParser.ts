/**
 * Graph Parser
 *
 * Turns YAML/JSON graph files into frozen graph definitions.
 * Schema problems throw SchemaError; structural problems are left for
 * `validate()` so that every one of them can be reported together.
 *
 * @module parser
 */

import { parse as parseYAML } from 'yaml';
import { z } from 'zod';
import { GraphSchema, fieldsAt } from './GraphSchema.js';
import { createEdge, createNode } from '../graph/GraphBuilder.js';
import { SchemaError } from '../errors/GraphErrors.js';
import { GraphrunError } from '../errors/GraphrunError.js';
import { findMatches, isLikelyTypo } from '../errors/TypoDetector.js';
import { ErrorSeverity, GraphrunErrorCode } from '../errors/ErrorCodes.js';
import { deepFreeze } from '../utils/deepFreeze.js';
import type { GraphDefinition } from '../types/core-types.js';

/**
 * Render a zod path as `nodes[2].outputKeys`
 */
export function formatPath(path: readonly (string | number)[]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`;
    }
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

export class GraphParser {
  /**
   * Parse a graph from an already-decoded object
   *
   * @throws SchemaError if the object does not match the graph schema
   */
  static parse(raw: unknown): GraphDefinition {
    const result = GraphSchema.safeParse(raw);
    if (!result.success) {
      throw this.transformZodError(result.error);
    }

    const file = result.data;
    const nodes = file.nodes.map(node => createNode(node));

    return deepFreeze({
      name: file.name,
      version: file.version,
      ...(file.description !== undefined ? { description: file.description } : {}),
      nodes,
      edges: file.edges.map((edge, index) => createEdge(edge, index)),
      entryPoint: file.entryPoint ?? nodes[0]?.id ?? '',
      pauseNodes: file.pauseNodes,
      terminalNodes: file.terminalNodes,
    });
  }

  static fromYAML(content: string, source: string = 'YAML input'): GraphDefinition {
    let raw: unknown;
    try {
      raw = parseYAML(content);
    } catch (error) {
      throw SchemaError.parseError(source, error instanceof Error ? error.message : String(error));
    }
    return this.parse(raw);
  }

  static fromJSON(content: string, source: string = 'JSON input'): GraphDefinition {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw SchemaError.parseError(source, error instanceof Error ? error.message : String(error));
    }
    return this.parse(raw);
  }

  /**
   * Parse file content, choosing the format from the file name.
   * YAML is a superset of JSON, so unknown extensions are read as YAML.
   */
  static fromFile(content: string, filename?: string): GraphDefinition {
    if (filename?.endsWith('.json')) {
      return this.fromJSON(content, filename);
    }
    return this.fromYAML(content, filename ?? 'graph file');
  }

  /**
   * True when the object matches the schema
   */
  static isValid(raw: unknown): boolean {
    try {
      this.parse(raw);
      return true;
    } catch (error) {
      if (error instanceof GraphrunError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Convert the first zod issue into a SchemaError with a path and hint
   */
  private static transformZodError(error: z.ZodError): SchemaError {
    const issue = error.issues[0];
    const more = error.issues.length > 1 ? ` (and ${error.issues.length - 1} more issue(s))` : '';

    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      const field = issue.keys[0];
      const fieldPath = formatPath([...issue.path, field]);
      const candidates = fieldsAt(issue.path);
      const suggestions = findMatches(field, candidates);

      let hint: string;
      if (suggestions.length > 0 && isLikelyTypo(field, suggestions[0])) {
        hint = `This looks like a typo of "${suggestions[0]}"`;
      } else if (suggestions.length > 1) {
        hint = `Did you mean one of: ${suggestions.map(s => `"${s}"`).join(', ')}?`;
      } else if (suggestions.length === 1) {
        hint = `Did you mean "${suggestions[0]}"?`;
      } else {
        hint = `Valid fields here: ${candidates.join(', ')}`;
      }

      return new SchemaError({
        code: GraphrunErrorCode.SCHEMA_INVALID,
        message: `Unknown field "${field}"${more}`,
        path: fieldPath,
        hint,
        severity: ErrorSeverity.ERROR,
        context: { field, suggestions },
      });
    }

    return SchemaError.invalid(formatPath(issue.path), `${issue.message}${more}`);
  }
}
