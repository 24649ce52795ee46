/**
 * Graph Schema and Structural Errors
 *
 * Errors raised while reading a graph file (SchemaError) and the error values
 * reported by structural validation (StructuralError). Structural errors are
 * collected into a list by the validator; they are only thrown wrapped in a
 * GraphValidationError when a caller tries to run an invalid graph.
 *
 * USAGE:
 * =====
 * ```typescript
 * errors.push(StructuralError.danglingEdge('e2', 'target', 'review', 'edges[1].target'));
 * ```
 *
 * @module errors
 */

import { GraphrunError } from './GraphrunError.js';
import { GraphrunErrorCode, ErrorSeverity } from './ErrorCodes.js';

/**
 * Graph file could not be read into a graph definition
 */
export class SchemaError extends GraphrunError {
  /**
   * YAML/JSON syntax error
   */
  static parseError(source: string, details: string): SchemaError {
    return new SchemaError({
      code: GraphrunErrorCode.SCHEMA_PARSE_ERROR,
      message: `Failed to parse graph definition from ${source}: ${details}`,
      path: source,
      hint: 'Check YAML/JSON syntax - ensure proper indentation, quotes, and structure',
      severity: ErrorSeverity.ERROR,
      context: { source, details },
    });
  }

  /**
   * Field-level schema violation
   */
  static invalid(path: string, details: string): SchemaError {
    return new SchemaError({
      code: GraphrunErrorCode.SCHEMA_INVALID,
      message: `Invalid graph definition at "${path || 'root'}": ${details}`,
      path: path || 'root',
      severity: ErrorSeverity.ERROR,
      context: { details },
    });
  }
}

/**
 * A single structural defect of a graph definition
 */
export class StructuralError extends GraphrunError {
  static unknownEntryPoint(entryPoint: string): StructuralError {
    return new StructuralError({
      code: GraphrunErrorCode.STRUCTURE_UNKNOWN_ENTRY_POINT,
      message: `Entry point "${entryPoint}" is not a declared node`,
      path: 'entryPoint',
      hint: 'Set entryPoint to the id of one of the declared nodes',
      severity: ErrorSeverity.ERROR,
      context: { entryPoint },
    });
  }

  static danglingEdge(
    edgeId: string,
    end: 'source' | 'target',
    nodeId: string,
    path: string
  ): StructuralError {
    return new StructuralError({
      code: GraphrunErrorCode.STRUCTURE_DANGLING_EDGE,
      message: `Edge "${edgeId}" ${end} "${nodeId}" is not a declared node`,
      path,
      hint: `Declare node "${nodeId}" or point the edge at an existing node`,
      severity: ErrorSeverity.ERROR,
      context: { edgeId, end, nodeId },
    });
  }

  static keyOverlap(nodeId: string, keys: string[], path: string): StructuralError {
    return new StructuralError({
      code: GraphrunErrorCode.STRUCTURE_KEY_OVERLAP,
      message: `Node "${nodeId}" writes its own input keys: ${keys.join(', ')}`,
      path,
      hint: 'Rename the output keys or declare the node with overwrite: true',
      severity: ErrorSeverity.ERROR,
      context: { nodeId, keys },
    });
  }

  static unknownMarker(
    list: 'pauseNodes' | 'terminalNodes',
    nodeId: string,
    index: number
  ): StructuralError {
    return new StructuralError({
      code: GraphrunErrorCode.STRUCTURE_UNKNOWN_MARKER,
      message: `${list} names "${nodeId}", which is not a declared node`,
      path: `${list}[${index}]`,
      severity: ErrorSeverity.ERROR,
      context: { list, nodeId },
    });
  }

  static duplicateNode(nodeId: string, index: number): StructuralError {
    return new StructuralError({
      code: GraphrunErrorCode.STRUCTURE_DUPLICATE_NODE,
      message: `Node id "${nodeId}" is declared more than once`,
      path: `nodes[${index}].id`,
      severity: ErrorSeverity.ERROR,
      context: { nodeId },
    });
  }

  static duplicateEdge(edgeId: string, index: number): StructuralError {
    return new StructuralError({
      code: GraphrunErrorCode.STRUCTURE_DUPLICATE_EDGE,
      message: `Edge id "${edgeId}" is declared more than once`,
      path: `edges[${index}].id`,
      severity: ErrorSeverity.ERROR,
      context: { edgeId },
    });
  }

  static invalidExpression(owner: string, details: string, path: string): StructuralError {
    return new StructuralError({
      code: GraphrunErrorCode.STRUCTURE_INVALID_EXPRESSION,
      message: `${owner}: ${details}`,
      path,
      hint: 'Expressions support literals, dotted names, ! == != < <= > >= && || in and parentheses',
      severity: ErrorSeverity.ERROR,
      context: { owner, details },
    });
  }

  static invalidNode(nodeId: string, details: string, path: string): StructuralError {
    return new StructuralError({
      code: GraphrunErrorCode.STRUCTURE_INVALID_NODE,
      message: `Node "${nodeId}": ${details}`,
      path,
      severity: ErrorSeverity.ERROR,
      context: { nodeId, details },
    });
  }

  static emptyGraph(): StructuralError {
    return new StructuralError({
      code: GraphrunErrorCode.STRUCTURE_EMPTY_GRAPH,
      message: 'Graph declares no nodes',
      path: 'nodes',
      severity: ErrorSeverity.ERROR,
    });
  }
}

/**
 * Thrown when a caller tries to execute a graph that failed validation
 */
export class GraphValidationError extends GraphrunError {
  public readonly errors: readonly StructuralError[];

  constructor(graphName: string, errors: readonly StructuralError[]) {
    super({
      code: GraphrunErrorCode.STRUCTURE_INVALID_GRAPH,
      message: `Graph "${graphName}" has ${errors.length} structural error(s):\n`
        + errors.map(e => `  - [${e.code}] ${e.message}`).join('\n'),
      severity: ErrorSeverity.ERROR,
      context: { graphName, count: errors.length },
    });
    this.errors = errors;
  }
}
