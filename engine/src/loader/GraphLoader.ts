/**
 * Graph Loader
 *
 * File I/O for graph definitions. The engine itself never touches the
 * filesystem for graphs; the CLI and embedding applications load files
 * here and pass the resulting definitions in.
 *
 * @example
 * ```ts
 * const graph = await GraphLoader.fromFile('./graphs/triage.yaml');
 * const errors = validate(graph);
 * ```
 *
 * @module loader
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { GraphParser } from '../parser/GraphParser.js';
import { SchemaError } from '../errors/GraphErrors.js';
import type { GraphDefinition } from '../types/core-types.js';

export class GraphLoader {
  /**
   * Read and parse a graph file (.yaml, .yml or .json)
   *
   * @throws SchemaError if the file cannot be read or parsed
   */
  static async fromFile(filePath: string): Promise<GraphDefinition> {
    const resolvedPath = resolve(filePath);

    let content: string;
    try {
      content = await readFile(resolvedPath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw SchemaError.parseError(filePath, `cannot read file (${reason})`);
    }

    return GraphParser.fromFile(content, resolvedPath);
  }

  static fromYAML(content: string): GraphDefinition {
    return GraphParser.fromYAML(content);
  }

  static fromJSON(content: string): GraphDefinition {
    return GraphParser.fromJSON(content);
  }
}
