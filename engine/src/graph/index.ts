/**
 * Graph Model
 *
 * - GraphBuilder: fluent construction of frozen graph definitions
 * - GraphValidator: structural checks, reported as a list
 * - GraphIndex: id lookups and per-source edge order used at run time
 */

export * from './GraphBuilder.js';
export * from './GraphValidator.js';
export * from './GraphIndex.js';
