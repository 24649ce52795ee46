/**
 * graphrun engine - goal-driven workflow graphs
 *
 * @example
 * ```ts
 * import { GraphBuilder, GraphEngine } from '@graphrun/engine';
 *
 * const graph = new GraphBuilder('triage')
 *   .model('classify', { outputKeys: ['category'], instructions: 'Classify the ticket' })
 *   .passthrough('done')
 *   .edge('classify', 'done')
 *   .terminal('done')
 *   .build();
 *
 * const engine = new GraphEngine({ maxSteps: 20, model });
 * const result = await engine.execute(graph, 'triage-ticket', { ticket });
 * ```
 */

// ============================================================================
// PRIMARY EXPORTS
// ============================================================================

export { GraphEngine, validate, execute, resume } from './core/GraphEngine.js';

export type {
  GraphEngineConfig,
  ResolvedEngineConfig,
  RunOptions,
  ExecutionMode,
} from './core/EngineConfig.js';
export { applyConfigDefaults, validateConfig } from './core/EngineConfig.js';

export type { RunResult } from './execution/ExecutionEngine.js';

// ============================================================================
// TYPES
// ============================================================================

export * from './types/core-types.js';

// ============================================================================
// BUILDING BLOCKS
// ============================================================================

// Graph model, validation and files
export * from './graph/index.js';
export * from './parser/index.js';
export * from './loader/index.js';

// Run state
export * from './context/index.js';
export * from './state/index.js';
export * from './session/index.js';

// Execution internals (custom handlers, embedding)
export * from './execution/index.js';
export * from './automation/index.js';

// Capabilities
export * from './capabilities/index.js';

// Events, logging and errors
export * from './events/index.js';
export * from './logging/index.js';
export * from './errors/index.js';

// Test doubles
export * from './testing/index.js';
