/**
 * Context Module
 *
 * Per-run context state and the expression language evaluated against it.
 *
 * @module context
 */

export * from './ContextStore.js';
export * from './ExpressionEvaluator.js';
