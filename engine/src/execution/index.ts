/**
 * Execution Layer
 *
 * - NodeInvoker: runs one attempt of a node through its type's handler
 * - NodeExecutor: one visit of a node, with retries
 * - EdgeRouter: picks the edge taken after a node
 * - ExecutionEngine: the run loop
 */

export * from './NodeHandler.js';
export * from './NodeInvoker.js';
export * from './NodeExecutor.js';
export * from './EdgeRouter.js';
export * from './ErrorClassifier.js';
export * from './OutputMapper.js';
export * from './ExecutionEngine.js';
export * from './handlers/ModelNodeHandler.js';
export * from './handlers/ToolNodeHandler.js';
export * from './handlers/ConditionalNodeHandler.js';
export * from './handlers/PassthroughNodeHandler.js';
export * from './handlers/MockNodeHandler.js';
