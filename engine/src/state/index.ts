/**
 * State Module
 *
 * @module state
 */

export * from './ExecutionState.js';
export * from './StateMachine.js';
