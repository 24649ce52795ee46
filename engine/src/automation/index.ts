/**
 * Automation Module
 *
 * Retry delays and per-invocation deadlines.
 *
 * @module automation
 */

export * from './BackoffStrategy.js';
export * from './TimeoutManager.js';
