/**
 * Logging Module
 *
 * @module logging
 */

export * from './EngineLogger.js';
export * from '../types/log-types.js';
