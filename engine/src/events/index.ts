/**
 * Events Module
 *
 * @module events
 */

export * from './EngineEvents.js';
export * from './EventBus.js';
