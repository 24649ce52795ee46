/**
 * Loader Module
 *
 * @module loader
 */

export * from './GraphLoader.js';
