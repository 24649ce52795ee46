/**
 * Parser Module
 *
 * @module parser
 */

export * from './GraphSchema.js';
export * from './GraphParser.js';
