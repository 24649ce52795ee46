/**
 * Error Module
 *
 * Diagnostic error classes, codes and exit codes.
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './GraphrunError.js';
export * from './GraphErrors.js';
export * from './RunErrors.js';
export * from './TypoDetector.js';
