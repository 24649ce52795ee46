/**
 * Session Module
 *
 * @module session
 */

export * from './SessionSnapshot.js';
export * from './SnapshotStore.js';
