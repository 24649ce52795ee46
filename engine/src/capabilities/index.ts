/**
 * Capabilities Module
 *
 * Interfaces to the external model, tools and credential storage.
 *
 * @module capabilities
 */

export * from './CapabilityError.js';
export * from './ModelCapability.js';
export * from './ToolCapability.js';
export * from './CredentialStore.js';
