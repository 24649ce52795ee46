/**
 * Run-time and configuration errors
 *
 * These are thrown inside the engine and converted into run results at the
 * engine boundary; callers only see them thrown from configuration, session
 * store and snapshot handling.
 *
 * @module errors
 */

import { GraphrunError } from './GraphrunError.js';
import { GraphrunErrorCode, ErrorSeverity } from './ErrorCodes.js';
import type { NodeErrorKind } from '../types/core-types.js';

/**
 * A node's required inputs are absent from context.
 * Always names every absent key, not just the first.
 */
export class MissingKeyError extends GraphrunError {
  public readonly missingKeys: readonly string[];

  constructor(missingKeys: readonly string[], nodeId?: string) {
    const owner = nodeId ? `Node "${nodeId}" requires` : 'Required';
    super({
      code: GraphrunErrorCode.RUN_MISSING_KEY,
      message: `${owner} context keys that are missing: ${missingKeys.join(', ')}`,
      path: nodeId ? `nodes.${nodeId}.inputKeys` : undefined,
      severity: ErrorSeverity.ERROR,
      context: { nodeId, missingKeys: [...missingKeys] },
    });
    this.missingKeys = missingKeys;
  }

  /**
   * Same error attributed to a node
   */
  forNode(nodeId: string): MissingKeyError {
    return new MissingKeyError(this.missingKeys, nodeId);
  }
}

/**
 * Classified failure of a model or tool call.
 * Capabilities may throw it to pick the classification themselves.
 */
export class NodeInvocationError extends GraphrunError {
  public readonly kind: NodeErrorKind;

  constructor(kind: NodeErrorKind, message: string, nodeId?: string) {
    super({
      code: kind === 'Cancelled' ? GraphrunErrorCode.RUN_CANCELLED : GraphrunErrorCode.RUN_NODE_FAILED,
      message,
      path: nodeId ? `nodes.${nodeId}` : undefined,
      severity: ErrorSeverity.ERROR,
      context: { kind, nodeId },
    });
    this.kind = kind;
  }
}

/**
 * A secret required by a node's tools is unavailable
 */
export class MissingCredentialError extends GraphrunError {
  public readonly credential: string;

  constructor(credential: string, details?: { nodeId?: string; envVar?: string }) {
    const where = details?.nodeId ? ` (needed by node "${details.nodeId}")` : '';
    super({
      code: GraphrunErrorCode.RUN_MISSING_CREDENTIAL,
      message: `Credential "${credential}" is not available${where}`,
      hint: details?.envVar
        ? `Set the ${details.envVar} environment variable or add "${credential}" to the credential store`
        : `Add "${credential}" to the credential store`,
      severity: ErrorSeverity.ERROR,
      context: { credential, ...details },
    });
    this.credential = credential;
  }
}

/**
 * Engine configuration is invalid
 */
export class ConfigError extends GraphrunError {
  static invalid(field: string, details: string): ConfigError {
    return new ConfigError({
      code: GraphrunErrorCode.CONFIG_INVALID,
      message: `Invalid engine configuration "${field}": ${details}`,
      path: `config.${field}`,
      severity: ErrorSeverity.ERROR,
      context: { field },
    });
  }

  static missingCapability(capability: 'model' | 'tools', nodeIds: string[]): ConfigError {
    return new ConfigError({
      code: GraphrunErrorCode.CONFIG_MISSING_CAPABILITY,
      message: `No ${capability} capability configured, but nodes need one: ${nodeIds.join(', ')}`,
      path: `config.${capability}`,
      hint: `Pass a ${capability} capability in the engine configuration, or run with mode: 'mock'`,
      severity: ErrorSeverity.ERROR,
      context: { capability, nodeIds },
    });
  }
}

/**
 * Session snapshot cannot be used
 */
export class SnapshotError extends GraphrunError {
  static invalid(details: string): SnapshotError {
    return new SnapshotError({
      code: GraphrunErrorCode.SNAPSHOT_INVALID,
      message: `Invalid session snapshot: ${details}`,
      severity: ErrorSeverity.ERROR,
    });
  }

  static mismatch(expected: string, actual: string): SnapshotError {
    return new SnapshotError({
      code: GraphrunErrorCode.SNAPSHOT_MISMATCH,
      message: `Session snapshot was taken against ${actual}, cannot resume it on ${expected}`,
      hint: 'Resume with the same graph name and version that produced the snapshot',
      severity: ErrorSeverity.ERROR,
      context: { expected, actual },
    });
  }

  static notFound(runId: string): SnapshotError {
    return new SnapshotError({
      code: GraphrunErrorCode.SNAPSHOT_NOT_FOUND,
      message: `No paused session stored for run "${runId}"`,
      severity: ErrorSeverity.ERROR,
      context: { runId },
    });
  }
}
