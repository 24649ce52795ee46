/**
 * Engine Configuration
 *
 * User-facing configuration for GraphEngine and the functional entry points.
 * Only `maxSteps` is required; everything else has a default.
 *
 * @module core
 */

import type { ModelCapability } from '../capabilities/ModelCapability.js';
import type { ToolCapability } from '../capabilities/ToolCapability.js';
import type { CredentialSpec, CredentialStore } from '../capabilities/CredentialStore.js';
import type { BackoffConfig } from '../automation/BackoffStrategy.js';
import type { MockOutcomes } from '../execution/handlers/MockNodeHandler.js';
import type { SnapshotStore } from '../session/SnapshotStore.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import type { EngineLogFormat, LogLevelName } from '../types/log-types.js';
import { ConfigError } from '../errors/RunErrors.js';

/**
 * Execution mode
 * - 'live': model and tool nodes call the configured capabilities
 * - 'mock': model and tool nodes return canned outcomes, no external call
 */
export type ExecutionMode = 'live' | 'mock';

/**
 * Engine configuration options
 *
 * @example
 * ```ts
 * const config: GraphEngineConfig = {
 *   maxSteps: 50,
 *   model: myModel,
 *   tools: registry,
 *   credentials: new EnvCredentialStore(specs),
 *   credentialSpecs: specs,
 * };
 *
 * const engine = new GraphEngine(config);
 * ```
 */
export interface GraphEngineConfig {
  // === Execution ===

  /**
   * Maximum node visits per run; the safety net for cyclic graphs
   */
  maxSteps: number;

  /**
   * @default 'live'
   */
  mode?: ExecutionMode;

  /**
   * Per-invocation timeout when a node declares none (milliseconds)
   * @default 30000
   */
  defaultTimeoutMs?: number;

  /**
   * Delay between retry attempts
   * @default no delay
   */
  retryBackoff?: BackoffConfig;

  // === Capabilities ===

  model?: ModelCapability;
  tools?: ToolCapability;

  /**
   * Checked before a model or tool node whose tools need a credential
   */
  credentials?: CredentialStore;
  credentialSpecs?: readonly CredentialSpec[];

  /**
   * Scripted outcomes per node id (mock mode only)
   */
  mockOutcomes?: MockOutcomes;

  // === Sessions ===

  /**
   * Where paused runs are saved. Without one, the snapshot is only
   * returned in the result.
   */
  snapshotStore?: SnapshotStore;

  // === Logging ===

  /**
   * @default 'info'
   */
  logLevel?: LogLevelName;

  /**
   * @default 'text'
   */
  logFormat?: EngineLogFormat;

  /**
   * Equivalent to logLevel 'debug' with timestamps
   * @default false
   */
  verbose?: boolean;

  /**
   * Use this logger instead of creating one from the settings above
   */
  logger?: EngineLogger | null;
}

type OptionalKeys =
  | 'model'
  | 'tools'
  | 'credentials'
  | 'retryBackoff'
  | 'mockOutcomes'
  | 'snapshotStore'
  | 'logger';

export type ResolvedEngineConfig = Required<Omit<GraphEngineConfig, OptionalKeys>> &
  Pick<GraphEngineConfig, OptionalKeys>;

const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error', 'silent'];
const LOG_FORMATS: readonly EngineLogFormat[] = ['text', 'json'];

/**
 * Apply default values to engine configuration
 */
export function applyConfigDefaults(config: GraphEngineConfig): ResolvedEngineConfig {
  return {
    maxSteps: config.maxSteps,
    mode: config.mode ?? 'live',
    defaultTimeoutMs: config.defaultTimeoutMs ?? 30000,
    retryBackoff: config.retryBackoff,
    model: config.model,
    tools: config.tools,
    credentials: config.credentials,
    credentialSpecs: config.credentialSpecs ?? [],
    mockOutcomes: config.mockOutcomes,
    snapshotStore: config.snapshotStore,
    logLevel: config.verbose ? 'debug' : (config.logLevel ?? 'info'),
    logFormat: config.logFormat ?? 'text',
    verbose: config.verbose ?? false,
    logger: config.logger,
  };
}

/**
 * Validate engine configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: GraphEngineConfig): void {
  if (!Number.isInteger(config.maxSteps) || config.maxSteps < 1) {
    throw ConfigError.invalid('maxSteps', `must be a positive integer, got ${String(config.maxSteps)}`);
  }

  if (config.mode !== undefined && config.mode !== 'live' && config.mode !== 'mock') {
    throw ConfigError.invalid('mode', `must be 'live' or 'mock', got '${String(config.mode)}'`);
  }

  if (config.defaultTimeoutMs !== undefined && !(config.defaultTimeoutMs > 0)) {
    throw ConfigError.invalid('defaultTimeoutMs', 'must be positive');
  }

  if (config.logLevel !== undefined && !LOG_LEVELS.includes(config.logLevel)) {
    throw ConfigError.invalid('logLevel', `must be one of ${LOG_LEVELS.join(', ')}`);
  }

  if (config.logFormat !== undefined && !LOG_FORMATS.includes(config.logFormat)) {
    throw ConfigError.invalid('logFormat', `must be one of ${LOG_FORMATS.join(', ')}`);
  }

  const backoff = config.retryBackoff;
  if (backoff) {
    if (backoff.baseDelayMs !== undefined && backoff.baseDelayMs < 0) {
      throw ConfigError.invalid('retryBackoff.baseDelayMs', 'must not be negative');
    }
    if (backoff.jitter !== undefined && (backoff.jitter < 0 || backoff.jitter > 1)) {
      throw ConfigError.invalid('retryBackoff.jitter', 'must be between 0 and 1');
    }
  }

  if (config.mockOutcomes && config.mode !== 'mock') {
    throw ConfigError.invalid('mockOutcomes', "only used with mode: 'mock'");
  }
}

/**
 * Per-run options
 */
export interface RunOptions {
  /** Defaults to a generated id */
  runId?: string;
  /** Overrides the engine's maxSteps for this run */
  maxSteps?: number;
  /** Cancels the run cooperatively */
  signal?: AbortSignal;
}
