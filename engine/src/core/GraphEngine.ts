/**
 * Graph Engine - Main Public API
 *
 * User-facing engine class. Validates graphs before running them, owns the
 * event bus and logger, and persists paused runs when a snapshot store is
 * configured.
 *
 * @example
 * ```ts
 * const engine = new GraphEngine({ maxSteps: 50, model, tools });
 * engine.events.on('node.completed', (event) => console.log(event.nodeId));
 *
 * const graph = await engine.loadGraph('./graphs/triage.yaml');
 * const result = await engine.execute(graph, 'triage-ticket', { ticket });
 * ```
 *
 * @module core
 */

import type { GraphEngineConfig, ResolvedEngineConfig, RunOptions } from './EngineConfig.js';
import { applyConfigDefaults, validateConfig } from './EngineConfig.js';
import type { ContextValues, GraphDefinition } from '../types/core-types.js';
import type { StructuralError } from '../errors/GraphErrors.js';
import { GraphValidationError } from '../errors/GraphErrors.js';
import { ConfigError, SnapshotError } from '../errors/RunErrors.js';
import { validateGraph } from '../graph/GraphValidator.js';
import { GraphLoader } from '../loader/GraphLoader.js';
import { EventBus } from '../events/EventBus.js';
import { ExecutionEngine, type RunResult } from '../execution/ExecutionEngine.js';
import { EngineLogger, createEngineLogger } from '../logging/EngineLogger.js';
import { findNonJsonValue } from '../utils/jsonValue.js';
import { assertResumable, type SessionSnapshot } from '../session/SessionSnapshot.js';

function assertJsonInput(input: Readonly<ContextValues>): void {
  for (const [key, value] of Object.entries(input)) {
    const found = findNonJsonValue(value, key);
    if (found) {
      throw ConfigError.invalid('input', `${found.path} is a ${found.type}, which is not a JSON value`);
    }
  }
}

export class GraphEngine {
  readonly events: EventBus;
  private readonly config: ResolvedEngineConfig;
  private readonly logger: EngineLogger | null;
  private readonly engine: ExecutionEngine;

  /**
   * @throws ConfigError if the configuration is invalid
   */
  constructor(config: GraphEngineConfig, events: EventBus = new EventBus()) {
    validateConfig(config);
    this.config = applyConfigDefaults(config);
    this.events = events;

    this.logger = this.config.logger !== undefined
      ? this.config.logger
      : createEngineLogger(this.config.logLevel, this.config.verbose, { format: this.config.logFormat });

    this.events.setErrorReporter((error, event) => {
      this.logger?.error(`Event handler for '${event.type}' failed`, error, { runId: event.runId });
    });

    this.engine = new ExecutionEngine(this.config, this.events, this.logger);
  }

  /**
   * Every structural error of the graph (empty when valid)
   */
  validate(graph: GraphDefinition): StructuralError[] {
    return validateGraph(graph);
  }

  /**
   * Run a graph from its entry point
   *
   * @throws GraphValidationError if the graph is invalid
   * @throws ConfigError if a capability the graph needs is not configured,
   * or the input holds a value JSON cannot carry
   */
  async execute(
    graph: GraphDefinition,
    goalRef: string,
    input: Readonly<ContextValues> = {},
    options: RunOptions = {}
  ): Promise<RunResult> {
    this.assertValid(graph);
    assertJsonInput(input);
    return this.engine.execute(graph, goalRef, input, this.runOptions(options));
  }

  /**
   * Continue a paused run from its snapshot
   *
   * @throws GraphValidationError if the graph is invalid
   * @throws SnapshotError if the snapshot was taken on another graph or version
   */
  async resume(
    graph: GraphDefinition,
    snapshot: SessionSnapshot,
    additionalInput: Readonly<ContextValues> = {},
    options: RunOptions = {}
  ): Promise<RunResult> {
    this.assertValid(graph);
    assertJsonInput(additionalInput);
    return this.engine.resume(graph, snapshot, additionalInput, this.runOptions(options));
  }

  /**
   * Resume a paused run saved in the snapshot store. The stored snapshot is
   * taken out of the store before the run restarts, so only one of several
   * concurrent resumes of a run gets it; pausing again stores a new one.
   *
   * @throws SnapshotError if no store is configured, no snapshot is stored,
   * or the stored snapshot does not fit the graph (it is then kept)
   */
  async resumeRun(
    runId: string,
    graph: GraphDefinition,
    additionalInput: Readonly<ContextValues> = {},
    options: Omit<RunOptions, 'runId'> = {}
  ): Promise<RunResult> {
    const store = this.config.snapshotStore;
    if (!store) {
      throw SnapshotError.invalid('no snapshot store is configured');
    }

    this.assertValid(graph);
    assertJsonInput(additionalInput);
    this.engine.checkCapabilities(graph);
    const runOptions = this.runOptions({ ...options, runId });

    const snapshot = await store.take(runId);
    if (!snapshot) {
      throw SnapshotError.notFound(runId);
    }

    try {
      assertResumable(snapshot, graph);
    } catch (error) {
      await store.save(snapshot);
      throw error;
    }

    return this.engine.resume(graph, snapshot, additionalInput, runOptions);
  }

  /**
   * Read a graph file (.yaml, .yml or .json)
   *
   * @throws SchemaError if the file cannot be read or parsed
   */
  async loadGraph(path: string): Promise<GraphDefinition> {
    const graph = await GraphLoader.fromFile(path);
    this.logger?.debug(`Loaded graph ${graph.name}@${graph.version}`, {
      path,
      nodes: graph.nodes.length,
      edges: graph.edges.length,
    });
    return graph;
  }

  getConfig(): Readonly<ResolvedEngineConfig> {
    return this.config;
  }

  getLogger(): EngineLogger | null {
    return this.logger;
  }

  private assertValid(graph: GraphDefinition): void {
    const errors = validateGraph(graph);
    if (errors.length > 0) {
      this.logger?.error(`Graph ${graph.name} is invalid`, undefined, { errors: errors.length });
      throw new GraphValidationError(graph.name, errors);
    }
  }

  private runOptions(options: RunOptions): RunOptions {
    if (options.maxSteps !== undefined && (!Number.isInteger(options.maxSteps) || options.maxSteps < 1)) {
      throw ConfigError.invalid('maxSteps', `must be a positive integer, got ${options.maxSteps}`);
    }
    return options;
  }
}

/**
 * Every structural error of the graph (empty when valid)
 */
export function validate(graph: GraphDefinition): StructuralError[] {
  return validateGraph(graph);
}

/**
 * Run a graph once with a throwaway engine
 *
 * @throws GraphValidationError if the graph is invalid
 */
export async function execute(
  graph: GraphDefinition,
  goalRef: string,
  input: Readonly<ContextValues>,
  config: GraphEngineConfig,
  options: RunOptions = {}
): Promise<RunResult> {
  return new GraphEngine(config).execute(graph, goalRef, input, options);
}

/**
 * Resume a paused run with a throwaway engine
 *
 * @throws GraphValidationError if the graph is invalid
 * @throws SnapshotError if the snapshot does not belong to the graph
 */
export async function resume(
  graph: GraphDefinition,
  snapshot: SessionSnapshot,
  additionalInput: Readonly<ContextValues>,
  config: GraphEngineConfig,
  options: RunOptions = {}
): Promise<RunResult> {
  return new GraphEngine(config).resume(graph, snapshot, additionalInput, options);
}
