/**
 * Execution Engine
 *
 * Walks a graph with a single cursor per run:
 *
 *   pause check → budget check → input and credential checks →
 *   invoke (with retries) → count step → terminal check → route
 *
 * Each run owns its context store, state machine and mock script, so one
 * engine instance can serve concurrent runs.
 *
 * @module execution
 */

import type {
  ContextValues,
  GraphDefinition,
  NodeOutcome,
  NodeSpec,
  RunError,
  TokenUsage,
} from '../types/core-types.js';
import { ContextStore } from '../context/ContextStore.js';
import { indexGraph, type GraphIndex } from '../graph/GraphIndex.js';
import { RunStatus, type FinalRunStatus, type NodeVisit } from '../state/ExecutionState.js';
import { createRunStateMachine } from '../state/StateMachine.js';
import type { StateMachine } from '../state/StateMachine.js';
import { BackoffStrategy } from '../automation/BackoffStrategy.js';
import type { EventBus } from '../events/EventBus.js';
import { EngineEventType, createEvent } from '../events/EngineEvents.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { requiredCredentials } from '../capabilities/CredentialStore.js';
import { ConfigError, MissingCredentialError, MissingKeyError } from '../errors/RunErrors.js';
import { SNAPSHOT_FORMAT_VERSION, assertResumable, type SessionSnapshot } from '../session/SessionSnapshot.js';
import type { ResolvedEngineConfig, RunOptions } from '../core/EngineConfig.js';
import { NodeInvoker } from './NodeInvoker.js';
import { NodeExecutor } from './NodeExecutor.js';
import { EdgeRouter } from './EdgeRouter.js';
import { MockScript } from './handlers/MockNodeHandler.js';

/**
 * Result of `execute` or `resume`
 */
export interface RunResult {
  runId: string;
  status: FinalRunStatus;
  stepsExecuted: number;
  goalRef: string;

  /** Final context (Succeeded only) */
  output?: Readonly<ContextValues>;

  /** Why the run stopped (Failed, BudgetExceeded, Cancelled) */
  error?: RunError;

  /** Node the run will resume at (Paused only) */
  pausedAt?: string;
  snapshot?: SessionSnapshot;

  /** True when model and tool nodes were mocked */
  mock: boolean;

  /** Visited node ids in order, including those before a resume */
  path: string[];

  /** One entry per visit made by this call */
  attempts: NodeVisit[];

  usage: TokenUsage;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
}

/**
 * Where a run begins
 */
interface RunStart {
  runId: string;
  goalRef: string;
  current: string;
  context: ContextStore;
  stepsExecuted: number;
  path: string[];
  /** First iteration is a resume at a pause node */
  resumed: boolean;
}

/**
 * Mutable bookkeeping of one run
 */
interface RunState extends RunStart {
  graph: GraphDefinition;
  machine: StateMachine<RunStatus>;
  visits: NodeVisit[];
  usage: TokenUsage;
  startedAt: Date;
}

export function generateRunId(): string {
  return `run-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

export class ExecutionEngine {
  private readonly backoff?: BackoffStrategy;

  constructor(
    private readonly config: ResolvedEngineConfig,
    private readonly events: EventBus,
    private readonly logger: EngineLogger | null = null
  ) {
    this.backoff = config.retryBackoff ? new BackoffStrategy(config.retryBackoff) : undefined;
  }

  /**
   * Start a fresh run at the graph's entry point.
   * The graph must already be valid.
   *
   * @throws ConfigError in live mode when a capability the graph needs is missing
   */
  async execute(
    graph: GraphDefinition,
    goalRef: string,
    input: Readonly<ContextValues>,
    options: RunOptions = {}
  ): Promise<RunResult> {
    this.checkCapabilities(graph);

    const start: RunStart = {
      runId: options.runId ?? generateRunId(),
      goalRef,
      current: graph.entryPoint,
      context: new ContextStore(input),
      stepsExecuted: 0,
      path: [],
      resumed: false,
    };

    this.logger?.info(`Starting run of ${graph.name}@${graph.version}`, {
      runId: start.runId,
      goal: goalRef,
      mode: this.config.mode,
    });
    await this.events.emit(
      createEvent(
        EngineEventType.RUN_STARTED,
        {
          graphName: graph.name,
          graphVersion: graph.version,
          goalRef,
          entryPoint: graph.entryPoint,
          mock: this.isMock(),
        },
        { runId: start.runId }
      )
    );

    return this.run(graph, start, createRunStateMachine(), options);
  }

  /**
   * Continue a paused run with extra input merged into its context
   *
   * @throws SnapshotError if the snapshot does not belong to this graph
   * @throws ConfigError in live mode when a capability the graph needs is missing
   */
  async resume(
    graph: GraphDefinition,
    snapshot: SessionSnapshot,
    additionalInput: Readonly<ContextValues>,
    options: RunOptions = {}
  ): Promise<RunResult> {
    assertResumable(snapshot, graph);
    this.checkCapabilities(graph);

    const context = new ContextStore(snapshot.context);
    context.merge(additionalInput);

    const start: RunStart = {
      runId: options.runId ?? snapshot.runId,
      goalRef: snapshot.goalRef,
      current: snapshot.pausedAt,
      context,
      stepsExecuted: snapshot.stepsExecuted,
      path: [...snapshot.path],
      resumed: true,
    };

    const machine = createRunStateMachine(RunStatus.PAUSED);
    machine.transition(RunStatus.RUNNING, 'resumed');

    this.logger?.info(`Resuming run of ${graph.name}@${graph.version}`, {
      runId: start.runId,
      pausedAt: snapshot.pausedAt,
      stepsExecuted: snapshot.stepsExecuted,
    });
    await this.events.emit(
      createEvent(
        EngineEventType.RUN_RESUMED,
        {
          graphName: graph.name,
          graphVersion: graph.version,
          goalRef: snapshot.goalRef,
          pausedAt: snapshot.pausedAt,
          stepsExecuted: snapshot.stepsExecuted,
          mock: this.isMock(),
        },
        { runId: start.runId }
      )
    );

    return this.run(graph, start, machine, options);
  }

  private async run(
    graph: GraphDefinition,
    start: RunStart,
    machine: StateMachine<RunStatus>,
    options: RunOptions
  ): Promise<RunResult> {
    const index = indexGraph(graph);
    const maxSteps = options.maxSteps ?? this.config.maxSteps;
    const signal = options.signal;
    const invoker = this.createInvoker();
    const executor = new NodeExecutor({
      invoker,
      events: this.events,
      defaultTimeoutMs: this.config.defaultTimeoutMs,
      backoff: this.backoff,
      logger: this.logger,
    });
    const router = new EdgeRouter(graph, this.logger);

    const state: RunState = {
      ...start,
      graph,
      machine,
      visits: [],
      usage: { inputTokens: 0, outputTokens: 0 },
      startedAt: new Date(),
    };
    let skipPause = start.resumed;

    for (;;) {
      if (signal?.aborted) {
        return this.finish(state, RunStatus.CANCELLED, {
          error: { kind: 'Cancelled', message: 'Run was cancelled', nodeId: state.current },
        });
      }

      if (index.pauseNodes.has(state.current) && !skipPause) {
        return this.pause(state);
      }
      skipPause = false;

      if (state.stepsExecuted >= maxSteps) {
        return this.finish(state, RunStatus.BUDGET_EXCEEDED, {
          error: {
            kind: 'BudgetExceeded',
            message: `Step budget of ${maxSteps} exhausted before node "${state.current}"`,
            nodeId: state.current,
          },
          maxSteps,
        });
      }

      const node = this.nodeAt(index, state.current);

      const absent = state.context.missing(node.inputKeys);
      if (absent.length > 0) {
        const error = new MissingKeyError(absent, node.id);
        return this.finish(state, RunStatus.FAILED, {
          error: { kind: 'MissingKey', message: error.message, nodeId: node.id, missingKeys: absent },
        });
      }

      const missingCredential = await this.findMissingCredential(node, invoker);
      if (missingCredential) {
        return this.finish(state, RunStatus.FAILED, {
          error: {
            kind: 'MissingCredential',
            message: missingCredential.message,
            nodeId: node.id,
            credential: missingCredential.credential,
          },
        });
      }

      const visit = await executor.execute(node, state.context.view(node.inputKeys), {
        runId: state.runId,
        goalRef: state.goalRef,
        step: state.stepsExecuted + 1,
        signal,
      });
      const outcome = visit.outcome;

      state.stepsExecuted += 1;
      state.path.push(node.id);
      state.visits.push({
        nodeId: node.id,
        attempts: visit.attempts,
        status: outcome.status,
        durationMs: visit.durationMs,
      });

      if (outcome.status === 'success') {
        state.context.merge(outcome.produced);
        if (outcome.usage) {
          state.usage.inputTokens += outcome.usage.inputTokens;
          state.usage.outputTokens += outcome.usage.outputTokens;
        }
      } else if (outcome.error.kind === 'Cancelled' && signal?.aborted) {
        return this.finish(state, RunStatus.CANCELLED, {
          error: { kind: 'Cancelled', message: outcome.error.message, nodeId: node.id },
        });
      }

      if (index.terminalNodes.has(node.id)) {
        return outcome.status === 'success'
          ? this.finish(state, RunStatus.SUCCEEDED, { terminalNode: node.id })
          : this.finish(state, RunStatus.FAILED, {
              error: { kind: outcome.error.kind, message: outcome.error.message, nodeId: node.id },
            });
      }

      const edge = router.select(node.id, outcome, state.context.snapshot());
      if (!edge) {
        return this.finish(state, RunStatus.FAILED, {
          error: {
            kind: 'NoMatchingEdge',
            message: `No outgoing edge of node "${node.id}" matches its ${outcome.status} outcome`,
            nodeId: node.id,
          },
        });
      }

      this.logger?.debug(`Routing ${edge.source} → ${edge.target}`, {
        edgeId: edge.id,
        condition: edge.condition,
        outcome: describeOutcome(outcome),
      });
      state.current = edge.target;
    }
  }

  private async pause(state: RunState): Promise<RunResult> {
    const snapshot: SessionSnapshot = {
      formatVersion: SNAPSHOT_FORMAT_VERSION,
      runId: state.runId,
      graphName: state.graph.name,
      graphVersion: state.graph.version,
      goalRef: state.goalRef,
      pausedAt: state.current,
      context: state.context.snapshot(),
      stepsExecuted: state.stepsExecuted,
      path: [...state.path],
      createdAt: new Date().toISOString(),
    };

    if (this.config.snapshotStore) {
      await this.config.snapshotStore.save(snapshot);
    }

    return this.finish(state, RunStatus.PAUSED, { snapshot });
  }

  private async finish(
    state: RunState,
    status: FinalRunStatus,
    details: { error?: RunError; snapshot?: SessionSnapshot; terminalNode?: string; maxSteps?: number }
  ): Promise<RunResult> {
    state.machine.transition(status, details.error?.kind);

    const completedAt = new Date();
    const durationMs = completedAt.getTime() - state.startedAt.getTime();
    const result: RunResult = {
      runId: state.runId,
      status,
      stepsExecuted: state.stepsExecuted,
      goalRef: state.goalRef,
      mock: this.isMock(),
      path: [...state.path],
      attempts: state.visits,
      usage: state.usage,
      startedAt: state.startedAt,
      completedAt,
      durationMs,
    };

    const eventContext = { runId: state.runId };
    const logContext = { runId: state.runId, status, steps: state.stepsExecuted, durationMs };

    switch (status) {
      case RunStatus.SUCCEEDED:
        result.output = state.context.snapshot();
        this.logger?.info('Run succeeded', logContext);
        await this.events.emit(
          createEvent(
            EngineEventType.RUN_SUCCEEDED,
            { terminalNode: details.terminalNode ?? state.current, stepsExecuted: state.stepsExecuted, durationMs },
            eventContext
          )
        );
        break;

      case RunStatus.PAUSED:
        result.pausedAt = state.current;
        result.snapshot = details.snapshot;
        this.logger?.info(`Run paused at ${state.current}`, logContext);
        await this.events.emit(
          createEvent(
            EngineEventType.RUN_PAUSED,
            { pausedAt: state.current, stepsExecuted: state.stepsExecuted },
            eventContext
          )
        );
        break;

      case RunStatus.BUDGET_EXCEEDED:
        result.error = details.error;
        this.logger?.warn('Run exceeded its step budget', { ...logContext, nextNode: state.current });
        await this.events.emit(
          createEvent(
            EngineEventType.RUN_BUDGET_EXCEEDED,
            {
              maxSteps: details.maxSteps ?? this.config.maxSteps,
              stepsExecuted: state.stepsExecuted,
              nextNode: state.current,
            },
            eventContext
          )
        );
        break;

      case RunStatus.CANCELLED:
        result.error = details.error;
        this.logger?.info('Run cancelled', logContext);
        await this.events.emit(
          createEvent(EngineEventType.RUN_CANCELLED, { stepsExecuted: state.stepsExecuted }, eventContext)
        );
        break;

      case RunStatus.FAILED: {
        const error: RunError = details.error ?? { kind: 'UpstreamFailure', message: 'Run failed' };
        result.error = error;
        this.logger?.info(`Run failed: ${error.message}`, { ...logContext, kind: error.kind });
        await this.events.emit(
          createEvent(
            EngineEventType.RUN_FAILED,
            { error, stepsExecuted: state.stepsExecuted, durationMs },
            eventContext
          )
        );
        break;
      }
    }

    return result;
  }

  private nodeAt(index: GraphIndex, nodeId: string): NodeSpec {
    const node = index.nodes.get(nodeId);
    if (!node) {
      // Unreachable for a validated graph
      throw new Error(`Node "${nodeId}" is not part of the graph`);
    }
    return node;
  }

  /**
   * First required credential of the node's tools that the store lacks.
   * Mocked and internal nodes need none.
   */
  private async findMissingCredential(
    node: NodeSpec,
    invoker: NodeInvoker
  ): Promise<MissingCredentialError | undefined> {
    if (!invoker.isExternal(node.nodeType)) {
      return undefined;
    }

    for (const spec of requiredCredentials(node.toolRefs, this.config.credentialSpecs)) {
      const available = this.config.credentials ? await this.config.credentials.isAvailable(spec.name) : false;
      if (!available) {
        return new MissingCredentialError(spec.name, { nodeId: node.id, envVar: spec.envVar });
      }
    }
    return undefined;
  }

  /**
   * @throws ConfigError naming the nodes that need an unconfigured capability
   */
  checkCapabilities(graph: GraphDefinition): void {
    if (this.isMock()) {
      return;
    }

    const modelNodes = graph.nodes.filter(node => node.nodeType === 'model').map(node => node.id);
    if (modelNodes.length > 0 && !this.config.model) {
      throw ConfigError.missingCapability('model', modelNodes);
    }

    const toolNodes = graph.nodes.filter(node => node.nodeType === 'tool').map(node => node.id);
    if (toolNodes.length > 0 && !this.config.tools) {
      throw ConfigError.missingCapability('tools', toolNodes);
    }
  }

  private createInvoker(): NodeInvoker {
    return NodeInvoker.create({
      mode: this.config.mode,
      model: this.config.model,
      tools: this.config.tools,
      mockScript: this.isMock() ? new MockScript(this.config.mockOutcomes) : undefined,
    });
  }

  private isMock(): boolean {
    return this.config.mode === 'mock';
  }
}

function describeOutcome(outcome: NodeOutcome): string {
  return outcome.status === 'success' ? 'success' : `failure(${outcome.error.kind})`;
}
