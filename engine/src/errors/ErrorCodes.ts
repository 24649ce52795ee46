/**
 * Graphrun Error Codes
 *
 * Structured error codes for the graph execution engine, plus the process
 * exit codes the CLI maps them to.
 *
 * Format: GR-[Category]-[Number]
 *
 * Categories:
 * - S: Structure errors (graph file schema, structural validation)
 * - R: Run errors (missing inputs, node failures, routing, budget)
 * - C: Configuration and session snapshot errors
 *
 * ADDING NEW ERRORS:
 * =================
 * 1. Add error code enum value below
 * 2. Add description in getErrorDescription()
 * 3. Add exit code mapping in getExitCodeForError()
 * 4. Add a factory method to the matching error class
 *
 * @module errors
 */

/**
 * Process exit codes used by the CLI
 */
export enum ExitCode {
  SUCCESS = 0,
  RUN_FAILED = 1,
  INVALID_GRAPH = 2,
  BUDGET_EXCEEDED = 3,
  INTERNAL_ERROR = 4,
  INVALID_CONFIG = 5,
}

export enum GraphrunErrorCode {
  // ============================================================================
  // STRUCTURE ERRORS (S)
  // Exit Code: ExitCode.INVALID_GRAPH
  // ============================================================================

  /** Graph file could not be parsed as YAML/JSON */
  SCHEMA_PARSE_ERROR = 'GR-S-001',

  /** Graph file does not match the graph schema */
  SCHEMA_INVALID = 'GR-S-002',

  /** Entry point is not a declared node */
  STRUCTURE_UNKNOWN_ENTRY_POINT = 'GR-S-003',

  /** Edge source or target is not a declared node */
  STRUCTURE_DANGLING_EDGE = 'GR-S-004',

  /** Node output keys overlap its input keys without overwrite */
  STRUCTURE_KEY_OVERLAP = 'GR-S-005',

  /** Pause or terminal node is not a declared node */
  STRUCTURE_UNKNOWN_MARKER = 'GR-S-006',

  /** Two nodes share an id */
  STRUCTURE_DUPLICATE_NODE = 'GR-S-007',

  /** Two edges share an id */
  STRUCTURE_DUPLICATE_EDGE = 'GR-S-008',

  /** Predicate edge or conditional rule has a bad expression */
  STRUCTURE_INVALID_EXPRESSION = 'GR-S-009',

  /** Node declaration is inconsistent with its type */
  STRUCTURE_INVALID_NODE = 'GR-S-010',

  /** Graph declares no nodes */
  STRUCTURE_EMPTY_GRAPH = 'GR-S-011',

  /** Graph failed structural validation (aggregate) */
  STRUCTURE_INVALID_GRAPH = 'GR-S-012',

  // ============================================================================
  // RUN ERRORS (R)
  // Exit Code: ExitCode.RUN_FAILED
  // ============================================================================

  /** Node required inputs are absent from context */
  RUN_MISSING_KEY = 'GR-R-001',

  /** Node invocation failed after all attempts */
  RUN_NODE_FAILED = 'GR-R-002',

  /** No outgoing edge matched the node outcome */
  RUN_NO_MATCHING_EDGE = 'GR-R-003',

  /** Step budget exhausted */
  RUN_BUDGET_EXCEEDED = 'GR-R-004',

  /** Required credential is unavailable */
  RUN_MISSING_CREDENTIAL = 'GR-R-005',

  /** Run was cancelled */
  RUN_CANCELLED = 'GR-R-006',

  // ============================================================================
  // CONFIGURATION / SNAPSHOT ERRORS (C)
  // Exit Code: ExitCode.INVALID_CONFIG
  // ============================================================================

  /** Engine configuration is invalid */
  CONFIG_INVALID = 'GR-C-001',

  /** Node type has no capability to run it */
  CONFIG_MISSING_CAPABILITY = 'GR-C-002',

  /** Snapshot is malformed */
  SNAPSHOT_INVALID = 'GR-C-003',

  /** Snapshot belongs to another graph or graph version */
  SNAPSHOT_MISMATCH = 'GR-C-004',

  /** No snapshot stored for the run */
  SNAPSHOT_NOT_FOUND = 'GR-C-005',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Stops the run or the command */
  ERROR = 'error',

  /** Reported, execution continues */
  WARNING = 'warning',

  /** Informational message */
  INFO = 'info',
}

/**
 * Get human-readable category name from error code
 *
 * @example
 * ```typescript
 * getErrorCategory(GraphrunErrorCode.RUN_MISSING_KEY); // "Run Error"
 * ```
 */
export function getErrorCategory(code: GraphrunErrorCode): string {
  if (code.startsWith('GR-S-')) return 'Structure Error';
  if (code.startsWith('GR-R-')) return 'Run Error';
  if (code.startsWith('GR-C-')) return 'Configuration Error';
  return 'Unknown Error';
}

/**
 * Get detailed description for an error code
 */
export function getErrorDescription(code: GraphrunErrorCode): string {
  switch (code) {
    case GraphrunErrorCode.SCHEMA_PARSE_ERROR:
      return 'The graph file is not valid YAML or JSON.';
    case GraphrunErrorCode.SCHEMA_INVALID:
      return 'The graph file does not match the graph schema (unknown field, wrong type or missing field).';
    case GraphrunErrorCode.STRUCTURE_UNKNOWN_ENTRY_POINT:
      return 'The entry point must name a node declared in the graph.';
    case GraphrunErrorCode.STRUCTURE_DANGLING_EDGE:
      return 'Every edge must connect two nodes declared in the graph.';
    case GraphrunErrorCode.STRUCTURE_KEY_OVERLAP:
      return 'A node may only write one of its own input keys when it is declared with overwrite: true.';
    case GraphrunErrorCode.STRUCTURE_UNKNOWN_MARKER:
      return 'Pause and terminal node lists may only name declared nodes.';
    case GraphrunErrorCode.STRUCTURE_DUPLICATE_NODE:
      return 'Node ids must be unique within a graph.';
    case GraphrunErrorCode.STRUCTURE_DUPLICATE_EDGE:
      return 'Edge ids must be unique within a graph.';
    case GraphrunErrorCode.STRUCTURE_INVALID_EXPRESSION:
      return 'A predicate or rule expression is missing or cannot be parsed.';
    case GraphrunErrorCode.STRUCTURE_INVALID_NODE:
      return 'The node declaration does not fit its node type.';
    case GraphrunErrorCode.STRUCTURE_EMPTY_GRAPH:
      return 'A graph needs at least one node.';
    case GraphrunErrorCode.STRUCTURE_INVALID_GRAPH:
      return 'The graph failed structural validation; see the listed errors.';
    case GraphrunErrorCode.RUN_MISSING_KEY:
      return 'A node was reached before all of its input keys were present in context.';
    case GraphrunErrorCode.RUN_NODE_FAILED:
      return 'A node failed on every attempt.';
    case GraphrunErrorCode.RUN_NO_MATCHING_EDGE:
      return 'No outgoing edge of a non-terminal node matched its outcome.';
    case GraphrunErrorCode.RUN_BUDGET_EXCEEDED:
      return 'The run reached its step budget before reaching a terminal node.';
    case GraphrunErrorCode.RUN_MISSING_CREDENTIAL:
      return 'A node needs a credential that is not available.';
    case GraphrunErrorCode.RUN_CANCELLED:
      return 'The run was cancelled by its caller.';
    case GraphrunErrorCode.CONFIG_INVALID:
      return 'The engine configuration is invalid.';
    case GraphrunErrorCode.CONFIG_MISSING_CAPABILITY:
      return 'A model or tool node cannot run because no capability was configured for it.';
    case GraphrunErrorCode.SNAPSHOT_INVALID:
      return 'The session snapshot is malformed.';
    case GraphrunErrorCode.SNAPSHOT_MISMATCH:
      return 'The session snapshot was taken against a different graph or graph version.';
    case GraphrunErrorCode.SNAPSHOT_NOT_FOUND:
      return 'No paused session is stored for this run id.';
    default:
      return 'Unknown error';
  }
}

/**
 * Map error code to process exit code
 */
export function getExitCodeForError(code: GraphrunErrorCode): ExitCode {
  if (code === GraphrunErrorCode.RUN_BUDGET_EXCEEDED) {
    return ExitCode.BUDGET_EXCEEDED;
  }
  if (code.startsWith('GR-S-')) return ExitCode.INVALID_GRAPH;
  if (code.startsWith('GR-R-')) return ExitCode.RUN_FAILED;
  if (code.startsWith('GR-C-')) return ExitCode.INVALID_CONFIG;
  return ExitCode.INTERNAL_ERROR;
}

/**
 * Suggested action for an error code
 */
export function getSuggestedAction(code: GraphrunErrorCode): string {
  if (code.startsWith('GR-S-')) return 'Fix the graph definition and run `graphrun validate` again.';
  if (code === GraphrunErrorCode.RUN_MISSING_KEY) return 'Provide the missing keys in the run input or produce them upstream.';
  if (code === GraphrunErrorCode.RUN_NO_MATCHING_EDGE) return 'Add an edge (for example an `always` fallback) for this outcome.';
  if (code === GraphrunErrorCode.RUN_BUDGET_EXCEEDED) return 'Check the graph for unintended loops or raise maxSteps.';
  if (code === GraphrunErrorCode.RUN_MISSING_CREDENTIAL) return 'Configure the credential (for example through its environment variable).';
  if (code.startsWith('GR-C-')) return 'Check the engine configuration and session store.';
  return 'Check the run log for details.';
}

/**
 * Whether the user can fix the error by changing the graph or input
 */
export function isUserError(code: GraphrunErrorCode): boolean {
  return code.startsWith('GR-S-') || code === GraphrunErrorCode.RUN_MISSING_KEY
    || code === GraphrunErrorCode.RUN_NO_MATCHING_EDGE;
}
