/**
 * Session Snapshot
 *
 * Serialized state of a paused run. Serialization is canonical (sorted
 * keys, two-space indent): the same state always yields the same bytes,
 * so a resume is reproducible against the same graph version.
 *
 * @module session
 */

import { z } from 'zod';
import type { ContextValues, GraphDefinition } from '../types/core-types.js';
import { SnapshotError } from '../errors/RunErrors.js';
import { indexGraph } from '../graph/GraphIndex.js';

export const SNAPSHOT_FORMAT_VERSION = 1;

export interface SessionSnapshot {
  readonly formatVersion: typeof SNAPSHOT_FORMAT_VERSION;
  readonly runId: string;
  readonly graphName: string;
  readonly graphVersion: string;
  readonly goalRef: string;
  /** Node the run will resume at */
  readonly pausedAt: string;
  /** Full context at the moment of pause */
  readonly context: Readonly<ContextValues>;
  readonly stepsExecuted: number;
  /** Node ids visited so far */
  readonly path: readonly string[];
  /** ISO timestamp */
  readonly createdAt: string;
}

export const SessionSnapshotSchema = z
  .object({
    formatVersion: z.literal(SNAPSHOT_FORMAT_VERSION),
    runId: z.string().min(1),
    graphName: z.string().min(1),
    graphVersion: z.string().min(1),
    goalRef: z.string(),
    pausedAt: z.string().min(1),
    context: z.record(z.unknown()),
    stepsExecuted: z.number().int().nonnegative(),
    path: z.array(z.string()),
    createdAt: z.string(),
  })
  .strict();

/**
 * JSON with object keys sorted at every level
 */
export function canonicalJSON(value: unknown): string {
  return JSON.stringify(sortKeys(value), null, 2);
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Object.getOwnPropertyDescriptor(value, key)?.value);
    }
    return sorted;
  }
  return value;
}

export function serializeSnapshot(snapshot: SessionSnapshot): string {
  return canonicalJSON(snapshot);
}

/**
 * Validate a decoded snapshot
 *
 * @throws SnapshotError if it does not match the snapshot format
 */
export function parseSnapshot(raw: unknown): SessionSnapshot {
  const result = SessionSnapshotSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw SnapshotError.invalid(`${where}${issue.message}`);
  }
  return result.data;
}

/**
 * @throws SnapshotError if the text is not a valid snapshot
 */
export function deserializeSnapshot(text: string): SessionSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw SnapshotError.invalid(error instanceof Error ? error.message : String(error));
  }
  return parseSnapshot(raw);
}

/**
 * Check that a snapshot can resume on this graph
 *
 * @throws SnapshotError on a name/version mismatch or an unknown pause node
 */
export function assertResumable(snapshot: SessionSnapshot, graph: GraphDefinition): void {
  if (snapshot.graphName !== graph.name || snapshot.graphVersion !== graph.version) {
    throw SnapshotError.mismatch(
      `${graph.name}@${graph.version}`,
      `${snapshot.graphName}@${snapshot.graphVersion}`
    );
  }
  if (!indexGraph(graph).nodes.has(snapshot.pausedAt)) {
    throw SnapshotError.invalid(`pausedAt "${snapshot.pausedAt}" is not a node of graph "${graph.name}"`);
  }
}
