/**
 * Snapshot Stores
 *
 * Persistence for paused runs, keyed by run id. Stores hold the canonical
 * serialized form.
 *
 * @module session
 */

import { mkdir, readFile, readdir, rename, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import type { SessionSnapshot } from './SessionSnapshot.js';
import { deserializeSnapshot, serializeSnapshot } from './SessionSnapshot.js';

export interface SnapshotStore {
  save(snapshot: SessionSnapshot): Promise<void>;

  /**
   * @returns undefined when no snapshot is stored for the run
   */
  load(runId: string): Promise<SessionSnapshot | undefined>;

  /**
   * Remove and return the stored snapshot. Of several concurrent calls for
   * one run id, at most one gets the snapshot.
   *
   * @returns undefined when no snapshot is stored for the run
   */
  take(runId: string): Promise<SessionSnapshot | undefined>;

  /**
   * @returns Whether a snapshot was removed
   */
  delete(runId: string): Promise<boolean>;

  /** Run ids with a stored snapshot */
  list(): Promise<string[]>;
}

export class InMemorySnapshotStore implements SnapshotStore {
  private readonly snapshots = new Map<string, string>();

  async save(snapshot: SessionSnapshot): Promise<void> {
    this.snapshots.set(snapshot.runId, serializeSnapshot(snapshot));
  }

  async load(runId: string): Promise<SessionSnapshot | undefined> {
    const text = this.snapshots.get(runId);
    return text === undefined ? undefined : deserializeSnapshot(text);
  }

  async take(runId: string): Promise<SessionSnapshot | undefined> {
    const text = this.snapshots.get(runId);
    if (text === undefined) {
      return undefined;
    }
    this.snapshots.delete(runId);
    return deserializeSnapshot(text);
  }

  async delete(runId: string): Promise<boolean> {
    return this.snapshots.delete(runId);
  }

  async list(): Promise<string[]> {
    return [...this.snapshots.keys()].sort();
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One `<runId>.json` file per paused run under a directory
 */
export class FileSnapshotStore implements SnapshotStore {
  private claims = 0;

  constructor(private readonly directory: string) {}

  pathFor(runId: string): string {
    return join(this.directory, `${encodeURIComponent(runId)}.json`);
  }

  async save(snapshot: SessionSnapshot): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const target = this.pathFor(snapshot.runId);
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, `${serializeSnapshot(snapshot)}\n`, 'utf-8');
    await rename(temp, target);
  }

  async load(runId: string): Promise<SessionSnapshot | undefined> {
    let text: string;
    try {
      text = await readFile(this.pathFor(runId), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
    return deserializeSnapshot(text);
  }

  /**
   * Renames the file to a claim path first: only one rename of the same file
   * can succeed.
   */
  async take(runId: string): Promise<SessionSnapshot | undefined> {
    const target = this.pathFor(runId);
    const claim = `${target}.${process.pid}.${++this.claims}.claim`;
    try {
      await rename(target, claim);
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }

    let snapshot: SessionSnapshot;
    try {
      snapshot = deserializeSnapshot(await readFile(claim, 'utf-8'));
    } catch (error) {
      await rename(claim, target);
      throw error;
    }
    await unlink(claim);
    return snapshot;
  }

  async delete(runId: string): Promise<boolean> {
    try {
      await unlink(this.pathFor(runId));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
    return entries
      .filter(name => name.endsWith('.json'))
      .map(name => decodeURIComponent(name.slice(0, -'.json'.length)))
      .sort();
  }
}
