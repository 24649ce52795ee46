/**
 * Context Store
 *
 * Key/value state of a single run. Owned by exactly one run; `merge` is the
 * only mutator. Reads hand out deep copies so invokers and callers never
 * alias the live state.
 *
 * @module context
 */

import type { ContextValues } from '../types/core-types.js';
import { MissingKeyError } from '../errors/RunErrors.js';
import { deepFreeze } from '../utils/deepFreeze.js';

export class ContextStore {
  private readonly values = new Map<string, unknown>();

  constructor(initial: Readonly<ContextValues> = {}) {
    this.merge(initial);
  }

  /**
   * Whether a key is present (undefined counts as absent)
   */
  has(key: string): boolean {
    return this.values.get(key) !== undefined;
  }

  /**
   * Keys that are absent from the store, in the order given
   */
  missing(keys: readonly string[]): string[] {
    return keys.filter(key => !this.has(key));
  }

  /**
   * Values for the given keys
   *
   * @throws MissingKeyError naming every absent key
   */
  get(keys: readonly string[]): ContextValues {
    const absent = this.missing(keys);
    if (absent.length > 0) {
      throw new MissingKeyError(absent);
    }
    return this.view(keys);
  }

  /**
   * Deep copy of the present subset of the given keys
   */
  view(keys: readonly string[]): ContextValues {
    const result: ContextValues = {};
    for (const key of keys) {
      if (this.has(key)) {
        result[key] = structuredClone(this.values.get(key));
      }
    }
    return result;
  }

  /**
   * Merge values into the store. Existing keys are overwritten; overlap
   * rules are enforced when the graph is validated.
   */
  merge(values: Readonly<ContextValues>): void {
    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) {
        continue;
      }
      this.values.set(key, structuredClone(value));
    }
  }

  /**
   * Immutable copy of the full context
   */
  snapshot(): Readonly<ContextValues> {
    const copy: ContextValues = {};
    for (const [key, value] of this.values) {
      copy[key] = value;
    }
    return deepFreeze(structuredClone(copy));
  }

  /**
   * Keys in insertion order
   */
  keys(): string[] {
    return [...this.values.keys()];
  }

  get size(): number {
    return this.values.size;
  }
}
