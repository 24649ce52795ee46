/**
 * Values that survive a JSON round trip unchanged: strings, booleans,
 * finite numbers, null, arrays and plain objects of those.
 */

export interface NonJsonValue {
  /** Where the value sits, e.g. `report.items[2]` */
  path: string;
  /** What it is, e.g. `Date`, `NaN`, `bigint` */
  type: string;
}

function describe(value: unknown): string {
  if (typeof value === 'number') {
    return Number.isNaN(value) ? 'NaN' : String(value);
  }
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name || 'object';
  }
  return typeof value;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * First value under `value` that JSON cannot carry, if any
 */
export function findNonJsonValue(value: unknown, path: string): NonJsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return undefined;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? undefined : { path, type: describe(value) };
  }
  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) {
      const found = findNonJsonValue(value[i], `${path}[${i}]`);
      if (found) return found;
    }
    return undefined;
  }
  if (typeof value === 'object' && isPlainObject(value)) {
    for (const [key, child] of Object.entries(value)) {
      const found = findNonJsonValue(child, `${path}.${key}`);
      if (found) return found;
    }
    return undefined;
  }
  return { path, type: describe(value) };
}
