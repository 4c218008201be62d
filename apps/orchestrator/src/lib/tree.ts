/**
 * Accessors over the nested maps the generator builds (service, compose and
 * metadata buckets). Paths are arrays of keys so that keys may contain dots.
 */

import type { JsonObject, JsonValue } from '@dockyard/shared';

export type TreeValue = JsonValue;
export type TreeMap = JsonObject;

export function isTreeMap(value: TreeValue | undefined): value is TreeMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split a dotted path, rejecting empty segments.
 * Returns null for malformed paths such as `service..ports` or `.env`.
 */
export function splitPath(path: string): string[] | null {
  const segments = path.split('.');
  return segments.every(segment => segment.length > 0) ? segments : null;
}

export function getPath(root: TreeMap, path: readonly string[]): TreeValue | undefined {
  let current: TreeValue | undefined = root;
  for (const key of path) {
    if (!isTreeMap(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

/**
 * Walk to the map at `path`, creating maps along the way.
 * Any non-map value found on the way is replaced.
 */
export function ensureMap(root: TreeMap, path: readonly string[]): TreeMap {
  let current = root;
  for (const key of path) {
    const next = current[key];
    if (isTreeMap(next)) {
      current = next;
    } else {
      const created: TreeMap = {};
      current[key] = created;
      current = created;
    }
  }
  return current;
}

export function setPath(root: TreeMap, path: readonly string[], value: TreeValue): void {
  if (path.length === 0) {
    throw new Error('setPath requires at least one key');
  }
  const parent = ensureMap(root, path.slice(0, -1));
  parent[path[path.length - 1]] = value;
}

/**
 * Append to the list at `path`. A missing value becomes a new list; a scalar
 * already stored there becomes the list's first element.
 */
export function appendAtPath(root: TreeMap, path: readonly string[], value: TreeValue): TreeValue[] {
  if (path.length === 0) {
    throw new Error('appendAtPath requires at least one key');
  }
  const parent = ensureMap(root, path.slice(0, -1));
  const key = path[path.length - 1];
  const existing = parent[key];

  let list: TreeValue[];
  if (Array.isArray(existing)) {
    list = existing;
  } else if (existing === undefined || existing === null) {
    list = [];
  } else {
    list = [existing];
  }
  list.push(value);
  parent[key] = list;
  return list;
}

export function cloneTree<T extends TreeValue>(value: T): T {
  return structuredClone(value);
}

export function isEmptyValue(value: TreeValue | undefined): boolean {
  if (value === undefined || value === null || value === '') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return isTreeMap(value) && Object.keys(value).length === 0;
}

/**
 * Recursively drop `""`, `null`, `[]` and `{}`. Containers left empty after their
 * children are pruned are dropped as well. `false` and `0` are kept.
 */
export function pruneEmpty(value: TreeValue): TreeValue | undefined {
  if (Array.isArray(value)) {
    const items: TreeValue[] = [];
    for (const item of value) {
      const pruned = pruneEmpty(item);
      if (pruned !== undefined) {
        items.push(pruned);
      }
    }
    return items.length > 0 ? items : undefined;
  }

  if (isTreeMap(value)) {
    const result: TreeMap = {};
    for (const [key, child] of Object.entries(value)) {
      const pruned = pruneEmpty(child);
      if (pruned !== undefined) {
        result[key] = pruned;
      }
    }
    return Object.keys(result).length > 0 ? result : undefined;
  }

  return isEmptyValue(value) ? undefined : value;
}
