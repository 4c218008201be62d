import { isTreeMap, type TreeMap, type TreeValue } from '../../lib/tree.js';

/**
 * Convert a short-form network list (`[a, b]`) into map form (`{a: {}, b: {}}`).
 * Maps are returned as-is; anything else yields an empty map.
 */
export function toNetworkMap(value: TreeValue | undefined): TreeMap {
  if (isTreeMap(value)) {
    return value;
  }
  const result: TreeMap = {};
  if (Array.isArray(value)) {
    for (const entry of value) {
      if (typeof entry === 'string' && entry.length > 0) {
        result[entry] = {};
      }
    }
  } else if (typeof value === 'string' && value.length > 0) {
    result[value] = {};
  }
  return result;
}

/**
 * Make sure `target.networks` is in map form and return it.
 */
export function ensureNetworkMap(target: TreeMap): TreeMap {
  const networks = toNetworkMap(target.networks);
  target.networks = networks;
  return networks;
}

/**
 * Attach a network to a service. Other attachments are left alone.
 */
export function attachNetwork(service: TreeMap, name: string, settings: TreeMap = {}): void {
  ensureNetworkMap(service)[name] = settings;
}
