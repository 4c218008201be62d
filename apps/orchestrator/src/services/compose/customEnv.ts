/**
 * Multi-value pass for wildcard routing paths such as `service.environment.*`.
 *
 * The field's value is a list of `{key, value}` pairs or a plain map. It runs
 * after global injection, so a user-supplied key replaces a computed one.
 */

import type { BlueprintSchemaMap, RawInputs } from '@dockyard/shared';
import { generatorLogger } from '../../lib/logger.js';
import { cloneTree, ensureMap, isTreeMap, type TreeMap, type TreeValue } from '../../lib/tree.js';
import { parseRoutingPath } from './inputRouter.js';

function collectPairs(value: TreeValue): Array<[string, TreeValue]> {
  if (Array.isArray(value)) {
    const pairs: Array<[string, TreeValue]> = [];
    for (const item of value) {
      if (!isTreeMap(item) || typeof item.key !== 'string') {
        continue;
      }
      pairs.push([item.key, item.value ?? null]);
    }
    return pairs;
  }
  if (isTreeMap(value)) {
    return Object.entries(value);
  }
  return [];
}

export function applyCustomEnvironment(
  service: TreeMap,
  inputs: RawInputs,
  schema: BlueprintSchemaMap
): TreeMap {
  for (const [fieldName, field] of Object.entries(schema)) {
    if (field.compose_transform || !Object.hasOwn(inputs, fieldName)) {
      continue;
    }

    const target = parseRoutingPath(fieldName, field);
    if (!target.wildcard) {
      continue;
    }
    if (target.bucket !== 'service') {
      generatorLogger.warn({ field: fieldName, bucket: target.bucket }, 'Wildcard routing is only supported in the service bucket');
      continue;
    }

    const destination = ensureMap(service, target.path);
    let merged = 0;
    for (const [rawKey, value] of collectPairs(inputs[fieldName])) {
      const key = rawKey.trim();
      if (!key) {
        continue;
      }
      destination[key] = cloneTree(value);
      merged++;
    }

    generatorLogger.debug({ field: fieldName, merged }, 'Merged custom values');
  }

  return service;
}
