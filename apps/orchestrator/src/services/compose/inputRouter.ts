/**
 * Input router
 *
 * Distributes completed inputs into the service, compose and metadata buckets
 * according to each field's routing path. Transform-tagged fields, wildcard
 * paths and `env.*` fields are left to their dedicated passes.
 */

import {
  DEFAULT_ROUTING_PATH,
  ROUTING_BUCKETS,
  type BlueprintField,
  type BlueprintSchemaMap,
  type RawInputs,
  type RoutedData,
  type RoutingBucket,
} from '@dockyard/shared';
import { SchemaError } from '../../lib/errors.js';
import { generatorLogger } from '../../lib/logger.js';
import { cloneTree, setPath, splitPath, type TreeValue } from '../../lib/tree.js';
import { ensureNetworkMap } from './networks.js';

export interface RoutingTarget {
  bucket: RoutingBucket;
  /** Nested keys inside the bucket; empty means "top level under the field name" */
  path: string[];
  /** True for `bucket.path.*`, handled by the custom multi-value pass */
  wildcard: boolean;
}

function isRoutingBucket(value: string): value is RoutingBucket {
  return ROUTING_BUCKETS.some(bucket => bucket === value);
}

/**
 * Parse a field's routing path.
 * Malformed paths degrade to the bucket's top level; only paths that cannot be
 * interpreted at all raise a SchemaError.
 */
export function parseRoutingPath(fieldName: string, field: BlueprintField): RoutingTarget {
  const raw: unknown = field.schema ?? DEFAULT_ROUTING_PATH;
  if (typeof raw !== 'string') {
    throw new SchemaError(fieldName, `routing path must be a string, got ${typeof raw}`);
  }

  let path = raw.trim();
  let wildcard = false;
  if (path.endsWith('.*')) {
    wildcard = true;
    path = path.slice(0, -2);
  }
  if (path.includes('*')) {
    throw new SchemaError(fieldName, `wildcard is only allowed as the last segment: "${raw}"`);
  }

  const dot = path.indexOf('.');
  const head = dot === -1 ? path : path.slice(0, dot);
  const rest = dot === -1 ? '' : path.slice(dot + 1);

  if (!isRoutingBucket(head)) {
    generatorLogger.warn({ field: fieldName, path: raw }, 'Unknown routing bucket, storing at service top level');
    return { bucket: 'service', path: [], wildcard: false };
  }

  if (head === 'env' && rest.length === 0) {
    throw new SchemaError(fieldName, 'env routing path needs a variable name');
  }

  if (dot === -1) {
    return { bucket: head, path: [], wildcard };
  }

  const segments = splitPath(rest);
  if (!segments) {
    if (head === 'env') {
      throw new SchemaError(fieldName, `malformed env routing path "${raw}"`);
    }
    generatorLogger.warn({ field: fieldName, path: raw }, 'Malformed routing path, storing at bucket top level');
    return { bucket: head, path: [], wildcard: false };
  }

  return { bucket: head, path: segments, wildcard };
}

/**
 * Route completed inputs into the three buckets.
 * Fields are visited in schema order so the output does not depend on input key order.
 */
export function routeInputs(inputs: RawInputs, schema: BlueprintSchemaMap): RoutedData {
  const routed: RoutedData = { service: {}, compose: {}, metadata: {} };

  for (const [name, field] of Object.entries(schema)) {
    if (!Object.hasOwn(inputs, name)) {
      continue;
    }
    // Transform-tagged fields belong to the transform pass only
    if (field.compose_transform) {
      continue;
    }

    const target = parseRoutingPath(name, field);
    if (target.wildcard || target.bucket === 'env') {
      continue;
    }

    const bucket = routed[target.bucket];
    const path = target.path.length === 0 ? [name] : target.path;
    let value: TreeValue = cloneTree(inputs[name]);

    if (path[0] === 'networks') {
      if (path.length === 1 && typeof value === 'string') {
        value = [value];
      } else if (path.length > 1) {
        ensureNetworkMap(bucket);
      }
    }

    setPath(bucket, path, value);
  }

  const unknown = Object.keys(inputs).filter(name => !Object.hasOwn(schema, name));
  if (unknown.length > 0) {
    generatorLogger.debug({ fields: unknown }, 'Dropped inputs without a schema entry');
  }

  return routed;
}
