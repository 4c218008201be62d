/**
 * Compose transforms
 *
 * Each transform converts one compound or array input into compose fragments,
 * mutating the service map in place. Transforms are looked up by the
 * `compose_transform` tag of a blueprint field.
 */

import {
  TRANSFORM_NAMES,
  type BlueprintField,
  type BlueprintSchemaMap,
  type CustomNetwork,
  type JsonValue,
  type RawInputs,
  type TransformName,
} from '@dockyard/shared';
import { TransformError } from '../../lib/errors.js';
import { transformLogger } from '../../lib/logger.js';
import { appendAtPath, isTreeMap, type TreeMap } from '../../lib/tree.js';
import { attachNetwork } from './networks.js';
import { rewriteRelativeSource } from './normalize.js';

/**
 * Side channel shared by the transforms of one generation pass.
 */
export interface TransformCache {
  /** Networks to declare at top level as external */
  customNetworks: CustomNetwork[];
  /** Networks the runtime must create before the stack starts */
  networkRequests: string[];
  /** One-shot lookups already performed (e.g. the legacy port fields) */
  handled: Set<string>;
}

export interface TransformContext {
  fieldName: string;
  value: JsonValue;
  field: BlueprintField;
  inputs: RawInputs;
  service: TreeMap;
  cache: TransformCache;
}

export type TransformFn = (context: TransformContext) => void;

export function createTransformCache(): TransformCache {
  return {
    customNetworks: [],
    networkRequests: [],
    handled: new Set(),
  };
}

function nonEmptyString(value: JsonValue | undefined): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * {host, container, protocol?} → {published, target, protocol}
 *
 * Deprecated input shape: separate `host_port` / `container_port` inputs are
 * still honoured once per pass when the value is not a compound object.
 */
function transformPortMapping({ value, inputs, service, cache }: TransformContext): void {
  if (isTreeMap(value) && 'host' in value && 'container' in value) {
    appendAtPath(service, ['ports'], {
      published: value.host,
      target: value.container,
      protocol: nonEmptyString(value.protocol) ?? 'tcp',
    });
    return;
  }

  if (cache.handled.has('port_mapping')) {
    return;
  }
  cache.handled.add('port_mapping');

  const hostPort = inputs.host_port;
  const containerPort = inputs.container_port;
  if (hostPort && containerPort) {
    appendAtPath(service, ['ports'], {
      published: hostPort,
      target: containerPort,
      protocol: 'tcp',
    });
  }
}

function transformPortArray({ value, service }: TransformContext): void {
  if (!Array.isArray(value)) {
    return;
  }

  for (const item of value) {
    if (!isTreeMap(item) || !item.host || !item.container) {
      continue;
    }
    appendAtPath(service, ['ports'], {
      published: item.host,
      target: item.container,
      protocol: nonEmptyString(item.protocol) ?? 'tcp',
    });
  }
}

function buildVolume(item: TreeMap, rewriteRelative: boolean): TreeMap {
  const type = nonEmptyString(item.type) ?? 'bind';
  let source = item.source;

  if (rewriteRelative && type === 'bind' && typeof source === 'string') {
    source = rewriteRelativeSource(source);
  }

  const volume: TreeMap = { type, source, target: item.target };

  if (item.read_only === true) {
    volume.read_only = true;
  }

  if (type === 'bind') {
    const bind: TreeMap = {};
    const propagation = nonEmptyString(item.bind_propagation);
    if (propagation) {
      bind.propagation = propagation;
    }
    if (item.bind_create_host_path !== undefined && item.bind_create_host_path !== null) {
      bind.create_host_path = item.bind_create_host_path;
    }
    if (Object.keys(bind).length > 0) {
      volume.bind = bind;
    }
  }

  return volume;
}

/**
 * {source, target, type?, read_only?, bind_*?} → long-form volume.
 * A bare string is the legacy form: a bind mount onto the field's `volume_target`.
 */
function transformVolumeMapping({ value, field, service }: TransformContext): void {
  if (isTreeMap(value) && 'source' in value && 'target' in value) {
    appendAtPath(service, ['volumes'], buildVolume(value, false));
  } else if (typeof value === 'string') {
    appendAtPath(service, ['volumes'], {
      type: 'bind',
      source: value,
      target: field.volume_target ?? '/data',
      read_only: false,
    });
  }
}

function transformVolumeArray({ value, service }: TransformContext): void {
  if (!Array.isArray(value)) {
    return;
  }

  for (const item of value) {
    if (!isTreeMap(item) || !item.source || !item.target) {
      continue;
    }
    appendAtPath(service, ['volumes'], buildVolume(item, true));
  }
}

/**
 * {network_name, ipv4_address?} → service.networks[network_name]
 */
function transformNetworkConfig({ value, service }: TransformContext): void {
  if (!isTreeMap(value)) {
    return;
  }
  const networkName = nonEmptyString(value.network_name);
  if (!networkName) {
    return;
  }

  const ipv4Address = nonEmptyString(value.ipv4_address);
  attachNetwork(service, networkName, ipv4Address ? { ipv4_address: ipv4Address } : {});
}

/**
 * [{network_name, mode}] → service-level attachments plus top-level external
 * declarations. `create` entries are queued for the runtime to ensure.
 */
function transformCustomNetworksArray({ fieldName, value, service, cache }: TransformContext): void {
  if (!Array.isArray(value)) {
    transformLogger.warn({ field: fieldName }, 'Custom networks value is not a list, skipping');
    return;
  }

  for (const item of value) {
    if (!isTreeMap(item)) {
      continue;
    }
    const networkName = nonEmptyString(item.network_name);
    if (!networkName) {
      transformLogger.warn({ field: fieldName }, 'Skipping custom network with empty name');
      continue;
    }
    const mode = item.mode === 'create' ? 'create' : 'existing';

    if (mode === 'create' && !cache.networkRequests.includes(networkName)) {
      cache.networkRequests.push(networkName);
    }

    attachNetwork(service, networkName);

    if (!cache.customNetworks.some(network => network.name === networkName)) {
      cache.customNetworks.push({ name: networkName, mode });
    }

    transformLogger.info({ field: fieldName, network: networkName, mode }, 'Added custom network');
  }
}

const TRANSFORM_REGISTRY: ReadonlyMap<string, TransformFn> = new Map<TransformName, TransformFn>([
  ['port_mapping', transformPortMapping],
  ['port_array', transformPortArray],
  ['volume_mapping', transformVolumeMapping],
  ['volume_array', transformVolumeArray],
  ['network_config', transformNetworkConfig],
  ['custom_networks_array', transformCustomNetworksArray],
]);

export function isTransformName(name: string): name is TransformName {
  return TRANSFORM_NAMES.some(known => known === name);
}

export function getAvailableTransforms(): string[] {
  return [...TRANSFORM_REGISTRY.keys()];
}

/**
 * Run one transform. Unknown names are logged and skipped.
 * Returns whether a transform ran.
 */
export function applyTransform(name: string, context: TransformContext): boolean {
  const transform = TRANSFORM_REGISTRY.get(name);
  if (!transform) {
    transformLogger.warn({ err: new TransformError(name, context.fieldName) }, 'Unknown transform type');
    return false;
  }
  transform(context);
  return true;
}

/**
 * Apply every transform-tagged field present in `inputs`, in schema order.
 */
export function applyFieldTransforms(
  inputs: RawInputs,
  schema: BlueprintSchemaMap,
  service: TreeMap,
  cache: TransformCache
): void {
  for (const [fieldName, field] of Object.entries(schema)) {
    if (!field.compose_transform || !Object.hasOwn(inputs, fieldName)) {
      continue;
    }
    applyTransform(field.compose_transform, {
      fieldName,
      value: inputs[fieldName],
      field,
      inputs,
      service,
      cache,
    });
  }
}
