/**
 * Stack assembler
 *
 * Merges the routed service and compose buckets with the transform side channel
 * into one compose descriptor, then prunes, normalizes and validates it.
 */

import {
  DEFAULT_RESTART_POLICY,
  IMAGE_TAG_SUFFIX,
  type AppIdentity,
  type StackDescriptor,
} from '@dockyard/shared';
import { generatorLogger } from '../../lib/logger.js';
import { cloneTree, isTreeMap, pruneEmpty, type TreeMap, type TreeValue } from '../../lib/tree.js';
import { toNetworkMap } from './networks.js';
import { environmentToList, normalizePort, normalizeVolume } from './normalize.js';
import { validateStack } from './stackValidator.js';
import type { TransformCache } from './transforms.js';

export interface AssembledStack {
  descriptor: StackDescriptor;
  serviceName: string;
  containerName: string;
}

const SERVICE_KEY_ORDER = [
  'image',
  'container_name',
  'hostname',
  'restart',
  'user',
  'environment',
  'ports',
  'volumes',
  'networks',
];

// Top-level sections whose entries are named definitions; `{}` is a valid entry
const NAMED_SECTIONS = new Set(['networks', 'volumes', 'secrets', 'configs']);

/**
 * Append `:${TAG:-latest}` unless the image already names a tag or uses a variable.
 */
export function applyImageTag(image: string): string {
  if (image.includes(':') || image.includes('$')) {
    return image;
  }
  return `${image}${IMAGE_TAG_SUFFIX}`;
}

/** Prune each named entry but keep it, as `{}` if nothing is left. */
function pruneNamedEntries(section: TreeMap): TreeMap | undefined {
  const result: TreeMap = {};
  for (const [name, entry] of Object.entries(section)) {
    result[name] = pruneEmpty(entry) ?? {};
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

function pruneService(service: TreeMap): TreeMap {
  const result: TreeMap = {};
  for (const [key, value] of Object.entries(service)) {
    const pruned = key === 'networks' && isTreeMap(value) ? pruneNamedEntries(value) : pruneEmpty(value);
    if (pruned !== undefined) {
      result[key] = pruned;
    }
  }
  return result;
}

function pruneTopLevel(compose: TreeMap): TreeMap {
  const result: TreeMap = {};
  for (const [key, value] of Object.entries(compose)) {
    let pruned: TreeValue | undefined;
    if (key === 'networks' && Array.isArray(value)) {
      pruned = pruneNamedEntries(toNetworkMap(value));
    } else if (NAMED_SECTIONS.has(key) && isTreeMap(value)) {
      pruned = pruneNamedEntries(value);
    } else {
      pruned = pruneEmpty(value);
    }
    if (pruned !== undefined) {
      result[key] = pruned;
    }
  }
  return result;
}

function orderServiceKeys(service: TreeMap): TreeMap {
  const ordered: TreeMap = {};
  for (const key of SERVICE_KEY_ORDER) {
    if (Object.hasOwn(service, key)) {
      ordered[key] = service[key];
    }
  }
  for (const [key, value] of Object.entries(service)) {
    if (!Object.hasOwn(ordered, key)) {
      ordered[key] = value;
    }
  }
  return ordered;
}

function normalizeService(service: TreeMap): TreeMap {
  if (Array.isArray(service.ports)) {
    service.ports = service.ports.map(normalizePort);
  }
  if (Array.isArray(service.volumes)) {
    service.volumes = service.volumes.map(normalizeVolume);
  }
  if (service.environment !== undefined) {
    service.environment = environmentToList(service.environment);
  }
  return orderServiceKeys(service);
}

/**
 * Build and validate the stack descriptor for one app.
 * The service is keyed by the app name; `container_name` defaults to it.
 */
export function assembleStack(
  service: TreeMap,
  compose: TreeMap,
  cache: TransformCache,
  app: AppIdentity
): AssembledStack {
  const serviceMap = cloneTree(service);
  const composeMap = cloneTree(compose);

  if (typeof serviceMap.image === 'string') {
    const image = serviceMap.image.trim();
    // blank counts as missing so validation reports it
    if (image) serviceMap.image = applyImageTag(image);
    else delete serviceMap.image;
  }
  if (serviceMap.restart === undefined || serviceMap.restart === null || serviceMap.restart === '') {
    serviceMap.restart = DEFAULT_RESTART_POLICY;
  }

  const containerName =
    typeof serviceMap.container_name === 'string' && serviceMap.container_name
      ? serviceMap.container_name
      : app.name;
  serviceMap.container_name = containerName;

  if (cache.customNetworks.length > 0) {
    const networks = toNetworkMap(composeMap.networks);
    for (const network of cache.customNetworks) {
      if (!Object.hasOwn(networks, network.name)) {
        networks[network.name] = { external: true };
      }
    }
    composeMap.networks = networks;
  }

  if (Object.hasOwn(composeMap, 'services')) {
    generatorLogger.warn({ app: app.name }, 'Ignoring "services" routed through the compose bucket');
    delete composeMap.services;
  }

  const descriptor: TreeMap = {
    services: { [app.name]: normalizeService(pruneService(serviceMap)) },
    ...pruneTopLevel(composeMap),
  };

  const validated = validateStack(descriptor, cache.customNetworks);
  generatorLogger.debug({ app: app.name, service: app.name }, 'Stack assembled');

  return { descriptor: validated, serviceName: app.name, containerName };
}
