import type {
  ComposeService,
  GenerationResult,
  HookContext,
  ServiceNetworkConfig,
  StackDescriptor,
} from '@dockyard/shared';
import { ExternalSideEffectError } from '../lib/errors.js';
import { runtimeLogger } from '../lib/logger.js';
import { generateStack, type GenerateStackOptions } from './compose/composeGenerator.js';
import { buildHookContext } from './hookContext.js';
import { DockerNetworkDriver, ensureNetwork, type NetworkDriver } from './networkManager.js';
import { serializeCompose, type StackArtifacts } from './stackWriter.js';

export interface BuiltStack extends StackArtifacts {
  result: GenerationResult;
  hookContext: HookContext;
  /** Requested networks that could not be created and were detached */
  failedNetworks: string[];
}

type ServiceNetworks = ComposeService['networks'];

function filterAttachments(networks: ServiceNetworks, removed: ReadonlySet<string>): ServiceNetworks {
  if (!networks) {
    return undefined;
  }
  if (Array.isArray(networks)) {
    const kept = networks.filter(name => !removed.has(name));
    return kept.length > 0 ? kept : undefined;
  }
  const kept: Record<string, ServiceNetworkConfig> = {};
  for (const [name, settings] of Object.entries(networks)) {
    if (!removed.has(name)) {
      kept[name] = settings;
    }
  }
  return Object.keys(kept).length > 0 ? kept : undefined;
}

export function detachNetworks(descriptor: StackDescriptor, names: readonly string[]): StackDescriptor {
  const removed = new Set(names);
  const services: Record<string, ComposeService> = {};

  for (const [serviceName, service] of Object.entries(descriptor.services)) {
    const updated: ComposeService = { ...service };
    const networks = filterAttachments(service.networks, removed);
    if (networks) {
      updated.networks = networks;
    } else {
      delete updated.networks;
    }
    services[serviceName] = updated;
  }

  const updated: StackDescriptor = { ...descriptor, services };
  if (descriptor.networks) {
    const networks = { ...descriptor.networks };
    for (const name of removed) {
      delete networks[name];
    }
    if (Object.keys(networks).length > 0) {
      updated.networks = networks;
    } else {
      delete updated.networks;
    }
  }
  return updated;
}

/**
 * Generate a stack and perform the side effects generation asked for.
 *
 * Networks requested with `mode: create` are ensured through the driver. A
 * network that cannot be created is logged and detached so the rest of the
 * stack can still start.
 */
export async function buildStack(
  options: GenerateStackOptions,
  driver: NetworkDriver = new DockerNetworkDriver()
): Promise<BuiltStack> {
  const generated = generateStack(options);
  const failedNetworks: string[] = [];

  for (const network of generated.networkRequests) {
    try {
      await ensureNetwork(driver, network);
    } catch (err) {
      if (!(err instanceof ExternalSideEffectError)) {
        throw err;
      }
      runtimeLogger.error({ err, app: options.app.name, network }, 'Network creation failed, detaching it from the stack');
      failedNetworks.push(network);
    }
  }

  const result: GenerationResult =
    failedNetworks.length > 0
      ? { ...generated, descriptor: detachNetworks(generated.descriptor, failedNetworks) }
      : generated;

  return {
    result,
    composeYaml: serializeCompose(result.descriptor),
    envFile: result.envFile,
    hookContext: buildHookContext(options.app, result),
    failedNetworks,
  };
}
