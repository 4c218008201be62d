import type { AppIdentity, ComposeService, GenerationResult, HookContext } from '@dockyard/shared';

function firstStaticIp(service: ComposeService | undefined): string | null {
  const networks = service?.networks;
  if (!networks || Array.isArray(networks)) {
    return null;
  }
  for (const settings of Object.values(networks)) {
    if (settings.ipv4_address) {
      return settings.ipv4_address;
    }
  }
  return null;
}

/**
 * Identity bundle passed to lifecycle hooks. Without an explicit container IP,
 * the first static `ipv4_address` of the generated service is used.
 */
export function buildHookContext(
  app: AppIdentity,
  result: Pick<GenerationResult, 'descriptor' | 'serviceName' | 'containerName' | 'metadata'>,
  containerIp?: string | null
): HookContext {
  return {
    appId: app.id,
    appName: app.name,
    blueprintName: app.blueprintName,
    containerName: result.containerName,
    containerIp: containerIp ?? firstStaticIp(result.descriptor.services[result.serviceName]),
    metadata: result.metadata,
  };
}
