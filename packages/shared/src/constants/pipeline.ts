import type { GlobalKey, TransformName } from '../types/blueprint.js';
import type { GlobalSettings } from '../types/settings.js';

export const TRANSFORM_NAMES = [
  'port_mapping',
  'port_array',
  'volume_mapping',
  'volume_array',
  'network_config',
  'custom_networks_array',
] as const satisfies readonly TransformName[];

export const GLOBAL_KEYS = ['PUID', 'PGID', 'UMASK', 'TZ', 'USER'] as const satisfies readonly GlobalKey[];

export const ROUTING_BUCKETS = ['service', 'compose', 'metadata', 'env'] as const;

/** Routing path used when a field declares none */
export const DEFAULT_ROUTING_PATH = 'service';

export const IMAGE_TAG_SUFFIX = ':${TAG:-latest}';

export const HOST_PATH_VARIABLE = 'HOST_PATH';

export const DEFAULT_RESTART_POLICY = 'unless-stopped';

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  puid: 1000,
  pgid: 1000,
  umask: '022',
  timezone: 'UTC',
  user: null,
  networkName: 'dockyard_net',
  networkSubnet: '10.21.12.0/26',
  networkGateway: '10.21.12.1',
  stacksPath: '/stacks',
  dataPath: '/app/data',
};
