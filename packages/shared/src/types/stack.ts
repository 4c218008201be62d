import type { JsonObject, JsonValue } from './json.js';

/** Field name → user-supplied value for one app instance. */
export type RawInputs = Record<string, JsonValue>;

export type RoutingBucket = 'service' | 'compose' | 'metadata' | 'env';

export interface RoutedData {
  service: JsonObject;
  compose: JsonObject;
  metadata: JsonObject;
}

export type PortProtocol = 'tcp' | 'udp';

export interface PortConfig {
  target: number;
  published?: number | string;
  protocol: PortProtocol;
  host_ip?: string;
}

export type VolumeType = 'bind' | 'volume' | 'tmpfs';

export interface VolumeMount {
  type: VolumeType;
  source?: string;
  target: string;
  read_only?: boolean;
  bind?: {
    propagation?: string;
    create_host_path?: boolean;
  };
}

export interface ServiceNetworkConfig {
  ipv4_address?: string;
  aliases?: string[];
}

export interface ComposeService {
  image: string;
  container_name?: string;
  restart?: string;
  user?: string;
  environment?: string[];
  ports?: PortConfig[];
  volumes?: VolumeMount[];
  networks?: string[] | Record<string, ServiceNetworkConfig>;
  [key: string]: unknown;
}

export interface StackDescriptor {
  services: Record<string, ComposeService>;
  networks?: Record<string, JsonObject>;
  volumes?: Record<string, JsonObject>;
  secrets?: Record<string, JsonObject>;
  configs?: Record<string, JsonObject>;
  /** Other top-level keys routed through the compose bucket (`name`, `x-*` extensions) */
  [key: string]: unknown;
}

export type CustomNetworkMode = 'create' | 'existing';

export interface CustomNetwork {
  name: string;
  mode: CustomNetworkMode;
}

export interface GenerationResult {
  descriptor: StackDescriptor;
  envFile: string;
  serviceName: string;
  containerName: string;
  metadata: JsonObject;
  /** Networks a transform asked the runtime to create before the stack starts */
  networkRequests: string[];
}

/** Identity bundle handed to app lifecycle hooks */
export interface HookContext {
  appId: number | string;
  appName: string;
  blueprintName: string;
  containerName: string;
  containerIp: string | null;
  metadata: JsonObject;
}
