export interface GlobalSettings {
  puid: number;
  pgid: number;
  umask: string;
  timezone: string;
  /** Overrides the `<puid>:<pgid>` pair injected for USER fields */
  user?: string | null;
  networkName: string;
  networkSubnet: string;
  networkGateway: string;
  stacksPath: string;
  dataPath: string;
}

/**
 * Identity of one installed app instance.
 * `name` is the unique instance name; it keys the service and the stack directory.
 */
export interface AppIdentity {
  id: number | string;
  name: string;
  blueprintName: string;
  /** Host-side path of the app's stack directory */
  hostPath: string;
}
