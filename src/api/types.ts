export type ConfigValue = string | number | boolean;
export type ConfigMap = Record<string, ConfigValue>;

export interface ApiCommand {
  id: number;
  name: string;
  active: boolean;
  // Unset while the command is still running.
  success?: boolean;
  resultMessage?: string;
}

export interface ApiCluster {
  name: string;
  version: string;
  fullVersion?: string;
}

export interface ApiHost {
  hostId: string;
  hostname: string;
}

export const PARCEL_STAGES = [
  'UNAVAILABLE',
  'AVAILABLE_REMOTELY',
  'DOWNLOADING',
  'DOWNLOADED',
  'DISTRIBUTING',
  'DISTRIBUTED',
  'ACTIVATING',
  'ACTIVATED',
  'INUSE',
] as const;

export type ParcelStage = typeof PARCEL_STAGES[number];

export interface ApiParcelState {
  progress: number;
  totalProgress: number;
  errors: string[];
  warnings?: string[];
}

export interface ApiParcel {
  product: string;
  version: string;
  // Kept as the raw string: the manager may report stages this tool never waits for.
  stage: string;
  state: ApiParcelState;
}

export type ParcelCommand = 'startDownload' | 'startDistribution' | 'activate';

export interface ApiConfigEntry {
  name: string;
  value?: string;
  default?: string;
}

export type ServiceState = 'STARTED' | 'STARTING' | 'STOPPED' | 'STOPPING' | 'NA' | 'UNKNOWN' | 'HISTORY_NOT_AVAILABLE';

export interface ApiService {
  name: string;
  type: string;
  serviceState: ServiceState;
}

export interface ApiRole {
  name: string;
  type: string;
  hostId: string;
}

export interface NewRole {
  name: string;
  type: string;
  hostId: string;
}

/**
 * The slice of the manager's API this tool drives.
 *
 * Lookups return `undefined` when the entity does not exist; only real failures reject.
 */
export interface ControlPlaneClient {
  getServerApiVersion(): Promise<string>;

  findCluster(name: string): Promise<ApiCluster | undefined>;
  createCluster(cluster: ApiCluster): Promise<ApiCluster>;
  listClusterHosts(cluster: string): Promise<ApiHost[]>;
  listHosts(): Promise<ApiHost[]>;
  addClusterHosts(cluster: string, hostIds: string[]): Promise<void>;
  startCluster(cluster: string): Promise<ApiCommand>;
  stopCluster(cluster: string): Promise<ApiCommand>;
  deployClientConfig(cluster: string): Promise<ApiCommand>;

  findParcel(cluster: string, product: string, version: string): Promise<ApiParcel | undefined>;
  runParcelCommand(cluster: string, product: string, version: string, command: ParcelCommand): Promise<void>;

  getManagerConfig(): Promise<ApiConfigEntry[]>;
  updateManagerConfig(values: Record<string, string>): Promise<void>;
  inspectHosts(): Promise<ApiCommand>;

  getCommand(id: number): Promise<ApiCommand>;
  // Resolves with the last observed state once the command finishes or the timeout elapses.
  waitCommand(command: ApiCommand, timeoutSeconds: number): Promise<ApiCommand>;

  findService(cluster: string, service: string): Promise<ApiService | undefined>;
  createService(cluster: string, service: string, type: string): Promise<ApiService>;
  updateServiceConfig(cluster: string, service: string, config: ConfigMap): Promise<void>;
  updateRoleConfigGroup(cluster: string, service: string, group: string, config: ConfigMap): Promise<void>;
  findRole(cluster: string, service: string, role: string): Promise<ApiRole | undefined>;
  createRole(cluster: string, service: string, role: NewRole): Promise<ApiRole>;
  updateRoleConfig(cluster: string, service: string, role: string, config: ConfigMap): Promise<void>;
  runServiceCommand(cluster: string, service: string, command: string): Promise<ApiCommand>;
  runRoleCommand(cluster: string, service: string, command: string, roles: string[]): Promise<ApiCommand[]>;

  findMgmtService(): Promise<ApiService | undefined>;
  createMgmtService(): Promise<ApiService>;
  listMgmtRolesByType(type: string): Promise<ApiRole[]>;
  createMgmtRole(role: NewRole): Promise<ApiRole>;
  updateMgmtRoleConfigGroup(group: string, config: ConfigMap): Promise<void>;
  startMgmtService(): Promise<ApiCommand>;
}
