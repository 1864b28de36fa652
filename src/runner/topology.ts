import type { ConfigMap } from '../api/types.js';
import type { PollSettings } from '../lib/retry.js';

export interface ManagerConnection {
  host: string;
  port: number;
  tls: boolean;
  username: string;
  password: string;
  apiVersion: number;
}

export interface ClusterSpec {
  name: string;
  version: string;
  fullVersion: string;
  hosts: string[];
}

export interface ParcelSpec {
  product: string;
  version: string;
  repo?: string;
}

// Group and hosts are checked by the deploying service, not by the loader.
export interface RoleSpec {
  group?: string;
  hosts?: string[];
  config?: ConfigMap;
}

export interface ServiceConfig {
  type?: string;
  config?: ConfigMap;
  roles?: RoleSpec[];
}

export interface SetupSettings {
  parcelPoll: PollSettings;
  repoPoll: PollSettings;
  inspectPoll: PollSettings;
  clusterCommandTimeoutSeconds: number;
}

export interface ClusterTopology {
  cm: ManagerConnection;
  cluster: ClusterSpec;
  parcel: ParcelSpec;
  services: Record<string, ServiceConfig>;
  settings: SetupSettings;
}

export const MGMT_SERVICE_KEY = 'MGMT';
