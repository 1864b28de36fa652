import type { ConfigMap } from '../api/types.js';
import type { ClusterService } from './service.js';

// A role entry from the topology after validation.
export interface RoleAssignment {
  group: string;
  hosts: string[];
  config: ConfigMap;
}

/**
 * Behaviour of one service kind.
 *
 * Every hook is optional; a missing hook falls back to the shared protocol in
 * {@link ClusterService}. The entity name is the upper-cased `name`.
 */
export interface ServiceKind {
  name: string;
  description: string;

  // Role types the kind accepts. Groups outside this list are deployed with a warning.
  roleTypes: string[];

  deploy?(service: ClusterService): Promise<void>;
  createRoles?(service: ClusterService, role: RoleAssignment): Promise<void>;
  preStart?(service: ClusterService): Promise<void>;
  postStart?(service: ClusterService): Promise<void>;
}

export type ServiceRegistry = ReadonlyMap<string, ServiceKind>;
