import type { ApiCommand, ApiRole, ApiService, ConfigMap, ControlPlaneClient } from '../api/types.js';
import type { HostDirectory } from '../cluster/hosts.js';
import { ConfigurationError, ControlPlaneRequestError } from '../lib/errors.js';
import type { ServiceConfig } from '../runner/topology.js';
import type { RoleAssignment, ServiceKind } from './types.js';

// Directory creation and similar quick bootstrap commands.
export const SETUP_COMMAND_TIMEOUT_SECONDS = 60;
// Schema and database bootstrap commands.
export const SCHEMA_COMMAND_TIMEOUT_SECONDS = 300;

export interface ServiceContext {
  api: ControlPlaneClient;
  cluster: string;
  hosts: HostDirectory;
}

/**
 * One service of one cluster, deployed through the shared protocol.
 *
 * Every step probes the manager before it creates anything, so `deploy` can be repeated
 * after a partial run.
 */
export class ClusterService {
  readonly name: string;
  readonly type: string;
  private entity: ApiService | null = null;

  constructor(
    private readonly ctx: ServiceContext,
    readonly kind: ServiceKind,
    readonly config: ServiceConfig,
  ) {
    this.name = kind.name.toUpperCase();
    this.type = config.type ?? this.name;
  }

  get api(): ControlPlaneClient {
    return this.ctx.api;
  }

  get cluster(): string {
    return this.ctx.cluster;
  }

  async deploy(): Promise<void> {
    if (this.kind.deploy) {
      await this.kind.deploy(this);
      return;
    }
    await this.deployRoles();
  }

  async preStart(): Promise<void> {
    await this.kind.preStart?.(this);
  }

  async postStart(): Promise<void> {
    await this.kind.postStart?.(this);
  }

  // The shared deploy step: service config, role-group configs, then one role per host.
  async deployRoles(): Promise<void> {
    this.log('Deploying service');
    const roles = this.roleAssignments();

    if (await this.started()) {
      this.log('Service already started, skipping deployment');
      return;
    }

    await this.api.updateServiceConfig(this.cluster, this.name, this.config.config ?? {});

    for (const role of roles) {
      if (!this.kind.roleTypes.includes(role.group)) {
        console.warn(`[${this.name}] Role group ${role.group} is not one of ${this.kind.roleTypes.join(', ')}`);
      }
      await this.api.updateRoleConfigGroup(this.cluster, this.name, this.roleGroupName(role.group), role.config);
      await this.createRoles(role);
    }
  }

  async createRoles(role: RoleAssignment): Promise<void> {
    if (this.kind.createRoles) {
      await this.kind.createRoles(this, role);
      return;
    }
    for (const [index, host] of role.hosts.entries()) {
      await this.ensureRole(role.group, index + 1, host);
    }
  }

  /**
   * Validated role entries. Throws before anything is sent to the manager when a role
   * lacks a group or hosts, or when no roles are configured at all.
   */
  roleAssignments(): RoleAssignment[] {
    return validateRoles(this.name, this.config);
  }

  async service(): Promise<ApiService> {
    if (this.entity) {
      return this.entity;
    }

    const existing = await this.api.findService(this.cluster, this.name);
    if (existing) {
      this.entity = existing;
    } else {
      this.log(`Creating service of type ${this.type}`);
      this.entity = await this.api.createService(this.cluster, this.name, this.type);
    }
    return this.entity;
  }

  async started(): Promise<boolean> {
    const service = await this.service();
    return service.serviceState === 'STARTED';
  }

  roleName(group: string, ordinal: number): string {
    return `${this.name}-${group}-${ordinal}`;
  }

  roleGroupName(group: string): string {
    return `${this.name}-${group}-BASE`;
  }

  // Looks the role up by its deterministic name and creates it on `host` when missing.
  async ensureRole(group: string, ordinal: number, host: string): Promise<ApiRole> {
    const name = this.roleName(group, ordinal);
    const existing = await this.api.findRole(this.cluster, this.name, name);
    if (existing) {
      return existing;
    }

    this.log(`Creating role ${name} on ${host}`);
    return this.api.createRole(this.cluster, this.name, {
      name,
      type: group,
      hostId: this.ctx.hosts.resolve(host),
    });
  }

  async updateRoleConfig(role: string, config: ConfigMap): Promise<void> {
    await this.api.updateRoleConfig(this.cluster, this.name, role, config);
  }

  /**
   * Issues a best-effort bootstrap command and waits for it.
   *
   * A failed or timed-out command is logged and reported as `false`; the run carries on
   * since these commands may already have been applied by an earlier run.
   */
  async runCommand(command: string, timeoutSeconds: number): Promise<boolean> {
    let issued: ApiCommand;
    try {
      issued = await this.api.runServiceCommand(this.cluster, this.name, command);
    } catch (err) {
      return this.rejected(command, err);
    }
    const finished = await this.api.waitCommand(issued, timeoutSeconds);
    return this.report(command, finished, timeoutSeconds);
  }

  // Same as runCommand, for commands addressed to individual roles.
  async runRoleCommand(command: string, roles: string[], timeoutSeconds: number): Promise<boolean> {
    let issued: ApiCommand[];
    try {
      issued = await this.api.runRoleCommand(this.cluster, this.name, command, roles);
    } catch (err) {
      return this.rejected(command, err);
    }

    let allSucceeded = true;
    for (const cmd of issued) {
      const finished = await this.api.waitCommand(cmd, timeoutSeconds);
      if (!this.report(command, finished, timeoutSeconds)) {
        allSucceeded = false;
      }
    }
    return allSucceeded;
  }

  log(message: string): void {
    console.log(`[${this.name}] ${message}`);
  }

  private report(command: string, result: ApiCommand, timeoutSeconds: number): boolean {
    if (result.success) {
      return true;
    }
    const reason = result.active
      ? `still running after ${timeoutSeconds}s`
      : result.resultMessage ?? 'no result message';
    console.warn(`[${this.name}] Command ${command} failed, continuing with setup. ${reason}`);
    return false;
  }

  // The manager answers 4xx when a bootstrap command does not apply (anymore); anything else is fatal.
  private rejected(command: string, err: unknown): boolean {
    if (err instanceof ControlPlaneRequestError && err.status !== undefined && err.status >= 400 && err.status < 500) {
      console.warn(`[${this.name}] Command ${command} was rejected, continuing with setup. ${err.message}`);
      return false;
    }
    throw err;
  }
}

export function validateRoles(owner: string, config: ServiceConfig): RoleAssignment[] {
  const roles = config.roles ?? [];
  if (roles.length === 0) {
    throw new ConfigurationError(`[${owner}] At least one role should be specified per service`);
  }

  return roles.map(role => {
    if (!role.group || !role.hosts || role.hosts.length === 0) {
      throw new ConfigurationError(`[${owner}] group and hosts should be specified per role`);
    }
    return { group: role.group, hosts: role.hosts, config: role.config ?? {} };
  });
}
