import { Agent, fetch, type Dispatcher, type Response } from 'undici';
import type { z } from 'zod';
import { ControlPlaneRequestError, errorMessage } from '../lib/errors.js';
import { retry, sleep } from '../lib/retry.js';
import type {
  ApiCluster,
  ApiCommand,
  ApiConfigEntry,
  ApiHost,
  ApiParcel,
  ApiRole,
  ApiService,
  ConfigMap,
  ControlPlaneClient,
  NewRole,
  ParcelCommand,
} from './types.js';
import {
  BulkCommandSchema,
  ClusterListSchema,
  ClusterSchema,
  CommandSchema,
  ConfigListSchema,
  HostListSchema,
  HostRefListSchema,
  ParcelSchema,
  RoleListSchema,
  RoleSchema,
  ServiceListSchema,
  ServiceSchema,
} from './wire.js';

const WAIT_INITIAL_INTERVAL_MS = 1000;
const WAIT_MAX_INTERVAL_MS = 10000;
const BODY_EXCERPT_LENGTH = 500;

export interface HttpControlPlaneClientOptions {
  host: string;
  port: number;
  tls: boolean;
  username: string;
  password: string;
  apiVersion: number;
  // Overrides the connection pool, e.g. with an undici MockAgent.
  dispatcher?: Dispatcher;
}

type RequestOptions = {
  body?: unknown;
  searchParams?: Record<string, string>;
};

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export class HttpControlPlaneClient implements ControlPlaneClient {
  private readonly origin: string;
  private readonly apiRoot: string;
  private readonly authorization: string;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(options: HttpControlPlaneClientOptions) {
    const scheme = options.tls ? 'https' : 'http';
    this.origin = `${scheme}://${options.host}:${options.port}`;
    this.apiRoot = `/api/v${options.apiVersion}`;
    const credentials = Buffer.from(`${options.username}:${options.password}`).toString('base64');
    this.authorization = `Basic ${credentials}`;
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher = options.dispatcher ?? new Agent();
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  async getServerApiVersion(): Promise<string> {
    const response = await this.send('GET', '/api/version', {});
    return (await response.text()).trim();
  }

  // Clusters and hosts

  async findCluster(name: string): Promise<ApiCluster | undefined> {
    return this.lookup(ClusterSchema, `/clusters/${enc(name)}`);
  }

  async createCluster(cluster: ApiCluster): Promise<ApiCluster> {
    const response = await this.request(ClusterListSchema, 'POST', '/clusters', { body: { items: [cluster] } });
    return firstItem(response.items, 'POST', '/clusters');
  }

  async listClusterHosts(cluster: string): Promise<ApiHost[]> {
    const refs = await this.request(HostRefListSchema, 'GET', `/clusters/${enc(cluster)}/hosts`);
    const ids = new Set(refs.items.map(ref => ref.hostId));
    const hosts = await this.listHosts();
    return hosts.filter(host => ids.has(host.hostId));
  }

  async listHosts(): Promise<ApiHost[]> {
    const response = await this.request(HostListSchema, 'GET', '/hosts');
    return response.items;
  }

  async addClusterHosts(cluster: string, hostIds: string[]): Promise<void> {
    await this.send('POST', this.api(`/clusters/${enc(cluster)}/hosts`), {
      body: { items: hostIds.map(hostId => ({ hostId })) },
    });
  }

  async startCluster(cluster: string): Promise<ApiCommand> {
    return this.request(CommandSchema, 'POST', `/clusters/${enc(cluster)}/commands/start`);
  }

  async stopCluster(cluster: string): Promise<ApiCommand> {
    return this.request(CommandSchema, 'POST', `/clusters/${enc(cluster)}/commands/stop`);
  }

  async deployClientConfig(cluster: string): Promise<ApiCommand> {
    return this.request(CommandSchema, 'POST', `/clusters/${enc(cluster)}/commands/deployClientConfig`);
  }

  // Parcels and manager settings

  async findParcel(cluster: string, product: string, version: string): Promise<ApiParcel | undefined> {
    return this.lookup(ParcelSchema, parcelPath(cluster, product, version));
  }

  async runParcelCommand(cluster: string, product: string, version: string, command: ParcelCommand): Promise<void> {
    await this.send('POST', this.api(`${parcelPath(cluster, product, version)}/commands/${command}`), {});
  }

  async getManagerConfig(): Promise<ApiConfigEntry[]> {
    const response = await this.request(ConfigListSchema, 'GET', '/cm/config', { searchParams: { view: 'full' } });
    return response.items;
  }

  async updateManagerConfig(values: Record<string, string>): Promise<void> {
    await this.send('PUT', this.api('/cm/config'), { body: configItems(values) });
  }

  async inspectHosts(): Promise<ApiCommand> {
    return this.request(CommandSchema, 'POST', '/cm/commands/inspectHosts');
  }

  // Commands

  async getCommand(id: number): Promise<ApiCommand> {
    return this.request(CommandSchema, 'GET', `/commands/${id}`);
  }

  async waitCommand(command: ApiCommand, timeoutSeconds: number): Promise<ApiCommand> {
    const deadline = Date.now() + timeoutSeconds * 1000;
    let current = command;
    let interval = WAIT_INITIAL_INTERVAL_MS;

    while (current.active) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return current;
      }
      await sleep(Math.min(interval, remaining));
      // A transiently failed poll is repeated; the command keeps running on the manager.
      current = await retry(() => this.getCommand(command.id), {
        delayMs: WAIT_INITIAL_INTERVAL_MS,
        onRetry: (err, attempt) => {
          console.warn(`Polling command ${command.name} (${command.id}) failed, attempt ${attempt}: ${errorMessage(err)}`);
        },
      });
      interval = Math.min(interval * 2, WAIT_MAX_INTERVAL_MS);
    }

    return current;
  }

  // Cluster services and roles

  async findService(cluster: string, service: string): Promise<ApiService | undefined> {
    return this.lookup(ServiceSchema, servicePath(cluster, service));
  }

  async createService(cluster: string, service: string, type: string): Promise<ApiService> {
    const path = `/clusters/${enc(cluster)}/services`;
    const response = await this.request(ServiceListSchema, 'POST', path, {
      body: { items: [{ name: service, type }] },
    });
    return firstItem(response.items, 'POST', path);
  }

  async updateServiceConfig(cluster: string, service: string, config: ConfigMap): Promise<void> {
    await this.send('PUT', this.api(`${servicePath(cluster, service)}/config`), { body: configItems(config) });
  }

  async updateRoleConfigGroup(cluster: string, service: string, group: string, config: ConfigMap): Promise<void> {
    const path = `${servicePath(cluster, service)}/roleConfigGroups/${enc(group)}/config`;
    await this.send('PUT', this.api(path), { body: configItems(config) });
  }

  async findRole(cluster: string, service: string, role: string): Promise<ApiRole | undefined> {
    return this.lookup(RoleSchema, `${servicePath(cluster, service)}/roles/${enc(role)}`);
  }

  async createRole(cluster: string, service: string, role: NewRole): Promise<ApiRole> {
    const path = `${servicePath(cluster, service)}/roles`;
    const response = await this.request(RoleListSchema, 'POST', path, { body: { items: [roleBody(role)] } });
    return firstItem(response.items, 'POST', path);
  }

  async updateRoleConfig(cluster: string, service: string, role: string, config: ConfigMap): Promise<void> {
    const path = `${servicePath(cluster, service)}/roles/${enc(role)}/config`;
    await this.send('PUT', this.api(path), { body: configItems(config) });
  }

  async runServiceCommand(cluster: string, service: string, command: string): Promise<ApiCommand> {
    return this.request(CommandSchema, 'POST', `${servicePath(cluster, service)}/commands/${enc(command)}`);
  }

  async runRoleCommand(cluster: string, service: string, command: string, roles: string[]): Promise<ApiCommand[]> {
    const path = `${servicePath(cluster, service)}/roleCommands/${enc(command)}`;
    const response = await this.request(BulkCommandSchema, 'POST', path, { body: { items: roles } });
    if (response.errors.length > 0) {
      console.warn(`${command} reported errors: ${response.errors.join('; ')}`);
    }
    return response.items;
  }

  // Management service

  async findMgmtService(): Promise<ApiService | undefined> {
    return this.lookup(ServiceSchema, '/cm/service');
  }

  async createMgmtService(): Promise<ApiService> {
    return this.request(ServiceSchema, 'PUT', '/cm/service', { body: { name: 'mgmt', type: 'MGMT' } });
  }

  async listMgmtRolesByType(type: string): Promise<ApiRole[]> {
    const response = await this.request(RoleListSchema, 'GET', '/cm/service/roles');
    return response.items.filter(role => role.type === type);
  }

  async createMgmtRole(role: NewRole): Promise<ApiRole> {
    const path = '/cm/service/roles';
    const response = await this.request(RoleListSchema, 'POST', path, { body: { items: [roleBody(role)] } });
    return firstItem(response.items, 'POST', path);
  }

  async updateMgmtRoleConfigGroup(group: string, config: ConfigMap): Promise<void> {
    await this.send('PUT', this.api(`/cm/service/roleConfigGroups/${enc(group)}/config`), {
      body: configItems(config),
    });
  }

  async startMgmtService(): Promise<ApiCommand> {
    return this.request(CommandSchema, 'POST', '/cm/service/commands/start');
  }

  // Transport

  private api(path: string): string {
    return `${this.apiRoot}${path}`;
  }

  private async request<T>(schema: Schema<T>, method: string, path: string, options: RequestOptions = {}): Promise<T> {
    const fullPath = this.api(path);
    const response = await this.send(method, fullPath, options);
    return this.parse(schema, await response.json(), method, fullPath);
  }

  private async lookup<T>(schema: Schema<T>, path: string): Promise<T | undefined> {
    const fullPath = this.api(path);
    const response = await this.send('GET', fullPath, {}, true);
    if (response.status === 404) {
      await response.body?.cancel();
      return undefined;
    }
    return this.parse(schema, await response.json(), 'GET', fullPath);
  }

  private parse<T>(schema: Schema<T>, payload: unknown, method: string, path: string): T {
    const result = schema.safeParse(payload);
    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join(', ');
      throw new ControlPlaneRequestError(`Unexpected response from ${method} ${path}: ${issues}`, {
        method,
        path,
        transient: false,
      });
    }
    return result.data;
  }

  private async send(method: string, path: string, options: RequestOptions, allowNotFound = false): Promise<Response> {
    const url = new URL(path, this.origin);
    if (options.searchParams) {
      for (const [key, value] of Object.entries(options.searchParams)) {
        url.searchParams.set(key, value);
      }
    }

    const headers: Record<string, string> = {
      accept: 'application/json',
      authorization: this.authorization,
    };
    let body: string | undefined;
    if (options.body !== undefined) {
      headers['content-type'] = 'application/json';
      body = JSON.stringify(options.body);
    }

    if (process.env.DEBUG_CM_API) {
      console.error(`[DEBUG] ${method} ${url.pathname}${url.search}`);
    }

    let response: Response;
    try {
      response = await fetch(url, { method, body, headers, dispatcher: this.dispatcher });
    } catch (err) {
      throw new ControlPlaneRequestError(`${method} ${path} failed: ${errorMessage(err)}`, {
        method,
        path,
        transient: true,
        cause: err,
      });
    }

    if (response.ok || (allowNotFound && response.status === 404)) {
      return response;
    }

    const details = await readErrorBody(response);
    throw new ControlPlaneRequestError(`${method} ${path} failed (${response.status}): ${details}`, {
      method,
      path,
      status: response.status,
      body: details,
      transient: response.status >= 500,
    });
  }
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text ? text.slice(0, BODY_EXCERPT_LENGTH) : 'no body';
  } catch {
    return 'unavailable';
  }
}

function firstItem<T>(items: T[], method: string, path: string): T {
  const [item] = items;
  if (item === undefined) {
    throw new ControlPlaneRequestError(`${method} ${path} returned no items`, { method, path, transient: false });
  }
  return item;
}

function configItems(config: ConfigMap): { items: Array<{ name: string; value: string }> } {
  return {
    items: Object.entries(config).map(([name, value]) => ({ name, value: String(value) })),
  };
}

function roleBody(role: NewRole): { name: string; type: string; hostRef: { hostId: string } } {
  return { name: role.name, type: role.type, hostRef: { hostId: role.hostId } };
}

function parcelPath(cluster: string, product: string, version: string): string {
  return `/clusters/${enc(cluster)}/parcels/products/${enc(product)}/versions/${enc(version)}`;
}

function servicePath(cluster: string, service: string): string {
  return `/clusters/${enc(cluster)}/services/${enc(service)}`;
}

function enc(segment: string): string {
  return encodeURIComponent(segment);
}
