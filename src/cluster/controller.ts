import type { ApiCommand, ControlPlaneClient } from '../api/types.js';
import { ConfigurationError, ConvergenceError, RemoteStateError, SetupStageError } from '../lib/errors.js';
import { pollOptions, retry } from '../lib/retry.js';
import { ParcelLifecycle } from '../parcels/parcel-lifecycle.js';
import { ADDITIONAL_SERVICES, BASE_SERVICES, ClusterService, createServiceRegistry } from '../services/index.js';
import type { ServiceRegistry } from '../services/index.js';
import { MGMT_SERVICE_KEY, type ClusterTopology } from '../runner/topology.js';
import { HostDirectory } from './hosts.js';
import { deployMgmtServices } from './mgmt.js';

export const SETUP_STAGES = [
  'createCluster',
  'parcels',
  'inspectHosts',
  'mgmt',
  'baseServices',
  'additionalServices',
  'clientConfig',
] as const;

export type SetupStage = typeof SETUP_STAGES[number];

export interface ClusterControllerOptions {
  registry?: ServiceRegistry;
  baseServices?: string[];
  additionalServices?: string[];
}

export interface SetupResult {
  cluster: string;
  enrolledHosts: string[];
  baseServices: string[];
  additionalServices: string[];
}

/**
 * Brings a cluster up from a topology, start to finish.
 *
 * Assumes the hosts are prepared and the manager is installed with its databases. Every
 * step probes before it creates, so a failed run is resumed by calling `setup()` again.
 */
export class ClusterController {
  private readonly registry: ServiceRegistry;
  private readonly baseServices: string[];
  private readonly additionalServices: string[];
  private hosts: HostDirectory | null = null;

  constructor(
    private readonly api: ControlPlaneClient,
    private readonly topology: ClusterTopology,
    options: ClusterControllerOptions = {},
  ) {
    this.registry = options.registry ?? createServiceRegistry();
    this.baseServices = options.baseServices ?? BASE_SERVICES;
    this.additionalServices = options.additionalServices ?? ADDITIONAL_SERVICES;

    const phased = [...this.baseServices, ...this.additionalServices];
    const unknown = phased.filter(kind => !this.registry.has(kind));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown service kinds: ${unknown.join(', ')}`);
    }

    const knownKeys = new Set([...this.registry.keys()].map(kind => kind.toUpperCase()));
    const configured = Object.keys(topology.services).filter(key => key !== MGMT_SERVICE_KEY);
    const unknownKeys = configured.filter(key => !knownKeys.has(key));
    if (unknownKeys.length > 0) {
      throw new ConfigurationError(`Unknown services in topology: ${unknownKeys.join(', ')}`);
    }

    const phasedKeys = new Set(phased.map(kind => kind.toUpperCase()));
    for (const key of configured) {
      if (!phasedKeys.has(key)) {
        console.warn(`Service ${key} is configured but not part of any phase, skipping`);
      }
    }
  }

  get clusterName(): string {
    return this.topology.cluster.name;
  }

  async setup(): Promise<SetupResult> {
    const enrolledHosts = await this.stage('createCluster', () => this.createCluster());
    await this.stage('parcels', () => this.setupParcels());
    await this.stage('inspectHosts', () => this.waitInspectHosts());
    await this.stage('mgmt', () => this.deployMgmtServices());
    const baseServices = await this.stage('baseServices', () => this.orchestrate(this.baseServices, true));
    const additionalServices = await this.stage('additionalServices', () =>
      this.orchestrate(this.additionalServices, false),
    );
    await this.stage('clientConfig', () => this.deployClientConfig());

    return { cluster: this.clusterName, enrolledHosts, baseServices, additionalServices };
  }

  /**
   * Creates the cluster entity unless one with the same name exists, then enrols the
   * topology hosts that are not members yet. Returns the hosts added by this call.
   */
  async createCluster(): Promise<string[]> {
    const spec = this.topology.cluster;
    const existing = await this.api.findCluster(spec.name);
    if (!existing) {
      console.log(`Creating Cluster entity: ${spec.name}`);
      await this.api.createCluster({ name: spec.name, version: spec.version, fullVersion: spec.fullVersion });
    }

    const directory = await this.hostDirectory(true);
    const members = new Set<string>();
    for (const host of await this.api.listClusterHosts(spec.name)) {
      members.add(host.hostname);
      members.add(host.hostId);
    }

    // Compared by host id, so one machine listed by hostname and by id is enrolled once.
    const missing: string[] = [];
    const missingIds: string[] = [];
    for (const host of spec.hosts) {
      const hostId = directory.resolve(host);
      if (members.has(hostId) || missingIds.includes(hostId)) {
        continue;
      }
      missing.push(host);
      missingIds.push(hostId);
    }
    if (missing.length === 0) {
      console.log(`All ${spec.hosts.length} hosts already belong to ${spec.name}`);
      return [];
    }

    console.log(`Adding hosts to ${spec.name}: ${missing.join(', ')}`);
    await this.api.addClusterHosts(spec.name, missingIds);
    return missing;
  }

  async setupParcels(): Promise<void> {
    const { settings } = this.topology;
    const parcel = await ParcelLifecycle.open(this.api, this.clusterName, this.topology.parcel, {
      stage: settings.parcelPoll,
      repo: settings.repoPoll,
    });
    await parcel.download();
    await parcel.distribute();
    await parcel.activate();
  }

  async waitInspectHosts(): Promise<void> {
    const command = await this.api.inspectHosts();

    await retry(async () => {
      console.log('Inspecting hosts...');
      const current = await this.api.getCommand(command.id);
      if (current.active || current.success === undefined) {
        throw new ConvergenceError(`Waiting on command ${current.name} (${current.id}) to finish`);
      }
      if (!current.success) {
        throw new RemoteStateError(`Host inspection failed: ${current.resultMessage ?? 'no result message'}`);
      }
      console.log(`Host inspection completed: ${current.resultMessage ?? ''}`);
    }, pollOptions(this.topology.settings.inspectPoll));
  }

  async deployMgmtServices(): Promise<void> {
    await deployMgmtServices({
      api: this.api,
      hosts: await this.hostDirectory(),
      config: this.topology.services[MGMT_SERVICE_KEY],
      startTimeoutSeconds: this.topology.settings.clusterCommandTimeoutSeconds,
    });
  }

  /**
   * Deploys and pre-starts each configured kind in order, (re)starts the cluster, then
   * runs the post-start step of every deployed service. Returns the deployed entity names.
   */
  async orchestrate(kinds: string[], stopFirst: boolean): Promise<string[]> {
    const ctx = { api: this.api, cluster: this.clusterName, hosts: await this.hostDirectory() };
    const deployed: ClusterService[] = [];

    for (const kindName of kinds) {
      const config = this.topology.services[kindName.toUpperCase()];
      if (!config) {
        continue;
      }
      const kind = this.registry.get(kindName);
      if (!kind) {
        throw new ConfigurationError(`Unknown service kind: ${kindName}`);
      }

      const service = new ClusterService(ctx, kind, config);
      await service.deploy();
      await service.preStart();
      deployed.push(service);
    }

    console.log(`Starting services: ${kinds.join(', ')} on cluster ${this.clusterName}`);
    if (stopFirst) {
      await this.runClusterCommand('stop', () => this.api.stopCluster(this.clusterName));
    }
    await this.runClusterCommand('start', () => this.api.startCluster(this.clusterName));

    for (const service of deployed) {
      await service.postStart();
    }
    return deployed.map(service => service.name);
  }

  async deployClientConfig(): Promise<void> {
    await this.runClusterCommand('deployClientConfig', () => this.api.deployClientConfig(this.clusterName));
  }

  private async runClusterCommand(label: string, issue: () => Promise<ApiCommand>): Promise<void> {
    const timeout = this.topology.settings.clusterCommandTimeoutSeconds;
    const result = await this.api.waitCommand(await issue(), timeout);
    if (!result.success) {
      const reason = result.active ? `still running after ${timeout}s` : result.resultMessage ?? 'no result message';
      console.warn(`Cluster ${label} did not succeed, continuing. ${reason}`);
    }
  }

  private async hostDirectory(reload = false): Promise<HostDirectory> {
    if (!this.hosts || reload) {
      this.hosts = await HostDirectory.load(this.api);
    }
    return this.hosts;
  }

  private async stage<T>(name: SetupStage, run: () => Promise<T>): Promise<T> {
    const index = SETUP_STAGES.indexOf(name) + 1;
    console.log(`[${index}/${SETUP_STAGES.length}] ${name}`);
    try {
      return await run();
    } catch (err) {
      throw new SetupStageError(name, err);
    }
  }
}
