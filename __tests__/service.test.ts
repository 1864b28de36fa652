import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HostDirectory } from '../src/cluster/hosts.js';
import { ConfigurationError, ControlPlaneRequestError } from '../src/lib/errors.js';
import type { ServiceConfig } from '../src/runner/topology.js';
import { ClusterService, type ServiceContext, type ServiceKind } from '../src/services/index.js';
import { yarn } from '../src/services/kinds/yarn.js';
import { FakeControlPlane } from './helpers/fake-control-plane.js';

const CLUSTER = 'analytics';
const HOSTS = ['node1.example.test', 'node2.example.test', 'node3.example.test'];

const YARN_CONFIG: ServiceConfig = {
  config: { yarn_service_mapred_safety_valve: '' },
  roles: [
    { group: 'RESOURCEMANAGER', hosts: ['node1.example.test'] },
    { group: 'NODEMANAGER', hosts: ['node2.example.test', 'node3.example.test'], config: { yarn_nodemanager_resource_memory_mb: 4096 } },
  ],
};

async function clusterContext(): Promise<{ fake: FakeControlPlane; ctx: ServiceContext }> {
  const fake = new FakeControlPlane(HOSTS);
  await fake.createCluster({ name: CLUSTER, version: 'CDH5' });
  fake.calls.splice(0);
  return { fake, ctx: { api: fake, cluster: CLUSTER, hosts: new HostDirectory(fake.hosts) } };
}

describe('ClusterService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('derives the entity name and type from the kind', async () => {
    const { ctx } = await clusterContext();

    const plain = new ClusterService(ctx, yarn, YARN_CONFIG);
    const typed = new ClusterService(ctx, yarn, { ...YARN_CONFIG, type: 'YARN_CUSTOM' });

    expect(plain.name).toBe('YARN');
    expect(plain.type).toBe('YARN');
    expect(typed.type).toBe('YARN_CUSTOM');
    expect(plain.roleName('NODEMANAGER', 2)).toBe('YARN-NODEMANAGER-2');
    expect(plain.roleGroupName('NODEMANAGER')).toBe('YARN-NODEMANAGER-BASE');
  });

  describe('deploy', () => {
    it('creates the service, configures it and places one role per host', async () => {
      const { fake, ctx } = await clusterContext();

      await new ClusterService(ctx, yarn, YARN_CONFIG).deploy();

      expect(fake.calls).toEqual([
        'findService YARN',
        'createService YARN YARN',
        'updateServiceConfig YARN',
        'updateRoleConfigGroup YARN-RESOURCEMANAGER-BASE',
        'findRole YARN-RESOURCEMANAGER-1',
        'createRole YARN-RESOURCEMANAGER-1 RESOURCEMANAGER id-1',
        'updateRoleConfigGroup YARN-NODEMANAGER-BASE',
        'findRole YARN-NODEMANAGER-1',
        'createRole YARN-NODEMANAGER-1 NODEMANAGER id-2',
        'findRole YARN-NODEMANAGER-2',
        'createRole YARN-NODEMANAGER-2 NODEMANAGER id-3',
      ]);
      const created = fake.service(CLUSTER, 'YARN');
      expect(created?.config).toEqual({ yarn_service_mapred_safety_valve: '' });
      expect(created?.roleGroups.get('YARN-NODEMANAGER-BASE')).toEqual({ yarn_nodemanager_resource_memory_mb: 4096 });
      expect(created?.roleGroups.get('YARN-RESOURCEMANAGER-BASE')).toEqual({});
    });

    it('can be repeated without creating anything twice', async () => {
      const { fake, ctx } = await clusterContext();
      await new ClusterService(ctx, yarn, YARN_CONFIG).deploy();
      fake.calls.splice(0);

      await new ClusterService(ctx, yarn, YARN_CONFIG).deploy();

      expect(fake.callsMatching('create')).toEqual([]);
      expect(fake.callsMatching('findRole')).toEqual([
        'findRole YARN-RESOURCEMANAGER-1',
        'findRole YARN-NODEMANAGER-1',
        'findRole YARN-NODEMANAGER-2',
      ]);
      expect(fake.service(CLUSTER, 'YARN')?.roles.size).toBe(3);
    });

    it('leaves a started service untouched', async () => {
      const { fake, ctx } = await clusterContext();
      await new ClusterService(ctx, yarn, YARN_CONFIG).deploy();
      const existing = fake.service(CLUSTER, 'YARN');
      if (existing) existing.entity.serviceState = 'STARTED';
      fake.calls.splice(0);

      await new ClusterService(ctx, yarn, YARN_CONFIG).deploy();

      expect(fake.calls).toEqual(['findService YARN']);
    });

    it('rejects a service without roles before contacting the manager', async () => {
      const { fake, ctx } = await clusterContext();

      await expect(new ClusterService(ctx, yarn, { config: {} }).deploy()).rejects.toThrow(
        new ConfigurationError('[YARN] At least one role should be specified per service'),
      );
      expect(fake.calls).toEqual([]);
    });

    it('rejects a role without hosts before contacting the manager', async () => {
      const { fake, ctx } = await clusterContext();
      const config: ServiceConfig = {
        roles: [{ group: 'RESOURCEMANAGER', hosts: ['node1.example.test'] }, { group: 'NODEMANAGER' }],
      };

      await expect(new ClusterService(ctx, yarn, config).deploy()).rejects.toThrow(
        new ConfigurationError('[YARN] group and hosts should be specified per role'),
      );
      expect(fake.calls).toEqual([]);
    });

    it('fails on a host the manager does not know', async () => {
      const { ctx } = await clusterContext();
      const config: ServiceConfig = { roles: [{ group: 'RESOURCEMANAGER', hosts: ['node9.example.test'] }] };

      await expect(new ClusterService(ctx, yarn, config).deploy()).rejects.toThrow(
        new ConfigurationError('Host node9.example.test is not registered with the manager'),
      );
    });

    it('accepts host ids in place of hostnames', async () => {
      const { fake, ctx } = await clusterContext();
      const config: ServiceConfig = { roles: [{ group: 'RESOURCEMANAGER', hosts: ['id-3'] }] };

      await new ClusterService(ctx, yarn, config).deploy();

      expect(fake.callsMatching('createRole')).toEqual(['createRole YARN-RESOURCEMANAGER-1 RESOURCEMANAGER id-3']);
    });

    it('warns about role groups the kind does not list but deploys them', async () => {
      const { fake, ctx } = await clusterContext();
      const config: ServiceConfig = { roles: [{ group: 'TIMELINESERVER', hosts: ['node1.example.test'] }] };

      await new ClusterService(ctx, yarn, config).deploy();

      expect(console.warn).toHaveBeenCalledWith(
        '[YARN] Role group TIMELINESERVER is not one of RESOURCEMANAGER, JOBHISTORY, NODEMANAGER, GATEWAY',
      );
      expect(fake.callsMatching('createRole')).toEqual(['createRole YARN-TIMELINESERVER-1 TIMELINESERVER id-1']);
    });

    it('hands deployment to a kind that brings its own', async () => {
      const { fake, ctx } = await clusterContext();
      const deploy = vi.fn(async () => {});
      const custom: ServiceKind = { name: 'Custom', description: 'test kind', roleTypes: [], deploy };

      const service = new ClusterService(ctx, custom, {});
      await service.deploy();

      expect(deploy).toHaveBeenCalledWith(service);
      expect(fake.calls).toEqual([]);
    });
  });

  describe('bootstrap commands', () => {
    async function deployedHdfs(): Promise<{ fake: FakeControlPlane; service: ClusterService }> {
      const { fake, ctx } = await clusterContext();
      await fake.createService(CLUSTER, 'HDFS', 'HDFS');
      fake.calls.splice(0);
      const service = new ClusterService(ctx, { name: 'Hdfs', description: 'test kind', roleTypes: [] }, {});
      return { fake, service };
    }

    it('waits for a command with the given timeout', async () => {
      const { fake, service } = await deployedHdfs();

      await expect(service.runCommand('hdfsCreateTmpDir', 60)).resolves.toBe(true);

      expect(fake.calls).toEqual(['serviceCommand HDFS hdfsCreateTmpDir', 'wait hdfsCreateTmpDir 60']);
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('logs a failed command and carries on', async () => {
      const { fake, service } = await deployedHdfs();
      fake.commandOutcomes.set('hdfsCreateTmpDir', { success: false, resultMessage: 'Directory /tmp already exists' });

      await expect(service.runCommand('hdfsCreateTmpDir', 60)).resolves.toBe(false);

      expect(console.warn).toHaveBeenCalledWith(
        '[HDFS] Command hdfsCreateTmpDir failed, continuing with setup. Directory /tmp already exists',
      );
    });

    it('logs a command that is still running at the timeout', async () => {
      const { fake, service } = await deployedHdfs();
      fake.commandOutcomes.set('hdfsCreateTmpDir', { active: true });

      await expect(service.runCommand('hdfsCreateTmpDir', 60)).resolves.toBe(false);

      expect(console.warn).toHaveBeenCalledWith(
        '[HDFS] Command hdfsCreateTmpDir failed, continuing with setup. still running after 60s',
      );
    });

    it('carries on when the manager rejects the command', async () => {
      const { fake, service } = await deployedHdfs();
      vi.spyOn(fake, 'runServiceCommand').mockRejectedValue(
        new ControlPlaneRequestError('POST /clusters/analytics/services/HDFS/commands/hdfsCreateTmpDir failed (400)', {
          method: 'POST',
          path: '/clusters/analytics/services/HDFS/commands/hdfsCreateTmpDir',
          status: 400,
          transient: false,
        }),
      );

      await expect(service.runCommand('hdfsCreateTmpDir', 60)).resolves.toBe(false);

      expect(console.warn).toHaveBeenCalledWith(
        '[HDFS] Command hdfsCreateTmpDir was rejected, continuing with setup. POST /clusters/analytics/services/HDFS/commands/hdfsCreateTmpDir failed (400)',
      );
    });

    it('propagates other failures to issue a command', async () => {
      const { fake, service } = await deployedHdfs();
      const unavailable = new ControlPlaneRequestError('POST /x failed (503)', {
        method: 'POST',
        path: '/x',
        status: 503,
        transient: true,
      });
      vi.spyOn(fake, 'runServiceCommand').mockRejectedValue(unavailable);

      await expect(service.runCommand('hdfsCreateTmpDir', 60)).rejects.toBe(unavailable);
    });

    it('waits for every command a role command fans out to', async () => {
      const { fake, service } = await deployedHdfs();
      fake.commandOutcomes.set('hdfsFormat', { success: false, resultMessage: 'Already formatted' });

      const ok = await service.runRoleCommand('hdfsFormat', ['HDFS-NAMENODE-1', 'HDFS-NAMENODE-2'], 60);

      expect(ok).toBe(false);
      expect(fake.calls).toEqual([
        'roleCommand HDFS hdfsFormat HDFS-NAMENODE-1,HDFS-NAMENODE-2',
        'wait hdfsFormat 60',
        'wait hdfsFormat 60',
      ]);
      expect(console.warn).toHaveBeenCalledTimes(2);
    });
  });
});
