import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HostDirectory } from '../src/cluster/hosts.js';
import type { ServiceConfig } from '../src/runner/topology.js';
import {
  ADDITIONAL_SERVICES,
  BASE_SERVICES,
  ClusterService,
  createServiceRegistry,
  getAllServiceKinds,
  type ServiceKind,
} from '../src/services/index.js';
import { FakeControlPlane } from './helpers/fake-control-plane.js';

const CLUSTER = 'analytics';
const HOSTS = ['node1.example.test', 'node2.example.test', 'node3.example.test'];

function kind(name: string): ServiceKind {
  const found = createServiceRegistry().get(name);
  if (!found) {
    throw new Error(`no service kind ${name}`);
  }
  return found;
}

async function serviceOf(name: string, config: ServiceConfig = {}): Promise<{ fake: FakeControlPlane; service: ClusterService }> {
  const fake = new FakeControlPlane(HOSTS);
  await fake.createCluster({ name: CLUSTER, version: 'CDH5' });
  const service = new ClusterService(
    { api: fake, cluster: CLUSTER, hosts: new HostDirectory(fake.hosts) },
    kind(name),
    config,
  );
  await service.service();
  fake.calls.splice(0);
  return { fake, service };
}

// Bootstrap commands in issue order, with the timeout each was awaited with.
function waits(fake: FakeControlPlane): string[] {
  return fake.callsMatching('wait ');
}

describe('service kinds', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('registry', () => {
    it('covers every phased service', () => {
      const registry = createServiceRegistry();

      for (const name of [...BASE_SERVICES, ...ADDITIONAL_SERVICES]) {
        expect(registry.has(name)).toBe(true);
      }
      expect(registry.size).toBe(10);
    });

    it('refuses two kinds with the same name', () => {
      const [first] = getAllServiceKinds();

      expect(() => createServiceRegistry([first, { ...first }])).toThrow('Duplicate service kind: Zookeeper');
    });
  });

  describe('Zookeeper', () => {
    it('numbers the ensemble members by role ordinal', async () => {
      const { fake, service } = await serviceOf('Zookeeper', {
        roles: [{ group: 'SERVER', hosts: HOSTS }],
      });

      await service.deploy();

      expect(fake.callsMatching('updateRoleConfig ')).toEqual([
        'updateRoleConfig ZOOKEEPER-SERVER-1 {"serverId":1}',
        'updateRoleConfig ZOOKEEPER-SERVER-2 {"serverId":2}',
        'updateRoleConfig ZOOKEEPER-SERVER-3 {"serverId":3}',
      ]);
      expect(fake.service(CLUSTER, 'ZOOKEEPER')?.roles.get('ZOOKEEPER-SERVER-3')?.config).toEqual({ serverId: 3 });
    });

    it('sets serverId on existing members again on a repeated run', async () => {
      const config: ServiceConfig = { roles: [{ group: 'SERVER', hosts: HOSTS.slice(0, 1) }] };
      const { fake, service } = await serviceOf('Zookeeper', config);
      await service.deploy();
      fake.calls.splice(0);

      await service.deploy();

      expect(fake.callsMatching('createRole')).toEqual([]);
      expect(fake.callsMatching('updateRoleConfig ')).toEqual(['updateRoleConfig ZOOKEEPER-SERVER-1 {"serverId":1}']);
    });

    it('initializes the ensemble before start', async () => {
      const { fake, service } = await serviceOf('Zookeeper');

      await service.preStart();
      await service.postStart();

      expect(fake.calls).toEqual(['serviceCommand ZOOKEEPER zooKeeperInit', 'wait zooKeeperInit 60']);
    });
  });

  describe('Hdfs', () => {
    it('formats the first namenode before start and creates /tmp after', async () => {
      const { fake, service } = await serviceOf('Hdfs');

      await service.preStart();
      await service.postStart();

      expect(fake.calls).toEqual([
        'roleCommand HDFS hdfsFormat HDFS-NAMENODE-1',
        'wait hdfsFormat 60',
        'serviceCommand HDFS hdfsCreateTmpDir',
        'wait hdfsCreateTmpDir 60',
      ]);
    });

    it('continues when the namenode was formatted by an earlier run', async () => {
      const { fake, service } = await serviceOf('Hdfs');
      fake.commandOutcomes.set('hdfsFormat', { success: false, resultMessage: 'Storage directory is not empty' });

      await service.preStart();
      await service.postStart();

      expect(console.warn).toHaveBeenCalledWith(
        '[HDFS] Command hdfsFormat failed, continuing with setup. Storage directory is not empty',
      );
      expect(fake.callsMatching('serviceCommand')).toEqual(['serviceCommand HDFS hdfsCreateTmpDir']);
    });
  });

  it('Yarn has no bootstrap commands', async () => {
    const { fake, service } = await serviceOf('Yarn');

    await service.preStart();
    await service.postStart();

    expect(fake.calls).toEqual([]);
  });

  it('Spark_On_Yarn prepares its directories and jars before start', async () => {
    const { fake, service } = await serviceOf('Spark_On_Yarn');

    await service.preStart();

    expect(service.name).toBe('SPARK_ON_YARN');
    expect(waits(fake)).toEqual([
      'wait CreateSparkUserDirCommand 60',
      'wait CreateSparkHistoryDirCommand 60',
      'wait SparkUploadJarServiceCommand 60',
    ]);
  });

  it('Hbase creates its root directory before start', async () => {
    const { fake, service } = await serviceOf('Hbase');

    await service.preStart();
    await service.postStart();

    expect(waits(fake)).toEqual(['wait hbaseCreateRoot 60']);
  });

  it('Hive creates the warehouse before start and the metastore schema after', async () => {
    const { fake, service } = await serviceOf('Hive');

    await service.preStart();
    expect(waits(fake)).toEqual(['wait hiveCreateHiveWarehouse 60']);

    await service.postStart();
    expect(waits(fake)).toEqual([
      'wait hiveCreateHiveWarehouse 60',
      'wait hiveCreateMetastoreDatabase 300',
      'wait hiveCreateMetastoreDatabaseTables 300',
    ]);
  });

  it('Impala creates its user directory before start', async () => {
    const { fake, service } = await serviceOf('Impala');

    await service.preStart();

    expect(waits(fake)).toEqual(['wait impalaCreateUserDir 60']);
  });

  it('Flume has no bootstrap commands', async () => {
    const { fake, service } = await serviceOf('Flume');

    await service.preStart();
    await service.postStart();

    expect(fake.calls).toEqual([]);
  });

  it('Oozie creates its database and installs the share lib before start', async () => {
    const { fake, service } = await serviceOf('Oozie');

    await service.preStart();

    expect(waits(fake)).toEqual(['wait createOozieDb 300', 'wait installOozieShareLib 300']);
  });

  it('Sqoop creates its user directory and tables before start', async () => {
    const { fake, service } = await serviceOf('Sqoop');

    await service.preStart();

    expect(waits(fake)).toEqual(['wait createSqoopUserDir 300', 'wait sqoopCreateDatabaseTables 300']);
  });
});
