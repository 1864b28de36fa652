import type { ServiceKind, ServiceRegistry } from './types.js';
import { zookeeper } from './kinds/zookeeper.js';
import { hdfs } from './kinds/hdfs.js';
import { yarn } from './kinds/yarn.js';
import { sparkOnYarn } from './kinds/spark-on-yarn.js';
import { hbase } from './kinds/hbase.js';
import { hive } from './kinds/hive.js';
import { impala } from './kinds/impala.js';
import { flume } from './kinds/flume.js';
import { oozie } from './kinds/oozie.js';
import { sqoop } from './kinds/sqoop.js';

const serviceKinds: ServiceKind[] = [zookeeper, hdfs, yarn, sparkOnYarn, hbase, hive, impala, flume, oozie, sqoop];

// Phases run sequentially. Base services are started before the others are configured,
// since several of those rely on directories the base services create.
export const BASE_SERVICES = ['Zookeeper', 'Hdfs', 'Yarn'];
export const ADDITIONAL_SERVICES = ['Spark_On_Yarn', 'Hbase', 'Hive', 'Impala', 'Flume', 'Oozie', 'Sqoop'];

export function createServiceRegistry(kinds: ServiceKind[] = serviceKinds): ServiceRegistry {
  const registry = new Map<string, ServiceKind>();
  for (const kind of kinds) {
    if (registry.has(kind.name)) {
      throw new Error(`Duplicate service kind: ${kind.name}`);
    }
    registry.set(kind.name, kind);
  }
  return registry;
}

export function getAllServiceKinds(): ServiceKind[] {
  return serviceKinds;
}

export { ClusterService, validateRoles, SETUP_COMMAND_TIMEOUT_SECONDS, SCHEMA_COMMAND_TIMEOUT_SECONDS } from './service.js';
export type { ServiceContext } from './service.js';
export type { ServiceKind, ServiceRegistry, RoleAssignment } from './types.js';
