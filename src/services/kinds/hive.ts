import type { ServiceKind } from '../types.js';
import { SCHEMA_COMMAND_TIMEOUT_SECONDS, SETUP_COMMAND_TIMEOUT_SECONDS } from '../service.js';

export const hive: ServiceKind = {
  name: 'Hive',
  description: 'Warehouse',
  roleTypes: ['HIVEMETASTORE', 'HIVESERVER2', 'WEBHCAT', 'GATEWAY'],

  async preStart(service) {
    await service.runCommand('hiveCreateHiveWarehouse', SETUP_COMMAND_TIMEOUT_SECONDS);
  },

  // The metastore schema can only be created once the metastore database is reachable.
  async postStart(service) {
    await service.runCommand('hiveCreateMetastoreDatabase', SCHEMA_COMMAND_TIMEOUT_SECONDS);
    await service.runCommand('hiveCreateMetastoreDatabaseTables', SCHEMA_COMMAND_TIMEOUT_SECONDS);
  },
};
