import type { ServiceKind } from '../types.js';
import { SCHEMA_COMMAND_TIMEOUT_SECONDS } from '../service.js';

export const sqoop: ServiceKind = {
  name: 'Sqoop',
  description: 'Data transfer service',
  roleTypes: ['SQOOP_SERVER'],

  async preStart(service) {
    await service.runCommand('createSqoopUserDir', SCHEMA_COMMAND_TIMEOUT_SECONDS);
    await service.runCommand('sqoopCreateDatabaseTables', SCHEMA_COMMAND_TIMEOUT_SECONDS);
  },
};
