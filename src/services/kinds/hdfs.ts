import type { ServiceKind } from '../types.js';
import { SETUP_COMMAND_TIMEOUT_SECONDS } from '../service.js';

export const hdfs: ServiceKind = {
  name: 'Hdfs',
  description: 'Distributed filesystem',
  roleTypes: ['NAMENODE', 'SECONDARYNAMENODE', 'DATANODE', 'GATEWAY'],

  async preStart(service) {
    service.log('Formatting HDFS Namenode');
    await service.runRoleCommand('hdfsFormat', [service.roleName('NAMENODE', 1)], SETUP_COMMAND_TIMEOUT_SECONDS);
  },

  async postStart(service) {
    await service.runCommand('hdfsCreateTmpDir', SETUP_COMMAND_TIMEOUT_SECONDS);
  },
};
