import type { ServiceKind } from '../types.js';
import { SETUP_COMMAND_TIMEOUT_SECONDS } from '../service.js';

export const hbase: ServiceKind = {
  name: 'Hbase',
  description: 'Column store',
  roleTypes: ['MASTER', 'REGIONSERVER', 'HBASETHRIFTSERVER', 'HBASERESTSERVER', 'GATEWAY'],

  async preStart(service) {
    await service.runCommand('hbaseCreateRoot', SETUP_COMMAND_TIMEOUT_SECONDS);
  },
};
