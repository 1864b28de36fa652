import type { ServiceKind } from '../types.js';
import { SETUP_COMMAND_TIMEOUT_SECONDS } from '../service.js';

export const impala: ServiceKind = {
  name: 'Impala',
  description: 'Query engine',
  roleTypes: ['STATESTORE', 'CATALOGSERVER', 'IMPALAD'],

  async preStart(service) {
    await service.runCommand('impalaCreateUserDir', SETUP_COMMAND_TIMEOUT_SECONDS);
  },
};
