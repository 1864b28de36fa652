import type { ServiceKind } from '../types.js';
import { SETUP_COMMAND_TIMEOUT_SECONDS } from '../service.js';

export const zookeeper: ServiceKind = {
  name: 'Zookeeper',
  description: 'Coordination ensemble',
  roleTypes: ['SERVER'],

  // Ensemble members need a unique serverId; the role ordinal is used for it.
  async createRoles(service, role) {
    for (const [index, host] of role.hosts.entries()) {
      const ordinal = index + 1;
      const created = await service.ensureRole(role.group, ordinal, host);
      await service.updateRoleConfig(created.name, { serverId: ordinal });
    }
  },

  // Fails harmlessly when the ensemble was initialised by an earlier run.
  async preStart(service) {
    service.log('Initializing Zookeeper');
    await service.runCommand('zooKeeperInit', SETUP_COMMAND_TIMEOUT_SECONDS);
  },
};
