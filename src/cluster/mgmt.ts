import type { ControlPlaneClient } from '../api/types.js';
import { ConfigurationError, RemoteStateError } from '../lib/errors.js';
import { validateRoles } from '../services/service.js';
import type { ServiceConfig } from '../runner/topology.js';
import type { HostDirectory } from './hosts.js';

export interface MgmtDeployment {
  api: ControlPlaneClient;
  hosts: HostDirectory;
  config: ServiceConfig | undefined;
  startTimeoutSeconds: number;
}

/**
 * Creates, configures and starts the manager's own monitoring services.
 *
 * Unlike cluster services, each configured role gets a single instance, placed on the
 * first host listed for it. The layer has to end up started; anything else is fatal.
 */
export async function deployMgmtServices(deployment: MgmtDeployment): Promise<void> {
  const { api, hosts, config } = deployment;
  console.log('[MGMT] Deploying Management Services');

  if (!config) {
    throw new ConfigurationError('[MGMT] services.MGMT is required to deploy the management services');
  }
  const roles = validateRoles('MGMT', config);

  let mgmt = await api.findMgmtService();
  if (mgmt?.serviceState === 'STARTED') {
    console.log('[MGMT] Management Services already started');
    return;
  }
  if (!mgmt) {
    console.warn("[MGMT] Management Services don't exist. Creating...");
    mgmt = await api.createMgmtService();
  }

  for (const role of roles) {
    const existing = await api.listMgmtRolesByType(role.group);
    if (existing.length === 0) {
      console.log(`[MGMT] Creating role for ${role.group}`);
      await api.createMgmtRole({
        name: `${role.group}-1`,
        type: role.group,
        hostId: hosts.resolve(role.hosts[0]),
      });
    }
  }

  for (const role of roles) {
    await api.updateMgmtRoleConfigGroup(`mgmt-${role.group}-BASE`, role.config);
  }

  const command = await api.waitCommand(await api.startMgmtService(), deployment.startTimeoutSeconds);
  const after = await api.findMgmtService();
  if (after?.serviceState !== 'STARTED') {
    const detail = command.resultMessage ? `: ${command.resultMessage}` : '';
    throw new RemoteStateError(`[MGMT] Management services didn't start up properly${detail}`);
  }
  console.log('[MGMT] Management Services started');
}
