import type { ServiceKind } from '../types.js';
import { SCHEMA_COMMAND_TIMEOUT_SECONDS } from '../service.js';

export const oozie: ServiceKind = {
  name: 'Oozie',
  description: 'Workflow scheduler',
  roleTypes: ['OOZIE_SERVER'],

  async preStart(service) {
    await service.runCommand('createOozieDb', SCHEMA_COMMAND_TIMEOUT_SECONDS);
    await service.runCommand('installOozieShareLib', SCHEMA_COMMAND_TIMEOUT_SECONDS);
  },
};
