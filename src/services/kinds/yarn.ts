import type { ServiceKind } from '../types.js';

export const yarn: ServiceKind = {
  name: 'Yarn',
  description: 'Resource manager',
  roleTypes: ['RESOURCEMANAGER', 'JOBHISTORY', 'NODEMANAGER', 'GATEWAY'],
};
