import type { ServiceKind } from '../types.js';

export const flume: ServiceKind = {
  name: 'Flume',
  description: 'Event collector',
  roleTypes: ['AGENT'],
};
