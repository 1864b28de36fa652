import { z } from 'zod';
import type { ApiCluster, ApiCommand, ApiConfigEntry, ApiHost, ApiParcel, ApiRole, ApiService, ServiceState } from './types.js';

// Response shapes of the manager's REST API, narrowed to the fields this tool reads.

const SERVICE_STATES: readonly ServiceState[] = [
  'STARTED',
  'STARTING',
  'STOPPED',
  'STOPPING',
  'NA',
  'UNKNOWN',
  'HISTORY_NOT_AVAILABLE',
];

function toServiceState(value: string): ServiceState {
  return SERVICE_STATES.find(state => state === value) ?? 'UNKNOWN';
}

export const CommandSchema: z.ZodType<ApiCommand, z.ZodTypeDef, unknown> = z.object({
  id: z.number().int(),
  name: z.string(),
  active: z.boolean(),
  success: z.boolean().optional(),
  resultMessage: z.string().optional(),
});

export const BulkCommandSchema = z.object({
  items: z.array(CommandSchema).default([]),
  errors: z.array(z.string()).default([]),
});

export const ClusterSchema: z.ZodType<ApiCluster, z.ZodTypeDef, unknown> = z.object({
  name: z.string(),
  version: z.string(),
  fullVersion: z.string().optional(),
});

export const ClusterListSchema = z.object({ items: z.array(ClusterSchema) });

export const HostSchema: z.ZodType<ApiHost, z.ZodTypeDef, unknown> = z.object({
  hostId: z.string(),
  hostname: z.string(),
});

export const HostListSchema = z.object({ items: z.array(HostSchema) });

export const HostRefListSchema = z.object({
  items: z.array(z.object({ hostId: z.string() })),
});

export const ParcelSchema: z.ZodType<ApiParcel, z.ZodTypeDef, unknown> = z.object({
  product: z.string(),
  version: z.string(),
  stage: z.string(),
  state: z.object({
    progress: z.number().default(0),
    totalProgress: z.number().default(0),
    errors: z.array(z.string()).default([]),
    warnings: z.array(z.string()).optional(),
  }),
});

export const ConfigListSchema: z.ZodType<{ items: ApiConfigEntry[] }, z.ZodTypeDef, unknown> = z.object({
  items: z.array(z.object({
    name: z.string(),
    value: z.string().optional(),
    default: z.string().optional(),
  })),
});

export const ServiceSchema: z.ZodType<ApiService, z.ZodTypeDef, unknown> = z.object({
  name: z.string(),
  type: z.string(),
  serviceState: z.string().default('UNKNOWN').transform(toServiceState),
});

export const ServiceListSchema = z.object({ items: z.array(ServiceSchema) });

export const RoleSchema: z.ZodType<ApiRole, z.ZodTypeDef, unknown> = z.object({
  name: z.string(),
  type: z.string(),
  hostRef: z.object({ hostId: z.string() }),
}).transform(role => ({ name: role.name, type: role.type, hostId: role.hostRef.hostId }));

export const RoleListSchema = z.object({ items: z.array(RoleSchema) });
