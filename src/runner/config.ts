import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import type { ClusterTopology } from './topology.js';

const ConfigValueSchema = z.union([z.string(), z.number(), z.boolean()]);
const ConfigMapSchema = z.record(ConfigValueSchema);

const ManagerConnectionSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive().default(7180),
  tls: z.boolean().default(false),
  username: z.string().min(1),
  password: z.string(),
  apiVersion: z.number().int().positive().default(10),
});

const ClusterSpecSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  fullVersion: z.string().min(1),
  hosts: z.array(z.string().min(1)).min(1),
});

const ParcelSpecSchema = z.object({
  product: z.string().min(1).default('CDH'),
  version: z.string().min(1),
  repo: z.string().url().optional(),
});

const RoleSpecSchema = z.object({
  group: z.string().optional(),
  hosts: z.array(z.string()).optional(),
  config: ConfigMapSchema.optional(),
});

const ServiceConfigSchema = z.object({
  type: z.string().min(1).optional(),
  config: ConfigMapSchema.optional(),
  roles: z.array(RoleSpecSchema).optional(),
});

const PollSettingsSchema = (attempts: number, delaySeconds: number) => z.object({
  attempts: z.number().int().positive().default(attempts),
  delaySeconds: z.number().nonnegative().default(delaySeconds),
}).default({});

const SetupSettingsSchema = z.object({
  parcelPoll: PollSettingsSchema(20, 30),
  repoPoll: PollSettingsSchema(20, 30),
  inspectPoll: PollSettingsSchema(20, 5),
  clusterCommandTimeoutSeconds: z.number().positive().default(1800),
}).default({});

// `bundle` is accepted as an alias of `parcel`.
const ClusterTopologySchema = z.preprocess(
  raw => {
    if (raw && typeof raw === 'object' && !('parcel' in raw) && 'bundle' in raw) {
      const { bundle, ...rest } = raw;
      return { ...rest, parcel: bundle };
    }
    return raw;
  },
  z.object({
    cm: ManagerConnectionSchema,
    cluster: ClusterSpecSchema,
    parcel: ParcelSpecSchema,
    services: z.record(ServiceConfigSchema).default({}),
    settings: SetupSettingsSchema,
  }),
);

export function parseTopology(raw: unknown): ClusterTopology {
  const result = ClusterTopologySchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid config:\n${errors}`);
  }

  return result.data;
}

export function loadConfig(configPath: string): ClusterTopology {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  return parseTopology(yaml.parse(content));
}
