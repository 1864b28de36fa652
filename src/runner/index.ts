#!/usr/bin/env node

import { parseArgs } from 'util';
import { HttpControlPlaneClient } from '../api/http-client.js';
import { ClusterController } from '../cluster/controller.js';
import { HostDirectory } from '../cluster/hosts.js';
import { errorMessage } from '../lib/errors.js';
import { loadConfig } from './config.js';
import { failureReport, successReport } from './report.js';
import type { ClusterTopology } from './topology.js';

interface RunContext {
  topology: ClusterTopology;
  client: HttpControlPlaneClient;
  json: boolean;
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      config: { type: 'string', short: 'c', default: 'cluster.yaml' },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(`
Usage: cluster-setup [options] [command]

Options:
  -c, --config <path>       Path to the cluster topology (default: cluster.yaml)
  --json                    Print a JSON result report on stdout
  -h, --help                Show this help message

Commands:
  setup                     Create and start the whole cluster (default)
  check                     Verify the manager is reachable and knows the cluster hosts

Examples:
  npx tsx src/runner/index.ts --config cluster.yaml
  npx tsx src/runner/index.ts --config cluster.yaml check
  npx tsx src/runner/index.ts --json setup
`);
    process.exit(0);
  }

  const configPath = values.config || 'cluster.yaml';
  const [command = 'setup'] = positionals;
  const json = values.json ?? false;

  let topology: ClusterTopology;
  try {
    topology = loadConfig(configPath);
  } catch (err) {
    exitWithFailure(err, json);
  }

  const client = new HttpControlPlaneClient(topology.cm);
  const context: RunContext = { topology, client, json };

  try {
    switch (command) {
      case 'setup':
        await runSetup(context);
        break;

      case 'check':
        await checkManager(context);
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.error('Run with --help for usage information');
        process.exitCode = 1;
    }
  } finally {
    await client.close();
  }
}

async function runSetup(context: RunContext): Promise<void> {
  const controller = new ClusterController(context.client, context.topology);

  try {
    const result = await controller.setup();
    if (context.json) {
      console.log(JSON.stringify(successReport(result)));
    }
    console.error(`Cluster ${result.cluster} is set up.`);
  } catch (err) {
    reportFailure(err, context.json);
    process.exitCode = 1;
  }
}

async function checkManager(context: RunContext): Promise<void> {
  const { cm, cluster } = context.topology;
  console.log(`Checking manager at ${cm.host}:${cm.port}...\n`);

  const version = await context.client.getServerApiVersion();
  console.log(`  ✓ manager reachable, highest API version ${version}`);

  const directory = await HostDirectory.load(context.client);
  let allKnown = true;
  for (const host of cluster.hosts) {
    const known = directory.find(host);
    if (!known) allKnown = false;
    console.log(`  ${known ? '✓' : '✗'} ${host}: ${known ? `registered as ${known.hostId}` : 'not registered'}`);
  }

  console.log('');
  if (allKnown) {
    console.log('All hosts are registered with the manager.');
  } else {
    console.log('Some hosts are not registered with the manager.');
    process.exitCode = 1;
  }
}

function reportFailure(err: unknown, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(failureReport(err)));
  }
  console.error('Error:', errorMessage(err));
}

function exitWithFailure(err: unknown, json: boolean): never {
  reportFailure(err, json);
  process.exit(1);
}

main().catch((err) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
