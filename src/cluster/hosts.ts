import type { ApiHost, ControlPlaneClient } from '../api/types.js';
import { ConfigurationError } from '../lib/errors.js';

// Maps the host names used in the topology onto the manager's host ids.
export class HostDirectory {
  private readonly byName = new Map<string, ApiHost>();
  private readonly byId = new Map<string, ApiHost>();

  constructor(hosts: ApiHost[]) {
    for (const host of hosts) {
      this.byName.set(host.hostname, host);
      this.byId.set(host.hostId, host);
    }
  }

  static async load(api: ControlPlaneClient): Promise<HostDirectory> {
    return new HostDirectory(await api.listHosts());
  }

  // Accepts either a hostname or a host id.
  find(host: string): ApiHost | undefined {
    return this.byName.get(host) ?? this.byId.get(host);
  }

  resolve(host: string): string {
    const found = this.find(host);
    if (!found) {
      throw new ConfigurationError(`Host ${host} is not registered with the manager`);
    }
    return found.hostId;
  }
}
