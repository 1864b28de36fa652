import type { ApiParcel, ControlPlaneClient, ParcelCommand, ParcelStage } from '../api/types.js';
import { ConfigurationError, ConvergenceError, RemoteStateError } from '../lib/errors.js';
import { pollOptions, retry, type PollSettings } from '../lib/retry.js';
import type { ParcelSpec } from '../runner/topology.js';

export const REMOTE_PARCEL_REPO_URLS = 'REMOTE_PARCEL_REPO_URLS';

// Every stage at or past a phase's target counts as done, so a re-run after a partial run passes.
export const DOWNLOADED_STAGES: readonly ParcelStage[] = ['DOWNLOADED', 'DISTRIBUTED', 'ACTIVATED', 'INUSE'];
export const DISTRIBUTED_STAGES: readonly ParcelStage[] = ['DISTRIBUTED', 'ACTIVATED', 'INUSE'];
export const ACTIVATED_STAGES: readonly ParcelStage[] = ['ACTIVATED', 'INUSE'];

export interface ParcelPolling {
  stage: PollSettings;
  repo: PollSettings;
}

/**
 * Moves one parcel through download, distribution and activation on a cluster.
 *
 * Use {@link ParcelLifecycle.open}; it checks that the manager can see the parcel and, when a
 * repository URL is configured, registers that repository first if needed.
 */
export class ParcelLifecycle {
  private constructor(
    private readonly api: ControlPlaneClient,
    private readonly cluster: string,
    private readonly spec: ParcelSpec,
    private readonly polling: ParcelPolling,
  ) {}

  static async open(
    api: ControlPlaneClient,
    cluster: string,
    spec: ParcelSpec,
    polling: ParcelPolling,
  ): Promise<ParcelLifecycle> {
    const lifecycle = new ParcelLifecycle(api, cluster, spec, polling);
    await lifecycle.validate();
    return lifecycle;
  }

  get label(): string {
    return `${this.spec.product}-${this.spec.version}`;
  }

  async validate(): Promise<void> {
    const parcel = await this.fetch();
    if (parcel) {
      this.checkErrors(parcel);
      return;
    }

    if (!this.spec.repo) {
      throw new ConfigurationError(
        `None of the existing repos contain parcel ${this.label}. Please specify a parcel repo.`,
      );
    }

    await this.addRepository(this.spec.repo);

    const resolved = await retry(async () => {
      const candidate = await this.fetch();
      if (!candidate) {
        throw new ConvergenceError(`Waiting on parcel ${this.label} to appear in ${this.spec.repo}`);
      }
      return candidate;
    }, pollOptions(this.polling.repo));
    this.checkErrors(resolved);
  }

  async download(): Promise<void> {
    await this.advance('startDownload', DOWNLOADED_STAGES);
  }

  async distribute(): Promise<void> {
    await this.advance('startDistribution', DISTRIBUTED_STAGES);
  }

  async activate(): Promise<void> {
    await this.advance('activate', ACTIVATED_STAGES);
  }

  /**
   * Polls until the parcel reaches one of `targets`.
   *
   * Parcel errors abort immediately; anything short of the targets is retried.
   */
  async checkState(targets: readonly ParcelStage[]): Promise<string> {
    return retry(async () => {
      const parcel = await this.fetch();
      if (!parcel) {
        throw new ConvergenceError(`Parcel ${this.label} is not visible on cluster ${this.cluster}`);
      }
      this.checkErrors(parcel);
      if (reached(parcel, targets)) {
        return parcel.stage;
      }

      const { progress, totalProgress } = parcel.state;
      console.log(`Parcel ${targets[0]} progress: ${progress} / ${totalProgress}`);
      throw new ConvergenceError(`Waiting on parcel to get to state ${targets[0]}`, {
        current: progress,
        total: totalProgress,
      });
    }, pollOptions(this.polling.stage));
  }

  private async advance(command: ParcelCommand, targets: readonly ParcelStage[]): Promise<void> {
    const current = await this.fetch();
    if (current && reached(current, targets)) {
      this.checkErrors(current);
      console.log(`Parcel ${this.label} already ${current.stage}, skipping ${command}`);
      return;
    }

    console.log(`Parcel ${this.label}: ${command}`);
    await this.api.runParcelCommand(this.cluster, this.spec.product, this.spec.version, command);
    await this.checkState(targets);
  }

  private async addRepository(repo: string): Promise<void> {
    const entries = await this.api.getManagerConfig();
    const entry = entries.find(candidate => candidate.name === REMOTE_PARCEL_REPO_URLS);
    const existing = (entry?.value || entry?.default || '')
      .split(',')
      .map(url => url.trim())
      .filter(url => url.length > 0);

    if (existing.includes(repo)) {
      return;
    }

    console.log(`Adding parcel repo ${repo}`);
    await this.api.updateManagerConfig({ [REMOTE_PARCEL_REPO_URLS]: [...existing, repo].join(',') });
  }

  private fetch(): Promise<ApiParcel | undefined> {
    return this.api.findParcel(this.cluster, this.spec.product, this.spec.version);
  }

  private checkErrors(parcel: ApiParcel): void {
    if (parcel.state.errors.length > 0) {
      throw new RemoteStateError(`Parcel ${this.label} reported errors: ${parcel.state.errors.join('; ')}`);
    }
  }
}

function reached(parcel: ApiParcel, targets: readonly ParcelStage[]): boolean {
  return targets.some(stage => stage === parcel.stage);
}
