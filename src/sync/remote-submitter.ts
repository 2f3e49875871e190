import type { VersionControlClient } from '../git/client.js';
import { buildRemoteUrl, parseRemoteUrl, stripTokenFromUrl } from '../github/remote-url.js';
import {
  ConcurrentUpdateRejected,
  ConfigurationError,
  VersionControlFailure,
  type SyncStep,
} from '../types/errors.js';
import { SyncOperation, type SyncOutcome } from '../types/sync.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('remote-submitter');

export const ORIGIN_REMOTE = 'origin';
export const FORK_REMOTE = 'fork';

/**
 * Publishes synchronized branches: push-remote setup, leased pushes, remote
 * branch deletion.
 */
export class RemoteSubmitter {
  constructor(private readonly git: VersionControlClient) {}

  /**
   * Remote to push to. With `pushToFork` (owner/repo) a `fork` remote is
   * pointed at that repository on origin's host, using origin's protocol.
   */
  async prepare(pushToFork?: string): Promise<string> {
    if (!pushToFork) {
      return ORIGIN_REMOTE;
    }

    return this.annotate('prepare-remote', async () => {
      const originUrl = await this.git.getRemoteUrl(ORIGIN_REMOTE);
      if (!originUrl) {
        throw new ConfigurationError('push-to-fork', `Remote '${ORIGIN_REMOTE}' is not configured`);
      }
      const forkUrl = buildRemoteUrl(parseRemoteUrl(originUrl), pushToFork);
      await this.git.setRemote(FORK_REMOTE, forkUrl);
      log.info({ remote: FORK_REMOTE, url: stripTokenFromUrl(forkUrl) }, 'Configured fork remote');
      return FORK_REMOTE;
    });
  }

  /**
   * Push a created or updated branch. Rewritten history is pushed with a lease
   * on the tip observed before the run. Returns the tip the remote reports
   * afterwards, or null when the outcome needs no push.
   */
  async push(outcome: SyncOutcome, remote: string): Promise<string | null> {
    if (outcome.operation !== SyncOperation.CREATED && outcome.operation !== SyncOperation.UPDATED) {
      return null;
    }

    const ref = `refs/heads/${outcome.branch}`;
    const lease = outcome.rewritten ? outcome.previousTip : undefined;

    return this.annotate('push', async () => {
      const result = await this.git.push({
        remote,
        localRef: ref,
        remoteRef: ref,
        ...(lease ? { forceWithLease: lease } : {}),
      });
      if (result.status === 'rejected') {
        throw new ConcurrentUpdateRejected(remote, outcome.branch, result.output);
      }

      const tip = await this.git.remoteTip(remote, outcome.branch);
      if (!tip) {
        throw new VersionControlFailure(`ls-remote ${remote} ${ref}`, 'branch not found after push');
      }
      if (tip !== outcome.headSha) {
        log.warn({ branch: outcome.branch, expected: outcome.headSha, actual: tip }, 'Remote tip differs from pushed commit');
      }
      return tip;
    });
  }

  /**
   * Delete the remote branch of a closed outcome
   */
  async deleteBranch(branch: string, remote: string): Promise<void> {
    await this.annotate('delete-remote-branch', () => this.git.deleteRemoteBranch(remote, branch));
    log.info({ branch, remote }, 'Deleted remote branch');
  }

  private async annotate<T>(step: SyncStep, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw error instanceof VersionControlFailure ? error.atStep(step) : error;
    }
  }
}
