/**
 * Sync Orchestrator
 *
 * One run end to end: guard and configure git, capture the scoped changes,
 * synchronize the branch, publish it, reconcile the pull request and write
 * the run outputs. Repository-local config is restored however the run ends.
 */

import type { VersionControlClient } from '../git/client.js';
import { SimpleGitClient } from '../git/simple-git-client.js';
import { createGitHubClient } from '../github/client.js';
import { GitHubPullRequestService, type PullRequestService } from '../github/pull-requests.js';
import { buildAuthHeader, extraHeaderKey, parseRemoteUrl, parseRepository } from '../github/remote-url.js';
import type { SyncConfig } from '../config/index.js';
import { applyBranchSuffix, type SuffixInputs } from '../sync/branch-suffix.js';
import { BranchSynchronizer, resolveBaseRef, type SynchronizerOptions } from '../sync/branch-synchronizer.js';
import { ChangeCapture } from '../sync/change-capture.js';
import { ConfigStateGuard } from '../sync/config-guard.js';
import { ORIGIN_REMOTE, RemoteSubmitter } from '../sync/remote-submitter.js';
import { ConfigurationError } from '../types/errors.js';
import { GitHubErrorCode, GitHubError, type GitHubPullRequest, type RepositoryCoordinates } from '../types/github.js';
import { SyncOperation, type PullRequestOperation, type RunOutputs, type SyncOutcome } from '../types/sync.js';
import { createLogger } from '../utils/logger.js';
import { writeOutputs } from './outputs.js';
import { createRetryPolicyEngine, type RetryPolicyEngine } from './retry-policy.js';

const log = createLogger('run-sync');

export interface SyncDependencies {
  git?: VersionControlClient;
  createPullRequestService?: (repository: RepositoryCoordinates) => PullRequestService;
  retry?: RetryPolicyEngine;
  synchronizer?: SynchronizerOptions;
  suffix?: Omit<SuffixInputs, 'headSha'>;
  /** Environment the outputs file is read from */
  env?: NodeJS.ProcessEnv;
}

export interface SyncRunResult {
  outcome: SyncOutcome;
  pullRequest: GitHubPullRequest | null;
  outputs: RunOutputs;
}

/**
 * Local config keys the run may change
 */
export function guardedConfigKeys(serverUrl: string): string[] {
  return [extraHeaderKey(serverUrl), 'user.name', 'user.email', 'commit.gpgsign'];
}

export async function runSync(config: SyncConfig, deps: SyncDependencies = {}): Promise<SyncRunResult> {
  const git = deps.git ?? new SimpleGitClient(config.path);
  const guard = new ConfigStateGuard(git);
  const { serverUrl } = config.environment;

  return guard.withGuard(guardedConfigKeys(serverUrl), async () => {
    // ------------------------------------------------------------------------
    // Git setup
    // ------------------------------------------------------------------------
    const originUrl = await git.getRemoteUrl(ORIGIN_REMOTE);
    if (!originUrl) {
      throw new ConfigurationError('path', `Repository at ${config.path} has no '${ORIGIN_REMOTE}' remote`);
    }
    const origin = parseRemoteUrl(originUrl);
    if (origin.protocol === 'https') {
      await git.configSet(extraHeaderKey(serverUrl), buildAuthHeader(config.token));
    }
    await git.configSet('user.name', config.committer.name);
    await git.configSet('user.email', config.committer.email);
    await git.configSet('commit.gpgsign', String(config.signCommits));

    const repository = parseRepository(config.environment.repository ?? origin.repository);

    const submitter = new RemoteSubmitter(git);
    const remote = await submitter.prepare(config.pushToFork);

    // ------------------------------------------------------------------------
    // Base and branch
    // ------------------------------------------------------------------------
    const current = await git.currentRef();
    if (current.kind === 'detached' && !config.base) {
      throw new ConfigurationError('base', 'Base branch must be specified when HEAD is detached');
    }
    const base = await resolveBaseRef(git, config.base, ORIGIN_REMOTE);

    const headSha = current.kind === 'detached' ? current.sha : await git.resolveRef('HEAD');
    const branch = applyBranchSuffix(config.branch, config.branchSuffix, {
      ...deps.suffix,
      ...(headSha ? { headSha } : {}),
    });
    if (branch === base.name) {
      throw new ConfigurationError('branch', `Branch '${branch}' must differ from the base`);
    }

    // ------------------------------------------------------------------------
    // Capture and synchronize
    // ------------------------------------------------------------------------
    const changeSet = await new ChangeCapture(git).capture({
      pathspecs: config.addPaths,
      message: config.commitMessage,
      author: config.author,
      committer: config.committer,
      signoff: config.signoff,
      sign: config.signCommits,
    });

    const synchronizer = new BranchSynchronizer(git, deps.synchronizer);
    const outcome = await synchronizer.synchronize({
      branch,
      base,
      changeSet,
      remote,
      deleteOnEmpty: config.deleteBranch,
    });

    let publishedTip: string | null = null;
    if (outcome.operation === SyncOperation.CREATED || outcome.operation === SyncOperation.UPDATED) {
      publishedTip = await submitter.push(outcome, remote);
    } else if (outcome.operation === SyncOperation.CLOSED) {
      await submitter.deleteBranch(branch, remote);
    } else if (outcome.previousTip) {
      publishedTip = outcome.previousTip;
    }

    // ------------------------------------------------------------------------
    // Pull request
    // ------------------------------------------------------------------------
    const retry =
      deps.retry ??
      createRetryPolicyEngine({
        maxRetries: config.environment.retry.maxRetries,
        backoffMs: config.environment.retry.backoffMs,
        backoffMultiplier: config.environment.retry.backoffMultiplier,
      });
    const service =
      deps.createPullRequestService?.(repository) ??
      new GitHubPullRequestService(
        createGitHubClient({
          token: config.token,
          ...(config.environment.apiUrl ? { baseUrl: config.environment.apiUrl } : {}),
        }),
        repository
      );

    const headOwner = config.pushToFork ? parseRepository(config.pushToFork).owner : repository.owner;
    const reconciler = new PullRequestReconciler(service, retry, config);
    const { pullRequest, operation } = await reconciler.reconcile(outcome, `${headOwner}:${branch}`, base.name, publishedTip);

    let verified = false;
    if (pullRequest && publishedTip) {
      verified = await reconciler.commitVerified(publishedTip);
    }

    const outputs: RunOutputs = {
      pullRequestOperation: operation,
      pullRequestCommitsVerified: verified,
      ...(pullRequest ? { pullRequestNumber: pullRequest.number, pullRequestUrl: pullRequest.url } : {}),
      ...(publishedTip ? { pullRequestHeadSha: publishedTip, pullRequestBranch: branch } : {}),
    };
    await writeOutputs(outputs, deps.env ?? process.env);

    log.info(
      { branch, operation: outcome.operation, pullRequest: pullRequest?.number, pullRequestOperation: operation },
      'Run complete'
    );
    return { outcome, pullRequest, outputs };
  });
}

// ============================================================================
// Pull request reconciliation
// ============================================================================

interface Reconciled {
  pullRequest: GitHubPullRequest | null;
  operation: PullRequestOperation;
}

class PullRequestReconciler {
  constructor(
    private readonly service: PullRequestService,
    private readonly retry: RetryPolicyEngine,
    private readonly config: SyncConfig
  ) {}

  async reconcile(
    outcome: SyncOutcome,
    head: string,
    base: string,
    publishedTip: string | null
  ): Promise<Reconciled> {
    const existing = await this.retry.run(
      () => this.service.findOpenPullRequest(head, base),
      'find-pull-request'
    );

    if (outcome.operation === SyncOperation.CLOSED) {
      if (!existing) {
        return { pullRequest: null, operation: 'none' };
      }
      await this.retry.run(() => this.service.closePullRequest(existing.number), 'close-pull-request');
      return { pullRequest: { ...existing, state: 'closed' }, operation: 'closed' };
    }

    if (!publishedTip) {
      return { pullRequest: existing, operation: 'none' };
    }

    if (existing) {
      const updated = await this.retry.run(
        () => this.service.updatePullRequest(existing.number, { title: this.config.title, body: this.config.body }),
        'update-pull-request'
      );
      const branchMoved = outcome.operation === SyncOperation.UPDATED || outcome.operation === SyncOperation.CREATED;
      if (branchMoved && this.config.draft && !updated.draft) {
        await this.retry.run(() => this.service.convertToDraft(updated.nodeId), 'convert-to-draft');
      }
      await this.applyMetadata(updated.number);
      return { pullRequest: updated, operation: branchMoved ? 'updated' : 'none' };
    }

    if (!outcome.hasDiffWithBase) {
      log.info({ head, base }, 'Branch has no diff with base; not opening a pull request');
      return { pullRequest: null, operation: 'none' };
    }

    const created = await this.create(head, base);
    await this.applyMetadata(created.pullRequest.number);
    return { pullRequest: created.pullRequest, operation: created.opened ? 'created' : 'updated' };
  }

  /**
   * Open the pull request. Not retried: a lost response would otherwise open
   * a duplicate. A concurrent run that opened it first is handled by updating
   * the one it opened.
   */
  private async create(head: string, base: string): Promise<{ pullRequest: GitHubPullRequest; opened: boolean }> {
    try {
      const pullRequest = await this.service.createPullRequest({
        title: this.config.title,
        body: this.config.body,
        head,
        base,
        draft: this.config.draft,
        maintainerCanModify: this.config.maintainerCanModify,
      });
      return { pullRequest, opened: true };
    } catch (error) {
      if (
        !(error instanceof GitHubError) ||
        error.code !== GitHubErrorCode.VALIDATION_FAILED ||
        !/already exists/i.test(error.message)
      ) {
        throw error;
      }
      const existing = await this.retry.run(() => this.service.findOpenPullRequest(head, base), 'find-pull-request');
      if (!existing) {
        throw error;
      }
      log.info({ number: existing.number }, 'Pull request already exists; updating it');
      const pullRequest = await this.retry.run(
        () => this.service.updatePullRequest(existing.number, { title: this.config.title, body: this.config.body }),
        'update-pull-request'
      );
      return { pullRequest, opened: false };
    }
  }

  private async applyMetadata(pullNumber: number): Promise<void> {
    const { labels, assignees, reviewers, teamReviewers, milestone } = this.config;
    await this.retry.run(() => this.service.addLabels(pullNumber, labels), 'add-labels');
    await this.retry.run(() => this.service.addAssignees(pullNumber, assignees), 'add-assignees');
    await this.retry.run(() => this.service.setMilestone(pullNumber, milestone), 'set-milestone');
    await this.retry.run(
      () => this.service.requestReviewers(pullNumber, reviewers, teamReviewers),
      'request-reviewers'
    );
  }

  /**
   * Verification status of the head commit; false when it cannot be read
   */
  async commitVerified(sha: string): Promise<boolean> {
    try {
      return await this.retry.run(() => this.service.isCommitVerified(sha), 'commit-verification');
    } catch (error) {
      log.warn({ err: error, sha }, 'Could not read commit verification');
      return false;
    }
  }
}
