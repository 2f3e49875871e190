/**
 * BranchSynchronizer
 *
 * Decides whether the target branch is created, updated, left alone or closed,
 * and performs the commit / rebase / cherry-pick sequence for it. Every run
 * hands the repository back the way it found it: original checkout, pending
 * edits, and (on failure) the local target branch.
 *
 * State machine:
 *
 *   resolve-branch ──empty──▶ not-updated | closed
 *        │
 *   prepare-working-branch ─▶ apply-to-base (HEAD ≠ base)
 *        │
 *        ├─ absent  ─▶ create ─▶ created
 *        └─ present ─▶ checkout-target ─▶ reapply ─▶ equivalence-check ─▶ not-updated
 *                                                    │
 *                                    base ancestor? ─┴─▶ updated (fast-forward)
 *                                                    └─▶ rebase ─▶ updated (rewritten)
 *                                                          └─conflict─▶ cherry-pick-fallback
 */

import type { PathChange, VersionControlClient } from '../git/client.js';
import {
  ConflictUnresolved,
  InvalidBaseReference,
  VersionControlFailure,
  type SyncStep,
} from '../types/errors.js';
import {
  BranchState,
  SyncOperation,
  isPublished,
  type BaseRef,
  type BranchRef,
  type ChangeSet,
  type CheckoutRef,
  type SyncOutcome,
} from '../types/sync.js';
import { createLogger } from '../utils/logger.js';
import { ephemeralBranchName } from './branch-suffix.js';
import { ChangeCapture } from './change-capture.js';

const log = createLogger('branch-synchronizer');

const STASH_MESSAGE = 'branchsync: pending changes outside the sync scope';

export interface SynchronizeRequest {
  /** Target branch, suffix already applied */
  branch: string;
  base: BaseRef;
  changeSet: ChangeSet;
  /** Remote the target branch is published on */
  remote: string;
  /** Close a published branch when there is nothing left to sync */
  deleteOnEmpty: boolean;
}

export interface SynchronizerOptions {
  /** Name generator for the ephemeral working branch */
  ephemeralName?: () => string;
}

/**
 * Everything the run has changed so far, so cleanup knows what to undo
 */
interface RunState {
  original: CheckoutRef;
  step: SyncStep;
  ephemeral: string | null;
  captured: string | null;
  stashed: boolean;
  /** Working tree holds only our own edits; safe to discard */
  ownsWorkingTree: boolean;
  inProgress: 'rebase' | 'cherry-pick' | null;
  /** Local target branch as it was before we moved it */
  target: { name: string; previousLocalTip: string | null } | null;
}

// ============================================================================
// Base resolution
// ============================================================================

/**
 * Resolve the base once for the whole run. An empty `requested` means the
 * current checkout.
 */
export async function resolveBaseRef(
  git: VersionControlClient,
  requested: string | undefined,
  remote: string
): Promise<BaseRef> {
  if (!requested) {
    const current = await git.currentRef();
    if (current.kind === 'detached') {
      return Object.freeze({ kind: 'current', name: current.sha, sha: current.sha });
    }
    const sha = await git.resolveRef('HEAD');
    if (!sha) {
      throw new InvalidBaseReference(current.name, `Branch '${current.name}' has no commits`);
    }
    return Object.freeze({ kind: 'current', name: current.name, sha });
  }

  let sha = (await git.resolveRef(requested)) ?? (await git.resolveRef(`refs/remotes/${remote}/${requested}`));
  if (!sha && (await git.branchExists(requested, remote))) {
    await git.fetch(remote, requested);
    sha = await git.resolveRef(`refs/remotes/${remote}/${requested}`);
  }
  if (!sha) {
    throw new InvalidBaseReference(requested);
  }
  log.debug({ base: requested, sha }, 'Resolved base reference');
  return Object.freeze({ kind: 'branch', name: requested, sha });
}

// ============================================================================
// Synchronizer
// ============================================================================

export class BranchSynchronizer {
  private readonly capture: ChangeCapture;
  private readonly ephemeralName: () => string;

  constructor(
    private readonly git: VersionControlClient,
    options: SynchronizerOptions = {}
  ) {
    this.capture = new ChangeCapture(git);
    this.ephemeralName = options.ephemeralName ?? (() => ephemeralBranchName());
  }

  /**
   * Presence of the branch locally and on the remote. A published branch is
   * fetched so its tip is available to check out.
   */
  async resolveBranch(name: string, remote: string): Promise<BranchRef> {
    const localTip = await this.git.resolveRef(`refs/heads/${name}`);
    const remoteTip = await this.git.remoteTip(remote, name);
    if (remoteTip) {
      await this.git.fetch(remote, name);
    }

    let state: BranchState = BranchState.ABSENT;
    if (localTip && remoteTip) state = BranchState.PRESENT_BOTH;
    else if (remoteTip) state = BranchState.PRESENT_REMOTE;
    else if (localTip) state = BranchState.PRESENT_LOCAL;

    return {
      name,
      state,
      ...(localTip ? { localTip } : {}),
      ...(remoteTip ? { remoteTip } : {}),
    };
  }

  async synchronize(request: SynchronizeRequest): Promise<SyncOutcome> {
    const { branch, base } = request;
    const state: RunState = {
      original: await this.annotate('resolve-branch', () => this.git.currentRef()),
      step: 'resolve-branch',
      ephemeral: null,
      captured: null,
      stashed: false,
      ownsWorkingTree: false,
      inProgress: null,
      target: null,
    };

    log.info({ branch, base: base.name, baseSha: base.sha, files: request.changeSet.files.length }, 'Synchronizing branch');

    let outcome: SyncOutcome;
    try {
      outcome = await this.run(request, state);
    } catch (error) {
      const failure = error instanceof VersionControlFailure ? error.atStep(state.step) : error;
      const cleanupErrors = await this.cleanup(state, true);
      for (const cleanupError of cleanupErrors) {
        log.error({ err: cleanupError, branch }, 'Cleanup after failed synchronization did not complete');
      }
      log.error({ err: failure, branch, step: state.step }, 'Synchronization failed');
      throw failure;
    }

    const cleanupErrors = await this.cleanup(state, false);
    const [firstError] = cleanupErrors;
    if (firstError !== undefined) {
      throw firstError instanceof VersionControlFailure ? firstError.atStep('restore-checkout') : firstError;
    }

    log.info(
      { branch, operation: outcome.operation, headSha: outcome.headSha, rewritten: outcome.rewritten },
      'Synchronization finished'
    );
    return Object.freeze(outcome);
  }

  // ==========================================================================
  // State machine
  // ==========================================================================

  private async run(request: SynchronizeRequest, state: RunState): Promise<SyncOutcome> {
    const { branch, base, changeSet, remote } = request;

    state.step = 'resolve-branch';
    const ref = await this.resolveBranch(branch, remote);
    log.debug({ branch, state: ref.state }, 'Resolved target branch');

    if (changeSet.empty) {
      return this.emptyOutcome(request, ref);
    }

    const prepared = await this.prepare(request, state);
    if (!prepared) {
      return this.emptyOutcome(request, ref);
    }

    if (!isPublished(ref) || !ref.remoteTip) {
      state.step = 'create';
      state.target = { name: branch, previousLocalTip: ref.localTip ?? null };
      await this.git.createBranch(branch, prepared);
      log.info({ branch, headSha: prepared }, 'Created branch from base');
      return {
        operation: SyncOperation.CREATED,
        branch,
        headSha: prepared,
        baseSha: base.sha,
        rewritten: false,
        hasDiffWithBase: await this.hasDiffWithBase(prepared, base.sha),
      };
    }

    return this.update(request, state, ref.remoteTip, ref.localTip ?? null, prepared);
  }

  /**
   * Commit the change set on an ephemeral branch and move it on top of the
   * base. Returns the prepared commit, or null when the change set turns out
   * to be empty relative to the base.
   */
  private async prepare(request: SynchronizeRequest, state: RunState): Promise<string | null> {
    const { base, changeSet, branch } = request;

    state.step = 'prepare-working-branch';
    const head = await this.git.resolveRef('HEAD');
    const ephemeral = this.ephemeralName();
    await this.git.createBranch(ephemeral, 'HEAD');
    state.ephemeral = ephemeral;

    const captured = await this.capture.commit(changeSet);
    state.captured = captured;
    state.stashed = await this.git.stash(STASH_MESSAGE);
    state.ownsWorkingTree = true;

    if (head === base.sha) {
      return captured;
    }

    state.step = 'apply-to-base';
    await this.git.createBranch(ephemeral, base.sha);
    state.inProgress = 'cherry-pick';
    const result = await this.git.cherryPick(captured);
    switch (result) {
      case 'success':
        state.inProgress = null;
        return this.requireHead();
      case 'empty':
        state.inProgress = null;
        log.info({ branch, base: base.name }, 'Changes are already contained in base');
        return null;
      case 'conflict':
        await this.git.abortCherryPick();
        state.inProgress = null;
        throw new ConflictUnresolved(
          branch,
          `Changes do not apply cleanly to base '${base.name}'`,
          'apply-to-base'
        );
    }
  }

  private async update(
    request: SynchronizeRequest,
    state: RunState,
    existingTip: string,
    localTip: string | null,
    prepared: string
  ): Promise<SyncOutcome> {
    const { branch, base, changeSet } = request;
    const notUpdated = async (): Promise<SyncOutcome> => ({
      operation: SyncOperation.NOT_UPDATED,
      branch,
      headSha: existingTip,
      baseSha: base.sha,
      previousTip: existingTip,
      rewritten: false,
      hasDiffWithBase: await this.hasDiffWithBase(existingTip, base.sha),
    });

    state.step = 'checkout-target';
    state.target = { name: branch, previousLocalTip: localTip };
    await this.git.createBranch(branch, existingTip);

    state.step = 'reapply';
    const changes = await this.git.diffNameStatus(base.sha, prepared);
    await this.git.overlayPaths(prepared, changes);
    const stale = await this.stalePaths(base.sha, existingTip, changes);
    if (stale) {
      await this.git.overlayPaths(stale.forkPoint, stale.changes);
    }

    state.step = 'equivalence-check';
    const paths = [...changes, ...(stale?.changes ?? [])].map((change) => change.path);
    const pending = paths.length > 0 ? await this.git.listChanges(paths) : [];
    if (pending.length === 0) {
      log.info({ branch, tip: existingTip }, 'Branch already contains the changes');
      return notUpdated();
    }

    const committed = await this.git.stageAndCommit({
      pathspecs: paths,
      message: changeSet.message,
      author: changeSet.author,
      committer: changeSet.committer,
      signoff: changeSet.signoff,
      sign: changeSet.sign,
    });
    if ((await this.git.treeHash(committed)) === (await this.git.treeHash(existingTip))) {
      await this.git.createBranch(branch, existingTip);
      log.info({ branch, tip: existingTip }, 'Branch tree is equivalent; discarding commit');
      return notUpdated();
    }

    const updated = async (headSha: string, rewritten: boolean): Promise<SyncOutcome> => ({
      operation: SyncOperation.UPDATED,
      branch,
      headSha,
      baseSha: base.sha,
      previousTip: existingTip,
      rewritten,
      hasDiffWithBase: await this.hasDiffWithBase(headSha, base.sha),
    });

    state.step = 'rebase';
    if (await this.git.isAncestor(base.sha, existingTip)) {
      log.info({ branch, headSha: committed }, 'Fast-forward update');
      return updated(committed, false);
    }

    state.inProgress = 'rebase';
    const rebased = await this.git.rebase(base.sha);
    if (rebased !== 'conflict') {
      state.inProgress = null;
      const headSha = await this.requireHead();
      log.info({ branch, headSha }, 'Rebased branch onto base');
      return updated(headSha, true);
    }
    await this.git.abortRebase();
    state.inProgress = null;
    log.warn({ branch, base: base.name }, 'Rebase conflicted; falling back to cherry-pick onto existing tip');

    state.step = 'cherry-pick-fallback';
    await this.git.createBranch(branch, existingTip);
    state.inProgress = 'cherry-pick';
    const picked = await this.git.cherryPick(prepared);
    switch (picked) {
      case 'success':
        state.inProgress = null;
        return updated(await this.requireHead(), false);
      case 'empty':
        state.inProgress = null;
        return notUpdated();
      case 'conflict':
        await this.git.abortCherryPick();
        state.inProgress = null;
        throw new ConflictUnresolved(
          branch,
          `Rebase onto '${base.name}' and cherry-pick onto the existing tip both conflicted`,
          'cherry-pick-fallback'
        );
    }
  }

  /**
   * Paths the branch changed since it forked from the base that the current
   * change set leaves alone. Putting them back to the fork point makes the
   * updated tree the base plus the change set, and nothing an earlier run left
   * behind.
   */
  private async stalePaths(
    baseSha: string,
    tip: string,
    touched: readonly PathChange[]
  ): Promise<{ forkPoint: string; changes: PathChange[] } | null> {
    const forkPoint = await this.git.mergeBase(baseSha, tip);
    if (!forkPoint) {
      return null;
    }
    const current = new Set(touched.map((change) => change.path));
    const changes = (await this.git.diffNameStatus(forkPoint, tip))
      .filter((change) => !current.has(change.path))
      .map((change): PathChange => ({ status: change.status === 'A' ? 'D' : 'M', path: change.path }));
    if (changes.length === 0) {
      return null;
    }
    log.info({ paths: changes.map((change) => change.path) }, 'Reverting paths the change set no longer touches');
    return { forkPoint, changes };
  }

  private async emptyOutcome(request: SynchronizeRequest, ref: BranchRef): Promise<SyncOutcome> {
    const { branch, base, deleteOnEmpty } = request;

    if (!isPublished(ref) || !ref.remoteTip) {
      log.info({ branch }, 'No changes and no branch; nothing to do');
      return {
        operation: SyncOperation.NOT_UPDATED,
        branch,
        headSha: base.sha,
        baseSha: base.sha,
        rewritten: false,
        hasDiffWithBase: false,
      };
    }

    const operation = deleteOnEmpty ? SyncOperation.CLOSED : SyncOperation.NOT_UPDATED;
    log.info({ branch, operation }, 'No changes for published branch');
    return {
      operation,
      branch,
      headSha: ref.remoteTip,
      baseSha: base.sha,
      previousTip: ref.remoteTip,
      rewritten: false,
      hasDiffWithBase: await this.hasDiffWithBase(ref.remoteTip, base.sha),
    };
  }

  // ==========================================================================
  // Cleanup
  // ==========================================================================

  /**
   * Undo the run's local side effects. Each step is attempted regardless of
   * the previous one; the errors are returned.
   */
  private async cleanup(state: RunState, failed: boolean): Promise<unknown[]> {
    const errors: unknown[] = [];
    const attempt = async (label: string, action: () => Promise<void>): Promise<void> => {
      try {
        await action();
      } catch (error) {
        log.warn({ err: error, action: label }, 'Cleanup step failed');
        errors.push(error);
      }
    };

    const inProgress = state.inProgress;
    if (inProgress === 'rebase') {
      await attempt('abort-rebase', () => this.git.abortRebase());
    } else if (inProgress === 'cherry-pick') {
      await attempt('abort-cherry-pick', () => this.git.abortCherryPick());
    }
    state.inProgress = null;

    if (failed && state.ownsWorkingTree) {
      await attempt('discard', () => this.git.discardChanges());
    }

    if (state.ephemeral) {
      const original = state.original;
      await attempt('checkout-original', () =>
        this.git.checkout(original.kind === 'branch' ? original.name : original.sha)
      );
    }

    const target = state.target;
    if (failed && target) {
      await attempt('restore-target', () =>
        target.previousLocalTip
          ? this.git.resetBranch(target.name, target.previousLocalTip)
          : this.git.deleteBranch(target.name)
      );
    }

    const ephemeral = state.ephemeral;
    if (ephemeral) {
      await attempt('delete-ephemeral', () => this.git.deleteBranch(ephemeral));
    }

    const captured = state.captured;
    if (captured) {
      await attempt('restore-changes', () => this.git.restoreChanges(captured));
    }

    if (state.stashed) {
      await attempt('stash-pop', () => this.git.stashPop());
    }

    return errors;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async annotate<T>(step: SyncStep, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw error instanceof VersionControlFailure ? error.atStep(step) : error;
    }
  }

  private async requireHead(): Promise<string> {
    const sha = await this.git.resolveRef('HEAD');
    if (!sha) {
      throw new VersionControlFailure('rev-parse HEAD', 'HEAD does not point to a commit');
    }
    return sha;
  }

  private async hasDiffWithBase(head: string, base: string): Promise<boolean> {
    if (head === base) return false;
    return (await this.git.treeHash(head)) !== (await this.git.treeHash(base));
  }
}
