/**
 * VersionControlClient capability
 *
 * The single seam between the synchronization engine and git. One method per
 * primitive; every method rejects with VersionControlFailure when the
 * underlying command fails. Calls are never issued concurrently against the
 * same working tree.
 */

import type { CheckoutRef, GitIdentity } from '../types/sync.js';

/**
 * Outcome of an operation that replays commits
 */
export type ApplyResult = 'success' | 'conflict' | 'empty';

/**
 * A path touched between two commits
 */
export interface PathChange {
  /** A (added), M (modified), D (deleted), T (type change) */
  status: 'A' | 'M' | 'D' | 'T';
  path: string;
}

export interface CommitRequest {
  /** Paths to stage; empty stages everything */
  pathspecs: readonly string[];
  message: string;
  author: GitIdentity;
  committer: GitIdentity;
  signoff?: boolean;
  /** GPG-sign the commit */
  sign?: boolean;
}

export interface PushRequest {
  remote: string;
  localRef: string;
  remoteRef: string;
  /** Expected remote tip; the push fails if the remote moved */
  forceWithLease?: string;
}

export interface PushResult {
  status: 'ok' | 'rejected';
  output: string;
}

export interface VersionControlClient {
  // --- refs and branches ---------------------------------------------------

  /** Current branch, or the commit when HEAD is detached */
  currentRef(): Promise<CheckoutRef>;
  /** Commit sha a ref points to, or null when it does not resolve */
  resolveRef(ref: string): Promise<string | null>;
  /** Local presence, or presence on `remote` when given (asks the remote) */
  branchExists(name: string, remote?: string): Promise<boolean>;
  /** Fetch a branch into refs/remotes/<remote>/<branch> */
  fetch(remote: string, branch: string): Promise<void>;
  checkout(ref: string): Promise<void>;
  /** Create (or reset) a branch at `from` and check it out, keeping local edits */
  createBranch(name: string, from: string): Promise<void>;
  /** Move a branch that is not checked out */
  resetBranch(name: string, to: string): Promise<void>;
  deleteBranch(name: string): Promise<void>;

  // --- working tree --------------------------------------------------------

  /** Paths within `pathspecs` that differ from HEAD, untracked included */
  listChanges(pathspecs: readonly string[]): Promise<string[]>;
  /**
   * Stage the scoped paths and commit only those; entries staged outside the
   * scope stay staged and out of the commit. Returns the new commit sha.
   */
  stageAndCommit(request: CommitRequest): Promise<string>;
  /** Make the listed paths match `source` in the working tree */
  overlayPaths(source: string, changes: readonly PathChange[]): Promise<void>;
  /** Re-apply a commit's diff to the working tree as uncommitted edits */
  restoreChanges(commit: string): Promise<void>;
  /** Stash everything left, untracked included; false when there was nothing */
  stash(message: string): Promise<boolean>;
  stashPop(): Promise<void>;
  /** Reset tracked files to HEAD and remove untracked ones */
  discardChanges(): Promise<void>;

  // --- history -------------------------------------------------------------

  rebase(onto: string): Promise<ApplyResult>;
  abortRebase(): Promise<void>;
  cherryPick(commit: string): Promise<ApplyResult>;
  abortCherryPick(): Promise<void>;
  treeHash(ref: string): Promise<string>;
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;
  /** Best common ancestor, or null for unrelated histories */
  mergeBase(a: string, b: string): Promise<string | null>;
  diffNameStatus(from: string, to: string): Promise<PathChange[]>;

  // --- remotes -------------------------------------------------------------

  push(request: PushRequest): Promise<PushResult>;
  deleteRemoteBranch(remote: string, branch: string): Promise<void>;
  /** Tip of the branch as the remote reports it */
  remoteTip(remote: string, branch: string): Promise<string | null>;
  getRemoteUrl(remote: string): Promise<string | null>;
  /** Add the remote, or update its URL when it exists */
  setRemote(name: string, url: string): Promise<void>;

  // --- config (repository-local) -------------------------------------------

  configGetAll(key: string): Promise<string[] | null>;
  configSet(key: string, value: string): Promise<void>;
  configAdd(key: string, value: string): Promise<void>;
  configUnset(key: string): Promise<void>;
}
