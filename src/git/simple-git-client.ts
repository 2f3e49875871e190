/**
 * simple-git backed VersionControlClient
 *
 * Commands go through `raw` so the exact argument lists stay visible and
 * testable. simple-git only rejects when a command exits non-zero AND wrote to
 * stderr, so lookups that exit quietly (`--quiet`, `--get-all` on a missing
 * key) resolve with empty output and are treated as "absent".
 */

import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import type { CheckoutRef } from '../types/sync.js';
import { VersionControlFailure } from '../types/errors.js';
import { stripTokenFromUrl } from '../github/remote-url.js';
import { createLogger } from '../utils/logger.js';
import type {
  ApplyResult,
  CommitRequest,
  PathChange,
  PushRequest,
  PushResult,
  VersionControlClient,
} from './client.js';

const log = createLogger('git-client');

const UNMERGED_STATUSES = new Set(['DD', 'AU', 'UD', 'UA', 'DU', 'AA', 'UU']);
const EMPTY_PICK_PATTERN = /previous cherry-pick is now empty|nothing to commit/;
const REJECTED_PUSH_PATTERN = /\[rejected\]|stale info|non-fast-forward|fetch first/;
const MISSING_REMOTE_REF_PATTERN = /remote ref does not exist/;
const NO_SUCH_REMOTE_PATTERN = /No such remote/;

interface ExecOptions {
  /** Replacement for the logged/reported command when args carry secrets */
  display?: string;
}

function getGit(path: string): SimpleGit {
  const options: Partial<SimpleGitOptions> = {
    baseDir: path,
    binary: 'git',
    // One working tree, one command at a time
    maxConcurrentProcesses: 1,
  };
  return simpleGit(options);
}

/**
 * Split NUL-separated porcelain output
 */
function splitNul(output: string): string[] {
  return output.split('\0').filter((entry) => entry.length > 0);
}

export class SimpleGitClient implements VersionControlClient {
  private readonly git: SimpleGit;

  constructor(private readonly repoPath: string) {
    this.git = getGit(repoPath);
  }

  // ==========================================================================
  // Command execution
  // ==========================================================================

  private async exec(args: string[], options: ExecOptions = {}): Promise<string> {
    const display = options.display ?? stripTokenFromUrl(args.join(' '));
    log.debug({ command: display }, 'git');
    try {
      return await this.git.raw(args);
    } catch (error) {
      const output = error instanceof Error ? error.message : String(error);
      throw new VersionControlFailure(display, stripTokenFromUrl(output), { cause: error });
    }
  }

  // ==========================================================================
  // Refs and branches
  // ==========================================================================

  async currentRef(): Promise<CheckoutRef> {
    const branch = (await this.exec(['symbolic-ref', '--quiet', '--short', 'HEAD'])).trim();
    if (branch) {
      return { kind: 'branch', name: branch };
    }
    const sha = await this.resolveRef('HEAD');
    if (!sha) {
      throw new VersionControlFailure('rev-parse HEAD', 'HEAD does not point to a commit');
    }
    return { kind: 'detached', sha };
  }

  async resolveRef(ref: string): Promise<string | null> {
    const sha = (await this.exec(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`])).trim();
    return sha || null;
  }

  async branchExists(name: string, remote?: string): Promise<boolean> {
    if (remote) {
      return (await this.remoteTip(remote, name)) !== null;
    }
    return (await this.resolveRef(`refs/heads/${name}`)) !== null;
  }

  async fetch(remote: string, branch: string): Promise<void> {
    await this.exec([
      'fetch',
      '--no-tags',
      '--force',
      remote,
      `+refs/heads/${branch}:refs/remotes/${remote}/${branch}`,
    ]);
  }

  async checkout(ref: string): Promise<void> {
    await this.exec(['checkout', '--quiet', ref]);
  }

  async createBranch(name: string, from: string): Promise<void> {
    await this.exec(['checkout', '--quiet', '-B', name, from]);
  }

  async resetBranch(name: string, to: string): Promise<void> {
    await this.exec(['branch', '--force', name, to]);
  }

  async deleteBranch(name: string): Promise<void> {
    await this.exec(['branch', '--delete', '--force', name]);
  }

  // ==========================================================================
  // Working tree
  // ==========================================================================

  async listChanges(pathspecs: readonly string[]): Promise<string[]> {
    const args = ['status', '--porcelain=v1', '-z', '--untracked-files=all', '--no-renames'];
    if (pathspecs.length > 0) {
      args.push('--', ...pathspecs);
    }
    const output = await this.exec(args);
    return splitNul(output).map((entry) => entry.slice(3));
  }

  async stageAndCommit(request: CommitRequest): Promise<string> {
    const before = await this.resolveRef('HEAD');

    const matched: string[] = [];
    if (request.pathspecs.length === 0) {
      await this.exec(['add', '--all']);
    } else {
      // A pathspec that matches nothing is skipped rather than failing `git add`
      for (const pathspec of request.pathspecs) {
        const changed = await this.listChanges([pathspec]);
        if (changed.length > 0) {
          await this.exec(['add', '--all', '--', pathspec]);
          matched.push(pathspec);
        }
      }
      if (matched.length === 0) {
        throw new VersionControlFailure('commit', 'nothing to commit');
      }
    }

    const { author, committer } = request;
    const args = [
      '-c',
      `user.name=${committer.name}`,
      '-c',
      `user.email=${committer.email}`,
      'commit',
      '--quiet',
      `--author=${author.name} <${author.email}>`,
      '-m',
      request.message,
    ];
    if (request.signoff) {
      args.push('--signoff');
    }
    args.push(request.sign ? '--gpg-sign' : '--no-gpg-sign');
    // Commit only the scope; whatever else the caller staged stays in the index
    if (matched.length > 0) {
      args.push('--', ...matched);
    }
    await this.exec(args, { display: 'commit' });

    // `git commit` with nothing staged exits 1 without stderr
    const after = await this.resolveRef('HEAD');
    if (!after || after === before) {
      throw new VersionControlFailure('commit', 'nothing to commit');
    }
    log.info({ sha: after, message: request.message }, 'Created commit');
    return after;
  }

  async overlayPaths(source: string, changes: readonly PathChange[]): Promise<void> {
    for (const change of changes) {
      if (change.status === 'D') {
        // Removed from the working tree only, so `add --all -- <path>` still matches the index entry
        await rm(join(this.repoPath, change.path), { force: true, recursive: true });
      } else {
        await this.exec(['checkout', source, '--', change.path]);
      }
    }
  }

  async restoreChanges(commit: string): Promise<void> {
    await this.exec(['cherry-pick', '--no-commit', commit]);
    await this.exec(['reset', '--quiet']);
  }

  async stash(message: string): Promise<boolean> {
    const pending = await this.listChanges([]);
    if (pending.length === 0) {
      return false;
    }
    await this.exec(['stash', 'push', '--include-untracked', '-m', message]);
    return true;
  }

  async stashPop(): Promise<void> {
    await this.exec(['stash', 'pop', '--quiet']);
  }

  async discardChanges(): Promise<void> {
    await this.exec(['reset', '--hard', '--quiet', 'HEAD']);
    await this.exec(['clean', '-d', '--force', '--quiet']);
  }

  // ==========================================================================
  // History
  // ==========================================================================

  private async hasUnmergedPaths(): Promise<boolean> {
    const output = await this.exec(['status', '--porcelain=v1', '-z', '--untracked-files=no']);
    return splitNul(output).some((entry) => UNMERGED_STATUSES.has(entry.slice(0, 2)));
  }

  async rebase(onto: string): Promise<ApplyResult> {
    try {
      await this.exec(['rebase', '--no-autostash', onto]);
      return 'success';
    } catch (error) {
      if (error instanceof VersionControlFailure && (await this.hasUnmergedPaths())) {
        log.warn({ onto }, 'Rebase stopped on conflicts');
        return 'conflict';
      }
      throw error;
    }
  }

  async abortRebase(): Promise<void> {
    await this.exec(['rebase', '--abort']);
  }

  async cherryPick(commit: string): Promise<ApplyResult> {
    try {
      await this.exec(['cherry-pick', '-X', 'theirs', commit]);
      return 'success';
    } catch (error) {
      if (!(error instanceof VersionControlFailure)) {
        throw error;
      }
      if (await this.hasUnmergedPaths()) {
        log.warn({ commit }, 'Cherry-pick stopped on conflicts');
        return 'conflict';
      }
      if (EMPTY_PICK_PATTERN.test(error.output)) {
        await this.abortCherryPick();
        return 'empty';
      }
      throw error;
    }
  }

  async abortCherryPick(): Promise<void> {
    await this.exec(['cherry-pick', '--abort']);
  }

  async treeHash(ref: string): Promise<string> {
    const tree = (await this.exec(['rev-parse', '--verify', `${ref}^{tree}`])).trim();
    if (!tree) {
      throw new VersionControlFailure(`rev-parse ${ref}^{tree}`, 'ref does not resolve to a tree');
    }
    return tree;
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    const mergeBase = await this.mergeBase(ancestor, descendant);
    return mergeBase !== null && mergeBase === (await this.resolveRef(ancestor));
  }

  async mergeBase(a: string, b: string): Promise<string | null> {
    // Unrelated histories exit 1 without output
    const sha = (await this.exec(['merge-base', a, b])).trim();
    return sha || null;
  }

  async diffNameStatus(from: string, to: string): Promise<PathChange[]> {
    const output = await this.exec(['diff', '--name-status', '--no-renames', '-z', from, to]);
    const fields = splitNul(output);
    const changes: PathChange[] = [];
    for (let i = 0; i + 1 < fields.length; i += 2) {
      const status = fields[i];
      const path = fields[i + 1];
      if ((status === 'A' || status === 'M' || status === 'D' || status === 'T') && path) {
        changes.push({ status, path });
      }
    }
    return changes;
  }

  // ==========================================================================
  // Remotes
  // ==========================================================================

  async push(request: PushRequest): Promise<PushResult> {
    const args = ['push', '--porcelain'];
    if (request.forceWithLease) {
      args.push(`--force-with-lease=${request.remoteRef}:${request.forceWithLease}`);
    }
    args.push(request.remote, `${request.localRef}:${request.remoteRef}`);

    try {
      const output = await this.exec(args);
      // Porcelain mode reports refused refs on stdout, not always with a failing exit
      if (REJECTED_PUSH_PATTERN.test(output)) {
        return { status: 'rejected', output };
      }
      log.info({ remote: request.remote, ref: request.remoteRef, lease: request.forceWithLease }, 'Pushed to remote');
      return { status: 'ok', output };
    } catch (error) {
      if (error instanceof VersionControlFailure && REJECTED_PUSH_PATTERN.test(error.output)) {
        return { status: 'rejected', output: error.output };
      }
      throw error;
    }
  }

  async deleteRemoteBranch(remote: string, branch: string): Promise<void> {
    try {
      await this.exec(['push', remote, '--delete', `refs/heads/${branch}`]);
    } catch (error) {
      if (error instanceof VersionControlFailure && MISSING_REMOTE_REF_PATTERN.test(error.output)) {
        log.debug({ remote, branch }, 'Remote branch already gone');
        return;
      }
      throw error;
    }
  }

  async remoteTip(remote: string, branch: string): Promise<string | null> {
    const ref = `refs/heads/${branch}`;
    const output = await this.exec(['ls-remote', '--heads', remote, ref]);
    for (const line of output.split('\n')) {
      const [sha, name] = line.trim().split(/\s+/);
      if (sha && name === ref) {
        return sha;
      }
    }
    return null;
  }

  async getRemoteUrl(remote: string): Promise<string | null> {
    try {
      const url = (await this.exec(['remote', 'get-url', remote])).trim();
      return url || null;
    } catch (error) {
      if (error instanceof VersionControlFailure && NO_SUCH_REMOTE_PATTERN.test(error.output)) {
        return null;
      }
      throw error;
    }
  }

  async setRemote(name: string, url: string): Promise<void> {
    const existing = await this.getRemoteUrl(name);
    const display = `remote ${existing ? 'set-url' : 'add'} ${name} ${stripTokenFromUrl(url)}`;
    if (existing) {
      await this.exec(['remote', 'set-url', name, url], { display });
    } else {
      await this.exec(['remote', 'add', name, url], { display });
    }
  }

  // ==========================================================================
  // Config
  // ==========================================================================

  async configGetAll(key: string): Promise<string[] | null> {
    const output = await this.exec(['config', '--local', '--get-all', key]);
    if (output === '') {
      return null;
    }
    return output.replace(/\n$/, '').split('\n');
  }

  async configSet(key: string, value: string): Promise<void> {
    await this.exec(['config', '--local', '--replace-all', key, value], {
      display: `config --local --replace-all ${key} ***`,
    });
  }

  async configAdd(key: string, value: string): Promise<void> {
    await this.exec(['config', '--local', '--add', key, value], {
      display: `config --local --add ${key} ***`,
    });
  }

  async configUnset(key: string): Promise<void> {
    await this.exec(['config', '--local', '--unset-all', key]);
  }
}
