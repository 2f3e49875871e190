/**
 * BranchSynchronizer Tests
 *
 * State-machine behaviour against the in-memory repository: create, update,
 * equivalence, rebase, cherry-pick fallback, unwinding and scoped capture.
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { BranchSynchronizer, resolveBaseRef } from '../src/sync/branch-synchronizer.js';
import { ChangeCapture } from '../src/sync/change-capture.js';
import { RemoteSubmitter } from '../src/sync/remote-submitter.js';
import { ConflictUnresolved, InvalidBaseReference, VersionControlFailure } from '../src/types/errors.js';
import type { SyncOutcome } from '../src/types/sync.js';
import { InMemoryRepository, type Files } from './mocks/in-memory-repository.js';

const BRANCH = 'branchsync/patch';
const author = { name: 'Test Author', email: 'author@example.com' };
const committer = { name: 'Test Committer', email: 'committer@example.com' };

interface SyncOptions {
  base?: string;
  pathspecs?: string[];
  deleteOnEmpty?: boolean;
}

async function sync(repo: InMemoryRepository, options: SyncOptions = {}): Promise<SyncOutcome> {
  const base = await resolveBaseRef(repo, options.base, 'origin');
  const changeSet = await new ChangeCapture(repo).capture({
    pathspecs: options.pathspecs ?? [],
    message: 'Update generated files',
    author,
    committer,
  });
  let counter = 0;
  const synchronizer = new BranchSynchronizer(repo, { ephemeralName: () => `tmp-${++counter}` });
  return synchronizer.synchronize({
    branch: BRANCH,
    base,
    changeSet,
    remote: 'origin',
    deleteOnEmpty: options.deleteOnEmpty ?? false,
  });
}

async function syncAndPush(repo: InMemoryRepository, options: SyncOptions = {}): Promise<SyncOutcome> {
  const outcome = await sync(repo, options);
  await new RemoteSubmitter(repo).push(outcome, 'origin');
  return outcome;
}

/** Commit `files` directly on the checked-out branch */
async function commitOnCurrent(repo: InMemoryRepository, files: Files, message = 'Base change'): Promise<string> {
  for (const [path, content] of Object.entries(files)) {
    repo.writeFile(path, content);
  }
  return repo.stageAndCommit({ pathspecs: Object.keys(files), message, author, committer });
}

describe('resolveBaseRef', () => {
  it('should use the current branch when no base is given', async () => {
    const repo = InMemoryRepository.create();
    const root = repo.branchTip('main');

    const base = await resolveBaseRef(repo, undefined, 'origin');

    expect(base).toEqual({ kind: 'current', name: 'main', sha: root });
  });

  it('should use the commit as name when HEAD is detached', async () => {
    const repo = InMemoryRepository.create();
    const root = repo.branchTip('main') ?? '';
    await repo.checkout(root);

    const base = await resolveBaseRef(repo, undefined, 'origin');

    expect(base).toEqual({ kind: 'current', name: root, sha: root });
  });

  it('should fetch a base that only exists on the remote', async () => {
    const repo = InMemoryRepository.create();
    const release = repo.advanceRemote('release', { 'VERSION': '2.0.0\n' }, 'Release 2.0.0');

    const base = await resolveBaseRef(repo, 'release', 'origin');

    expect(base).toEqual({ kind: 'branch', name: 'release', sha: release });
    expect(repo.calls).toContain('fetch');
  });

  it('should reject a base that resolves nowhere', async () => {
    const repo = InMemoryRepository.create();

    await expect(resolveBaseRef(repo, 'no-such-branch', 'origin')).rejects.toBeInstanceOf(InvalidBaseReference);
  });
});

describe('BranchSynchronizer', () => {
  let repo: InMemoryRepository;

  beforeEach(() => {
    repo = InMemoryRepository.create({ files: { 'README.md': 'a\n', 'notes.txt': 'n\n' } });
  });

  describe('empty change sets', () => {
    it('should do nothing when there are no changes and no branch', async () => {
      const root = repo.branchTip('main');

      const outcome = await sync(repo);

      expect(outcome).toEqual({
        operation: 'not-updated',
        branch: BRANCH,
        headSha: root,
        baseSha: root,
        rewritten: false,
        hasDiffWithBase: false,
      });
      expect(repo.localBranches()).toEqual(['main']);
      expect(repo.calls).not.toContain('createBranch');
      expect(repo.calls).not.toContain('stageAndCommit');
    });

    it('should leave a published branch alone without deleteOnEmpty', async () => {
      repo.writeFile('report.txt', 'v1\n');
      const created = await syncAndPush(repo);
      repo.deleteFile('report.txt');

      const outcome = await sync(repo);

      expect(outcome.operation).toBe('not-updated');
      expect(outcome.headSha).toBe(created.headSha);
      expect(outcome.previousTip).toBe(created.headSha);
      expect(outcome.hasDiffWithBase).toBe(true);
    });

    it('should close a published branch with deleteOnEmpty', async () => {
      repo.writeFile('report.txt', 'v1\n');
      const created = await syncAndPush(repo);
      repo.deleteFile('report.txt');

      const outcome = await sync(repo, { deleteOnEmpty: true });

      expect(outcome.operation).toBe('closed');
      expect(outcome.previousTip).toBe(created.headSha);
    });

    it('should treat changes already contained in the base as empty', async () => {
      const root = repo.branchTip('main') ?? '';
      const mainTip = await commitOnCurrent(repo, { 'report.txt': 'v1\n' }, 'Report on main');
      await repo.checkout(root);
      repo.writeFile('report.txt', 'v1\n');

      const outcome = await sync(repo, { base: 'main' });

      expect(outcome.operation).toBe('not-updated');
      expect(outcome.headSha).toBe(mainTip);
      expect(repo.branchTip(BRANCH)).toBeUndefined();
      expect(await repo.currentRef()).toEqual({ kind: 'detached', sha: root });
      expect(repo.readFile('report.txt')).toBe('v1\n');
    });
  });

  describe('create from scratch', () => {
    it('should create the branch from the base with exactly the captured change', async () => {
      const root = repo.branchTip('main') ?? '';
      repo.writeFile('report.txt', 'v1\n');

      const outcome = await sync(repo);

      expect(outcome.operation).toBe('created');
      expect(outcome.rewritten).toBe(false);
      expect(outcome.hasDiffWithBase).toBe(true);
      expect(repo.branchTip(BRANCH)).toBe(outcome.headSha);
      expect(repo.commitInfo(outcome.headSha)).toEqual({
        parents: [root],
        message: 'Update generated files',
        author,
        committer,
      });
      expect(repo.filesAt(outcome.headSha)).toEqual({ 'README.md': 'a\n', 'notes.txt': 'n\n', 'report.txt': 'v1\n' });
    });

    it('should hand back the original checkout and pending edits', async () => {
      repo.writeFile('report.txt', 'v1\n');

      await sync(repo);

      expect(await repo.currentRef()).toEqual({ kind: 'branch', name: 'main' });
      expect(repo.workingFiles()).toEqual({ 'README.md': 'a\n', 'notes.txt': 'n\n', 'report.txt': 'v1\n' });
      expect(await repo.listChanges([])).toEqual(['report.txt']);
      expect(repo.localBranches()).toEqual([BRANCH, 'main']);
    });

    it('should apply the change onto an explicit base different from HEAD', async () => {
      await repo.createBranch('feature', 'main');
      await commitOnCurrent(repo, { 'feature.txt': 'f\n' }, 'Feature work');
      repo.writeFile('report.txt', 'v1\n');
      const mainTip = repo.branchTip('main') ?? '';

      const outcome = await sync(repo, { base: 'main' });

      expect(outcome.operation).toBe('created');
      expect(repo.commitInfo(outcome.headSha).parents).toEqual([mainTip]);
      expect(repo.filesAt(outcome.headSha)).toEqual({ 'README.md': 'a\n', 'notes.txt': 'n\n', 'report.txt': 'v1\n' });
      expect(await repo.currentRef()).toEqual({ kind: 'branch', name: 'feature' });
      expect(repo.readFile('feature.txt')).toBe('f\n');
    });
  });

  describe('idempotence', () => {
    it('should report not-updated and push nothing on a second run with the same changes', async () => {
      repo.writeFile('report.txt', 'v1\n');
      const first = await syncAndPush(repo);
      const remoteTip = repo.server().branches.get(BRANCH);

      const second = await syncAndPush(repo);

      expect(second.operation).toBe('not-updated');
      expect(second.headSha).toBe(first.headSha);
      expect(repo.server().branches.get(BRANCH)).toBe(remoteTip);
      expect(repo.branchTip(BRANCH)).toBe(first.headSha);
      expect(repo.workingFiles()).toEqual({ 'README.md': 'a\n', 'notes.txt': 'n\n', 'report.txt': 'v1\n' });
    });
  });

  describe('update by equivalent tree', () => {
    it('should leave a branch whose tree already holds the change', async () => {
      repo.writeFile('report.txt', 'v1\n');
      const root = repo.branchTip('main') ?? '';
      // Same content published by someone else, under a different commit
      const foreign = repo.advanceRemote(BRANCH, { 'README.md': 'a\n', 'notes.txt': 'n\n', 'report.txt': 'v1\n' });

      const outcome = await sync(repo);

      expect(outcome.operation).toBe('not-updated');
      expect(outcome.headSha).toBe(foreign);
      expect(outcome.previousTip).toBe(foreign);
      expect(repo.branchTip(BRANCH)).toBe(foreign);
      expect(repo.commitInfo(foreign).parents).toEqual([]);
      expect(repo.branchTip('main')).toBe(root);
    });
  });

  describe('update', () => {
    it('should fast-forward when the base has not moved', async () => {
      repo.writeFile('report.txt', 'v1\n');
      const created = await syncAndPush(repo);
      repo.writeFile('report.txt', 'v2\n');

      const outcome = await syncAndPush(repo);

      expect(outcome.operation).toBe('updated');
      expect(outcome.rewritten).toBe(false);
      expect(outcome.previousTip).toBe(created.headSha);
      expect(repo.commitInfo(outcome.headSha).parents).toEqual([created.headSha]);
      expect(repo.filesAt(outcome.headSha)['report.txt']).toBe('v2\n');
      expect(repo.server().branches.get(BRANCH)).toBe(outcome.headSha);
    });

    it('should drop what an earlier run changed once the change set no longer touches it', async () => {
      repo.writeFile('README.md', 'b\n');
      repo.writeFile('notes.txt', 'N\n');
      repo.writeFile('report.txt', 'v1\n');
      const created = await syncAndPush(repo);
      repo.writeFile('README.md', 'c\n');
      repo.writeFile('notes.txt', 'n\n');
      repo.deleteFile('report.txt');

      const outcome = await syncAndPush(repo);

      expect(outcome.operation).toBe('updated');
      expect(outcome.rewritten).toBe(false);
      expect(repo.commitInfo(outcome.headSha).parents).toEqual([created.headSha]);
      expect(repo.filesAt(outcome.headSha)).toEqual({ 'README.md': 'c\n', 'notes.txt': 'n\n' });
      expect(repo.workingFiles()).toEqual({ 'README.md': 'c\n', 'notes.txt': 'n\n' });
    });

    it('should rebase onto a moved base and push with a lease', async () => {
      repo.writeFile('report.txt', 'v1\n');
      const created = await syncAndPush(repo);
      const moved = await commitOnCurrent(repo, { 'CHANGELOG.md': '1.1\n' });
      repo.writeFile('report.txt', 'v2\n');

      const outcome = await syncAndPush(repo);

      expect(outcome.operation).toBe('updated');
      expect(outcome.rewritten).toBe(true);
      expect(outcome.previousTip).toBe(created.headSha);
      expect(repo.filesAt(outcome.headSha)).toEqual({
        'CHANGELOG.md': '1.1\n',
        'README.md': 'a\n',
        'notes.txt': 'n\n',
        'report.txt': 'v2\n',
      });
      expect(repo.history(outcome.headSha).slice(2)).toEqual(repo.history(moved));
      expect(repo.server().branches.get(BRANCH)).toBe(outcome.headSha);
    });
  });

  describe('conflict fallback', () => {
    it('should cherry-pick onto the existing tip when the rebase conflicts', async () => {
      repo.writeFile('README.md', 'b\n');
      const created = await syncAndPush(repo);
      await commitOnCurrent(repo, { 'README.md': 'c\n' });
      repo.writeFile('README.md', 'd\n');

      const outcome = await syncAndPush(repo);

      expect(outcome.operation).toBe('updated');
      expect(outcome.rewritten).toBe(false);
      expect(repo.commitInfo(outcome.headSha).parents).toEqual([created.headSha]);
      expect(repo.filesAt(outcome.headSha)['README.md']).toBe('d\n');
      expect(repo.calls).toContain('abortRebase');
      expect(repo.isOperationInProgress()).toBe(false);
      expect(repo.server().branches.get(BRANCH)).toBe(outcome.headSha);
    });
  });

  describe('unwind on fatal conflict', () => {
    it('should restore branch, checkout and edits when both strategies conflict', async () => {
      repo.deleteFile('notes.txt');
      const created = await syncAndPush(repo);
      await commitOnCurrent(repo, { 'notes.txt': 'x\n' });
      repo.writeFile('notes.txt', 'm\n');

      const error = await sync(repo).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConflictUnresolved);
      expect(error).toMatchObject({ kind: 'conflict_unresolved', step: 'cherry-pick-fallback', branch: BRANCH });
      expect(repo.branchTip(BRANCH)).toBe(created.headSha);
      expect(repo.server().branches.get(BRANCH)).toBe(created.headSha);
      expect(await repo.currentRef()).toEqual({ kind: 'branch', name: 'main' });
      expect(repo.readFile('notes.txt')).toBe('m\n');
      expect(repo.localBranches()).toEqual([BRANCH, 'main']);
      expect(repo.isOperationInProgress()).toBe(false);
      expect(repo.stashCount()).toBe(0);
    });

    it('should restore a local-only branch after a failure while creating', async () => {
      await repo.createBranch(BRANCH, 'main');
      await repo.checkout('main');
      const previous = repo.branchTip(BRANCH);
      repo.writeFile('report.txt', 'v1\n');
      repo.failOn('treeHash', 'fatal: unable to read tree');

      const error = await sync(repo).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(VersionControlFailure);
      expect(error).toMatchObject({ step: 'create' });
      expect(repo.branchTip(BRANCH)).toBe(previous);
      expect(await repo.currentRef()).toEqual({ kind: 'branch', name: 'main' });
      expect(repo.readFile('report.txt')).toBe('v1\n');
      expect(repo.localBranches()).toEqual([BRANCH, 'main']);
    });

    it('should delete a branch it created when a later step fails', async () => {
      repo.writeFile('report.txt', 'v1\n');
      repo.failOn('treeHash');

      await expect(sync(repo)).rejects.toMatchObject({ step: 'create' });

      expect(repo.branchTip(BRANCH)).toBeUndefined();
      expect(repo.localBranches()).toEqual(['main']);
    });
  });

  describe('scoped capture isolation', () => {
    it('should commit only in-scope paths and keep the rest in the working tree', async () => {
      repo.writeFile('docs/guide.md', 'guide\n');
      repo.writeFile('src/app.ts', 'export {};\n');

      const outcome = await sync(repo, { pathspecs: ['docs'] });

      expect(outcome.operation).toBe('created');
      expect(repo.filesAt(outcome.headSha)).toEqual({
        'README.md': 'a\n',
        'docs/guide.md': 'guide\n',
        'notes.txt': 'n\n',
      });
      expect(repo.workingFiles()).toEqual({
        'README.md': 'a\n',
        'docs/guide.md': 'guide\n',
        'notes.txt': 'n\n',
        'src/app.ts': 'export {};\n',
      });
      expect(repo.stashCount()).toBe(0);
    });

    it('should leave out paths the caller staged outside the scope', async () => {
      repo.writeFile('docs/guide.md', 'guide\n');
      repo.writeFile('notes.txt', 'staged\n');
      repo.stageFile('notes.txt');

      const outcome = await sync(repo, { pathspecs: ['docs'] });

      expect(outcome.operation).toBe('created');
      expect(repo.filesAt(outcome.headSha)).toEqual({
        'README.md': 'a\n',
        'docs/guide.md': 'guide\n',
        'notes.txt': 'n\n',
      });
      expect(repo.readFile('notes.txt')).toBe('staged\n');
      expect(repo.readFile('docs/guide.md')).toBe('guide\n');
    });

    it('should ignore out-of-scope edits when nothing is in scope', async () => {
      repo.writeFile('src/app.ts', 'export {};\n');

      const outcome = await sync(repo, { pathspecs: ['docs'] });

      expect(outcome.operation).toBe('not-updated');
      expect(repo.branchTip(BRANCH)).toBeUndefined();
      expect(repo.readFile('src/app.ts')).toBe('export {};\n');
    });
  });
});
