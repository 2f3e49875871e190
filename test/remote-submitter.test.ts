/**
 * RemoteSubmitter tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RemoteSubmitter } from '../src/sync/remote-submitter.js';
import { ConcurrentUpdateRejected, ConfigurationError, VersionControlFailure } from '../src/types/errors.js';
import type { SyncOutcome } from '../src/types/sync.js';
import { InMemoryRepository } from './mocks/in-memory-repository.js';

const identity = { name: 'Test Author', email: 'author@example.com' };

describe('RemoteSubmitter', () => {
  let repo: InMemoryRepository;
  let submitter: RemoteSubmitter;
  let base: string;

  /** Commit a file on a new local branch and return to main */
  async function localBranch(name: string, content: string): Promise<string> {
    await repo.createBranch(name, 'main');
    repo.writeFile('report.txt', content);
    const sha = await repo.stageAndCommit({ pathspecs: [], message: 'Report', author: identity, committer: identity });
    await repo.checkout('main');
    return sha;
  }

  function outcome(overrides: Partial<SyncOutcome> & Pick<SyncOutcome, 'headSha'>): SyncOutcome {
    return {
      operation: 'created',
      branch: 'topic',
      baseSha: base,
      rewritten: false,
      hasDiffWithBase: true,
      ...overrides,
    };
  }

  beforeEach(() => {
    repo = InMemoryRepository.create();
    submitter = new RemoteSubmitter(repo);
    base = repo.branchTip('main') ?? '';
  });

  describe('prepare', () => {
    it('should push to origin by default', async () => {
      expect(await submitter.prepare()).toBe('origin');
      expect(repo.calls).not.toContain('setRemote');
    });

    it('should point a fork remote at the fork on the same host', async () => {
      expect(await submitter.prepare('bot/widgets')).toBe('fork');
      expect(await repo.getRemoteUrl('fork')).toBe('https://github.com/bot/widgets');
    });

    it('should need an origin remote for forks', async () => {
      const bare = new InMemoryRepository();

      await expect(new RemoteSubmitter(bare).prepare('bot/widgets')).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe('push', () => {
    it('should publish a created branch and return the remote tip', async () => {
      const head = await localBranch('topic', 'v1');

      const tip = await submitter.push(outcome({ headSha: head }), 'origin');

      expect(tip).toBe(head);
      expect(repo.server().branches.get('topic')).toBe(head);
    });

    it('should not push outcomes that did not move the branch', async () => {
      const tip = await submitter.push(outcome({ operation: 'not-updated', headSha: base }), 'origin');

      expect(tip).toBeNull();
      expect(repo.calls).not.toContain('push');
    });

    it('should force-push rewritten history with a lease on the previous tip', async () => {
      const previous = await localBranch('topic', 'v1');
      await submitter.push(outcome({ headSha: previous }), 'origin');
      await repo.createBranch('topic', 'main');
      repo.writeFile('report.txt', 'v2');
      const rewritten = await repo.stageAndCommit({ pathspecs: [], message: 'Report', author: identity, committer: identity });
      await repo.checkout('main');

      const tip = await submitter.push(
        outcome({ operation: 'updated', headSha: rewritten, previousTip: previous, rewritten: true }),
        'origin'
      );

      expect(tip).toBe(rewritten);
      expect(repo.commitInfo(rewritten).parents).toEqual([base]);
    });

    it('should reject a lease the remote no longer matches', async () => {
      const previous = await localBranch('topic', 'v1');
      await submitter.push(outcome({ headSha: previous }), 'origin');
      repo.advanceRemote('topic', { 'other.txt': 'concurrent' });

      const error = await submitter
        .push(outcome({ operation: 'updated', headSha: previous, previousTip: previous, rewritten: true }), 'origin')
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConcurrentUpdateRejected);
      expect(error).toMatchObject({ kind: 'concurrent_update_rejected', step: 'push', retryable: true, branch: 'topic' });
    });

    it('should reject a fast-forward push when the remote moved', async () => {
      const head = await localBranch('topic', 'v1');
      repo.advanceRemote('topic', { 'other.txt': 'concurrent' });

      await expect(submitter.push(outcome({ operation: 'updated', headSha: head }), 'origin')).rejects.toBeInstanceOf(
        ConcurrentUpdateRejected
      );
    });

    it('should attribute git failures to the push step', async () => {
      const head = await localBranch('topic', 'v1');
      repo.failOn('push', 'fatal: unable to access remote');

      const error = await submitter.push(outcome({ headSha: head }), 'origin').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(VersionControlFailure);
      expect(error).toMatchObject({ step: 'push', message: 'git push failed: fatal: unable to access remote' });
    });
  });

  describe('deleteBranch', () => {
    it('should delete the remote branch', async () => {
      const head = await localBranch('topic', 'v1');
      await submitter.push(outcome({ headSha: head }), 'origin');

      await submitter.deleteBranch('topic', 'origin');

      expect(repo.server().branches.has('topic')).toBe(false);
    });
  });
});
