/**
 * GitHub pull request service tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { toGitHubError } from '../src/github/client.js';
import { GitHubPullRequestService, stripTeamOrg } from '../src/github/pull-requests.js';
import { GitHubError, GitHubErrorCode } from '../src/types/github.js';
import { FakeGitHubApi, pullRequestPayload } from './mocks/github-api.js';

const REPO = { owner: 'acme', repo: 'widgets' };

describe('GitHubPullRequestService', () => {
  let api: FakeGitHubApi;
  let service: GitHubPullRequestService;

  beforeEach(() => {
    api = new FakeGitHubApi();
    service = new GitHubPullRequestService(api.client(), REPO);
  });

  describe('findOpenPullRequest', () => {
    it('should query open pull requests for head and base', async () => {
      api.on('GET', '/repos/acme/widgets/pulls', { body: [pullRequestPayload(7, { draft: true })] });

      const pr = await service.findOpenPullRequest('acme:branchsync/patch', 'main');

      expect(pr).toEqual({
        number: 7,
        url: 'https://github.com/acme/widgets/pull/7',
        title: 'Changes by branchsync',
        state: 'open',
        head: 'branchsync/patch',
        base: 'main',
        draft: true,
        nodeId: 'PR_node7',
      });
      expect(api.requests[0]?.query).toEqual({
        state: 'open',
        head: 'acme:branchsync/patch',
        base: 'main',
        per_page: '1',
      });
    });

    it('should return null when there is none', async () => {
      api.on('GET', '/repos/acme/widgets/pulls', { body: [] });

      expect(await service.findOpenPullRequest('acme:branchsync/patch', 'main')).toBeNull();
    });
  });

  describe('createPullRequest', () => {
    it('should send the pull request fields', async () => {
      api.on('POST', '/repos/acme/widgets/pulls', { status: 201, body: pullRequestPayload(8) });

      const pr = await service.createPullRequest({
        title: 'Changes by branchsync',
        head: 'acme:branchsync/patch',
        base: 'main',
      });

      expect(pr.number).toBe(8);
      expect(api.requests[0]?.body).toEqual({
        title: 'Changes by branchsync',
        head: 'acme:branchsync/patch',
        base: 'main',
        draft: false,
        maintainer_can_modify: true,
      });
    });

    it('should include the body when given', async () => {
      api.on('POST', '/repos/acme/widgets/pulls', { status: 201, body: pullRequestPayload(8) });

      await service.createPullRequest({
        title: 'T',
        body: 'Generated by the nightly job',
        head: 'bot:branchsync/patch',
        base: 'main',
        draft: true,
        maintainerCanModify: false,
      });

      expect(api.requests[0]?.body).toEqual({
        title: 'T',
        body: 'Generated by the nightly job',
        head: 'bot:branchsync/patch',
        base: 'main',
        draft: true,
        maintainer_can_modify: false,
      });
    });

    it('should map validation failures', async () => {
      api.on('POST', '/repos/acme/widgets/pulls', {
        status: 422,
        body: { message: 'Validation Failed', errors: [{ message: 'A pull request already exists' }] },
      });

      const error = await service
        .createPullRequest({ title: 'T', head: 'acme:branchsync/patch', base: 'main' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitHubError);
      expect(error).toMatchObject({ code: GitHubErrorCode.VALIDATION_FAILED, statusCode: 422 });
    });
  });

  describe('update and close', () => {
    it('should only send the fields given', async () => {
      api.on('PATCH', '/repos/acme/widgets/pulls/7', { body: pullRequestPayload(7, { title: 'New title' }) });

      const pr = await service.updatePullRequest(7, { title: 'New title' });

      expect(pr.title).toBe('New title');
      expect(api.requests[0]?.body).toEqual({ title: 'New title' });
    });

    it('should close by setting the state', async () => {
      api.on('PATCH', '/repos/acme/widgets/pulls/7', { body: pullRequestPayload(7, { state: 'closed' }) });

      await service.closePullRequest(7);

      expect(api.requests[0]?.body).toEqual({ state: 'closed' });
    });
  });

  describe('metadata', () => {
    it('should add labels and assignees', async () => {
      api.on('POST', '/repos/acme/widgets/issues/7/labels', { body: [] });
      api.on('POST', '/repos/acme/widgets/issues/7/assignees', { status: 201, body: {} });

      await service.addLabels(7, ['automated', 'deps']);
      await service.addAssignees(7, ['octo']);

      expect(api.requests.map((r) => [r.method, r.path, r.body])).toEqual([
        ['POST', '/repos/acme/widgets/issues/7/labels', { labels: ['automated', 'deps'] }],
        ['POST', '/repos/acme/widgets/issues/7/assignees', { assignees: ['octo'] }],
      ]);
    });

    it('should skip empty metadata without calling the API', async () => {
      await service.addLabels(7, []);
      await service.addAssignees(7, []);
      await service.requestReviewers(7, [], []);
      await service.setMilestone(7, 0);

      expect(api.requests).toEqual([]);
    });

    it('should request reviewers with team slugs', async () => {
      api.on('POST', '/repos/acme/widgets/pulls/7/requested_reviewers', { status: 201, body: pullRequestPayload(7) });

      await service.requestReviewers(7, ['alice'], ['acme/platform', 'docs']);

      expect(api.requests[0]?.body).toEqual({ reviewers: ['alice'], team_reviewers: ['platform', 'docs'] });
    });

    it('should set the milestone through the issues API', async () => {
      api.on('PATCH', '/repos/acme/widgets/issues/7', { body: {} });

      await service.setMilestone(7, 3);

      expect(api.requests[0]?.body).toEqual({ milestone: 3 });
    });
  });

  describe('convertToDraft', () => {
    it('should call the GraphQL mutation with the node id', async () => {
      api.on('POST', '/graphql', { body: { data: { convertPullRequestToDraft: { pullRequest: { isDraft: true } } } } });

      await service.convertToDraft('PR_node7');

      expect(api.requests[0]?.body).toMatchObject({ variables: { pullRequestId: 'PR_node7' } });
    });
  });

  describe('isCommitVerified', () => {
    it('should read the verification flag', async () => {
      api.on('GET', '/repos/acme/widgets/commits/abc123', {
        body: { sha: 'abc123', commit: { verification: { verified: true, reason: 'valid' } } },
      });

      expect(await service.isCommitVerified('abc123')).toBe(true);
    });

    it('should be false without verification data', async () => {
      api.on('GET', '/repos/acme/widgets/commits/abc123', { body: { sha: 'abc123', commit: {} } });

      expect(await service.isCommitVerified('abc123')).toBe(false);
    });
  });

  describe('error mapping', () => {
    it('should report authentication failures', async () => {
      api.on('GET', '/repos/acme/widgets/pulls', { status: 401, body: { message: 'Bad credentials' } });

      const error = await service.findOpenPullRequest('acme:x', 'main').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitHubError);
      expect(error).toMatchObject({
        code: GitHubErrorCode.UNAUTHORIZED,
        statusCode: 401,
        message: 'Failed to look up pull requests for acme:x: authentication failed',
      });
    });

    it('should treat server errors as retryable', async () => {
      api.on('GET', '/repos/acme/widgets/pulls', { status: 502, body: { message: 'Bad Gateway' } });

      const error = await service.findOpenPullRequest('acme:x', 'main').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitHubError);
      expect(error).toMatchObject({ code: GitHubErrorCode.SERVER_ERROR, retryable: true });
    });
  });
});

describe('toGitHubError', () => {
  const withStatus = (message: string, status: number) => Object.assign(new Error(message), { status });

  it('should map HTTP statuses to codes', () => {
    expect(toGitHubError(withStatus('Forbidden', 403), 'op').code).toBe(GitHubErrorCode.FORBIDDEN);
    expect(toGitHubError(withStatus('API rate limit exceeded', 403), 'op').code).toBe(GitHubErrorCode.RATE_LIMITED);
    expect(toGitHubError(withStatus('Not Found', 404), 'op').code).toBe(GitHubErrorCode.NOT_FOUND);
    expect(toGitHubError(withStatus('Too Many Requests', 429), 'op').code).toBe(GitHubErrorCode.RATE_LIMITED);
    expect(toGitHubError(withStatus('Service Unavailable', 503), 'op').code).toBe(GitHubErrorCode.SERVER_ERROR);
  });

  it('should treat errors without a status as network errors', () => {
    const error = toGitHubError(new Error('socket hang up'), 'Failed to close pull request #7');

    expect(error.code).toBe(GitHubErrorCode.NETWORK_ERROR);
    expect(error.message).toBe('Failed to close pull request #7: socket hang up');
  });

  it('should pass GitHubErrors through', () => {
    const original = new GitHubError('x', GitHubErrorCode.NOT_FOUND, 404);

    expect(toGitHubError(original, 'op')).toBe(original);
  });
});

describe('stripTeamOrg', () => {
  it('should drop the organization prefix', () => {
    expect(stripTeamOrg('acme/platform')).toBe('platform');
    expect(stripTeamOrg('platform')).toBe('platform');
  });
});
