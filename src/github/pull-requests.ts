/**
 * Pull request operations against the GitHub REST and GraphQL APIs.
 */

import type { Octokit } from '@octokit/rest';
import {
  createPullRequestOptionsSchema,
  gitHubPullRequestSchema,
  type CreatePullRequestOptions,
  type GitHubPullRequest,
  type RepositoryCoordinates,
  type UpdatePullRequestOptions,
} from '../types/github.js';
import { createLogger } from '../utils/logger.js';
import { toGitHubError } from './client.js';

const log = createLogger('pull-requests');

/**
 * Hosting-service operations the orchestrator needs
 */
export interface PullRequestService {
  /** Open pull request from `head` (`owner:branch`) into `base`, if any */
  findOpenPullRequest(head: string, base: string): Promise<GitHubPullRequest | null>;
  createPullRequest(options: CreatePullRequestOptions): Promise<GitHubPullRequest>;
  updatePullRequest(pullNumber: number, options: UpdatePullRequestOptions): Promise<GitHubPullRequest>;
  closePullRequest(pullNumber: number): Promise<void>;
  addLabels(pullNumber: number, labels: string[]): Promise<void>;
  addAssignees(pullNumber: number, assignees: string[]): Promise<void>;
  requestReviewers(pullNumber: number, reviewers: string[], teamReviewers: string[]): Promise<void>;
  setMilestone(pullNumber: number, milestone: number): Promise<void>;
  convertToDraft(nodeId: string): Promise<void>;
  isCommitVerified(sha: string): Promise<boolean>;
}

/**
 * Fields we read from any pull request payload
 */
interface PullRequestData {
  number: number;
  html_url: string;
  title: string;
  state: string;
  draft?: boolean | undefined;
  node_id: string;
  head: { ref: string };
  base: { ref: string };
}

function toPullRequest(data: PullRequestData): GitHubPullRequest {
  return gitHubPullRequestSchema.parse({
    number: data.number,
    url: data.html_url,
    title: data.title,
    state: data.state,
    head: data.head.ref,
    base: data.base.ref,
    draft: data.draft ?? false,
    nodeId: data.node_id,
  });
}

/**
 * Team slugs may be given as `org/team`; the API wants the slug only
 */
export function stripTeamOrg(team: string): string {
  const slash = team.lastIndexOf('/');
  return slash === -1 ? team : team.slice(slash + 1);
}

const CONVERT_TO_DRAFT_MUTATION = `
  mutation($pullRequestId: ID!) {
    convertPullRequestToDraft(input: { pullRequestId: $pullRequestId }) {
      pullRequest { isDraft }
    }
  }
`;

export class GitHubPullRequestService implements PullRequestService {
  constructor(
    private readonly client: Octokit,
    private readonly repository: RepositoryCoordinates
  ) {}

  async findOpenPullRequest(head: string, base: string): Promise<GitHubPullRequest | null> {
    try {
      const { data } = await this.client.rest.pulls.list({
        ...this.repository,
        state: 'open',
        head,
        base,
        per_page: 1,
      });
      const [first] = data;
      return first ? toPullRequest(first) : null;
    } catch (error) {
      throw toGitHubError(error, `Failed to look up pull requests for ${head}`);
    }
  }

  async createPullRequest(options: CreatePullRequestOptions): Promise<GitHubPullRequest> {
    const validated = createPullRequestOptionsSchema.parse(options);
    try {
      const params: Parameters<Octokit['rest']['pulls']['create']>[0] = {
        ...this.repository,
        title: validated.title,
        head: validated.head,
        base: validated.base,
        draft: validated.draft,
        maintainer_can_modify: validated.maintainerCanModify,
      };
      if (validated.body) {
        params.body = validated.body;
      }
      const { data } = await this.client.rest.pulls.create(params);
      log.info({ number: data.number, head: validated.head, base: validated.base }, 'Created pull request');
      return toPullRequest(data);
    } catch (error) {
      throw toGitHubError(error, 'Failed to create pull request');
    }
  }

  async updatePullRequest(pullNumber: number, options: UpdatePullRequestOptions): Promise<GitHubPullRequest> {
    try {
      const { data } = await this.client.rest.pulls.update({
        ...this.repository,
        pull_number: pullNumber,
        ...(options.title !== undefined ? { title: options.title } : {}),
        ...(options.body !== undefined ? { body: options.body } : {}),
      });
      log.info({ number: pullNumber }, 'Updated pull request');
      return toPullRequest(data);
    } catch (error) {
      throw toGitHubError(error, `Failed to update pull request #${pullNumber}`);
    }
  }

  async closePullRequest(pullNumber: number): Promise<void> {
    try {
      await this.client.rest.pulls.update({ ...this.repository, pull_number: pullNumber, state: 'closed' });
      log.info({ number: pullNumber }, 'Closed pull request');
    } catch (error) {
      throw toGitHubError(error, `Failed to close pull request #${pullNumber}`);
    }
  }

  async addLabels(pullNumber: number, labels: string[]): Promise<void> {
    if (labels.length === 0) return;
    try {
      await this.client.rest.issues.addLabels({ ...this.repository, issue_number: pullNumber, labels });
    } catch (error) {
      throw toGitHubError(error, `Failed to add labels to #${pullNumber}`);
    }
  }

  async addAssignees(pullNumber: number, assignees: string[]): Promise<void> {
    if (assignees.length === 0) return;
    try {
      await this.client.rest.issues.addAssignees({ ...this.repository, issue_number: pullNumber, assignees });
    } catch (error) {
      throw toGitHubError(error, `Failed to add assignees to #${pullNumber}`);
    }
  }

  async requestReviewers(pullNumber: number, reviewers: string[], teamReviewers: string[]): Promise<void> {
    if (reviewers.length === 0 && teamReviewers.length === 0) return;
    try {
      await this.client.rest.pulls.requestReviewers({
        ...this.repository,
        pull_number: pullNumber,
        reviewers,
        team_reviewers: teamReviewers.map(stripTeamOrg),
      });
    } catch (error) {
      throw toGitHubError(error, `Failed to request reviewers on #${pullNumber}`);
    }
  }

  async setMilestone(pullNumber: number, milestone: number): Promise<void> {
    if (milestone <= 0) return;
    try {
      await this.client.rest.issues.update({ ...this.repository, issue_number: pullNumber, milestone });
    } catch (error) {
      throw toGitHubError(error, `Failed to set milestone on #${pullNumber}`);
    }
  }

  async convertToDraft(nodeId: string): Promise<void> {
    try {
      await this.client.graphql(CONVERT_TO_DRAFT_MUTATION, { pullRequestId: nodeId });
    } catch (error) {
      throw toGitHubError(error, 'Failed to convert pull request to draft');
    }
  }

  async isCommitVerified(sha: string): Promise<boolean> {
    try {
      const { data } = await this.client.rest.repos.getCommit({ ...this.repository, ref: sha });
      return data.commit.verification?.verified ?? false;
    } catch (error) {
      throw toGitHubError(error, `Failed to read commit ${sha}`);
    }
  }
}
