import { z } from 'zod';

// ============================================================================
// GitHub Configuration
// ============================================================================

/**
 * Configuration for GitHub API client
 */
export const gitHubConfigSchema = z.object({
  /** Token with contents and pull-requests write access */
  token: z.string().min(1),
  /** Base URL for GitHub API (for Enterprise, defaults to api.github.com) */
  baseUrl: z.string().url().optional(),
});

export type GitHubConfig = z.infer<typeof gitHubConfigSchema>;

/**
 * owner/repo pair
 */
export interface RepositoryCoordinates {
  owner: string;
  repo: string;
}

// ============================================================================
// GitHub Pull Request
// ============================================================================

export const PullRequestState = {
  OPEN: 'open',
  CLOSED: 'closed',
} as const;

export type PullRequestState = (typeof PullRequestState)[keyof typeof PullRequestState];

export const gitHubPullRequestSchema = z.object({
  number: z.number(),
  url: z.string().url(),
  title: z.string(),
  state: z.enum(['open', 'closed']),
  /** Source branch */
  head: z.string(),
  /** Target branch */
  base: z.string(),
  draft: z.boolean(),
  /** GraphQL node id, needed for draft conversion */
  nodeId: z.string(),
});

export type GitHubPullRequest = z.infer<typeof gitHubPullRequestSchema>;

/**
 * Options for creating a pull request
 */
export const createPullRequestOptionsSchema = z.object({
  title: z.string(),
  body: z.string().optional(),
  /** Source branch, `owner:branch` when pushing from a fork */
  head: z.string(),
  base: z.string(),
  draft: z.boolean().default(false),
  maintainerCanModify: z.boolean().default(true),
});

export type CreatePullRequestOptions = z.input<typeof createPullRequestOptionsSchema>;

export interface UpdatePullRequestOptions {
  title?: string;
  body?: string;
}

/**
 * Metadata applied after a pull request is created or updated
 */
export interface PullRequestMetadata {
  labels: string[];
  assignees: string[];
  reviewers: string[];
  teamReviewers: string[];
  /** 0 means no milestone */
  milestone: number;
}

// ============================================================================
// GitHub Error Types
// ============================================================================

export const GitHubErrorCode = {
  /** Token is invalid or expired */
  UNAUTHORIZED: 'unauthorized',
  /** Token lacks required permissions */
  FORBIDDEN: 'forbidden',
  NOT_FOUND: 'not_found',
  /** Validation error (e.g., PR already exists, no commits between branches) */
  VALIDATION_FAILED: 'validation_failed',
  RATE_LIMITED: 'rate_limited',
  /** 5xx responses */
  SERVER_ERROR: 'server_error',
  /** Network or other error */
  NETWORK_ERROR: 'network_error',
} as const;

export type GitHubErrorCode = (typeof GitHubErrorCode)[keyof typeof GitHubErrorCode];

/**
 * GitHub API error
 */
export class GitHubError extends Error {
  constructor(
    message: string,
    public readonly code: GitHubErrorCode,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'GitHubError';
  }

  /**
   * Transient failures that an idempotent call may retry
   */
  get retryable(): boolean {
    return (
      this.code === GitHubErrorCode.SERVER_ERROR ||
      this.code === GitHubErrorCode.RATE_LIMITED ||
      this.code === GitHubErrorCode.NETWORK_ERROR
    );
  }
}
