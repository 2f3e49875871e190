import { Octokit } from '@octokit/rest';
import { GitHubError, GitHubErrorCode, gitHubConfigSchema, type GitHubConfig } from '../types/github.js';

const USER_AGENT = 'branchsync/0.1.0';

/**
 * Create an authenticated Octokit client
 */
export function createGitHubClient(config: GitHubConfig): Octokit {
  const validated = gitHubConfigSchema.parse(config);

  const options: ConstructorParameters<typeof Octokit>[0] = {
    auth: validated.token,
    userAgent: USER_AGENT,
  };

  if (validated.baseUrl) {
    options.baseUrl = validated.baseUrl;
  }

  return new Octokit(options);
}

/**
 * HTTP status of an Octokit request error, if it has one
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Map an Octokit failure to a GitHubError
 */
export function toGitHubError(error: unknown, context: string): GitHubError {
  if (error instanceof GitHubError) {
    return error;
  }

  const detail = error instanceof Error ? error.message : String(error);
  const status = getErrorStatus(error);
  const message = `${context}: ${detail}`;

  if (status === undefined) {
    return new GitHubError(message, GitHubErrorCode.NETWORK_ERROR);
  }
  if (status === 401) {
    return new GitHubError(`${context}: authentication failed`, GitHubErrorCode.UNAUTHORIZED, status);
  }
  if (status === 403) {
    return /rate limit/i.test(detail)
      ? new GitHubError(message, GitHubErrorCode.RATE_LIMITED, status)
      : new GitHubError(`${context}: token lacks required permissions`, GitHubErrorCode.FORBIDDEN, status);
  }
  if (status === 404) {
    return new GitHubError(message, GitHubErrorCode.NOT_FOUND, status);
  }
  if (status === 422) {
    return new GitHubError(message, GitHubErrorCode.VALIDATION_FAILED, status);
  }
  if (status === 429) {
    return new GitHubError(message, GitHubErrorCode.RATE_LIMITED, status);
  }
  if (status >= 500) {
    return new GitHubError(message, GitHubErrorCode.SERVER_ERROR, status);
  }
  return new GitHubError(message, GitHubErrorCode.NETWORK_ERROR, status);
}
