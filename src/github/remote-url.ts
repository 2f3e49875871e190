/**
 * Remote URL helpers: parsing, fork URLs, token auth header, redaction.
 */

import { ConfigurationError } from '../types/errors.js';
import type { RepositoryCoordinates } from '../types/github.js';

export type RemoteProtocol = 'https' | 'ssh' | 'git';

export interface RemoteDetail {
  protocol: RemoteProtocol;
  hostname: string;
  /** owner/repo, without .git */
  repository: string;
}

/**
 * Parse a git remote URL.
 *
 * Accepts https://[user@]host/owner/repo[.git], git@host:owner/repo[.git]
 * and git://host/owner/repo[.git].
 */
export function parseRemoteUrl(url: string): RemoteDetail {
  const trimmed = url.trim();

  const httpsMatch = trimmed.match(/^https:\/\/(?:[^@/]+@)?([^/]+)\/(.+?)(?:\.git)?\/?$/);
  if (httpsMatch?.[1] && httpsMatch[2]) {
    return { protocol: 'https', hostname: httpsMatch[1], repository: httpsMatch[2] };
  }

  const sshMatch = trimmed.match(/^(?:ssh:\/\/)?git@([^:/]+)[:/](.+?)(?:\.git)?$/);
  if (sshMatch?.[1] && sshMatch[2]) {
    return { protocol: 'ssh', hostname: sshMatch[1], repository: sshMatch[2] };
  }

  const gitMatch = trimmed.match(/^git:\/\/([^/]+)\/(.+?)(?:\.git)?$/);
  if (gitMatch?.[1] && gitMatch[2]) {
    return { protocol: 'git', hostname: gitMatch[1], repository: gitMatch[2] };
  }

  throw new ConfigurationError('remote', `Unsupported remote URL: ${stripTokenFromUrl(trimmed)}`);
}

/**
 * Split `owner/repo`
 */
export function parseRepository(repository: string): RepositoryCoordinates {
  const match = repository.trim().match(/^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+?)(?:\.git)?$/);
  if (!match?.[1] || !match[2]) {
    throw new ConfigurationError('repository', `Expected 'owner/repo', got '${repository}'`);
  }
  return { owner: match[1], repo: match[2] };
}

/**
 * URL for another repository on the same host, keeping the protocol of `detail`
 */
export function buildRemoteUrl(detail: Pick<RemoteDetail, 'protocol' | 'hostname'>, repository: string): string {
  switch (detail.protocol) {
    case 'ssh':
      return `git@${detail.hostname}:${repository}.git`;
    case 'git':
      return `git://${detail.hostname}/${repository}.git`;
    case 'https':
      return `https://${detail.hostname}/${repository}`;
  }
}

/**
 * Config key git reads the extra HTTP header from, scoped to the server
 */
export function extraHeaderKey(serverUrl: string): string {
  return `http.${serverUrl.replace(/\/+$/, '')}/.extraheader`;
}

/**
 * Basic auth header carrying an installation or personal token
 */
export function buildAuthHeader(token: string): string {
  const encoded = Buffer.from(`x-access-token:${token}`, 'utf8').toString('base64');
  return `AUTHORIZATION: basic ${encoded}`;
}

/**
 * Strip credentials from a URL (or any text containing URLs) for logging
 */
export function stripTokenFromUrl(url: string): string {
  return url
    .replace(/x-access-token:[^@\s]+@/g, 'x-access-token:***@')
    .replace(/(https?:\/\/)(?!x-access-token:)[^:@/\s]+:[^@/\s]+@/g, '$1***@');
}
