/**
 * branchsync Configuration Module
 *
 * Reads run inputs from `INPUT_<NAME>` environment variables (the CI action
 * convention, e.g. `INPUT_ADD-PATHS`), applies CLI overrides, and validates
 * everything with zod. Empty values count as unset.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { BranchSuffix } from '../sync/branch-suffix.js';
import { ConfigurationError } from '../types/errors.js';
import type { GitIdentity } from '../types/sync.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

export const DEFAULT_COMMITTER = 'github-actions[bot] <41898282+github-actions[bot]@users.noreply.github.com>';
export const DEFAULT_BRANCH = 'branchsync/patch';
export const DEFAULT_COMMIT_MESSAGE = '[branchsync] automated change';
export const DEFAULT_TITLE = 'Changes by branchsync';
export const MAX_BODY_LENGTH = 65536;

/**
 * Config field → input name
 */
export const INPUT_NAMES = {
  token: 'token',
  path: 'path',
  addPaths: 'add-paths',
  commitMessage: 'commit-message',
  committer: 'committer',
  author: 'author',
  signoff: 'signoff',
  signCommits: 'sign-commits',
  branch: 'branch',
  branchSuffix: 'branch-suffix',
  base: 'base',
  pushToFork: 'push-to-fork',
  deleteBranch: 'delete-branch',
  title: 'title',
  body: 'body',
  bodyPath: 'body-path',
  labels: 'labels',
  assignees: 'assignees',
  reviewers: 'reviewers',
  teamReviewers: 'team-reviewers',
  milestone: 'milestone',
  draft: 'draft',
  maintainerCanModify: 'maintainer-can-modify',
} as const;

export type InputKey = keyof typeof INPUT_NAMES;

/**
 * Raw string values, e.g. from CLI flags, that take precedence over the env
 */
export type InputOverrides = Partial<Record<InputKey, string>>;

// ============================================================================
// Input parsers
// ============================================================================

/**
 * Split on commas and newlines, trimming and dropping empties
 */
export function parseList(value: string): string[] {
  return value
    .split(/[\n,]+/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const IDENTITY_FORMAT = "Expected 'Display Name <email@address>'";

function matchIdentity(value: string): GitIdentity | null {
  const match = value.trim().match(/^(.+?)\s*<([^<>\s]+@[^<>\s]+)>$/);
  const name = match?.[1]?.trim();
  const email = match?.[2]?.trim();
  return name && email ? { name, email } : null;
}

/**
 * Parse `Display Name <email@address>`
 */
export function parseIdentity(value: string, parameter = 'identity'): GitIdentity {
  const identity = matchIdentity(value);
  if (!identity) {
    throw new ConfigurationError(parameter, `${IDENTITY_FORMAT}, got '${value}'`);
  }
  return identity;
}

const booleanInput = (defaultValue: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false']))
    .transform((value) => value === 'true')
    .optional()
    .transform((value) => value ?? defaultValue);

const listInput = z
  .string()
  .optional()
  .transform((value) => (value ? parseList(value) : []));

const identityInput = z.string().transform((value, ctx): GitIdentity => {
  const identity = matchIdentity(value);
  if (!identity) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${IDENTITY_FORMAT}, got '${value}'` });
    return z.NEVER;
  }
  return identity;
});

/**
 * Input schema with validation
 */
const inputSchema = z.object({
  token: z.string({ required_error: 'token is required' }).min(1),
  path: z.string().default('.'),
  addPaths: listInput,
  commitMessage: z.string().default(DEFAULT_COMMIT_MESSAGE),
  committer: identityInput,
  author: identityInput,
  signoff: booleanInput(false),
  signCommits: booleanInput(false),
  branch: z.string().trim().min(1).default(DEFAULT_BRANCH),
  branchSuffix: z
    .enum([BranchSuffix.NONE, BranchSuffix.RANDOM, BranchSuffix.TIMESTAMP, BranchSuffix.SHORT_COMMIT_HASH])
    .default(BranchSuffix.NONE),
  base: z.string().trim().optional(),
  pushToFork: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/, "must be 'owner/repo'")
    .optional(),
  deleteBranch: booleanInput(false),
  title: z.string().default(DEFAULT_TITLE),
  body: z.string().default(''),
  bodyPath: z.string().optional(),
  labels: listInput,
  assignees: listInput,
  reviewers: listInput,
  teamReviewers: listInput,
  milestone: z.coerce.number().int().min(0).default(0),
  draft: booleanInput(false),
  maintainerCanModify: booleanInput(true),
});

/**
 * Ambient settings from the CI environment
 */
const environmentSchema = z.object({
  workspace: z.string().optional(),
  /** owner/repo; falls back to origin's URL when unset */
  repository: z.string().optional(),
  apiUrl: z.string().url().optional(),
  serverUrl: z.string().url().default('https://github.com'),
  retry: z.object({
    maxRetries: z.coerce.number().int().min(0).max(10).default(3),
    backoffMs: z.coerce.number().int().min(0).max(60000).default(1000),
    backoffMultiplier: z.coerce.number().min(1).max(10).default(2),
  }),
});

export type SyncInputs = z.infer<typeof inputSchema>;
export type EnvironmentSettings = z.infer<typeof environmentSchema>;

export interface SyncConfig extends Omit<SyncInputs, 'path' | 'bodyPath'> {
  /** Absolute repository path */
  path: string;
  environment: EnvironmentSettings;
}

// ============================================================================
// Loading
// ============================================================================

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Read an input as the CI runner exposes it: `INPUT_ADD-PATHS`, with
 * `INPUT_ADD_PATHS` accepted for shells that cannot export hyphens.
 */
export function getInput(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const upper = name.toUpperCase();
  return nonEmpty(env[`INPUT_${upper}`]) ?? nonEmpty(env[`INPUT_${upper.replace(/-/g, '_')}`]);
}

/**
 * Noreply identity of the user who triggered the run
 */
function actorIdentity(actor: string, actorId: string | undefined): string {
  const email = actorId ? `${actorId}+${actor}@users.noreply.github.com` : `${actor}@users.noreply.github.com`;
  return `${actor} <${email}>`;
}

const inputNames = new Map<string, string>(Object.entries(INPUT_NAMES));

function toConfigurationError(error: z.ZodError): ConfigurationError {
  const [issue] = error.issues;
  const key = issue ? issue.path.join('.') : 'input';
  return new ConfigurationError(inputNames.get(key) ?? key, issue?.message ?? error.message);
}

/**
 * Load configuration from environment variables and overrides
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: InputOverrides = {}): SyncConfig {
  const pick = (key: InputKey): string | undefined => nonEmpty(overrides[key]) ?? getInput(env, INPUT_NAMES[key]);

  const committer = pick('committer') ?? DEFAULT_COMMITTER;
  const actor = nonEmpty(env.GITHUB_ACTOR);
  const rawInputs = {
    token: pick('token'),
    path: pick('path'),
    addPaths: pick('addPaths'),
    commitMessage: pick('commitMessage'),
    committer,
    author: pick('author') ?? (actor ? actorIdentity(actor, nonEmpty(env.GITHUB_ACTOR_ID)) : committer),
    signoff: pick('signoff'),
    signCommits: pick('signCommits'),
    branch: pick('branch'),
    branchSuffix: pick('branchSuffix'),
    base: pick('base'),
    pushToFork: pick('pushToFork'),
    deleteBranch: pick('deleteBranch'),
    title: pick('title'),
    body: pick('body'),
    bodyPath: pick('bodyPath'),
    labels: pick('labels'),
    assignees: pick('assignees'),
    reviewers: pick('reviewers'),
    teamReviewers: pick('teamReviewers'),
    milestone: pick('milestone'),
    draft: pick('draft'),
    maintainerCanModify: pick('maintainerCanModify'),
  };

  const inputs = inputSchema.safeParse(rawInputs);
  if (!inputs.success) {
    log.error({ errors: inputs.error.errors }, 'Invalid inputs');
    throw toConfigurationError(inputs.error);
  }

  const environment = environmentSchema.safeParse({
    workspace: nonEmpty(env.GITHUB_WORKSPACE),
    repository: nonEmpty(env.GITHUB_REPOSITORY),
    apiUrl: nonEmpty(env.GITHUB_API_URL),
    serverUrl: nonEmpty(env.GITHUB_SERVER_URL),
    retry: {
      maxRetries: nonEmpty(env.BRANCHSYNC_RETRY_MAX),
      backoffMs: nonEmpty(env.BRANCHSYNC_RETRY_BACKOFF_MS),
      backoffMultiplier: nonEmpty(env.BRANCHSYNC_RETRY_FACTOR),
    },
  });
  if (!environment.success) {
    log.error({ errors: environment.error.errors }, 'Invalid environment');
    throw toConfigurationError(environment.error);
  }

  const { path: inputPath, bodyPath, ...rest } = inputs.data;
  const root = environment.data.workspace ?? process.cwd();

  let body = rest.body;
  if (bodyPath) {
    const resolvedBodyPath = resolve(root, bodyPath);
    if (existsSync(resolvedBodyPath)) {
      body = readFileSync(resolvedBodyPath, 'utf8');
    } else {
      log.warn({ bodyPath }, 'body-path does not exist; using body');
    }
  }
  if (body.length > MAX_BODY_LENGTH) {
    throw new ConfigurationError('body', `Body exceeds maximum length of ${MAX_BODY_LENGTH} characters`);
  }

  const config: SyncConfig = {
    ...rest,
    body,
    path: resolve(root, inputPath),
    environment: environment.data,
  };

  log.info(
    {
      path: config.path,
      branch: config.branch,
      branchSuffix: config.branchSuffix,
      base: config.base,
      pushToFork: config.pushToFork,
      deleteBranch: config.deleteBranch,
      addPaths: config.addPaths,
    },
    'Configuration loaded'
  );

  return config;
}

/**
 * Singleton configuration instance
 */
let configInstance: SyncConfig | null = null;

export function getConfig(): SyncConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
