import { Command } from 'commander';
import { loadConfig, type InputOverrides, type SyncConfig } from '../../config/index.js';
import { runSync, type SyncRunResult } from '../../orchestrator/run-sync.js';
import {
  describeFailure,
  formatError,
  formatJson,
  formatOutcome,
  formatSuccess,
  print,
  printError,
} from '../formatter.js';

interface SyncCommandOptions {
  token?: string;
  path?: string;
  addPaths?: string;
  commitMessage?: string;
  committer?: string;
  author?: string;
  signoff?: boolean;
  signCommits?: boolean;
  branch?: string;
  branchSuffix?: string;
  base?: string;
  pushToFork?: string;
  deleteBranch?: boolean;
  title?: string;
  body?: string;
  bodyPath?: string;
  labels?: string;
  assignees?: string;
  reviewers?: string;
  teamReviewers?: string;
  milestone?: string;
  draft?: boolean;
  maintainerCanModify?: boolean;
  json?: boolean;
}

export interface SyncCommandDependencies {
  run?: (config: SyncConfig) => Promise<SyncRunResult>;
  env?: NodeJS.ProcessEnv;
}

/**
 * Flags given on the command line, as raw input strings
 */
export function toOverrides(options: SyncCommandOptions): InputOverrides {
  const overrides: InputOverrides = {};
  const text = [
    'token',
    'path',
    'addPaths',
    'commitMessage',
    'committer',
    'author',
    'branch',
    'branchSuffix',
    'base',
    'pushToFork',
    'title',
    'body',
    'bodyPath',
    'labels',
    'assignees',
    'reviewers',
    'teamReviewers',
    'milestone',
  ] as const;
  for (const key of text) {
    const value = options[key];
    if (value !== undefined) {
      overrides[key] = value;
    }
  }

  const flags = ['signoff', 'signCommits', 'deleteBranch', 'draft', 'maintainerCanModify'] as const;
  for (const key of flags) {
    const value = options[key];
    if (value !== undefined) {
      overrides[key] = String(value);
    }
  }
  return overrides;
}

/**
 * Create the sync command.
 */
export function createSyncCommand(deps: SyncCommandDependencies = {}): Command {
  const command = new Command('sync')
    .description('Commit pending changes to a branch and open or update its pull request')
    .option('--token <token>', 'Token with contents and pull-requests write access (INPUT_TOKEN)')
    .option('-p, --path <path>', 'Repository path, relative to GITHUB_WORKSPACE')
    .option('--add-paths <paths>', 'Comma or newline separated pathspecs to commit')
    .option('-m, --commit-message <message>', 'Commit message')
    .option('--committer <identity>', "Committer as 'Name <email>'")
    .option('--author <identity>', "Author as 'Name <email>'")
    .option('--signoff', 'Add a Signed-off-by trailer')
    .option('--sign-commits', 'GPG-sign commits')
    .option('-b, --branch <branch>', 'Branch to synchronize')
    .option('--branch-suffix <strategy>', 'none, random, timestamp or short-commit-hash')
    .option('--base <branch>', 'Base branch (defaults to the current branch)')
    .option('--push-to-fork <owner/repo>', 'Push the branch to this fork')
    .option('--delete-branch', 'Delete the branch and close its pull request when there is nothing to sync')
    .option('--title <title>', 'Pull request title')
    .option('--body <body>', 'Pull request body')
    .option('--body-path <file>', 'Read the pull request body from a file')
    .option('--labels <labels>', 'Comma separated labels')
    .option('--assignees <users>', 'Comma separated assignees')
    .option('--reviewers <users>', 'Comma separated reviewers')
    .option('--team-reviewers <teams>', 'Comma separated team reviewers')
    .option('--milestone <number>', 'Milestone number')
    .option('--draft', 'Open the pull request as a draft')
    .option('--no-maintainer-can-modify', 'Do not allow maintainers to push to the branch')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: SyncCommandOptions) => {
      try {
        const { json, ...inputs } = options;
        // Commander always sets the negated flag; only a given --no-... is an override
        const overrides = toOverrides(
          inputs.maintainerCanModify === false ? inputs : { ...inputs, maintainerCanModify: undefined }
        );
        const config = loadConfig(deps.env ?? process.env, overrides);
        const result = await (deps.run ?? runSync)(config);

        if (json) {
          print(formatJson({ outcome: result.outcome, outputs: result.outputs }));
        } else {
          print(formatOutcome(result.outcome, result.pullRequest));
          print('');
          print(formatSuccess(`Pull request operation: ${result.outputs.pullRequestOperation}`));
        }
      } catch (error) {
        printError(formatError(describeFailure(error)));
        process.exitCode = 1;
      }
    });

  return command;
}
