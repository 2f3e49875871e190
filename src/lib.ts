/**
 * branchsync Library API
 *
 * Exports the engine for programmatic usage.
 */

// Types
export * from './types/index.js';

// Orchestrator (main entry point)
export { runSync, guardedConfigKeys, type SyncDependencies, type SyncRunResult } from './orchestrator/run-sync.js';
export { writeOutputs, toOutputRecord } from './orchestrator/outputs.js';
export { RetryPolicyEngine, createRetryPolicyEngine, type RetryPolicy } from './orchestrator/retry-policy.js';

// Configuration
export { loadConfig, getConfig, resetConfig, type SyncConfig, type InputOverrides } from './config/index.js';

// Git
export type { VersionControlClient } from './git/client.js';
export { SimpleGitClient } from './git/simple-git-client.js';

// Synchronization
export { BranchSynchronizer, resolveBaseRef, type SynchronizeRequest } from './sync/branch-synchronizer.js';
export { ChangeCapture, type CaptureRequest } from './sync/change-capture.js';
export { ConfigStateGuard } from './sync/config-guard.js';
export { RemoteSubmitter } from './sync/remote-submitter.js';
export { BranchSuffix, applyBranchSuffix } from './sync/branch-suffix.js';

// GitHub
export { GitHubPullRequestService, type PullRequestService } from './github/pull-requests.js';
export { createGitHubClient } from './github/client.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
