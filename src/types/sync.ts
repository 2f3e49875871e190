import { z } from 'zod';

// ============================================================================
// Identity
// ============================================================================

/**
 * A fully resolved git identity
 */
export const gitIdentitySchema = z.object({
  name: z.string().min(1),
  email: z.string().min(1),
});

export type GitIdentity = z.infer<typeof gitIdentitySchema>;

// ============================================================================
// Checkout state
// ============================================================================

/**
 * What the caller had checked out before the run
 */
export type CheckoutRef =
  | { kind: 'branch'; name: string }
  | { kind: 'detached'; sha: string };

// ============================================================================
// Change set
// ============================================================================

/**
 * The scoped diff to commit. `empty` is a computed answer, not a placeholder:
 * a ChangeSet only exists once capture has looked at the working tree.
 */
export interface ChangeSet {
  /** Path allow-list; empty means everything */
  readonly pathspecs: readonly string[];
  readonly message: string;
  readonly author: GitIdentity;
  readonly committer: GitIdentity;
  readonly signoff: boolean;
  readonly sign: boolean;
  /** Paths within scope that differ from HEAD */
  readonly files: readonly string[];
  readonly empty: boolean;
}

// ============================================================================
// References
// ============================================================================

export const BranchState = {
  ABSENT: 'absent',
  PRESENT_LOCAL: 'present-local',
  PRESENT_REMOTE: 'present-remote',
  PRESENT_BOTH: 'present-both',
} as const;

export type BranchState = (typeof BranchState)[keyof typeof BranchState];

export interface BranchRef {
  name: string;
  state: BranchState;
  localTip?: string;
  remoteTip?: string;
}

/**
 * Whether a branch is published, which is what the state machine keys on.
 */
export function isPublished(ref: BranchRef): boolean {
  return ref.state === BranchState.PRESENT_REMOTE || ref.state === BranchState.PRESENT_BOTH;
}

/**
 * The reference the synchronized branch is built from. Resolved once per run.
 */
export interface BaseRef {
  readonly kind: 'current' | 'branch';
  /** Branch name used as the pull request base (sha when detached) */
  readonly name: string;
  readonly sha: string;
}

// ============================================================================
// Outcome
// ============================================================================

export const SyncOperation = {
  CREATED: 'created',
  UPDATED: 'updated',
  NOT_UPDATED: 'not-updated',
  CLOSED: 'closed',
} as const;

export type SyncOperation = (typeof SyncOperation)[keyof typeof SyncOperation];

export interface SyncOutcome {
  readonly operation: SyncOperation;
  /** Branch name actually used, suffix included */
  readonly branch: string;
  /** Resulting head commit (existing tip for not-updated/closed) */
  readonly headSha: string;
  readonly baseSha: string;
  /** Remote tip observed before the run, used as the push lease */
  readonly previousTip?: string;
  /** History was rewritten by a rebase and needs a leased force push */
  readonly rewritten: boolean;
  readonly hasDiffWithBase: boolean;
}

// ============================================================================
// Config snapshot
// ============================================================================

export interface ConfigEntry {
  readonly key: string;
  /** Previous values, or null when the key was unset */
  readonly values: readonly string[] | null;
}

export type ConfigSnapshot = readonly ConfigEntry[];

// ============================================================================
// Outputs
// ============================================================================

export type PullRequestOperation = 'created' | 'updated' | 'closed' | 'none';

export interface RunOutputs {
  pullRequestNumber?: number;
  pullRequestUrl?: string;
  pullRequestOperation: PullRequestOperation;
  pullRequestHeadSha?: string;
  pullRequestBranch?: string;
  pullRequestCommitsVerified: boolean;
}
