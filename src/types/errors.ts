/**
 * Error types for the synchronization engine.
 *
 * Every failure the engine surfaces is a SyncError carrying a kind, the
 * state-machine step it happened in (when known) and whether re-running the
 * whole job may succeed.
 */

// ============================================================================
// Error kinds and steps
// ============================================================================

export const SyncErrorKind = {
  /** A primitive git call failed (network, permission, malformed repository) */
  VERSION_CONTROL_FAILURE: 'version_control_failure',
  /** Rebase and the cherry-pick fallback both conflicted */
  CONFLICT_UNRESOLVED: 'conflict_unresolved',
  /** The remote rejected a push because its tip moved */
  CONCURRENT_UPDATE_REJECTED: 'concurrent_update_rejected',
  /** One or more config keys could not be put back */
  CONFIG_RESTORE_FAILURE: 'config_restore_failure',
  /** The named base does not resolve to a commit */
  INVALID_BASE_REFERENCE: 'invalid_base_reference',
} as const;

export type SyncErrorKind = (typeof SyncErrorKind)[keyof typeof SyncErrorKind];

/**
 * State-machine steps, used to tell the user where a run failed.
 */
export type SyncStep =
  | 'resolve-base'
  | 'resolve-branch'
  | 'capture'
  | 'prepare-working-branch'
  | 'apply-to-base'
  | 'create'
  | 'checkout-target'
  | 'reapply'
  | 'equivalence-check'
  | 'rebase'
  | 'cherry-pick-fallback'
  | 'restore-checkout'
  | 'prepare-remote'
  | 'push'
  | 'delete-remote-branch'
  | 'config-restore';

// ============================================================================
// Base class
// ============================================================================

export class SyncError extends Error {
  readonly kind: SyncErrorKind;
  readonly step: SyncStep | undefined;
  readonly retryable: boolean;

  constructor(
    kind: SyncErrorKind,
    message: string,
    options: { step?: SyncStep | undefined; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SyncError';
    this.kind = kind;
    this.step = options.step;
    this.retryable = options.retryable ?? false;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Short label used by the CLI, e.g. `conflict_unresolved at rebase`.
   */
  describe(): string {
    return this.step ? `${this.kind} at ${this.step}` : this.kind;
  }
}

// ============================================================================
// Concrete errors
// ============================================================================

/**
 * A git command failed. Carries the command line and whatever it printed.
 */
export class VersionControlFailure extends SyncError {
  readonly command: string;
  readonly output: string;

  constructor(
    command: string,
    output: string,
    options: { step?: SyncStep | undefined; cause?: unknown } = {}
  ) {
    const detail = output.trim();
    super(
      SyncErrorKind.VERSION_CONTROL_FAILURE,
      detail ? `git ${command} failed: ${detail}` : `git ${command} failed`,
      options
    );
    this.name = 'VersionControlFailure';
    this.command = command;
    this.output = output;
  }

  /**
   * Copy of this failure attributed to a state-machine step.
   */
  atStep(step: SyncStep): VersionControlFailure {
    if (this.step) return this;
    return new VersionControlFailure(this.command, this.output, { step, cause: this.cause });
  }
}

export class ConflictUnresolved extends SyncError {
  readonly branch: string;

  constructor(branch: string, message: string, step: SyncStep) {
    super(SyncErrorKind.CONFLICT_UNRESOLVED, message, { step });
    this.name = 'ConflictUnresolved';
    this.branch = branch;
  }
}

export class ConcurrentUpdateRejected extends SyncError {
  readonly branch: string;
  readonly remote: string;

  constructor(remote: string, branch: string, output: string) {
    super(
      SyncErrorKind.CONCURRENT_UPDATE_REJECTED,
      `Push of ${branch} to ${remote} was rejected because the remote branch moved; re-run to retry. ${output.trim()}`.trim(),
      { step: 'push', retryable: true }
    );
    this.name = 'ConcurrentUpdateRejected';
    this.branch = branch;
    this.remote = remote;
  }
}

export class ConfigRestoreFailure extends SyncError {
  readonly keys: string[];

  constructor(keys: string[], causes: unknown[]) {
    super(
      SyncErrorKind.CONFIG_RESTORE_FAILURE,
      `Failed to restore git config keys: ${keys.join(', ')}`,
      { step: 'config-restore', cause: causes[0] }
    );
    this.name = 'ConfigRestoreFailure';
    this.keys = keys;
  }
}

export class InvalidBaseReference extends SyncError {
  readonly ref: string;

  constructor(ref: string, reason?: string) {
    super(
      SyncErrorKind.INVALID_BASE_REFERENCE,
      reason ?? `Base reference '${ref}' does not resolve to a commit`,
      { step: 'resolve-base' }
    );
    this.name = 'InvalidBaseReference';
    this.ref = ref;
  }
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * An input value is missing or malformed.
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(`Invalid configuration for '${parameter}': ${message}`);
    this.parameter = parameter;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
