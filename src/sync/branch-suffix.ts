import { customAlphabet } from 'nanoid';
import { ConfigurationError } from '../types/errors.js';

export const BranchSuffix = {
  NONE: 'none',
  RANDOM: 'random',
  TIMESTAMP: 'timestamp',
  SHORT_COMMIT_HASH: 'short-commit-hash',
} as const;

export type BranchSuffix = (typeof BranchSuffix)[keyof typeof BranchSuffix];

const SUFFIX_LENGTH = 7;

const randomSuffix = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', SUFFIX_LENGTH);

export interface SuffixInputs {
  /** Commit the run started from; required for short-commit-hash */
  headSha?: string;
  now?: () => Date;
  random?: () => string;
}

/**
 * Compute the suffix for a strategy. Returns '' for `none`.
 */
export function branchSuffix(strategy: BranchSuffix, inputs: SuffixInputs = {}): string {
  switch (strategy) {
    case BranchSuffix.NONE:
      return '';
    case BranchSuffix.RANDOM:
      return (inputs.random ?? randomSuffix)();
    case BranchSuffix.TIMESTAMP:
      // Seconds since epoch
      return String(Math.floor((inputs.now ?? (() => new Date()))().getTime() / 1000));
    case BranchSuffix.SHORT_COMMIT_HASH:
      if (!inputs.headSha) {
        throw new ConfigurationError('branch-suffix', 'short-commit-hash needs the current commit');
      }
      return inputs.headSha.slice(0, SUFFIX_LENGTH);
  }
}

/**
 * Branch name with the suffix appended as `<branch>-<suffix>`
 */
export function applyBranchSuffix(branch: string, strategy: BranchSuffix, inputs: SuffixInputs = {}): string {
  const suffix = branchSuffix(strategy, inputs);
  return suffix ? `${branch}-${suffix}` : branch;
}

/**
 * Name for the run's ephemeral working branch
 */
export function ephemeralBranchName(random: () => string = randomSuffix): string {
  return `branchsync-tmp-${random()}`;
}
