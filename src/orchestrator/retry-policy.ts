/**
 * Retry Policy Engine
 *
 * Bounded exponential backoff for idempotent hosting-service calls. Creating a
 * pull request and pushing are never routed through here.
 */

import { GitHubError } from '../types/github.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('retry-policy');

/**
 * Configuration for retry behavior.
 */
export interface RetryPolicy {
  /** Maximum number of retry attempts (0 = no retries) */
  maxRetries: number;

  /** Initial backoff delay in milliseconds */
  backoffMs: number;

  /** Backoff multiplier for exponential backoff */
  backoffMultiplier: number;

  /** Maximum backoff delay in milliseconds */
  maxBackoffMs: number;

  /** Whether to add jitter to backoff (0-25% of backoff value) */
  jitter: boolean;
}

/**
 * Result of evaluating whether to retry.
 */
export interface RetryEvaluation {
  shouldRetry: boolean;
  /** 0 if shouldRetry is false */
  delayMs: number;
  reason: string;
}

/**
 * Summary of all attempts for an operation.
 */
export type RetryResult<T> = {
  /** Number of retries performed (0 if succeeded on first try) */
  retriedCount: number;
  totalDurationMs: number;
} & (
  | { success: true; result: T; finalError: null }
  | { success: false; result: null; finalError: Error }
);

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  backoffMs: 1000,
  backoffMultiplier: 2,
  maxBackoffMs: 30000,
  jitter: true,
};

export const NO_RETRY_POLICY: RetryPolicy = {
  maxRetries: 0,
  backoffMs: 0,
  backoffMultiplier: 0,
  maxBackoffMs: 0,
  jitter: false,
};

/**
 * Server errors, rate limits and network failures
 */
export function isTransientError(error: Error): boolean {
  return error instanceof GitHubError && error.retryable;
}

export class RetryPolicyEngine {
  private readonly policy: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    sleep: (ms: number) => Promise<void> = (ms) => new Promise((resolve) => setTimeout(resolve, ms))
  ) {
    this.policy = policy;
    this.sleep = sleep;
  }

  getPolicy(): RetryPolicy {
    return { ...this.policy };
  }

  /**
   * Evaluate whether an error should trigger a retry.
   *
   * @param attemptCount - attempts already made (0 = first attempt failed)
   */
  evaluateRetry(
    error: Error,
    attemptCount: number,
    isRetryable: (error: Error) => boolean = isTransientError
  ): RetryEvaluation {
    if (attemptCount >= this.policy.maxRetries) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `Max retries (${this.policy.maxRetries}) exhausted`,
      };
    }

    if (!isRetryable(error)) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `${error.name} is not retryable`,
      };
    }

    const delayMs = this.calculateBackoff(attemptCount);
    return {
      shouldRetry: true,
      delayMs,
      reason: `Retrying after ${delayMs}ms (attempt ${attemptCount + 1}/${this.policy.maxRetries})`,
    };
  }

  /**
   * Execute an operation with retry logic.
   */
  async execute<T>(
    operation: () => Promise<T>,
    options?: { isRetryable?: (error: Error) => boolean; label?: string }
  ): Promise<RetryResult<T>> {
    const startTime = Date.now();
    const maxAttempts = this.policy.maxRetries + 1;
    let lastError: Error | null = null;
    let attempt = 0;

    for (; attempt < maxAttempts; attempt++) {
      try {
        const result = await operation();
        return {
          success: true,
          result,
          finalError: null,
          retriedCount: attempt,
          totalDurationMs: Date.now() - startTime,
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        const evaluation = this.evaluateRetry(lastError, attempt, options?.isRetryable);

        if (!evaluation.shouldRetry) {
          log.warn({ attempt, label: options?.label, reason: evaluation.reason }, 'No more retries, failing');
          break;
        }
        log.info(
          { attempt, label: options?.label, nextRetryMs: evaluation.delayMs, reason: evaluation.reason },
          'Retrying operation'
        );
        await this.sleep(evaluation.delayMs);
      }
    }

    return {
      success: false,
      result: null,
      finalError: lastError ?? new Error(`${options?.label ?? 'operation'} failed`),
      retriedCount: Math.min(attempt, this.policy.maxRetries),
      totalDurationMs: Date.now() - startTime,
    };
  }

  /**
   * Like execute, but resolves with the value or rejects with the final error
   */
  async run<T>(operation: () => Promise<T>, label?: string): Promise<T> {
    const result = await this.execute(operation, label ? { label } : undefined);
    if (!result.success) {
      throw result.finalError;
    }
    return result.result;
  }

  /**
   * Backoff delay for an attempt: backoffMs * multiplier^attempt, capped,
   * plus up to 25% jitter when enabled.
   */
  calculateBackoff(attemptNumber: number): number {
    const base = this.policy.backoffMs * Math.pow(this.policy.backoffMultiplier, attemptNumber);
    const capped = Math.min(base, this.policy.maxBackoffMs);

    if (this.policy.jitter) {
      return Math.round(capped + capped * 0.25 * Math.random());
    }
    return Math.round(capped);
  }
}

export function createRetryPolicyEngine(policy?: Partial<RetryPolicy>): RetryPolicyEngine {
  return new RetryPolicyEngine({
    ...DEFAULT_RETRY_POLICY,
    ...policy,
  });
}
