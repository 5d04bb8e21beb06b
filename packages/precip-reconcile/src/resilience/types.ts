/**
 * Resilience Types
 *
 * TYPE SAFETY: All configs and stats are readonly; executors never mutate
 * the configuration they were given.
 */

// ============================================================================
// Bulkhead
// ============================================================================

export interface BulkheadConfig {
  readonly name: string;
  /** Maximum concurrent in-flight executions */
  readonly maxConcurrent: number;
}

export interface BulkheadStats {
  readonly name: string;
  readonly activeCount: number;
  readonly queuedCount: number;
  readonly completedCount: number;
  readonly peakActiveCount: number;
  readonly avgExecutionMs: number;
}

// ============================================================================
// Retry
// ============================================================================

export interface RetryConfig {
  /** Retries after the first attempt; total attempts = maxRetries + 1 */
  readonly maxRetries: number;
  /** Base delay; generic failures wait backoffSeconds * attemptNumber */
  readonly backoffSeconds: number;
}

/**
 * How long to wait before the next attempt
 *
 * - linear: backoffSeconds * attemptNumber
 * - server: delay suggested by the server (e.g. Retry-After), falling back
 *   to backoffSeconds when absent
 */
export type RetryDelay =
  | { readonly kind: 'linear' }
  | { readonly kind: 'server'; readonly seconds: number | null };

/**
 * Result of one attempt as classified by the caller
 */
export type AttemptDecision<T> =
  | { readonly action: 'complete'; readonly value: T }
  | { readonly action: 'retry'; readonly delay: RetryDelay; readonly reason: string };

export interface RetryAttempt {
  readonly attemptNumber: number;
  readonly reason: string;
  /** Delay slept after this attempt (0 when none followed) */
  readonly delayMs: number;
}

export type RetryResult<T> =
  | {
      readonly status: 'completed';
      readonly value: T;
      readonly attempts: number;
      readonly history: readonly RetryAttempt[];
    }
  | {
      readonly status: 'exhausted';
      readonly attempts: number;
      readonly lastReason: string;
      readonly history: readonly RetryAttempt[];
    };

export type SleepFn = (ms: number) => Promise<void>;
