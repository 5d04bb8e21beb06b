/**
 * Retry with Linear Backoff
 *
 * Drives an attempt function until it completes or the attempt budget is
 * spent. The attempt function classifies its own outcome, which keeps this
 * loop independent of HTTP or any particular source.
 *
 * DESIGN:
 * - Total attempts: maxRetries + 1
 * - Generic failures: sleep backoffSeconds * attemptNumber (linear)
 * - Server-directed delays (rate limiting): sleep the suggested seconds,
 *   or backoffSeconds when the server gave none
 * - No sleep after the final attempt
 */

import type {
  AttemptDecision,
  RetryAttempt,
  RetryConfig,
  RetryDelay,
  RetryResult,
  SleepFn,
} from './types.js';

export const defaultSleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay in milliseconds before the attempt after `attemptNumber`
 */
export function computeRetryDelayMs(
  delay: RetryDelay,
  attemptNumber: number,
  backoffSeconds: number
): number {
  if (delay.kind === 'server') {
    return (delay.seconds ?? backoffSeconds) * 1000;
  }
  return backoffSeconds * attemptNumber * 1000;
}

/**
 * Parse a Retry-After header value into seconds
 *
 * Accepts delta-seconds or an HTTP date; null when absent or unparseable.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (value === null) {
    return null;
  }

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, (date - now) / 1000);
}

/**
 * @example
 * ```typescript
 * const retry = new RetryExecutor({ maxRetries: 5, backoffSeconds: 60 });
 * const result = await retry.execute(async (attempt) => {
 *   const response = await fetch(url);
 *   if (response.ok) return { action: 'complete', value: response };
 *   return { action: 'retry', delay: { kind: 'linear' }, reason: `http_${response.status}` };
 * });
 * ```
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly sleep: SleepFn;

  constructor(config: RetryConfig, sleep: SleepFn = defaultSleep) {
    if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${config.maxRetries}`);
    }
    if (config.backoffSeconds < 0) {
      throw new RangeError(`backoffSeconds must be >= 0, got ${config.backoffSeconds}`);
    }
    this.config = config;
    this.sleep = sleep;
  }

  get maxAttempts(): number {
    return this.config.maxRetries + 1;
  }

  async execute<T>(
    attemptFn: (attemptNumber: number) => Promise<AttemptDecision<T>>
  ): Promise<RetryResult<T>> {
    const history: RetryAttempt[] = [];
    let lastReason = 'no_attempts';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const decision = await attemptFn(attempt);

      if (decision.action === 'complete') {
        history.push({ attemptNumber: attempt, reason: 'complete', delayMs: 0 });
        return { status: 'completed', value: decision.value, attempts: attempt, history };
      }

      lastReason = decision.reason;
      const isLast = attempt === this.maxAttempts;
      const delayMs = isLast
        ? 0
        : computeRetryDelayMs(decision.delay, attempt, this.config.backoffSeconds);
      history.push({ attemptNumber: attempt, reason: decision.reason, delayMs });

      if (!isLast) {
        await this.sleep(delayMs);
      }
    }

    return { status: 'exhausted', attempts: this.maxAttempts, lastReason, history };
  }
}
