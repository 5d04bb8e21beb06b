/**
 * Artifact Fetcher
 *
 * Retrieves one artifact per (source, timestamp) under a shared bulkhead.
 * The retry/backoff state machine knows nothing about formats: a source that
 * needs payload checks supplies a `validate(bytes)` capability.
 *
 * Per attempt:
 * - 200: success, or invalid-payload (terminal, never retried) when
 *   validate rejects the bytes
 * - 429: throttled; wait Retry-After seconds (backoffSeconds if absent)
 * - anything else, including timeouts and transport errors: wait
 *   backoffSeconds * attemptNumber
 *
 * Network failures never throw out of fetchArtifact; they end up in the
 * returned outcome.
 *
 * @module acquisition/artifact-fetcher
 */

import type { Bulkhead } from '../resilience/bulkhead.js';
import { RetryExecutor, parseRetryAfter } from '../resilience/retry.js';
import type { AttemptDecision, RetryConfig, SleepFn } from '../resilience/types.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';
import type { FetchDiagnostics } from './fetch-diagnostics.js';

const log = createLogger({ module: 'fetcher' });

// ============================================================================
// Outcomes
// ============================================================================

interface OutcomeBase {
  /** Formatted timestamp key of the artifact */
  readonly key: string;
  readonly attempts: number;
  readonly reason: string;
}

export interface SuccessOutcome extends OutcomeBase {
  readonly status: 'success';
  readonly payload: Uint8Array;
}

export interface InvalidPayloadOutcome extends OutcomeBase {
  readonly status: 'invalid-payload';
  readonly payload: Uint8Array;
}

/**
 * Per-attempt classification; the retry loop consumes it and never returns it
 */
export interface TransientFailureOutcome extends OutcomeBase {
  readonly status: 'transient-failure';
  readonly rateLimited: boolean;
  /** Server-suggested delay, only for rate-limited responses */
  readonly retryAfterSeconds: number | null;
}

export interface ExhaustedOutcome extends OutcomeBase {
  readonly status: 'exhausted';
  /** Reason of the final failed attempt */
  readonly lastFailure: string;
}

export type FetchOutcome =
  | SuccessOutcome
  | InvalidPayloadOutcome
  | TransientFailureOutcome
  | ExhaustedOutcome;

export type TerminalFetchOutcome = Exclude<FetchOutcome, TransientFailureOutcome>;

export const FETCH_REASONS = {
  OK: 'ok',
  INVALID_PAYLOAD: 'invalid_payload',
  RATE_LIMITED: 'rate_limited',
  MAX_RETRIES_EXCEEDED: 'max_retries_exceeded',
} as const;

// ============================================================================
// Fetch
// ============================================================================

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type PayloadValidator = (bytes: Uint8Array) => boolean | Promise<boolean>;

export interface ArtifactRequest {
  readonly url: string;
  readonly key: string;
  readonly validate?: PayloadValidator;
}

export interface FetcherContext {
  readonly bulkhead: Bulkhead;
  readonly diagnostics: FetchDiagnostics;
  readonly retry: RetryConfig;
  /** Per-attempt timeout covering headers and body */
  readonly timeoutMs: number;
  readonly fetchImpl?: FetchFn;
  readonly sleep?: SleepFn;
}

type AttemptOutcome = Exclude<FetchOutcome, ExhaustedOutcome>;

async function runValidator(validate: PayloadValidator, bytes: Uint8Array, key: string): Promise<boolean> {
  try {
    return await validate(bytes);
  } catch (error) {
    log.debug('Payload validator threw', { key, error: errorMessage(error) });
    return false;
  }
}

/**
 * One HTTP attempt, classified
 */
export async function attemptFetch(
  request: ArtifactRequest,
  attemptNumber: number,
  fetchImpl: FetchFn,
  timeoutMs: number
): Promise<AttemptOutcome> {
  const base = { key: request.key, attempts: attemptNumber };

  try {
    const response = await fetchImpl(request.url, { signal: AbortSignal.timeout(timeoutMs) });

    if (response.status === 200) {
      const payload = new Uint8Array(await response.arrayBuffer());
      if (request.validate && !(await runValidator(request.validate, payload, request.key))) {
        return { ...base, status: 'invalid-payload', reason: FETCH_REASONS.INVALID_PAYLOAD, payload };
      }
      return { ...base, status: 'success', reason: FETCH_REASONS.OK, payload };
    }

    await response.body?.cancel();

    if (response.status === 429) {
      return {
        ...base,
        status: 'transient-failure',
        reason: FETCH_REASONS.RATE_LIMITED,
        rateLimited: true,
        retryAfterSeconds: parseRetryAfter(response.headers.get('retry-after')),
      };
    }

    return {
      ...base,
      status: 'transient-failure',
      reason: `http_${response.status}`,
      rateLimited: false,
      retryAfterSeconds: null,
    };
  } catch (error) {
    const reason =
      error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
        ? 'timeout'
        : `error: ${errorMessage(error)}`;
    return {
      ...base,
      status: 'transient-failure',
      reason,
      rateLimited: false,
      retryAfterSeconds: null,
    };
  }
}

/**
 * Fetch one artifact with retries, holding a bulkhead slot for the duration
 *
 * Returns after at most maxRetries + 1 network calls.
 */
export async function fetchArtifact(
  request: ArtifactRequest,
  context: FetcherContext
): Promise<TerminalFetchOutcome> {
  const fetchImpl = context.fetchImpl ?? fetch;
  const executor = new RetryExecutor(context.retry, context.sleep);

  return context.bulkhead.execute(async () => {
    const result = await executor.execute(
      async (attemptNumber): Promise<AttemptDecision<TerminalFetchOutcome>> => {
        const outcome = await attemptFetch(request, attemptNumber, fetchImpl, context.timeoutMs);

        switch (outcome.status) {
          case 'success':
            return { action: 'complete', value: outcome };

          case 'invalid-payload':
            context.diagnostics.recordInvalidPayload();
            log.warn('Received invalid payload', { key: request.key, url: request.url });
            return { action: 'complete', value: outcome };

          case 'transient-failure':
            if (outcome.rateLimited) {
              context.diagnostics.recordThrottle();
              log.debug('Rate limited', {
                key: request.key,
                attempt: attemptNumber,
                retryAfterSeconds: outcome.retryAfterSeconds,
              });
              return {
                action: 'retry',
                delay: { kind: 'server', seconds: outcome.retryAfterSeconds },
                reason: outcome.reason,
              };
            }
            log.debug('Fetch attempt failed', {
              key: request.key,
              attempt: attemptNumber,
              reason: outcome.reason,
            });
            return { action: 'retry', delay: { kind: 'linear' }, reason: outcome.reason };
        }
      }
    );

    if (result.status === 'completed') {
      if (result.value.status === 'success') {
        context.diagnostics.recordSuccess();
      }
      return result.value;
    }

    context.diagnostics.recordExhausted();
    log.warn('Giving up on artifact', {
      key: request.key,
      url: request.url,
      attempts: result.attempts,
      lastFailure: result.lastReason,
    });
    return {
      status: 'exhausted',
      key: request.key,
      attempts: result.attempts,
      reason: FETCH_REASONS.MAX_RETRIES_EXCEEDED,
      lastFailure: result.lastReason,
    };
  });
}
