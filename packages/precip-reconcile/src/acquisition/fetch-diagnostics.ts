/**
 * Fetch diagnostics counters
 *
 * Injected into every fetch of a run and returned by the download phase.
 * Read for reporting only; nothing branches on these values.
 */

export interface FetchDiagnosticsSnapshot {
  /** 429 responses received */
  readonly throttled: number;
  /** 200 responses whose payload failed validation */
  readonly invalidPayload: number;
  /** Fetches that ran out of attempts */
  readonly exhausted: number;
  /** Fetches that completed with a usable payload */
  readonly succeeded: number;
}

export class FetchDiagnostics {
  private throttled = 0;
  private invalidPayload = 0;
  private exhausted = 0;
  private succeeded = 0;

  recordThrottle(): void {
    this.throttled++;
  }

  recordInvalidPayload(): void {
    this.invalidPayload++;
  }

  recordExhausted(): void {
    this.exhausted++;
  }

  recordSuccess(): void {
    this.succeeded++;
  }

  snapshot(): FetchDiagnosticsSnapshot {
    return {
      throttled: this.throttled,
      invalidPayload: this.invalidPayload,
      exhausted: this.exhausted,
      succeeded: this.succeeded,
    };
  }
}
