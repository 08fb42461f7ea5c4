// Simple metrics collection for intercepted calls
// Lightweight counters - OpenTelemetry is opt-in via openTelemetryInterceptor

/**
 * Counters kept by a ChainExecutor.
 */
export class Metrics {
  /** Calls that went through the interceptor chain */
  calls = 0;

  /** Calls with no applicable interceptors (proceed called directly) */
  passthroughCalls = 0;

  /** Successful completions */
  successes = 0;

  /** Failed calls, including before-hook and transform failures */
  failures = 0;

  /** Cancelled calls */
  cancellations = 0;

  /** Hook failures that were logged and collected */
  hookErrors = 0;

  reset(): void {
    this.calls = 0;
    this.passthroughCalls = 0;
    this.successes = 0;
    this.failures = 0;
    this.cancellations = 0;
    this.hookErrors = 0;
  }

  snapshot(): MetricsSnapshot {
    return {
      calls: this.calls,
      passthroughCalls: this.passthroughCalls,
      successes: this.successes,
      failures: this.failures,
      cancellations: this.cancellations,
      hookErrors: this.hookErrors,
    };
  }

  /**
   * Serialize for logging
   */
  toJSON(): MetricsSnapshot {
    return this.snapshot();
  }
}

export interface MetricsSnapshot {
  calls: number;
  passthroughCalls: number;
  successes: number;
  failures: number;
  cancellations: number;
  hookErrors: number;
}

export function createMetrics(): Metrics {
  return new Metrics();
}
