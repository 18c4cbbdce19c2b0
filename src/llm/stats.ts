export type PerformanceSnapshot = {
  averageDurationMs: number;
  failedRequests: number;
  successRate: number;
  successfulRequests: number;
  totalAttempts: number;
  totalDurationMs: number;
  totalRequests: number;
  totalRetries: number;
};

/**
 * Request counters shared by reference between every caller that issues model
 * requests. Each update is a single synchronous statement, so concurrent calls
 * interleaving on the event loop cannot lose increments.
 *
 * `totalRequests` counts terminal outcomes only; individual attempts and retry
 * decisions have their own counters.
 */
export class PerformanceStats {
  private failed = 0;
  private successful = 0;
  private attempts = 0;
  private retries = 0;
  private durationMs = 0;

  recordAttempt(): void {
    this.attempts += 1;
  }

  recordRetry(): void {
    this.retries += 1;
  }

  recordSuccess(durationMs: number): void {
    this.successful += 1;
    this.durationMs += Math.max(0, Math.trunc(durationMs));
  }

  recordFailure(): void {
    this.failed += 1;
  }

  get totalRequests(): number {
    return this.successful + this.failed;
  }

  averageDurationMs(): number {
    if (this.successful === 0) {
      return 0;
    }

    return this.durationMs / this.successful;
  }

  successRate(): number {
    const total = this.totalRequests;
    if (total === 0) {
      return 100;
    }

    return (this.successful / total) * 100;
  }

  snapshot(): PerformanceSnapshot {
    return {
      averageDurationMs: this.averageDurationMs(),
      failedRequests: this.failed,
      successRate: this.successRate(),
      successfulRequests: this.successful,
      totalAttempts: this.attempts,
      totalDurationMs: this.durationMs,
      totalRequests: this.totalRequests,
      totalRetries: this.retries,
    };
  }
}

export function formatPerformanceSummary(snapshot: PerformanceSnapshot): string {
  return [
    `Requests: ${String(snapshot.totalRequests)} (${String(snapshot.successfulRequests)} ok, ${String(snapshot.failedRequests)} failed)`,
    `Success rate: ${snapshot.successRate.toFixed(1)}%`,
    `Average latency: ${snapshot.averageDurationMs.toFixed(0)}ms`,
    `Attempts: ${String(snapshot.totalAttempts)}, retries: ${String(snapshot.totalRetries)}`,
  ].join("\n");
}
