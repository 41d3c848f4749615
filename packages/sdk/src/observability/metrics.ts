/**
 * Metrics tracking for store operations
 */

import { performance } from "node:perf_hooks";

export interface OperationMetrics {
  calls: number;
  failures: number;
  rows: number;
  durationMs: number[];
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<string, OperationMetrics>();

  /**
   * Get or create metrics for an operation
   */
  #getMetrics(operation: string): OperationMetrics {
    let entry = this.#metrics.get(operation);
    if (!entry) {
      entry = { calls: 0, failures: 0, rows: 0, durationMs: [] };
      this.#metrics.set(operation, entry);
    }
    return entry;
  }

  /**
   * Record a completed call with its duration and the rows it touched
   */
  recordSuccess(operation: string, ms: number, rows = 0): void {
    const entry = this.#getMetrics(operation);
    entry.calls++;
    entry.rows += rows;
    this.#pushSample(entry, ms);
  }

  /**
   * Record a failed call
   */
  recordFailure(operation: string, ms: number): void {
    const entry = this.#getMetrics(operation);
    entry.calls++;
    entry.failures++;
    this.#pushSample(entry, ms);
  }

  #pushSample(entry: OperationMetrics, ms: number): void {
    entry.durationMs.push(ms);

    // Keep only the last samples to avoid unbounded memory growth
    if (entry.durationMs.length > MAX_SAMPLES) {
      entry.durationMs.shift();
    }
  }

  /**
   * Time an async operation, recording success or failure
   */
  async time<T>(operation: string, fn: () => Promise<T>, rowsOf?: (result: T) => number): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      this.recordSuccess(operation, performance.now() - start, rowsOf ? rowsOf(result) : 0);
      return result;
    } catch (err) {
      this.recordFailure(operation, performance.now() - start);
      throw err;
    }
  }

  getMetrics(operation: string): OperationMetrics | undefined {
    return this.#metrics.get(operation);
  }

  getAllMetrics(): Map<string, OperationMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 duration for an operation
   */
  getP95(operation: string): number {
    const values = this.#metrics.get(operation)?.durationMs ?? [];
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  reset(operation?: string): void {
    if (operation) {
      this.#metrics.delete(operation);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
