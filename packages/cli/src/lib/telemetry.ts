/**
 * Telemetry and observability helpers
 */

import type { FanOutProgress } from "@prefixwatch/sdk";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>, verbose: boolean): void {
  if (!verbose) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(label: string, verbose: boolean, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(label, { duration_ms: duration, success }, verbose);
  }
}

/**
 * Fan-out progress callback printing one stderr line per shard in verbose mode
 */
export function progressReporter(label: string, verbose: boolean): ((progress: FanOutProgress) => void) | undefined {
  if (!verbose) {
    return undefined;
  }
  return ({ shardId, completed, total }) => {
    writeStderr(`${label}: shard ${shardId} done (${completed}/${total})\n`);
  };
}
