/**
 * Per-shard fan-out with independent outcomes
 *
 * A failing shard is recorded and the loop moves on; the caller decides what
 * to do with a partial result by inspecting the report. Nothing here turns a
 * failure into an empty success.
 */

import { StorageError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { ShardRegistry } from "./registry.js";
import { shardTableName } from "./shards.js";
import type {
  FanOutOptions,
  FanOutReport,
  FanOutStatus,
  ShardFailure,
  ShardId,
  ShardOutcome,
} from "./types.js";

/**
 * Classify a set of outcomes
 */
export function summarize(outcomes: readonly ShardOutcome<unknown>[]): FanOutStatus {
  const failed = outcomes.filter((outcome) => !outcome.ok).length;
  if (failed === 0) return "succeeded";
  return failed === outcomes.length ? "failed" : "partial";
}

/**
 * Report for a fan-out that had nothing to do
 */
export function emptyReport<T>(): FanOutReport<T> {
  return { status: "succeeded", outcomes: [], failures: [] };
}

/**
 * Throw the first shard failure unless every shard succeeded
 * @throws {StorageError} The first recorded failure
 */
export function assertComplete<T>(report: FanOutReport<T>): void {
  const first = report.failures[0];
  if (report.status !== "succeeded" && first) {
    throw first.error;
  }
}

/**
 * Shards a fan-out should visit: the requested subset, or every registered shard
 * @throws {LookupError} If a requested shard is not registered
 */
export async function resolveShardIds(
  registry: ShardRegistry,
  requested?: readonly ShardId[]
): Promise<ShardId[]> {
  if (requested === undefined) {
    return registry.listShardIds();
  }
  const unique = [...new Set(requested)];
  for (const shardId of unique) {
    await registry.assertRegistered(shardId);
  }
  return unique.sort((a, b) => a - b);
}

/**
 * Run one step per shard, in order, collecting each outcome
 */
export async function fanOut<T>(
  shardIds: readonly ShardId[],
  operation: string,
  step: (shardId: ShardId) => Promise<T>,
  options: Pick<FanOutOptions, "onProgress"> = {}
): Promise<FanOutReport<T>> {
  const outcomes: ShardOutcome<T>[] = [];
  const failures: ShardFailure[] = [];
  const total = shardIds.length;

  for (const shardId of shardIds) {
    const table = shardTableName(shardId);
    try {
      const value = await metrics.time(operation, () => step(shardId));
      outcomes.push({ ok: true, shardId, table, value });
    } catch (err) {
      if (!(err instanceof StorageError)) {
        throw err;
      }
      const failure: ShardFailure = {
        ok: false,
        shardId,
        table,
        error: StorageError.forShard(err, operation, shardId),
      };
      outcomes.push(failure);
      failures.push(failure);
      logger.error(`${operation}_failed`, { shard: shardId, message: failure.error.message });
    }
    options.onProgress?.({ shardId, completed: outcomes.length, total });
  }

  const status = summarize(outcomes);
  logger.debug(operation, {
    message: `${status}: ${total - failures.length}/${total} shard(s)`,
  });
  return { status, outcomes, failures };
}
