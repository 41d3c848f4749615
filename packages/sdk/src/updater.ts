/**
 * Bulk status updater: writes verified results back to every shard
 */

import { emptyReport, fanOut, resolveShardIds } from "./fanout.js";
import { logger } from "./observability/logs.js";
import type { ShardRegistry } from "./registry.js";
import type { UrlShardStore } from "./shards.js";
import type { FanOutOptions, FanOutReport, ShardId, StringList, Timestamp } from "./types.js";
import { uniqueUrls, validateTimestamp } from "./validation.js";
import { assertVendor, type Vendor } from "./vendors.js";

/**
 * Applies confirmed-malicious and confirmed-reachable timestamps across shards.
 *
 * Input is the output of an external verification step, not raw matcher
 * suspects. Each shard is updated in its own transaction; there is no
 * cross-shard atomicity, so a partial report can be retried with
 * `options.shardIds` set to the failed shards.
 */
export class BulkStatusUpdater {
  #registry: ShardRegistry;
  #shards: UrlShardStore;

  constructor(registry: ShardRegistry, shards: UrlShardStore) {
    this.#registry = registry;
    this.#shards = shards;
  }

  /**
   * Record that `vendor` confirmed these urls malicious at `at`
   * @returns Per-shard count of rows changed
   * @throws {ConfigurationError} If the vendor or timestamp is invalid (before any write)
   * @throws {LookupError} If `options.shardIds` names an unregistered shard
   */
  async markMalicious(
    vendor: Vendor,
    urls: StringList,
    at: Timestamp,
    options: FanOutOptions = {}
  ): Promise<FanOutReport<number>> {
    assertVendor(vendor);
    validateTimestamp(at, "at");
    const list = uniqueUrls(urls);

    return this.#apply(list, `${vendor} malicious`, options, (shardId) =>
      this.#shards.setVendorMaliciousTimestamp(shardId, list, vendor, at)
    );
  }

  /**
   * Record that these urls were confirmed reachable at `at`
   * @returns Per-shard count of rows changed
   * @throws {ConfigurationError} If the timestamp is invalid (before any write)
   * @throws {LookupError} If `options.shardIds` names an unregistered shard
   */
  async markReachable(
    urls: StringList,
    at: Timestamp,
    options: FanOutOptions = {}
  ): Promise<FanOutReport<number>> {
    validateTimestamp(at, "at");
    const list = uniqueUrls(urls);

    return this.#apply(list, "reachable", options, (shardId) =>
      this.#shards.setReachableTimestamp(shardId, list, at)
    );
  }

  async #apply(
    urls: readonly string[],
    label: string,
    options: FanOutOptions,
    step: (shardId: ShardId) => Promise<number>
  ): Promise<FanOutReport<number>> {
    if (urls.length === 0) {
      logger.debug("updater.fanout", { message: `${label}: no urls, nothing to update` });
      return emptyReport();
    }

    const shardIds = await resolveShardIds(this.#registry, options.shardIds);
    const report = await fanOut(shardIds, "updater.shard", step, options);

    const changed = report.outcomes.reduce((sum, outcome) => sum + (outcome.ok ? outcome.value : 0), 0);
    logger.info("updater.fanout", {
      message: `${label}: ${urls.length} url(s), ${changed} row(s) updated across ${shardIds.length} shard(s), status ${report.status}`,
    });
    return report;
  }
}
