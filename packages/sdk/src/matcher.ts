/**
 * Suspect matcher: cross-references stored url hashes with a vendor's prefixes
 */

import type { Database, Executor } from "./db/database.js";
import { StorageError } from "./errors.js";
import { fanOut, resolveShardIds } from "./fanout.js";
import { logger } from "./observability/logs.js";
import { PREFIX_TABLE, type HashPrefixIndex } from "./prefixes.js";
import type { ShardRegistry } from "./registry.js";
import { shardTableName, type UrlShardStore } from "./shards.js";
import type { FanOutOptions, ShardId, SuspectScan } from "./types.js";
import { assertVendor, type Vendor } from "./vendors.js";

interface ShardScan {
  prefixLengths: number[];
  urls: string[];
}

export class SuspectMatcher {
  #db: Database;
  #registry: ShardRegistry;
  #shards: UrlShardStore;
  #prefixes: HashPrefixIndex;

  constructor(db: Database, registry: ShardRegistry, shards: UrlShardStore, prefixes: HashPrefixIndex) {
    this.#db = db;
    this.#registry = registry;
    this.#shards = shards;
    this.#prefixes = prefixes;
  }

  /**
   * Find every stored url whose hash starts with one of the vendor's prefixes
   *
   * Visits shards in registry order and, within a shard, each distinct prefix
   * length: a hash truncated to L bytes is compared only with prefixes of
   * exactly L bytes. Urls present in several shards appear once per shard.
   *
   * Each shard reads the vendor's prefix lengths inside its own transaction,
   * so a concurrent replace is seen either wholly or not at all by that
   * shard. `prefixLengths` is the union of the lengths the shards matched at.
   *
   * A shard that fails is reported in `failures` and contributes no urls;
   * check `status` before treating `urls` as complete.
   * @throws {ConfigurationError} If the vendor is unknown
   * @throws {LookupError} If `options.shardIds` names an unregistered shard
   */
  async findSuspects(vendor: Vendor, options: FanOutOptions = {}): Promise<SuspectScan> {
    assertVendor(vendor);
    const shardIds = await resolveShardIds(this.#registry, options.shardIds);

    const lengthsSeen = new Set<number>();
    const report = await fanOut(
      shardIds,
      "matcher.shard",
      async (shardId) => {
        const scanned = await this.#scanShard(shardId, vendor);
        scanned.prefixLengths.forEach((length) => lengthsSeen.add(length));
        return scanned.urls;
      },
      options
    );

    const prefixLengths = [...lengthsSeen].sort((a, b) => a - b);
    if (prefixLengths.length === 0 && report.outcomes.some((outcome) => outcome.ok)) {
      logger.warn("matcher.scan", { vendor, message: "no prefixes loaded for this vendor" });
    }
    const urls = report.outcomes.flatMap((outcome) => (outcome.ok ? outcome.value : []));
    logger.info("matcher.scan", {
      vendor,
      message: `${urls.length} suspect url(s) across ${shardIds.length} shard(s), status ${report.status}`,
      details: { prefixLengths },
    });

    return { ...report, vendor, prefixLengths, urls };
  }

  /**
   * Match a single shard, e.g. to retry one that failed during a scan
   * @throws {StorageError} If the shard query fails
   * @throws {LookupError} If the shard is not registered
   */
  async findSuspectsInShard(shardId: ShardId, vendor: Vendor): Promise<string[]> {
    assertVendor(vendor);
    await this.#registry.assertRegistered(shardId);
    try {
      return (await this.#scanShard(shardId, vendor)).urls;
    } catch (err) {
      throw err instanceof StorageError ? StorageError.forShard(err, "matcher.shard", shardId) : err;
    }
  }

  async #scanShard(shardId: ShardId, vendor: Vendor): Promise<ShardScan> {
    return this.#db.transaction<ShardScan>(async (tx) => {
      const prefixLengths = await this.#prefixes.distinctPrefixLengthsFor(vendor, tx);
      if (prefixLengths.length === 0) return { prefixLengths, urls: [] };
      if (!(await this.#shards.shardExists(shardId, tx))) return { prefixLengths, urls: [] };

      const urls: string[] = [];
      for (const length of prefixLengths) {
        urls.push(...(await this.#matchLength(tx, shardId, vendor, length)));
      }
      return { prefixLengths, urls };
    }, "deferred");
  }

  async #matchLength(
    executor: Executor,
    shardId: ShardId,
    vendor: Vendor,
    length: number
  ): Promise<string[]> {
    const table = shardTableName(shardId);
    const rows = await executor.all<{ url: string }>(
      `SELECT s.url AS url
       FROM ${table} AS s
       INNER JOIN ${PREFIX_TABLE} AS p
         ON p.vendor = ? AND p.prefix_length = ? AND p.prefix = substr(s.hash, 1, ?)
       ORDER BY s.rowid`,
      [vendor, length, length]
    );
    return rows.map((row) => row.url);
  }
}
