/**
 * URL shard store: one table of observed urls per registered source
 */

import type { Database, Executor } from "./db/database.js";
import { IntegrityViolationError } from "./errors.js";
import { hashUrl } from "./hash.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { ShardRegistry } from "./registry.js";
import type { ShardId, StringList, Timestamp, UrlRecord } from "./types.js";
import {
  chunk,
  placeholders,
  uniqueUrls,
  validateShardId,
  validateTimestamp,
} from "./validation.js";
import {
  MALICIOUS_COLUMNS,
  VENDORS,
  assertVendor,
  vendorRecord,
  type MaliciousColumn,
  type Vendor,
} from "./vendors.js";

export const SHARD_TABLE_PREFIX = "shard_";

type ShardRow = {
  url: string;
  last_listed: number | null;
  last_reachable: number | null;
  hash: Buffer;
} & Record<MaliciousColumn, number | null>;

type StatusColumn = MaliciousColumn | "last_reachable";

export interface UrlShardStoreOptions {
  /** Maximum urls bound into one UPDATE ... IN (...) statement */
  batchSize: number;
}

/**
 * Table name for a shard id
 *
 * The id is the only thing interpolated into SQL, so it must be a positive
 * integer; callers additionally check it against the registry.
 * @throws {LookupError} If the id is not a positive integer
 */
export function shardTableName(shardId: ShardId): string {
  validateShardId(shardId);
  return `${SHARD_TABLE_PREFIX}${shardId}`;
}

function toRecord(row: ShardRow): UrlRecord {
  return {
    url: row.url,
    lastListed: row.last_listed,
    lastMalicious: vendorRecord((vendor) => row[MALICIOUS_COLUMNS[vendor]]),
    lastReachable: row.last_reachable,
    hash: row.hash,
  };
}

export class UrlShardStore {
  #db: Database;
  #registry: ShardRegistry;
  #batchSize: number;

  constructor(db: Database, registry: ShardRegistry, options: UrlShardStoreOptions) {
    this.#db = db;
    this.#registry = registry;
    this.#batchSize = options.batchSize;
  }

  tableName(shardId: ShardId): string {
    return shardTableName(shardId);
  }

  /**
   * Table names of every registered shard, in registry order
   */
  async listShardNames(): Promise<string[]> {
    const ids = await this.#registry.listShardIds();
    return ids.map(shardTableName);
  }

  /**
   * Whether the shard's table has been created yet
   */
  async shardExists(shardId: ShardId, executor: Executor = this.#db): Promise<boolean> {
    const row = await executor.get<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
      [shardTableName(shardId)]
    );
    return row !== undefined;
  }

  /**
   * Create the shard's table if absent
   * @throws {LookupError} If the shard is not registered
   */
  async ensureShard(shardId: ShardId): Promise<void> {
    await this.#db.transaction(async (tx) => {
      await this.#registry.assertRegistered(shardId, tx);
      await this.#createTable(tx, shardId);
    });
  }

  /**
   * Record urls as observed at `observedAt`
   *
   * New urls are inserted with their hash; known urls only get `last_listed`
   * refreshed. The stored hash and status columns are never touched here.
   * @returns Number of distinct urls written
   * @throws {ConfigurationError} If the timestamp is invalid
   * @throws {LookupError} If the shard is not registered
   */
  async upsertUrls(shardId: ShardId, urls: StringList, observedAt: Timestamp): Promise<number> {
    validateTimestamp(observedAt, "observedAt");
    validateShardId(shardId);
    const list = uniqueUrls(urls);
    const table = shardTableName(shardId);

    await metrics.time("shard.upsert", () =>
      this.#db.transaction(async (tx) => {
        await this.#registry.assertRegistered(shardId, tx);
        await this.#createTable(tx, shardId);
        if (list.length === 0) return 0;
        await tx.runBatch(
          `INSERT INTO ${table} (url, last_listed, hash)
           VALUES (?, ?, ?)
           ON CONFLICT(url) DO UPDATE SET last_listed = excluded.last_listed`,
          list.map((url) => [url, observedAt, hashUrl(url)])
        );
        return list.length;
      }),
      (count) => count
    );

    logger.info("shard.upsert", { shard: shardId, message: `${list.length} url(s)` });
    return list.length;
  }

  /**
   * Upsert urls into the shard owned by a source name
   * @returns The shard id written to
   * @throws {LookupError} If the source was never registered (nothing is written)
   */
  async ingest(sourceName: string, urls: StringList, observedAt: Timestamp): Promise<ShardId> {
    validateTimestamp(observedAt, "observedAt");
    const shardId = await this.#registry.shardIdFor(sourceName);
    logger.debug("shard.ingest", { shard: shardId, message: `source "${sourceName}"` });
    await this.upsertUrls(shardId, urls, observedAt);
    return shardId;
  }

  /**
   * Set a vendor's malicious timestamp on the listed urls present in this shard
   * Absent urls are skipped; an empty set issues no statement.
   * @returns Number of rows changed
   * @throws {ConfigurationError} If the vendor or timestamp is invalid
   * @throws {LookupError} If the shard is not registered
   */
  async setVendorMaliciousTimestamp(
    shardId: ShardId,
    urls: StringList,
    vendor: Vendor,
    at: Timestamp
  ): Promise<number> {
    assertVendor(vendor);
    return this.#setStatus(shardId, urls, MALICIOUS_COLUMNS[vendor], at);
  }

  /**
   * Set the reachability timestamp on the listed urls present in this shard
   * @returns Number of rows changed
   * @throws {ConfigurationError} If the timestamp is invalid
   * @throws {LookupError} If the shard is not registered
   */
  async setReachableTimestamp(shardId: ShardId, urls: StringList, at: Timestamp): Promise<number> {
    return this.#setStatus(shardId, urls, "last_reachable", at);
  }

  /**
   * Read one url's record, or null when the shard does not hold it
   * @throws {LookupError} If the shard is not registered
   */
  async getRecord(shardId: ShardId, url: string): Promise<UrlRecord | null> {
    const table = shardTableName(shardId);
    return this.#db.transaction(async (tx) => {
      await this.#registry.assertRegistered(shardId, tx);
      if (!(await this.shardExists(shardId, tx))) return null;
      const row = await tx.get<ShardRow>(
        `SELECT ${this.#columns()} FROM ${table} WHERE url = ?`,
        [url]
      );
      return row ? toRecord(row) : null;
    }, "deferred");
  }

  /**
   * Number of urls stored in a shard (0 before its first upsert)
   * @throws {LookupError} If the shard is not registered
   */
  async countUrls(shardId: ShardId): Promise<number> {
    const table = shardTableName(shardId);
    return this.#db.transaction(async (tx) => {
      await this.#registry.assertRegistered(shardId, tx);
      if (!(await this.shardExists(shardId, tx))) return 0;
      const row = await tx.get<{ count: number }>(`SELECT COUNT(*) AS count FROM ${table}`);
      return row?.count ?? 0;
    }, "deferred");
  }

  /**
   * Recompute every stored hash in a shard and compare
   * Mismatches are reported, never repaired.
   * @returns Number of rows checked
   * @throws {IntegrityViolationError} If any stored hash differs from its url's hash
   * @throws {LookupError} If the shard is not registered
   */
  async verifyShard(shardId: ShardId): Promise<number> {
    const table = shardTableName(shardId);
    const rows = await this.#db.transaction<Pick<ShardRow, "url" | "hash">[]>(async (tx) => {
      await this.#registry.assertRegistered(shardId, tx);
      if (!(await this.shardExists(shardId, tx))) return [];
      return tx.all<Pick<ShardRow, "url" | "hash">>(`SELECT url, hash FROM ${table}`);
    }, "deferred");

    const mismatched = rows
      .filter((row) => !Buffer.isBuffer(row.hash) || !hashUrl(row.url).equals(row.hash))
      .map((row) => row.url);

    if (mismatched.length > 0) {
      logger.error("shard.integrity", {
        shard: shardId,
        message: `${mismatched.length} stored hash(es) do not match`,
      });
      throw new IntegrityViolationError(shardId, mismatched);
    }
    return rows.length;
  }

  async #setStatus(
    shardId: ShardId,
    urls: StringList,
    column: StatusColumn,
    at: Timestamp
  ): Promise<number> {
    validateTimestamp(at, "at");
    const table = shardTableName(shardId);
    const list = uniqueUrls(urls);
    if (list.length === 0) return 0;

    return this.#db.transaction(async (tx) => {
      await this.#registry.assertRegistered(shardId, tx);
      if (!(await this.shardExists(shardId, tx))) return 0;

      let changed = 0;
      for (const batch of chunk(list, this.#batchSize)) {
        changed += await tx.run(
          `UPDATE ${table} SET ${column} = ? WHERE url IN (${placeholders(batch.length)})`,
          [at, ...batch]
        );
      }
      return changed;
    });
  }

  async #createTable(executor: Executor, shardId: ShardId): Promise<void> {
    const vendorColumns = VENDORS.map((vendor) => `${MALICIOUS_COLUMNS[vendor]} INTEGER,`).join("\n        ");
    await executor.run(
      `CREATE TABLE IF NOT EXISTS ${shardTableName(shardId)} (
        url TEXT NOT NULL UNIQUE,
        last_listed INTEGER,
        ${vendorColumns}
        last_reachable INTEGER,
        hash BLOB NOT NULL
      )`
    );
  }

  #columns(): string {
    return [
      "url",
      "last_listed",
      ...VENDORS.map((vendor) => MALICIOUS_COLUMNS[vendor]),
      "last_reachable",
      "hash",
    ].join(", ");
  }
}
