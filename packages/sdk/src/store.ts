/**
 * Store handle wiring the components over one SQLite connection
 */

import { resolveStoreOptions } from "./config.js";
import { Database } from "./db/database.js";
import { SuspectMatcher } from "./matcher.js";
import { logger } from "./observability/logs.js";
import { HashPrefixIndex } from "./prefixes.js";
import { ShardRegistry } from "./registry.js";
import { UrlShardStore } from "./shards.js";
import type {
  ReputationStore,
  ResolvedStoreOptions,
  ShardStats,
  StoreOptions,
  StoreStats,
} from "./types.js";
import { BulkStatusUpdater } from "./updater.js";
import { VENDORS, vendorRecord } from "./vendors.js";

/**
 * URL reputation store backed by SQLite
 *
 * @example
 * ```typescript
 * const store = await openStore({ path: "./urls.db" });
 *
 * await store.registry.registerSources(["list1"]);
 * await store.shards.ingest("list1", ["http://example.test/"], 100);
 * await store.prefixes.replaceVendorPrefixes("Google", feedPrefixes);
 *
 * const scan = await store.matcher.findSuspects("Google");
 * if (scan.status !== "succeeded") {
 *   // some shards failed; scan.failures says which
 * }
 *
 * await store.close();
 * ```
 */
class PrefixWatchStore implements ReputationStore {
  readonly options: ResolvedStoreOptions;
  readonly db: Database;
  readonly registry: ShardRegistry;
  readonly shards: UrlShardStore;
  readonly prefixes: HashPrefixIndex;
  readonly matcher: SuspectMatcher;
  readonly updater: BulkStatusUpdater;

  constructor(db: Database, options: ResolvedStoreOptions) {
    this.options = options;
    this.db = db;
    this.registry = new ShardRegistry(db);
    this.shards = new UrlShardStore(db, this.registry, { batchSize: options.batchSize });
    this.prefixes = new HashPrefixIndex(db);
    this.matcher = new SuspectMatcher(db, this.registry, this.shards, this.prefixes);
    this.updater = new BulkStatusUpdater(this.registry, this.shards);
  }

  async init(): Promise<void> {
    await this.registry.init();
    await this.prefixes.init();
  }

  async stats(): Promise<StoreStats> {
    const sources = await this.registry.listSources();
    const shards: ShardStats[] = [];
    for (const source of sources) {
      shards.push({
        shardId: source.shardId,
        name: source.name,
        table: this.shards.tableName(source.shardId),
        urls: await this.shards.countUrls(source.shardId),
      });
    }

    const counts = new Map<string, number>();
    for (const vendor of VENDORS) {
      counts.set(vendor, await this.prefixes.countPrefixes(vendor));
    }

    return {
      shards,
      urls: shards.reduce((sum, shard) => sum + shard.urls, 0),
      prefixes: vendorRecord((vendor) => counts.get(vendor) ?? 0),
    };
  }

  async close(): Promise<void> {
    await this.db.close();
    logger.debug("store.close", { message: this.options.path });
  }
}

/**
 * Open (creating if needed) a store and its registry and prefix tables
 * @throws {ConfigurationError} If the options are invalid
 * @throws {StorageError} If the database cannot be opened or initialized
 */
export async function openStore(options: StoreOptions = {}): Promise<ReputationStore> {
  const resolved = resolveStoreOptions(options);
  const db = await Database.open(resolved.path, {
    journalMode: resolved.journalMode,
    busyTimeoutMs: resolved.busyTimeoutMs,
  });

  const store = new PrefixWatchStore(db, resolved);
  try {
    await store.init();
  } catch (err) {
    await db.close();
    throw err;
  }

  logger.debug("store.open", { message: resolved.path });
  return store;
}
