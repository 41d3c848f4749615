/**
 * prefixwatch SDK
 *
 * Sharded URL reputation store with vendor hash-prefix matching
 */

// Re-export types
export type {
  ShardId,
  Timestamp,
  StringList,
  ShardSource,
  UrlRecord,
  FanOutStatus,
  ShardSuccess,
  ShardFailure,
  ShardOutcome,
  FanOutReport,
  FanOutProgress,
  FanOutOptions,
  SuspectScan,
  StoreOptions,
  ResolvedStoreOptions,
  ShardStats,
  StoreStats,
  ReputationStore,
} from "./types.js";

// Re-export components
export { Database, MEMORY_PATH } from "./db/database.js";
export type { Executor, SqlParams, SqlValue, JournalMode, TransactionMode } from "./db/database.js";
export { ShardRegistry, REGISTRY_TABLE } from "./registry.js";
export { UrlShardStore, shardTableName, SHARD_TABLE_PREFIX } from "./shards.js";
export { HashPrefixIndex, PREFIX_TABLE } from "./prefixes.js";
export { SuspectMatcher } from "./matcher.js";
export { BulkStatusUpdater } from "./updater.js";
export { assertComplete, summarize } from "./fanout.js";

// Re-export utilities
export { hashUrl, truncateHash, parsePrefix, formatPrefix, validatePrefix, HASH_LENGTH } from "./hash.js";
export { VENDORS, MALICIOUS_COLUMNS, isVendor, parseVendor, assertVendor } from "./vendors.js";
export type { Vendor } from "./vendors.js";
export { resolveStoreOptions, DEFAULT_DB_PATH, DEFAULT_BATCH_SIZE, MAX_BATCH_SIZE } from "./config.js";
export { logger } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";

// Re-export errors
export {
  PrefixWatchError,
  ConfigurationError,
  LookupError,
  StorageError,
  IntegrityViolationError,
} from "./errors.js";

export { openStore } from "./store.js";
