/**
 * Core types for prefixwatch
 */

import type { StorageError } from "./errors.js";
import type { Database, JournalMode } from "./db/database.js";
import type { SuspectMatcher } from "./matcher.js";
import type { HashPrefixIndex } from "./prefixes.js";
import type { ShardRegistry } from "./registry.js";
import type { UrlShardStore } from "./shards.js";
import type { BulkStatusUpdater } from "./updater.js";
import type { Vendor } from "./vendors.js";

/**
 * Registry-assigned shard id (positive integer)
 */
export type ShardId = number;

/**
 * Seconds since the Unix epoch
 */
export type Timestamp = number;

/**
 * A collection of urls or source names; a bare string is not one
 */
export type StringList = readonly string[] | ReadonlySet<string>;

/**
 * One registered ingestion source and the shard it owns
 */
export interface ShardSource {
  shardId: ShardId;
  name: string;
}

/**
 * One observed url as stored in its shard
 */
export interface UrlRecord {
  url: string;
  lastListed: Timestamp | null;
  lastMalicious: Record<Vendor, Timestamp | null>;
  lastReachable: Timestamp | null;
  /** SHA-256 of the url with the "/" terminator; never rewritten after insert */
  hash: Buffer;
}

/**
 * Overall result of a per-shard fan-out
 * - succeeded: no shard failed (also when there were no shards)
 * - partial: some shards failed, some succeeded
 * - failed: every shard that ran failed
 */
export type FanOutStatus = "succeeded" | "partial" | "failed";

export interface ShardSuccess<T> {
  ok: true;
  shardId: ShardId;
  table: string;
  value: T;
}

export interface ShardFailure {
  ok: false;
  shardId: ShardId;
  table: string;
  error: StorageError;
}

export type ShardOutcome<T> = ShardSuccess<T> | ShardFailure;

export interface FanOutReport<T> {
  status: FanOutStatus;
  /** One entry per shard, in registry order */
  outcomes: ShardOutcome<T>[];
  failures: ShardFailure[];
}

export interface FanOutProgress {
  shardId: ShardId;
  completed: number;
  total: number;
}

export interface FanOutOptions {
  /**
   * Restrict the fan-out to these shards (e.g. to retry the failures of a previous run).
   * Every id must be registered.
   */
  shardIds?: readonly ShardId[];
  /** Called after each shard, successful or not */
  onProgress?: (progress: FanOutProgress) => void;
}

/**
 * Result of matching stored hashes against one vendor's prefixes
 */
export interface SuspectScan extends FanOutReport<string[]> {
  vendor: Vendor;
  /** Distinct prefix lengths the scan matched at, ascending */
  prefixLengths: number[];
  /** Suspect urls across all successful shards; duplicates across shards preserved */
  urls: string[];
}

/**
 * Store configuration
 */
export interface StoreOptions {
  /** Database file, or ":memory:" (default: PREFIXWATCH_DB, else "./urls.db") */
  path?: string;
  /** Maximum urls bound into one statement (default: PREFIXWATCH_BATCH_SIZE, else 500) */
  batchSize?: number;
  /** Journal mode for file databases (default: "WAL") */
  journalMode?: JournalMode;
  /** How long a statement waits on a locked database file (default: 5000) */
  busyTimeoutMs?: number;
}

export type ResolvedStoreOptions = Required<StoreOptions>;

export interface ShardStats {
  shardId: ShardId;
  name: string;
  table: string;
  urls: number;
}

export interface StoreStats {
  shards: ShardStats[];
  urls: number;
  prefixes: Record<Vendor, number>;
}

/**
 * Open store handle; close it once at shutdown
 */
export interface ReputationStore {
  readonly options: ResolvedStoreOptions;
  readonly db: Database;
  readonly registry: ShardRegistry;
  readonly shards: UrlShardStore;
  readonly prefixes: HashPrefixIndex;
  readonly matcher: SuspectMatcher;
  readonly updater: BulkStatusUpdater;

  /**
   * Url counts per shard and prefix counts per vendor
   */
  stats(): Promise<StoreStats>;

  /**
   * Close the underlying connection; further calls fail with StorageError
   */
  close(): Promise<void>;
}
