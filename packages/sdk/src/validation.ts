/**
 * Validation utilities for store operations
 *
 * Everything here runs before a statement is issued, so a rejected call
 * never leaves a partial write behind.
 */

import { ConfigurationError, LookupError } from "./errors.js";
import type { ShardId, StringList, Timestamp } from "./types.js";

/**
 * Validate an observation or confirmation timestamp (integer seconds since the epoch)
 * @throws {ConfigurationError} If the value is not a non-negative safe integer
 */
export function validateTimestamp(value: Timestamp, label = "timestamp"): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConfigurationError(`${label} must be a non-negative integer, got ${String(value)}`);
  }
}

/**
 * Validate the shape of a shard id; registration is checked separately
 * @throws {LookupError} If the id cannot name a shard
 */
export function validateShardId(shardId: ShardId): void {
  if (!Number.isSafeInteger(shardId) || shardId < 1) {
    throw new LookupError(`shard ${String(shardId)}`);
  }
}

/**
 * Validate a source name
 * @throws {ConfigurationError} If the name is empty or blank
 */
export function validateSourceName(name: string): void {
  if (typeof name !== "string" || name.trim() === "") {
    throw new ConfigurationError("Source name must be a non-empty string");
  }
}

/**
 * Reject a bare string where a list is expected; iterating it would yield characters
 */
export function assertStringList(list: StringList, what: string): void {
  if (typeof list === "string" || list === null || typeof list !== "object") {
    throw new ConfigurationError(`${what} must be an array or set of strings`);
  }
}

/**
 * Collapse a url collection into a de-duplicated list, keeping first-seen order
 * @throws {ConfigurationError} If the collection is a bare string or an entry is not a string
 */
export function uniqueUrls(urls: StringList): string[] {
  assertStringList(urls, "URLs");
  const seen = new Set<string>();
  for (const url of urls) {
    if (typeof url !== "string") {
      throw new ConfigurationError(`URL must be a string, got ${typeof url}`);
    }
    seen.add(url);
  }
  return [...seen];
}

/**
 * Split a list into consecutive chunks of at most `size` entries
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Comma-separated "?" placeholders for an IN (...) list
 */
export function placeholders(count: number): string {
  return new Array<string>(count).fill("?").join(", ");
}
