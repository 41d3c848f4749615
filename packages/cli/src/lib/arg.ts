/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { ConfigurationError, parseVendor, type Vendor } from "@prefixwatch/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${name} is too large`);
  }

  return parsed;
}

/**
 * Parse an `--at` timestamp (seconds since the epoch)
 */
export function parseTimestamp(value: string): number {
  return parseNonNegativeInt(value, "--at");
}

/**
 * Parse one `--shard` id, accumulating repeated flags
 */
export function collectShardId(value: string, previous: number[] | undefined): number[] {
  const shardId = parseNonNegativeInt(value, "--shard");
  if (shardId === 0) {
    throw new InvalidArgumentError("--shard must be a positive integer");
  }
  return [...(previous ?? []), shardId];
}

/**
 * Parse a vendor name (case-insensitive)
 */
export function parseVendorArg(value: string): Vendor {
  try {
    return parseVendor(value);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}

/**
 * Current time in whole seconds, the default for `--at`
 */
export function nowSeconds(now: number = Date.now()): number {
  return Math.floor(now / 1000);
}
