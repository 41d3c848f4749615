/**
 * Store option resolution
 * Priority: explicit option > environment variable > default
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { ResolvedStoreOptions, StoreOptions } from "./types.js";

export const DEFAULT_DB_PATH = "./urls.db";
export const DEFAULT_BATCH_SIZE = 500;

/**
 * Kept below SQLite's default bound of 32766 host parameters per statement,
 * leaving room for the timestamp bound alongside each batch
 */
export const MAX_BATCH_SIZE = 32000;

const StoreOptionsSchema = z.object({
  path: z.string().min(1, "path must be non-empty"),
  batchSize: z.number().int().min(1).max(MAX_BATCH_SIZE),
  journalMode: z.enum(["WAL", "DELETE"]),
  busyTimeoutMs: z.number().int().min(0),
});

/**
 * Parse an integer environment variable; unset or blank falls back to the default
 */
function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  return Number(raw);
}

/**
 * Resolve store options against the environment and validate them
 * @throws {ConfigurationError} If any option is out of range
 */
export function resolveStoreOptions(
  options: StoreOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedStoreOptions {
  const candidate = {
    path: options.path ?? env.PREFIXWATCH_DB ?? DEFAULT_DB_PATH,
    batchSize: options.batchSize ?? envInt(env, "PREFIXWATCH_BATCH_SIZE") ?? DEFAULT_BATCH_SIZE,
    journalMode: options.journalMode ?? "WAL",
    busyTimeoutMs: options.busyTimeoutMs ?? 5000,
  };

  const result = StoreOptionsSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid store options: ${issues}`, { cause: result.error });
  }
  return result.data;
}
