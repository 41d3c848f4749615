/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openStore } from "@prefixwatch/sdk";
import type { ReputationStore, StoreOptions } from "@prefixwatch/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "prefixwatch-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "prefixwatch-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Database file path inside a temp directory
 */
export function tempDbPath(dir: string): string {
  return join(dir, "urls.db");
}

/**
 * Execute a function with a store backed by a temporary database file, cleaning up after
 * @param fn - Function to execute with the store and its database path
 * @param options - Optional store options (path will be overridden)
 * @returns Result of fn
 */
export async function withTempStore<T>(
  fn: (store: ReputationStore, dbPath: string) => Promise<T>,
  options?: Omit<StoreOptions, "path">
): Promise<T> {
  const dir = await createTempDir();
  const dbPath = tempDbPath(dir);
  let store: ReputationStore;
  try {
    store = await openStore({ ...options, path: dbPath });
  } catch (err) {
    await removeDir(dir);
    throw err;
  }

  let fnError: unknown;
  try {
    return await fn(store, dbPath);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    let cleanupError: unknown;
    try {
      await store.close();
    } catch (err) {
      cleanupError = err;
    }
    try {
      await removeDir(dir);
    } catch (err) {
      if (!cleanupError) {
        cleanupError = err;
      }
    }
    if (!fnError && cleanupError) {
      // eslint-disable-next-line no-unsafe-finally
      throw cleanupError;
    }
  }
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
