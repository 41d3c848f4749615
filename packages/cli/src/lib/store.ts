/**
 * Store adapter for CLI
 * Opens the store for one command and always closes it afterwards
 */

import { openStore, type ReputationStore } from "@prefixwatch/sdk";
import { resolveDbPath } from "./env.js";
import { writeStderr } from "./io.js";

/**
 * Global options shared by every command
 */
export type GlobalOptions = {
  db?: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Run fn against a store opened from the global options
 *
 * When fn fails, a close failure is printed as a warning and fn's error wins.
 */
export async function withCliStore<T>(
  globals: GlobalOptions,
  fn: (store: ReputationStore) => Promise<T>
): Promise<T> {
  const store = await openStore({ path: resolveDbPath(globals.db) });

  let result: T;
  try {
    result = await fn(store);
  } catch (err) {
    try {
      await store.close();
    } catch (closeErr) {
      writeStderr(`Warning: failed to close store: ${closeErr instanceof Error ? closeErr.message : String(closeErr)}\n`);
    }
    throw err;
  }

  await store.close();
  return result;
}
