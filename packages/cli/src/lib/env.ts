/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { DEFAULT_DB_PATH, MEMORY_PATH } from "@prefixwatch/sdk";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the database file
 * Priority: CLI option > PREFIXWATCH_DB env var > default "./urls.db"
 */
export function resolveDbPath(cliDb?: string, env: NodeJS.ProcessEnv = process.env): string {
  const db = cliDb ?? env.PREFIXWATCH_DB ?? DEFAULT_DB_PATH;
  if (db === MEMORY_PATH) {
    return db;
  }
  return path.resolve(expandTilde(db));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(flag?: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  return flag === true || env.PREFIXWATCH_CLI_DEBUG === "1";
}

