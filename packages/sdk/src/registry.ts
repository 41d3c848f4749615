/**
 * Shard registry: stable mapping from ingestion source name to shard id
 */

import type { Database, Executor } from "./db/database.js";
import { LookupError } from "./errors.js";
import { logger } from "./observability/logs.js";
import type { ShardId, ShardSource, StringList } from "./types.js";
import { assertStringList, validateShardId, validateSourceName } from "./validation.js";

export const REGISTRY_TABLE = "shard_sources";

interface SourceRow {
  id: number;
  name: string;
}

/**
 * Ids are SQLite rowids: assigned monotonically on first registration and
 * never reassigned, so shard table names are reproducible across runs.
 */
export class ShardRegistry {
  #db: Database;

  constructor(db: Database) {
    this.#db = db;
  }

  /**
   * Create the registry table if absent
   */
  async init(): Promise<void> {
    await this.#db.run(
      `CREATE TABLE IF NOT EXISTS ${REGISTRY_TABLE} (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL UNIQUE
      )`
    );
  }

  /**
   * Register source names; names already registered keep their id
   * @throws {ConfigurationError} If names is a bare string or any name is blank (nothing is registered)
   */
  async registerSources(names: StringList): Promise<void> {
    assertStringList(names, "Source names");
    const unique = [...new Set(names)];
    unique.forEach(validateSourceName);
    if (unique.length === 0) return;

    const inserted = await this.#db.transaction((tx) =>
      tx.runBatch(
        `INSERT OR IGNORE INTO ${REGISTRY_TABLE} (id, name) VALUES (NULL, ?)`,
        unique.map((name) => [name])
      )
    );

    logger.info("registry.register", {
      message: `${inserted} new of ${unique.length} source(s)`,
    });
  }

  /**
   * All registered shard ids, ascending
   */
  async listShardIds(executor: Executor = this.#db): Promise<ShardId[]> {
    const rows = await executor.all<Pick<SourceRow, "id">>(
      `SELECT id FROM ${REGISTRY_TABLE} ORDER BY id`
    );
    return rows.map((row) => row.id);
  }

  /**
   * All registered sources, in shard id order
   */
  async listSources(): Promise<ShardSource[]> {
    const rows = await this.#db.all<SourceRow>(
      `SELECT id, name FROM ${REGISTRY_TABLE} ORDER BY id`
    );
    return rows.map((row) => ({ shardId: row.id, name: row.name }));
  }

  /**
   * Resolve the shard id for a source name
   * @throws {LookupError} If the source was never registered
   */
  async shardIdFor(name: string, executor: Executor = this.#db): Promise<ShardId> {
    const row = await executor.get<Pick<SourceRow, "id">>(
      `SELECT id FROM ${REGISTRY_TABLE} WHERE name = ? LIMIT 1`,
      [name]
    );
    if (!row) {
      throw new LookupError(`source "${name}"`);
    }
    return row.id;
  }

  /**
   * Source name owning a shard
   * @throws {LookupError} If the shard id is not registered
   */
  async sourceNameFor(shardId: ShardId, executor: Executor = this.#db): Promise<string> {
    validateShardId(shardId);
    const row = await executor.get<Pick<SourceRow, "name">>(
      `SELECT name FROM ${REGISTRY_TABLE} WHERE id = ? LIMIT 1`,
      [shardId]
    );
    if (!row) {
      throw new LookupError(`shard ${shardId}`);
    }
    return row.name;
  }

  /**
   * Guard for every operation that addresses a shard table by id
   * @throws {LookupError} If the id is malformed or not registered
   */
  async assertRegistered(shardId: ShardId, executor: Executor = this.#db): Promise<void> {
    await this.sourceNameFor(shardId, executor);
  }
}
