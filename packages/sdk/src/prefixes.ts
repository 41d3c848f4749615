/**
 * Hash-prefix index: vendor-supplied malicious hash prefixes, tagged by byte length
 */

import type { Database, Executor } from "./db/database.js";
import { formatPrefix, validatePrefix } from "./hash.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { assertVendor, type Vendor } from "./vendors.js";

export const PREFIX_TABLE = "hash_prefixes";

export class HashPrefixIndex {
  #db: Database;

  constructor(db: Database) {
    this.#db = db;
  }

  /**
   * Create the prefix table and its lookup index if absent
   */
  async init(): Promise<void> {
    await this.#db.transaction(async (tx) => {
      await tx.run(
        `CREATE TABLE IF NOT EXISTS ${PREFIX_TABLE} (
          prefix BLOB NOT NULL,
          prefix_length INTEGER NOT NULL,
          vendor TEXT NOT NULL
        )`
      );
      await tx.run(
        `CREATE INDEX IF NOT EXISTS ${PREFIX_TABLE}_lookup
         ON ${PREFIX_TABLE} (vendor, prefix_length, prefix)`
      );
    });
  }

  /**
   * Swap a vendor's prefix set for a new snapshot
   *
   * Delete and insert share one transaction, so readers see either the old
   * set or the new one. Duplicate prefixes are stored once.
   * @returns Number of distinct prefixes stored
   * @throws {ConfigurationError} If the vendor or any prefix is invalid (nothing is replaced)
   */
  async replaceVendorPrefixes(vendor: Vendor, prefixes: Iterable<Uint8Array>): Promise<number> {
    assertVendor(vendor);

    const distinct = new Map<string, Buffer>();
    for (const prefix of prefixes) {
      validatePrefix(prefix);
      distinct.set(formatPrefix(prefix), Buffer.from(prefix));
    }

    await metrics.time(
      "prefixes.replace",
      () =>
        this.#db.transaction(async (tx) => {
          await tx.run(`DELETE FROM ${PREFIX_TABLE} WHERE vendor = ?`, [vendor]);
          return tx.runBatch(
            `INSERT INTO ${PREFIX_TABLE} (prefix, prefix_length, vendor) VALUES (?, ?, ?)`,
            [...distinct.values()].map((prefix) => [prefix, prefix.byteLength, vendor])
          );
        }),
      (inserted) => inserted
    );

    logger.info("prefixes.replace", { vendor, message: `${distinct.size} prefix(es)` });
    return distinct.size;
  }

  /**
   * Every prefix length present for a vendor, ascending
   * @throws {ConfigurationError} If the vendor is unknown
   */
  async distinctPrefixLengthsFor(vendor: Vendor, executor: Executor = this.#db): Promise<number[]> {
    assertVendor(vendor);
    const rows = await executor.all<{ prefix_length: number }>(
      `SELECT DISTINCT prefix_length FROM ${PREFIX_TABLE} WHERE vendor = ? ORDER BY prefix_length`,
      [vendor]
    );
    return rows.map((row) => row.prefix_length);
  }

  /**
   * Number of prefixes stored for a vendor
   * @throws {ConfigurationError} If the vendor is unknown
   */
  async countPrefixes(vendor: Vendor): Promise<number> {
    assertVendor(vendor);
    const row = await this.#db.get<{ count: number }>(
      `SELECT COUNT(*) AS count FROM ${PREFIX_TABLE} WHERE vendor = ?`,
      [vendor]
    );
    return row?.count ?? 0;
  }
}
