/**
 * Promise-based handle over a single sqlite3 connection
 *
 * Every statement runs under the connection's SerialLock. Inside
 * `transaction()` the callback receives an Executor bound to the held lock;
 * calling back into the Database from there would wait on itself, so
 * transactional code must only use the Executor it was given.
 */

import sqlite3 from "sqlite3";
import type { Database as NativeDatabase, RunResult, Statement } from "sqlite3";
import { StorageError } from "../errors.js";
import { SerialLock } from "./lock.js";

export type SqlValue = string | number | bigint | Buffer | null;
export type SqlParams = readonly SqlValue[];

export type JournalMode = "WAL" | "DELETE";
export type TransactionMode = "deferred" | "immediate";

export const MEMORY_PATH = ":memory:";

/**
 * Statement execution surface shared by the Database and its transactions
 */
export interface Executor {
  /** Execute a statement, returning the number of rows changed */
  run(sql: string, params?: SqlParams): Promise<number>;
  /** Execute a query, returning every row */
  all<T>(sql: string, params?: SqlParams): Promise<T[]>;
  /** Execute a query, returning the first row */
  get<T>(sql: string, params?: SqlParams): Promise<T | undefined>;
  /** Execute one prepared statement for each parameter tuple */
  runBatch(sql: string, tuples: Iterable<SqlParams>): Promise<number>;
}

export interface OpenOptions {
  journalMode?: JournalMode;
  busyTimeoutMs?: number;
}

/**
 * Short label for a statement, used as the StorageError operation
 */
function describe(sql: string): string {
  const flat = sql.replace(/\s+/g, " ").trim();
  return flat.length > 80 ? `${flat.slice(0, 77)}...` : flat;
}

/**
 * Raw statement execution with no locking
 */
class Connection implements Executor {
  #native: NativeDatabase;

  constructor(native: NativeDatabase) {
    this.#native = native;
  }

  run(sql: string, params: SqlParams = []): Promise<number> {
    return new Promise((resolve, reject) => {
      this.#native.run(sql, params, function (this: RunResult, err: Error | null) {
        if (err) {
          reject(new StorageError(describe(sql), undefined, { cause: err }));
          return;
        }
        resolve(this.changes);
      });
    });
  }

  all<T>(sql: string, params: SqlParams = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.#native.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) {
          reject(new StorageError(describe(sql), undefined, { cause: err }));
          return;
        }
        resolve(rows);
      });
    });
  }

  get<T>(sql: string, params: SqlParams = []): Promise<T | undefined> {
    return new Promise((resolve, reject) => {
      this.#native.get(sql, params, (err: Error | null, row: T | undefined) => {
        if (err) {
          reject(new StorageError(describe(sql), undefined, { cause: err }));
          return;
        }
        resolve(row);
      });
    });
  }

  exec(sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.#native.exec(sql, (err: Error | null) => {
        if (err) {
          reject(new StorageError(describe(sql), undefined, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  async runBatch(sql: string, tuples: Iterable<SqlParams>): Promise<number> {
    const statement = await this.#prepare(sql);
    let changes = 0;
    try {
      for (const params of tuples) {
        changes += await Connection.#runPrepared(statement, params, sql);
      }
    } finally {
      await Connection.#finalize(statement, sql);
    }
    return changes;
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.#native.close((err: Error | null) => {
        if (err) {
          reject(new StorageError("close", undefined, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  #prepare(sql: string): Promise<Statement> {
    return new Promise((resolve, reject) => {
      const statement = this.#native.prepare(sql, (err: Error | null) => {
        if (err) {
          reject(new StorageError(describe(sql), undefined, { cause: err }));
          return;
        }
        resolve(statement);
      });
    });
  }

  static #runPrepared(statement: Statement, params: SqlParams, sql: string): Promise<number> {
    return new Promise((resolve, reject) => {
      statement.run(params, function (this: RunResult, err: Error | null) {
        if (err) {
          reject(new StorageError(describe(sql), undefined, { cause: err }));
          return;
        }
        resolve(this.changes);
      });
    });
  }

  static #finalize(statement: Statement, sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      statement.finalize((err?: Error | null) => {
        if (err) {
          reject(new StorageError(`finalize ${describe(sql)}`, undefined, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }
}

/**
 * SQLite database handle with serialized access and scoped transactions
 *
 * @example
 * ```typescript
 * const db = await Database.open("./urls.db");
 * await db.transaction(async (tx) => {
 *   await tx.run("DELETE FROM hash_prefixes WHERE vendor = ?", ["Google"]);
 * });
 * await db.close();
 * ```
 */
export class Database implements Executor {
  readonly path: string;
  #conn: Connection;
  #lock = new SerialLock();
  #closed = false;

  private constructor(path: string, conn: Connection) {
    this.path = path;
    this.#conn = conn;
  }

  /**
   * Open a database file, or an ephemeral in-memory database for ":memory:"
   * @throws {StorageError} If the file cannot be opened or configured
   */
  static async open(path: string, options: OpenOptions = {}): Promise<Database> {
    const native = await new Promise<NativeDatabase>((resolve, reject) => {
      const db: NativeDatabase = new sqlite3.Database(path, (err: Error | null) => {
        if (err) {
          reject(new StorageError(`open ${path}`, undefined, { cause: err }));
          return;
        }
        resolve(db);
      });
    });

    native.configure("busyTimeout", options.busyTimeoutMs ?? 5000);
    const conn = new Connection(native);

    const journalMode = options.journalMode ?? "WAL";
    if (path !== MEMORY_PATH) {
      try {
        await conn.exec(`PRAGMA journal_mode = ${journalMode}`);
      } catch (err) {
        await conn.close();
        throw err;
      }
    }

    return new Database(path, conn);
  }

  get closed(): boolean {
    return this.#closed;
  }

  run(sql: string, params?: SqlParams): Promise<number> {
    return this.#locked(() => this.#conn.run(sql, params));
  }

  all<T>(sql: string, params?: SqlParams): Promise<T[]> {
    return this.#locked(() => this.#conn.all<T>(sql, params));
  }

  get<T>(sql: string, params?: SqlParams): Promise<T | undefined> {
    return this.#locked(() => this.#conn.get<T>(sql, params));
  }

  runBatch(sql: string, tuples: Iterable<SqlParams>): Promise<number> {
    return this.#locked(() => this.#conn.runBatch(sql, tuples));
  }

  /**
   * Run fn inside one transaction: commit on clean return, roll back on throw
   *
   * Write paths use "immediate" so the write lock is taken up front.
   */
  transaction<T>(fn: (tx: Executor) => Promise<T>, mode: TransactionMode = "immediate"): Promise<T> {
    return this.#locked(async () => {
      await this.#conn.exec(mode === "immediate" ? "BEGIN IMMEDIATE" : "BEGIN DEFERRED");

      try {
        const result = await fn(this.#conn);
        await this.#conn.exec("COMMIT");
        return result;
      } catch (err) {
        try {
          await this.#conn.exec("ROLLBACK");
        } catch (rollbackErr) {
          throw new StorageError("rollback", undefined, {
            cause: new AggregateError([err, rollbackErr], "Transaction and rollback both failed"),
          });
        }
        throw err;
      }
    });
  }

  /**
   * Close the connection once queued statements have finished
   */
  async close(): Promise<void> {
    if (this.#closed) return;
    await this.#lock.withLock(async () => {
      if (this.#closed) return;
      this.#closed = true;
      await this.#conn.close();
    });
  }

  #locked<T>(fn: () => Promise<T>): Promise<T> {
    return this.#lock.withLock(async () => {
      if (this.#closed) {
        throw new StorageError("use of closed database", undefined, {
          cause: new Error(`Database ${this.path} is closed`),
        });
      }
      return fn();
    });
  }
}
