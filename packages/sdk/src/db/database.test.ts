import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Database } from "./database.js";
import { StorageError } from "../errors.js";

describe("Database", () => {
  let db: Database;

  beforeEach(async () => {
    db = await Database.open(":memory:");
    await db.run("CREATE TABLE items (name TEXT NOT NULL UNIQUE, qty INTEGER)");
  });

  afterEach(async () => {
    await db.close();
  });

  describe("run() / all() / get()", () => {
    it("should return the number of changed rows", async () => {
      expect(await db.run("INSERT INTO items (name, qty) VALUES (?, ?), (?, ?)", ["a", 1, "b", 2])).toBe(2);
      expect(await db.run("UPDATE items SET qty = qty + 1")).toBe(2);
    });

    it("should read rows back", async () => {
      await db.run("INSERT INTO items (name, qty) VALUES (?, ?), (?, ?)", ["a", 1, "b", 2]);

      expect(await db.all<{ name: string }>("SELECT name FROM items ORDER BY name")).toEqual([
        { name: "a" },
        { name: "b" },
      ]);
      expect(await db.get<{ qty: number }>("SELECT qty FROM items WHERE name = ?", ["b"])).toEqual({ qty: 2 });
      expect(await db.get("SELECT qty FROM items WHERE name = ?", ["zzz"])).toBeUndefined();
    });

    it("should round-trip blobs as Buffers", async () => {
      await db.run("CREATE TABLE blobs (data BLOB)");
      await db.run("INSERT INTO blobs (data) VALUES (?)", [Buffer.from([0, 1, 254, 255])]);

      const row = await db.get<{ data: Buffer }>("SELECT data FROM blobs");
      expect(Buffer.isBuffer(row?.data)).toBe(true);
      expect(row?.data.equals(Buffer.from([0, 1, 254, 255]))).toBe(true);
    });

    it("should wrap engine errors in StorageError", async () => {
      await expect(db.run("INSERT INTO missing VALUES (1)")).rejects.toThrow(StorageError);
      await expect(db.all("SELECT nope FROM items")).rejects.toThrow(/no such column: nope/);
    });
  });

  describe("runBatch()", () => {
    it("should run the statement once per tuple", async () => {
      const changes = await db.runBatch("INSERT INTO items (name, qty) VALUES (?, ?)", [
        ["a", 1],
        ["b", 2],
        ["c", 3],
      ]);

      expect(changes).toBe(3);
      expect(await db.get<{ n: number }>("SELECT COUNT(*) AS n FROM items")).toEqual({ n: 3 });
    });

    it("should stop at the first failing tuple", async () => {
      await expect(
        db.runBatch("INSERT INTO items (name, qty) VALUES (?, ?)", [
          ["a", 1],
          ["a", 2],
          ["b", 3],
        ])
      ).rejects.toThrow(/UNIQUE constraint failed/);

      expect(await db.all<{ name: string }>("SELECT name FROM items")).toEqual([{ name: "a" }]);
    });
  });

  describe("transaction()", () => {
    it("should commit on clean return", async () => {
      const result = await db.transaction(async (tx) => {
        await tx.run("INSERT INTO items (name) VALUES (?)", ["a"]);
        return "done";
      });

      expect(result).toBe("done");
      expect(await db.all("SELECT name FROM items")).toEqual([{ name: "a" }]);
    });

    it("should roll back when the callback throws", async () => {
      await expect(
        db.transaction(async (tx) => {
          await tx.run("INSERT INTO items (name) VALUES (?)", ["a"]);
          throw new Error("abort");
        })
      ).rejects.toThrow("abort");

      expect(await db.all("SELECT name FROM items")).toEqual([]);
    });

    it("should roll back when a statement fails", async () => {
      await expect(
        db.transaction(async (tx) => {
          await tx.run("INSERT INTO items (name) VALUES (?)", ["a"]);
          await tx.run("INSERT INTO items (name) VALUES (?)", ["a"]);
        })
      ).rejects.toThrow(StorageError);

      expect(await db.all("SELECT name FROM items")).toEqual([]);
    });

    it("should not interleave concurrent callers", async () => {
      const order: string[] = [];

      await Promise.all([
        db.transaction(async (tx) => {
          order.push("first:begin");
          await tx.run("INSERT INTO items (name) VALUES (?)", ["a"]);
          await new Promise((resolve) => setTimeout(resolve, 10));
          order.push("first:end");
        }),
        db.run("INSERT INTO items (name) VALUES (?)", ["b"]).then(() => {
          order.push("second");
        }),
      ]);

      expect(order).toEqual(["first:begin", "first:end", "second"]);
    });
  });

  describe("close()", () => {
    it("should reject statements after close", async () => {
      await db.close();

      expect(db.closed).toBe(true);
      await expect(db.run("SELECT 1")).rejects.toThrow('Storage operation "use of closed database" failed');
    });

    it("should be idempotent", async () => {
      await db.close();
      await expect(db.close()).resolves.toBeUndefined();
    });
  });
});
