import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { openStore } from "./store.js";
import { hashUrl } from "./hash.js";
import { ConfigurationError, IntegrityViolationError, LookupError } from "./errors.js";
import { shardTableName } from "./shards.js";
import type { ReputationStore } from "./types.js";
import type { Vendor } from "./vendors.js";

const EVIL = "http://evil.com/";

describe("UrlShardStore", () => {
  let store: ReputationStore;

  beforeEach(async () => {
    store = await openStore({ path: ":memory:" });
    await store.registry.registerSources(["list1", "list2"]);
  });

  afterEach(async () => {
    await store.close();
  });

  describe("shardTableName()", () => {
    it("should derive the table from the id", () => {
      expect(shardTableName(7)).toBe("shard_7");
    });

    it("should refuse anything but a positive integer", () => {
      expect(() => shardTableName(0)).toThrow(LookupError);
      expect(() => shardTableName(-3)).toThrow(LookupError);
      expect(() => shardTableName(Number.NaN)).toThrow(LookupError);
    });
  });

  describe("listShardNames()", () => {
    it("should list one table per registered source", async () => {
      expect(await store.shards.listShardNames()).toEqual(["shard_1", "shard_2"]);
    });
  });

  describe("ensureShard()", () => {
    it("should create an empty table for a registered shard", async () => {
      await store.shards.ensureShard(1);
      await store.shards.ensureShard(1);

      expect(await store.shards.shardExists(1)).toBe(true);
      expect(await store.shards.countUrls(1)).toBe(0);
    });

    it("should refuse an unregistered shard", async () => {
      await expect(store.shards.ensureShard(5)).rejects.toThrow("Not registered: shard 5");
      expect(await store.shards.shardExists(5)).toBe(false);
    });
  });

  describe("upsertUrls()", () => {
    it("should insert new urls with their hash and unset status fields", async () => {
      await store.shards.upsertUrls(1, [EVIL], 100);

      const record = await store.shards.getRecord(1, EVIL);
      expect(record).not.toBeNull();
      expect(record?.lastListed).toBe(100);
      expect(record?.lastMalicious).toEqual({ Google: null, Yandex: null });
      expect(record?.lastReachable).toBeNull();
      expect(record?.hash.equals(hashUrl(EVIL))).toBe(true);
    });

    it("should be idempotent for the same timestamp", async () => {
      await store.shards.upsertUrls(1, [EVIL], 100);
      const once = await store.shards.getRecord(1, EVIL);

      await store.shards.upsertUrls(1, [EVIL], 100);
      const twice = await store.shards.getRecord(1, EVIL);

      expect(twice).toEqual(once);
      expect(await store.shards.countUrls(1)).toBe(1);
    });

    it("should only refresh lastListed for a known url", async () => {
      await store.shards.upsertUrls(1, [EVIL], 100);
      await store.shards.setVendorMaliciousTimestamp(1, [EVIL], "Google", 150);
      await store.shards.setReachableTimestamp(1, [EVIL], 160);

      await store.shards.upsertUrls(1, [EVIL], 300);

      const record = await store.shards.getRecord(1, EVIL);
      expect(record?.lastListed).toBe(300);
      expect(record?.lastMalicious).toEqual({ Google: 150, Yandex: null });
      expect(record?.lastReachable).toBe(160);
      expect(record?.hash.equals(hashUrl(EVIL))).toBe(true);
    });

    it("should never rewrite a stored hash on update", async () => {
      await store.shards.upsertUrls(1, [EVIL], 100);
      const stale = Buffer.alloc(32, 7);
      await store.db.run("UPDATE shard_1 SET hash = ? WHERE url = ?", [stale, EVIL]);

      await store.shards.upsertUrls(1, [EVIL], 200);

      const record = await store.shards.getRecord(1, EVIL);
      expect(record?.hash.equals(stale)).toBe(true);
      expect(record?.lastListed).toBe(200);
    });

    it("should collapse duplicate urls in one batch", async () => {
      const written = await store.shards.upsertUrls(1, ["http://a.test/", "http://a.test/", "http://b.test/"], 1);
      expect(written).toBe(2);
      expect(await store.shards.countUrls(1)).toBe(2);
    });

    it("should create the shard table lazily", async () => {
      expect(await store.shards.shardExists(2)).toBe(false);
      await store.shards.upsertUrls(2, [], 1);
      expect(await store.shards.shardExists(2)).toBe(true);
    });

    it("should reject an unregistered shard without creating a table", async () => {
      await expect(store.shards.upsertUrls(9, [EVIL], 100)).rejects.toThrow(LookupError);
      const row = await store.db.get<{ name: string }>(
        "SELECT name FROM sqlite_master WHERE name = 'shard_9'"
      );
      expect(row).toBeUndefined();
    });

    it("should reject an invalid timestamp before writing", async () => {
      await expect(store.shards.upsertUrls(1, [EVIL], -1)).rejects.toThrow(ConfigurationError);
      await expect(store.shards.upsertUrls(1, [EVIL], 1.5)).rejects.toThrow(
        "observedAt must be a non-negative integer, got 1.5"
      );
      expect(await store.shards.countUrls(1)).toBe(0);
    });
  });

  describe("ingest()", () => {
    it("should write into the shard owned by the source", async () => {
      const shardId = await store.shards.ingest("list2", [EVIL], 100);

      expect(shardId).toBe(2);
      expect(await store.shards.countUrls(2)).toBe(1);
      expect(await store.shards.countUrls(1)).toBe(0);
    });

    it("should fail loudly for a source that was never registered", async () => {
      await expect(store.shards.ingest("unknown.txt", [EVIL], 100)).rejects.toThrow(
        'Not registered: source "unknown.txt"'
      );
    });
  });

  describe("setVendorMaliciousTimestamp()", () => {
    beforeEach(async () => {
      await store.shards.upsertUrls(1, [EVIL, "http://fine.test/"], 100);
    });

    it("should set the vendor column and leave lastListed alone", async () => {
      const changed = await store.shards.setVendorMaliciousTimestamp(1, [EVIL], "Google", 200);

      expect(changed).toBe(1);
      const record = await store.shards.getRecord(1, EVIL);
      expect(record?.lastMalicious.Google).toBe(200);
      expect(record?.lastMalicious.Yandex).toBeNull();
      expect(record?.lastListed).toBe(100);

      const untouched = await store.shards.getRecord(1, "http://fine.test/");
      expect(untouched?.lastMalicious.Google).toBeNull();
    });

    it("should skip urls the shard does not hold", async () => {
      const changed = await store.shards.setVendorMaliciousTimestamp(1, ["http://absent.test/"], "Yandex", 200);

      expect(changed).toBe(0);
      expect(await store.shards.getRecord(1, "http://absent.test/")).toBeNull();
    });

    it("should issue no statement for an empty set", async () => {
      const transaction = vi.spyOn(store.db, "transaction");

      expect(await store.shards.setVendorMaliciousTimestamp(1, [], "Google", 200)).toBe(0);
      expect(transaction).not.toHaveBeenCalled();
    });

    it("should reject an unknown vendor", async () => {
      const vendor: Vendor = JSON.parse('"Bing"');
      await expect(store.shards.setVendorMaliciousTimestamp(1, [EVIL], vendor, 200)).rejects.toThrow(
        'Unknown vendor "Bing"; expected one of: Google, Yandex'
      );
    });

    it("should report 0 for a registered shard with no table yet", async () => {
      expect(await store.shards.setVendorMaliciousTimestamp(2, [EVIL], "Google", 200)).toBe(0);
    });
  });

  describe("setReachableTimestamp()", () => {
    it("should set lastReachable only", async () => {
      await store.shards.upsertUrls(1, [EVIL], 100);

      expect(await store.shards.setReachableTimestamp(1, [EVIL], 250)).toBe(1);

      const record = await store.shards.getRecord(1, EVIL);
      expect(record?.lastReachable).toBe(250);
      expect(record?.lastListed).toBe(100);
      expect(record?.lastMalicious).toEqual({ Google: null, Yandex: null });
    });

    it("should split large sets across statements", async () => {
      const small = await openStore({ path: ":memory:", batchSize: 2 });
      try {
        await small.registry.registerSources(["list1"]);
        const urls = ["http://1.test/", "http://2.test/", "http://3.test/", "http://4.test/", "http://5.test/"];
        await small.shards.upsertUrls(1, urls, 1);

        expect(await small.shards.setReachableTimestamp(1, urls, 9)).toBe(5);
        expect((await small.shards.getRecord(1, "http://5.test/"))?.lastReachable).toBe(9);
      } finally {
        await small.close();
      }
    });
  });

  describe("verifyShard()", () => {
    it("should return the number of rows checked when all hashes match", async () => {
      await store.shards.upsertUrls(1, [EVIL, "http://fine.test/"], 100);
      expect(await store.shards.verifyShard(1)).toBe(2);
    });

    it("should surface a tampered hash without repairing it", async () => {
      await store.shards.upsertUrls(1, [EVIL, "http://fine.test/"], 100);
      await store.db.run("UPDATE shard_1 SET hash = ? WHERE url = ?", [Buffer.alloc(32), EVIL]);

      const error = await store.shards.verifyShard(1).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(IntegrityViolationError);
      expect(error).toMatchObject({ shardId: 1, urls: [EVIL], code: "E_INTEGRITY" });

      const record = await store.shards.getRecord(1, EVIL);
      expect(record?.hash.equals(Buffer.alloc(32))).toBe(true);
    });

    it("should check nothing for a shard without a table", async () => {
      expect(await store.shards.verifyShard(2)).toBe(0);
    });
  });
});
