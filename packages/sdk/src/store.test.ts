import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openStore } from "./store.js";
import { ConfigurationError, StorageError } from "./errors.js";
import { hashUrl, truncateHash } from "./hash.js";

describe("openStore()", () => {
  let testDir: string;
  let dbPath: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "prefixwatch-test-"));
    dbPath = join(testDir, "urls.db");
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("should expose the resolved options", async () => {
    const store = await openStore({ path: dbPath, batchSize: 25 });
    try {
      expect(store.options).toEqual({
        path: dbPath,
        batchSize: 25,
        journalMode: "WAL",
        busyTimeoutMs: 5000,
      });
    } finally {
      await store.close();
    }
  });

  it("should reject invalid options before touching the file system", async () => {
    await expect(openStore({ path: dbPath, batchSize: -5 })).rejects.toThrow(ConfigurationError);
  });

  it("should fail with StorageError when the database cannot be opened", async () => {
    await expect(openStore({ path: join(testDir, "missing", "dir", "urls.db") })).rejects.toThrow(StorageError);
  });

  it("should keep shard ids and contents across reopen", async () => {
    const first = await openStore({ path: dbPath });
    await first.registry.registerSources(["list1", "list2"]);
    await first.shards.ingest("list2", ["http://kept.test/"], 100);
    await first.prefixes.replaceVendorPrefixes("Google", [truncateHash(hashUrl("http://kept.test/"), 4)]);
    await first.close();

    const second = await openStore({ path: dbPath });
    try {
      await second.registry.registerSources(["list3", "list1"]);

      expect(await second.registry.listSources()).toEqual([
        { shardId: 1, name: "list1" },
        { shardId: 2, name: "list2" },
        { shardId: 3, name: "list3" },
      ]);
      expect((await second.shards.getRecord(2, "http://kept.test/"))?.lastListed).toBe(100);
      expect((await second.matcher.findSuspects("Google")).urls).toEqual(["http://kept.test/"]);
    } finally {
      await second.close();
    }
  });

  it("should not share state between in-memory stores", async () => {
    const a = await openStore({ path: ":memory:" });
    const b = await openStore({ path: ":memory:" });
    try {
      await a.registry.registerSources(["only-a"]);
      expect(await b.registry.listSources()).toEqual([]);
    } finally {
      await a.close();
      await b.close();
    }
  });
});

describe("ReputationStore", () => {
  it("should summarize shards and prefixes", async () => {
    const store = await openStore({ path: ":memory:" });
    try {
      await store.registry.registerSources(["list1", "list2", "empty"]);
      await store.shards.ingest("list1", ["http://a.test/", "http://b.test/"], 100);
      await store.shards.ingest("list2", ["http://a.test/"], 100);
      await store.prefixes.replaceVendorPrefixes("Yandex", [
        Buffer.from("0a0b0c0d", "hex"),
        Buffer.from("0a0b0c0d0e", "hex"),
      ]);

      expect(await store.stats()).toEqual({
        shards: [
          { shardId: 1, name: "list1", table: "shard_1", urls: 2 },
          { shardId: 2, name: "list2", table: "shard_2", urls: 1 },
          { shardId: 3, name: "empty", table: "shard_3", urls: 0 },
        ],
        urls: 3,
        prefixes: { Google: 0, Yandex: 2 },
      });
    } finally {
      await store.close();
    }
  });

  it("should fail with StorageError after close", async () => {
    const store = await openStore({ path: ":memory:" });
    await store.close();

    await expect(store.registry.listSources()).rejects.toThrow(StorageError);
    await expect(store.close()).resolves.toBeUndefined();
  });
});
