import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { openStore } from "./store.js";
import { ConfigurationError } from "./errors.js";
import { PREFIX_TABLE } from "./prefixes.js";
import type { ReputationStore } from "./types.js";
import type { Vendor } from "./vendors.js";

const hex = (value: string): Buffer => Buffer.from(value, "hex");

describe("HashPrefixIndex", () => {
  let store: ReputationStore;

  beforeEach(async () => {
    store = await openStore({ path: ":memory:" });
  });

  afterEach(async () => {
    await store.close();
  });

  describe("replaceVendorPrefixes()", () => {
    it("should store each prefix with its byte length", async () => {
      const stored = await store.prefixes.replaceVendorPrefixes("Google", [hex("aabbccdd"), hex("0011223344")]);

      expect(stored).toBe(2);
      const rows = await store.db.all<{ prefix: Buffer; prefix_length: number; vendor: string }>(
        `SELECT prefix, prefix_length, vendor FROM ${PREFIX_TABLE} ORDER BY prefix_length`
      );
      expect(rows.map((row) => [row.prefix.toString("hex"), row.prefix_length, row.vendor])).toEqual([
        ["aabbccdd", 4, "Google"],
        ["0011223344", 5, "Google"],
      ]);
    });

    it("should replace the previous snapshot wholesale", async () => {
      await store.prefixes.replaceVendorPrefixes("Google", [hex("aabbccdd"), hex("0011223344")]);
      await store.prefixes.replaceVendorPrefixes("Google", [hex("ffeeddccbbaa")]);

      expect(await store.prefixes.distinctPrefixLengthsFor("Google")).toEqual([6]);
      expect(await store.prefixes.countPrefixes("Google")).toBe(1);
    });

    it("should leave other vendors untouched", async () => {
      await store.prefixes.replaceVendorPrefixes("Yandex", [hex("01020304")]);
      await store.prefixes.replaceVendorPrefixes("Google", [hex("aabbccdd")]);
      await store.prefixes.replaceVendorPrefixes("Google", []);

      expect(await store.prefixes.countPrefixes("Google")).toBe(0);
      expect(await store.prefixes.distinctPrefixLengthsFor("Yandex")).toEqual([4]);
    });

    it("should store duplicate prefixes once", async () => {
      const stored = await store.prefixes.replaceVendorPrefixes("Google", [hex("aabbccdd"), hex("AABBCCDD")]);

      expect(stored).toBe(1);
      expect(await store.prefixes.countPrefixes("Google")).toBe(1);
    });

    it("should accept plain Uint8Array prefixes", async () => {
      await store.prefixes.replaceVendorPrefixes("Yandex", [new Uint8Array([1, 2, 3, 4, 5])]);
      expect(await store.prefixes.distinctPrefixLengthsFor("Yandex")).toEqual([5]);
    });

    it("should keep the old snapshot when a prefix is malformed", async () => {
      await store.prefixes.replaceVendorPrefixes("Google", [hex("aabbccdd")]);

      await expect(
        store.prefixes.replaceVendorPrefixes("Google", [hex("0011223344"), new Uint8Array(0)])
      ).rejects.toThrow(ConfigurationError);

      expect(await store.prefixes.distinctPrefixLengthsFor("Google")).toEqual([4]);
    });

    it("should reject an unknown vendor", async () => {
      const vendor: Vendor = JSON.parse('"Bing"');
      await expect(store.prefixes.replaceVendorPrefixes(vendor, [hex("aabbccdd")])).rejects.toThrow(
        ConfigurationError
      );
    });
  });

  describe("distinctPrefixLengthsFor()", () => {
    it("should list mixed lengths in ascending order", async () => {
      await store.prefixes.replaceVendorPrefixes("Google", [
        hex("0011223344"),
        hex("aabbccdd"),
        hex("11223344"),
        hex("00112233445566778899aabbccddeeff00112233445566778899aabbccddeeff"),
      ]);

      expect(await store.prefixes.distinctPrefixLengthsFor("Google")).toEqual([4, 5, 32]);
    });

    it("should be empty for a vendor with no feed", async () => {
      expect(await store.prefixes.distinctPrefixLengthsFor("Yandex")).toEqual([]);
    });
  });
});
