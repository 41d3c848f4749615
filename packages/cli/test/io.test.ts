/**
 * Unit tests for line-list input
 */

import { describe, it, expect } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { withTempDir } from "@prefixwatch/testkit";
import { parseLineList, readLineList } from "../src/lib/io.js";
import { CliError } from "../src/lib/errors.js";

describe("line lists", () => {
  it("should skip blank lines and comments", () => {
    const content = "\uFEFF# exported 2024-01-01\nhttp://a.test/\r\n\n   \n  http://b.test/  \n#http://c.test/\n";
    expect(parseLineList(content)).toEqual(["http://a.test/", "http://b.test/"]);
  });

  it("should read entries from a file", async () => {
    await withTempDir(async (dir) => {
      const file = join(dir, "urls.txt");
      await writeFile(file, "http://a.test/\nhttp://b.test/\n");

      expect(await readLineList(file)).toEqual(["http://a.test/", "http://b.test/"]);
    });
  });

  it("should report a missing file as a CLI error", async () => {
    await withTempDir(async (dir) => {
      await expect(readLineList(join(dir, "missing.txt"))).rejects.toThrow(CliError);
    });
  });
});
