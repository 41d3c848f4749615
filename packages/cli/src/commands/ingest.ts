/**
 * Feed loading commands: observed urls and vendor hash prefixes
 */

import type { Command } from "commander";
import { parsePrefix, type Vendor } from "@prefixwatch/sdk";
import { nowSeconds, parseTimestamp, parseVendorArg } from "../lib/arg.js";
import { isVerbose } from "../lib/env.js";
import { readLineList } from "../lib/io.js";
import { printLines } from "../lib/render.js";
import { withCliStore, type GlobalOptions } from "../lib/store.js";
import { withTiming } from "../lib/telemetry.js";

type IngestOptions = GlobalOptions & {
  file?: string;
  at?: number;
};

type LoadPrefixesOptions = GlobalOptions & {
  file?: string;
};

export function addIngestCommands(program: Command): void {
  program
    .command("ingest <source>")
    .description("Record urls (one per line) as observed by a registered source")
    .option("--file <path>", "Read urls from file instead of stdin")
    .option("--at <seconds>", "Observation time in seconds since the epoch (default: now)", parseTimestamp)
    .action(async (source: string, _options: object, command: Command) => {
      const opts = command.optsWithGlobals<IngestOptions>();
      await withTiming("cli.ingest", isVerbose(opts.verbose), async () => {
        const urls = await readLineList(opts.file);
        const at = opts.at ?? nowSeconds();

        await withCliStore(opts, async (store) => {
          const shardId = await store.shards.ingest(source, urls, at);
          if (!opts.quiet) {
            printLines([`Ingested ${new Set(urls).size} url(s) into ${store.shards.tableName(shardId)}`]);
          }
        });
      });
    });

  program
    .command("load-prefixes")
    .description("Replace a vendor's hash prefixes with a hex list (one per line)")
    .option("--file <path>", "Read prefixes from file instead of stdin")
    .argument("<vendor>", "Vendor name (Google or Yandex)", parseVendorArg)
    .action(async (vendor: Vendor, _options: object, command: Command) => {
      const opts = command.optsWithGlobals<LoadPrefixesOptions>();
      await withTiming("cli.load-prefixes", isVerbose(opts.verbose), async () => {
        const prefixes = (await readLineList(opts.file)).map((line) => parsePrefix(line));

        await withCliStore(opts, async (store) => {
          const count = await store.prefixes.replaceVendorPrefixes(vendor, prefixes);
          if (!opts.quiet) {
            printLines([`Loaded ${count} prefix(es) for ${vendor}`]);
          }
        });
      });
    });
}
