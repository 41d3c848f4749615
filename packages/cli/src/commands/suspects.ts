/**
 * Suspect matching command
 */

import type { Command } from "commander";
import type { Vendor } from "@prefixwatch/sdk";
import { collectShardId, parseVendorArg } from "../lib/arg.js";
import { isVerbose } from "../lib/env.js";
import { printJson, printLines } from "../lib/render.js";
import { describeFailures, requireComplete } from "../lib/report.js";
import { withCliStore, type GlobalOptions } from "../lib/store.js";
import { progressReporter, withTiming } from "../lib/telemetry.js";

type SuspectsOptions = GlobalOptions & {
  json?: boolean;
  unique?: boolean;
  shard?: number[];
};

export function addSuspectsCommand(program: Command): void {
  program
    .command("suspects")
    .description("Print stored urls whose hash matches one of the vendor's prefixes")
    .argument("<vendor>", "Vendor name (Google or Yandex)", parseVendorArg)
    .option("--json", "Output as JSON for machine consumption")
    .option("--unique", "Print each url once even when several shards hold it")
    .option("--shard <id>", "Only scan this shard (repeatable)", collectShardId)
    .action(async (vendor: Vendor, _options: object, command: Command) => {
      const opts = command.optsWithGlobals<SuspectsOptions>();
      const verbose = isVerbose(opts.verbose);

      await withTiming("cli.suspects", verbose, () =>
        withCliStore(opts, async (store) => {
          const scan = await store.matcher.findSuspects(vendor, {
            shardIds: opts.shard,
            onProgress: progressReporter("suspects", verbose),
          });
          const urls = opts.unique ? [...new Set(scan.urls)] : scan.urls;

          if (opts.json) {
            printJson({
              vendor: scan.vendor,
              status: scan.status,
              prefixLengths: scan.prefixLengths,
              urls,
              failures: describeFailures(scan),
            });
          } else {
            printLines(urls);
          }

          requireComplete(scan, "Suspect scan");
        })
      );
    });
}
