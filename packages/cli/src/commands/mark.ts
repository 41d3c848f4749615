/**
 * Bulk status update commands
 *
 * Input is the output of an external verification step: urls confirmed
 * malicious by a vendor, or confirmed reachable.
 */

import type { Command } from "commander";
import type { FanOutReport, Vendor } from "@prefixwatch/sdk";
import { collectShardId, nowSeconds, parseTimestamp, parseVendorArg } from "../lib/arg.js";
import { isVerbose } from "../lib/env.js";
import { readLineList } from "../lib/io.js";
import { printLines } from "../lib/render.js";
import { requireComplete, sumOutcomes } from "../lib/report.js";
import { withCliStore, type GlobalOptions } from "../lib/store.js";
import { progressReporter, withTiming } from "../lib/telemetry.js";

type MarkOptions = GlobalOptions & {
  file?: string;
  at?: number;
  shard?: number[];
};

function summary(report: FanOutReport<number>): string {
  const succeeded = report.outcomes.length - report.failures.length;
  return `Updated ${sumOutcomes(report)} row(s) across ${succeeded} shard(s)`;
}

function addMarkOptions(command: Command): Command {
  return command
    .option("--file <path>", "Read urls from file instead of stdin")
    .option("--at <seconds>", "Confirmation time in seconds since the epoch (default: now)", parseTimestamp)
    .option("--shard <id>", "Only update this shard (repeatable)", collectShardId);
}

export function addMarkCommands(program: Command): void {
  addMarkOptions(
    program
      .command("mark-malicious")
      .description("Record that a vendor confirmed these urls malicious")
      .argument("<vendor>", "Vendor name (Google or Yandex)", parseVendorArg)
  ).action(async (vendor: Vendor, _options: object, command: Command) => {
    const opts = command.optsWithGlobals<MarkOptions>();
    const verbose = isVerbose(opts.verbose);

    await withTiming("cli.mark-malicious", verbose, async () => {
      const urls = await readLineList(opts.file);
      const at = opts.at ?? nowSeconds();

      await withCliStore(opts, async (store) => {
        const report = await store.updater.markMalicious(vendor, urls, at, {
          shardIds: opts.shard,
          onProgress: progressReporter("mark-malicious", verbose),
        });
        if (!opts.quiet) {
          printLines([summary(report)]);
        }
        requireComplete(report, "Malicious update");
      });
    });
  });

  addMarkOptions(
    program.command("mark-reachable").description("Record that these urls were confirmed reachable")
  ).action(async (_options: object, command: Command) => {
    const opts = command.optsWithGlobals<MarkOptions>();
    const verbose = isVerbose(opts.verbose);

    await withTiming("cli.mark-reachable", verbose, async () => {
      const urls = await readLineList(opts.file);
      const at = opts.at ?? nowSeconds();

      await withCliStore(opts, async (store) => {
        const report = await store.updater.markReachable(urls, at, {
          shardIds: opts.shard,
          onProgress: progressReporter("mark-reachable", verbose),
        });
        if (!opts.quiet) {
          printLines([summary(report)]);
        }
        requireComplete(report, "Reachability update");
      });
    });
  });
}
