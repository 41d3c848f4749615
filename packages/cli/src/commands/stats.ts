/**
 * Store statistics command
 */

import type { Command } from "commander";
import { VENDORS, type StoreStats } from "@prefixwatch/sdk";
import { isVerbose } from "../lib/env.js";
import { printJson, printLines } from "../lib/render.js";
import { withCliStore, type GlobalOptions } from "../lib/store.js";
import { withTiming } from "../lib/telemetry.js";

type StatsOptions = GlobalOptions & {
  json?: boolean;
};

export function formatStats(stats: StoreStats): string[] {
  const lines = [`Shards: ${stats.shards.length}`, `URLs: ${stats.urls}`];
  for (const shard of stats.shards) {
    lines.push(`  ${shard.table} (${shard.name}): ${shard.urls}`);
  }
  lines.push("Prefixes:");
  for (const vendor of VENDORS) {
    lines.push(`  ${vendor}: ${stats.prefixes[vendor]}`);
  }
  return lines;
}

export function addStatsCommand(program: Command): void {
  program
    .command("stats")
    .description("Show url counts per shard and prefix counts per vendor")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (_options: object, command: Command) => {
      const opts = command.optsWithGlobals<StatsOptions>();
      await withTiming("cli.stats", isVerbose(opts.verbose), () =>
        withCliStore(opts, async (store) => {
          const stats = await store.stats();
          if (opts.json) {
            printJson(stats);
          } else {
            printLines(formatStats(stats));
          }
        })
      );
    });
}
