/**
 * Source registration commands
 */

import type { Command } from "commander";
import { withCliStore, type GlobalOptions } from "../lib/store.js";
import { printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";
import { isVerbose } from "../lib/env.js";

type SourcesOptions = GlobalOptions & {
  json?: boolean;
};

export function addSourceCommands(program: Command): void {
  program
    .command("register <names...>")
    .description("Register ingestion sources, assigning each a shard")
    .action(async (names: string[], _options: object, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();
      await withTiming("cli.register", isVerbose(opts.verbose), () =>
        withCliStore(opts, async (store) => {
          await store.registry.registerSources(names);

          const lines: string[] = [];
          for (const name of new Set(names)) {
            lines.push(`${name} -> ${await store.registry.shardIdFor(name)}`);
          }
          if (!opts.quiet) {
            printLines(lines);
          }
        })
      );
    });

  program
    .command("sources")
    .description("List registered sources and their shard ids")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (_options: object, command: Command) => {
      const opts = command.optsWithGlobals<SourcesOptions>();
      await withTiming("cli.sources", isVerbose(opts.verbose), () =>
        withCliStore(opts, async (store) => {
          const sources = await store.registry.listSources();
          if (opts.json) {
            printJson(sources);
          } else {
            printLines(sources.map((source) => `${source.shardId}\t${source.name}`));
          }
        })
      );
    });
}
