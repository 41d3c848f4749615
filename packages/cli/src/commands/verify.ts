/**
 * Stored hash integrity check
 */

import type { Command } from "commander";
import { IntegrityViolationError } from "@prefixwatch/sdk";
import { isVerbose } from "../lib/env.js";
import { CliError, ExitCode } from "../lib/errors.js";
import { writeStderr } from "../lib/io.js";
import { printLines } from "../lib/render.js";
import { withCliStore, type GlobalOptions } from "../lib/store.js";
import { withTiming } from "../lib/telemetry.js";

export function addVerifyCommand(program: Command): void {
  program
    .command("verify [source]")
    .description("Recompute stored hashes of one source's shard, or of every shard")
    .action(async (source: string | undefined, _options: object, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();

      await withTiming("cli.verify", isVerbose(opts.verbose), () =>
        withCliStore(opts, async (store) => {
          const shardIds =
            source === undefined ? await store.registry.listShardIds() : [await store.registry.shardIdFor(source)];

          const lines: string[] = [];
          const violations: IntegrityViolationError[] = [];
          for (const shardId of shardIds) {
            try {
              const rows = await store.shards.verifyShard(shardId);
              lines.push(`${store.shards.tableName(shardId)}: ${rows} row(s) ok`);
            } catch (err) {
              if (!(err instanceof IntegrityViolationError)) throw err;
              violations.push(err);
              writeStderr(`${err.message}\n`);
            }
          }

          if (!opts.quiet) {
            printLines(lines);
          }
          if (violations.length > 0) {
            const urls = violations.reduce((sum, violation) => sum + violation.urls.length, 0);
            throw new CliError(`Integrity check failed: ${urls} url(s) in ${violations.length} shard(s)`, {
              exitCode: ExitCode.Integrity,
            });
          }
        })
      );
    });
}
