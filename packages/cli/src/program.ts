/**
 * prefixwatch command definitions and in-process entry point
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { logger } from "@prefixwatch/sdk";
import { addIngestCommands } from "./commands/ingest.js";
import { addMarkCommands } from "./commands/mark.js";
import { addSourceCommands } from "./commands/sources.js";
import { addStatsCommand } from "./commands/stats.js";
import { addSuspectsCommand } from "./commands/suspects.js";
import { addVerifyCommand } from "./commands/verify.js";
import { isVerbose } from "./lib/env.js";
import { ExitCode, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { writeStderr } from "./lib/io.js";
import { colorize } from "./lib/render.js";
import type { GlobalOptions } from "./lib/store.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

/**
 * Build the command tree
 *
 * Errors propagate out of `parseAsync` instead of exiting the process.
 */
export function createProgram(): Command {
  const program = new Command();

  // Configure error output with color; settings are inherited by subcommands added below
  program
    .configureOutput({
      writeOut: (str) => process.stdout.write(str),
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("prefixwatch")
    .description("Sharded URL reputation store with vendor hash-prefix matching")
    .version(readVersion())
    .option("--db <path>", "Database file (default: PREFIXWATCH_DB or ./urls.db)")
    .option("--verbose", "Verbose diagnostics on stderr")
    .option("--quiet", "Suppress non-error output")
    .hook("preAction", (_program, actionCommand) => {
      const opts = actionCommand.optsWithGlobals<GlobalOptions>();
      logger.setEnabled(isVerbose(opts.verbose));
    });

  addSourceCommands(program);
  addIngestCommands(program);
  addSuspectsCommand(program);
  addMarkCommands(program);
  addVerifyCommand(program);
  addStatsCommand(program);

  return program;
}

/**
 * Parse argv (including the node and script entries) and run one command
 * @returns Process exit code
 */
export async function run(argv: readonly string[]): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv]);
    return ExitCode.Ok;
  } catch (err) {
    // Commander has already printed its own usage errors, help and version
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    writeStderr(`Error: ${formatCliError(err, isVerbose(opts.verbose))}\n`);
    return mapSdkErrorToExitCode(err);
  }
}
