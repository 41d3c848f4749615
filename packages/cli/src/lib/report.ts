/**
 * Fan-out report handling shared by the matcher and updater commands
 */

import type { FanOutReport } from "@prefixwatch/sdk";
import { CliError, ExitCode } from "./errors.js";
import { writeStderr } from "./io.js";
import { colorize } from "./render.js";

/**
 * Plain-data view of a report's failures, for JSON output
 */
export function describeFailures<T>(
  report: FanOutReport<T>
): { shardId: number; table: string; error: string }[] {
  return report.failures.map((failure) => ({
    shardId: failure.shardId,
    table: failure.table,
    error: failure.error.message,
  }));
}

/**
 * Print each failed shard and fail the command unless every shard succeeded
 * @throws {CliError} With exit code 3 when the fan-out was partial or failed
 */
export function requireComplete<T>(report: FanOutReport<T>, label: string): void {
  if (report.status === "succeeded") {
    return;
  }

  for (const failure of report.failures) {
    writeStderr(colorize(`${failure.table}: ${failure.error.message}`, "yellow", process.stderr) + "\n");
  }

  const retry = report.failures.map((failure) => `--shard ${failure.shardId}`).join(" ");
  throw new CliError(
    `${label} ${report.status}: ${report.failures.length} of ${report.outcomes.length} shard(s) failed; retry with ${retry}`,
    { exitCode: ExitCode.Incomplete }
  );
}

/**
 * Total of per-shard counts over the successful shards
 */
export function sumOutcomes(report: FanOutReport<number>): number {
  return report.outcomes.reduce((sum, outcome) => sum + (outcome.ok ? outcome.value : 0), 0);
}
