/**
 * CLI testing utilities
 *
 * Commands run in-process; output written to process.stdout and
 * process.stderr is captured instead of printed.
 */

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code returned by the entry point */
  exitCode: number;
}

type WriteFn = typeof process.stdout.write;

function collector(chunks: string[]): WriteFn {
  const write = (chunk: string | Uint8Array, ...rest: unknown[]): boolean => {
    chunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8"));
    const callback = rest.find((arg): arg is () => void => typeof arg === "function");
    callback?.();
    return true;
  };
  return write;
}

/**
 * Run an entry point that resolves to an exit code, capturing its output
 * @param main - CLI entry point, e.g. `(argv) => run(argv)`
 * @param args - Command arguments (without node and script path)
 */
export async function runCli(
  main: (argv: string[]) => Promise<number>,
  args: string[]
): Promise<CliResult> {
  const out: string[] = [];
  const err: string[] = [];
  const originalOut = process.stdout.write;
  const originalErr = process.stderr.write;

  process.stdout.write = collector(out);
  process.stderr.write = collector(err);
  let exitCode: number;
  try {
    exitCode = await main(["node", "prefixwatch", ...args]);
  } finally {
    process.stdout.write = originalOut;
    process.stderr.write = originalErr;
  }

  return { stdout: out.join(""), stderr: err.join(""), exitCode };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
