/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { CliError } from "./errors.js";

/**
 * Read from stdin with size limit (default 64MB)
 * @param maxBytes - Maximum bytes to read
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 64 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Split line-oriented input into entries
 * Blank lines and lines starting with "#" are skipped; entries are trimmed.
 */
export function parseLineList(content: string): string[] {
  // Strip BOM if present
  const cleaned = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  return cleaned
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

/**
 * Read a line list from a file, or from stdin when no file is given
 * @throws {CliError} If neither a file nor piped input is available
 */
export async function readLineList(filePath?: string): Promise<string[]> {
  if (filePath !== undefined) {
    try {
      return parseLineList(await fs.readFile(filePath, "utf8"));
    } catch (err) {
      throw new CliError(`Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  }

  if (isStdinTTY()) {
    throw new CliError("No input provided. Use --file or pipe input to stdin");
  }

  let stdin: string;
  try {
    stdin = await readStdin(); // Size limit enforced during streaming
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : "Failed to read from stdin", { cause: err });
  }
  return parseLineList(stdin);
}

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}
