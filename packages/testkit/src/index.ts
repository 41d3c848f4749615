export { createTempDir, removeDir, tempDbPath, withTempDir, withTempStore } from "./fs.js";
export { runCli, parseJsonOutput } from "./cli.js";
export type { CliResult } from "./cli.js";
