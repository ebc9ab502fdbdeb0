export { createTempRoot, removeDir, withTempDir, withTempFileStore } from "./fs.js";
export { runCli, parseJsonOutput, CLI_ENTRY } from "./cli.js";
export type { CliResult, CliExecOptions } from "./cli.js";
export { BarrierStore, FailingStore } from "./stores.js";
