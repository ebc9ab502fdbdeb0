/**
 * CLI testing utilities
 */

import { fileURLToPath } from "node:url";
import { execa } from "execa";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
  /** Kill the process after this many milliseconds (default: 15000) */
  timeout?: number;
}

/**
 * Entry point of the lookup-intern CLI, run from source
 */
export const CLI_ENTRY = fileURLToPath(new URL("../../cli/src/cli.ts", import.meta.url));

/**
 * Execute the CLI from its TypeScript source with the tsx loader.
 * Never rejects on a non-zero exit code.
 */
export async function runCli(args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { cwd, env, input, timeout = 15000 } = options;

  const result = await execa("node", ["--import", "tsx", CLI_ENTRY, ...args], {
    cwd,
    env: { ...process.env, ...env },
    input,
    reject: false,
    timeout,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
  };
}

/**
 * Parse JSON output from CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
