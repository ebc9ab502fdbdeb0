/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" is left as given
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the lookup data root
 * Priority: CLI option > LOOKUP_ROOT env var > default "./data"
 */
export function resolveRoot(cliRoot?: string): string {
  const root = cliRoot ?? process.env.LOOKUP_ROOT ?? "./data";
  return path.resolve(expandTilde(root));
}

/**
 * Timing metrics go to stderr when LOOKUP_CLI_DEBUG=1
 */
export function isVerbose(): boolean {
  return process.env.LOOKUP_CLI_DEBUG === "1";
}
