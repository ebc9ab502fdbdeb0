#!/usr/bin/env node

/**
 * lookup-intern CLI entry point
 */

import { createProgram, type GlobalOptions } from "./program.js";
import { mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";

const program = createProgram();

// Top-level error handler
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const opts = program.opts<GlobalOptions>();
    console.error(`Error: ${formatCliError(err, opts.verbose ?? false)}`);
    process.exit(mapSdkErrorToExitCode(err));
  }
}

void main();
