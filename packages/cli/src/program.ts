/**
 * Command definitions for the lookup-intern CLI
 */

import { Command } from "commander";
import { VERSION } from "@lookup-intern/sdk";
import { openCliLookup, type CliLookup } from "./lib/store.js";
import { resolveRoot } from "./lib/env.js";
import { parseEntryId, parseNonNegativeInt } from "./lib/arg.js";
import { printJson, printLines, colorize } from "./lib/render.js";
import { withTiming } from "./lib/telemetry.js";

export interface GlobalOptions {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Build a fresh program; callers own parsing and exit handling
 */
export function createProgram(): Command {
  const program = new Command();

  const withLookup = async <T>(fn: (lookup: CliLookup) => Promise<T>): Promise<T> => {
    const lookup = openCliLookup(resolveRoot(program.opts<GlobalOptions>().root));
    try {
      return await fn(lookup);
    } finally {
      await lookup.close();
    }
  };

  program.configureOutput({
    writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
  });

  // Global options
  program
    .name("lookup-intern")
    .description("Find-or-create ids for names in file-backed lookup tables")
    .version(VERSION)
    .option("--root <path>", "Data directory root")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  program
    .command("init")
    .description("Initialize a lookup data directory")
    .action(async () => {
      await withTiming("cli.init", async () => {
        const opts = program.opts<GlobalOptions>();
        const root = resolveRoot(opts.root);

        await withLookup((lookup) => lookup.init());

        if (!opts.quiet) {
          console.log(`Initialized lookup tables at ${root}`);
        }
      });
    });

  program
    .command("id-for <table> <names...>")
    .description("Print the id for each name, creating entries for new names")
    .option("--json", "Output a name to id map as JSON")
    .action(async (table: string, names: string[], options: { json?: boolean }) => {
      await withTiming("cli.id_for", async () => {
        const pairs = await withLookup((lookup) => lookup.idsFor(table, names));

        if (options.json) {
          printJson(Object.fromEntries(pairs));
        } else {
          printLines(pairs.map(([, id]) => String(id)));
        }
      });
    });

  program
    .command("name-for <table> <ids...>")
    .description("Print the name for each id")
    .option("--json", "Output an id to name map as JSON")
    .action(async (table: string, rawIds: string[], options: { json?: boolean }) => {
      await withTiming("cli.name_for", async () => {
        const ids = rawIds.map(parseEntryId);
        const pairs = await withLookup((lookup) => lookup.namesFor(table, ids));

        if (options.json) {
          printJson(Object.fromEntries(pairs));
        } else {
          printLines(pairs.map(([, name]) => name));
        }
      });
    });

  program
    .command("ls <table>")
    .description("List the entries of a lookup table by id")
    .option("--json", "Output as JSON array")
    .option("--limit <n>", "Maximum number of results", (val) => parseNonNegativeInt(val, "--limit"))
    .action(async (table: string, options: { json?: boolean; limit?: number }) => {
      await withTiming("cli.ls", async () => {
        let entries = await withLookup((lookup) => lookup.list(table));

        if (options.limit !== undefined) {
          entries = entries.slice(0, options.limit);
        }

        if (options.json) {
          printJson(entries.map(({ id, name }) => ({ id, name })));
        } else {
          printLines(entries.map(({ id, name }) => `${id}\t${name}`));
        }
      });
    });

  return program;
}

export { mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";
