#!/usr/bin/env tsx

import { Command, InvalidArgumentError } from "commander";
import { setVerbose } from "@mdlive/core";
import { serveCommand } from "./commands/serve.ts";
import { searchCommand } from "./commands/search.ts";
import { treeCommand } from "./commands/tree.ts";

function integer(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return n;
}

const program = new Command();

program
  .name("mdlive")
  .description("Browse, search and live-edit a folder of markdown notes")
  .version("0.1.0")
  .option("-v, --verbose", "Enable verbose logging")
  .hook("preAction", (thisCommand) => {
    if (thisCommand.opts().verbose) {
      setVerbose(true);
    }
  });

program
  .command("serve")
  .description("Serve the notes over HTTP with live reload")
  .option("-p, --port <number>", "Port to listen on (defaults to MDLIVE_PORT or 8989)", integer)
  .option("-d, --notes-dir <path>", "Notes directory (defaults to MDLIVE_ROOT or ~/src/Notes)")
  .option("--debounce <ms>", "Quiet period before a file change is applied", integer)
  .option("--no-watch", "Disable file watching")
  .action(
    async (options: { port?: number; notesDir?: string; debounce?: number; watch: boolean }) => {
      await serveCommand({
        port: options.port,
        notesDir: options.notesDir,
        debounceMs: options.debounce,
        watch: options.watch,
      });
    },
  );

program
  .command("search")
  .description("Search note titles and bodies")
  .argument("<query>", "Search query")
  .option("-n, --limit <number>", "Number of results", integer)
  .option("--json", "Output as JSON", false)
  .option("-d, --notes-dir <path>", "Notes directory")
  .action(async (query: string, options: { limit?: number; json: boolean; notesDir?: string }) => {
    await searchCommand(query, options);
  });

program
  .command("tree")
  .description("Print the notes tree")
  .argument("[path]", "Directory to start from, relative to the notes root")
  .option("-d, --notes-dir <path>", "Notes directory")
  .action(async (path: string | undefined, options: { notesDir?: string }) => {
    await treeCommand(path, options);
  });

await program.parseAsync();
