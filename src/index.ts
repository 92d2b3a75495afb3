#!/usr/bin/env node

import { realpathSync } from "node:fs";
import { fileURLToPath, pathToFileURL } from "node:url";
import { Command } from "commander";
import { runCommand } from "./commands/run.js";
import { configCommand } from "./commands/config.js";
import { processorsCommand } from "./commands/processors.js";

export interface CommandHandlers {
  runCommand: typeof runCommand;
  configCommand: typeof configCommand;
  processorsCommand: typeof processorsCommand;
}

const defaultHandlers: CommandHandlers = {
  runCommand,
  configCommand,
  processorsCommand,
};

function isInvokedDirectly(argv1: string | undefined): boolean {
  if (typeof argv1 !== "string") return false;

  // npm often invokes package bins through symlinks in node_modules/.bin.
  // Compare real paths so symlinked execution still triggers the CLI entrypoint.
  try {
    const invokedPath = realpathSync(argv1);
    const thisModulePath = realpathSync(fileURLToPath(import.meta.url));
    if (invokedPath === thisModulePath) return true;
  } catch {
    // Fall through to URL equality check below.
  }

  try {
    return import.meta.url === pathToFileURL(argv1).href;
  } catch {
    return false;
  }
}

export function createProgram(handlers: CommandHandlers = defaultHandlers): Command {
  const program = new Command();

  program
    .name("filepool")
    .description("Process every file in a directory with a bounded pool of workers")
    .version("0.1.0");

  program
    .command("run [dir]")
    .description("Run a processor over each file and print one result per file, in order")
    .option("-c, --concurrency <n>", "Number of parallel workers")
    .option("--processor <name>", "Built-in processor (lines, words, bytes, checksum, head)")
    .option("--encoding <name>", "Text encoding for line-based processors (default utf-8)")
    .option("--ext <exts...>", "Only process files with these extensions")
    .option("-r, --recursive", "Descend into subdirectories")
    .option("--json", "Output machine-readable JSON")
    .option("-p, --path <path>", "Directory holding .filepool.yaml")
    .action(async (dir, opts) => {
      await handlers.runCommand(dir, {
        path: opts.path,
        concurrency: opts.concurrency,
        processor: opts.processor,
        encoding: opts.encoding,
        ext: opts.ext,
        recursive: opts.recursive,
        json: opts.json,
      });
    });

  program
    .command("config")
    .description("View or edit .filepool.yaml")
    .option("--concurrency <n>", "Set default number of workers")
    .option("--processor <name>", "Set default processor")
    .option("--encoding <name>", "Set default text encoding")
    .option("--ext <exts...>", "Set extensions to process")
    .option("--ignore <names...>", "Add names to the ignore list")
    .option("--recursive", "Descend into subdirectories by default")
    .option("--no-recursive", "Only process the top-level directory by default")
    .option("-p, --path <path>", "Project root path")
    .action(async (opts) => {
      await handlers.configCommand({
        path: opts.path,
        concurrency: opts.concurrency,
        processor: opts.processor,
        encoding: opts.encoding,
        ext: opts.ext,
        ignore: opts.ignore,
        recursive: opts.recursive,
      });
    });

  program
    .command("processors")
    .description("List built-in processors")
    .action(async () => {
      await handlers.processorsCommand();
    });

  return program;
}

export async function runCli(
  argv: string[] = process.argv,
  handlers: CommandHandlers = defaultHandlers,
): Promise<void> {
  const program = createProgram(handlers);
  await program.parseAsync(argv);
}

const invokedDirectly = isInvokedDirectly(process.argv[1]);

if (invokedDirectly) {
  runCli().catch((err) => {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(msg);
    process.exit(1);
  });
}
