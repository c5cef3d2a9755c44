#!/usr/bin/env node
/**
 * corpus-index entry point
 */

import { CommanderError, InvalidArgumentError, program } from "commander";

import {
  createDefaultCliIO,
  runChunkCommand,
  runFetchCommand,
  runIndexCommand,
  runSearchCommand,
  type ChunkCommandOptions,
  type FetchCommandOptions,
  type IndexCommandOptions,
  type SearchCommandOptions,
} from "./cli/commands.js";
import { EXIT_CODES } from "./core/errors.js";
import { logger } from "./utils/logger.js";
import { TOOL_VERSION } from "./version.js";

const log = logger;

const nodeMajor = Number.parseInt(process.versions.node.split(".")[0] ?? "0", 10);
if (Number.isNaN(nodeMajor) || nodeMajor < 20) {
  log.error(`Node.js ${process.versions.node} is not supported. Please upgrade to >= 20.0.0.`);
  process.exit(EXIT_CODES.FAILURE);
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return n;
}

const io = createDefaultCliIO();

program
  .name("corpus-index")
  .description("Fetch a source corpus at a pinned revision, chunk it and build a lexical index")
  .version(TOOL_VERSION)
  .exitOverride();

program
  .command("fetch")
  .description("Fetch a corpus revision into the cache and write its manifest")
  .requiredOption("--root-ref <ref>", "Branch or tag to fetch")
  .option("--repo-url <url>", "Repository URL or local path (default: from config)")
  .option("--cache-dir <path>", "Cache directory for corpora (default: from config)")
  .option("--force-refresh", "Ignore the cache and fetch fresh")
  .option("-c, --config <path>", "Config file path (YAML or JSON)")
  .action(async (options: FetchCommandOptions) => {
    process.exitCode = await runFetchCommand(options, io);
  });

program
  .command("index")
  .description("Fetch (or reuse) a corpus and build its FTS5 index")
  .requiredOption("--root-ref <ref>", "Branch or tag to index")
  .option("--repo-url <url>", "Repository URL or local path (default: from config)")
  .option("--cache-dir <path>", "Cache directory for corpora (default: from config)")
  .option("--output-dir <path>", "Directory receiving index builds (default: from config)")
  .option("--window-lines <n>", "Lines per chunk", parseInteger)
  .option("--overlap-lines <n>", "Lines shared by consecutive chunks", parseInteger)
  .option("-c, --config <path>", "Config file path (YAML or JSON)")
  .action(async (options: IndexCommandOptions) => {
    process.exitCode = await runIndexCommand(options, io);
  });

program
  .command("chunk")
  .description("Chunk a fetched corpus into chunks.jsonl without building an index")
  .requiredOption("--manifest <path>", "Corpus manifest written by fetch")
  .option("--out <dir>", "Output directory (default: from config)")
  .option("--window-lines <n>", "Lines per chunk", parseInteger)
  .option("--overlap-lines <n>", "Lines shared by consecutive chunks", parseInteger)
  .option("-c, --config <path>", "Config file path (YAML or JSON)")
  .action(async (options: ChunkCommandOptions) => {
    process.exitCode = await runChunkCommand(options, io);
  });

program
  .command("search")
  .description("Run a lexical query against a built index")
  .requiredOption("--index <dir>", "Index directory containing fts.sqlite")
  .requiredOption("--query <text>", "Search text")
  .option("--limit <n>", "Maximum number of results", parseInteger, 10)
  .option("--any", "Match any token instead of all tokens")
  .action(async (options: SearchCommandOptions) => {
    process.exitCode = await runSearchCommand(options, io);
  });

try {
  await program.parseAsync();
} catch (err) {
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE;
  } else {
    log.error("Command failed", err);
    process.exitCode = EXIT_CODES.FAILURE;
  }
}
