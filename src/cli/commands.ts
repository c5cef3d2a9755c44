/**
 * Command runners behind the CLI. Each takes its options, an output sink and
 * injectable collaborators, and resolves to a process exit code; none of them
 * touch `process` directly.
 */

import { existsSync } from "node:fs";
import path from "node:path";

import { loadConfig } from "../config/loader.js";
import type { Config } from "../config/schema.js";
import { errorMessage, EXIT_CODES, exitCodeForError, type ExitCode } from "../core/errors.js";
import { fetchCorpus } from "../corpus/fetcher.js";
import { createGitClient, type GitClient } from "../corpus/git.js";
import { loadCorpusManifest } from "../corpus/manifest.js";
import { FTS_DB_FILE, searchFtsIndex } from "../index/db.js";
import { buildChunksFile, buildFullIndex } from "../index/indexer.js";
import { INDEX_SCHEMA_VERSION } from "../index/schema.js";
import { createLogger, type LogSink } from "../utils/logger.js";

const COLORS = {
  RED: "\x1b[0;31m",
  GREEN: "\x1b[0;32m",
  YELLOW: "\x1b[1;33m",
  NC: "\x1b[0m",
};

export interface CliIO {
  print: (msg: string) => void;
  warn?: (msg: string) => void;
  error: (msg: string) => void;
}

export function createDefaultCliIO(opts?: { color?: boolean }): CliIO {
  const color = opts?.color ?? Boolean(process.stdout.isTTY);
  const paint = (c: string, msg: string) => (color ? `${c}${msg}${COLORS.NC}` : msg);
  return {
    print: (msg) => console.log(msg),
    warn: (msg) => console.error(paint(COLORS.YELLOW, `! ${msg}`)),
    error: (msg) => console.error(paint(COLORS.RED, `x ${msg}`)),
  };
}

export interface CliDeps {
  /** Defaults to a git-backed client using the configured timeouts. */
  git?: GitClient;
  now?: () => Date;
  log?: LogSink;
  isFts5Available?: () => boolean;
}

export interface CommonOptions {
  config?: string;
}

export interface WindowFlags {
  windowLines?: number;
  overlapLines?: number;
}

export interface FetchCommandOptions extends CommonOptions {
  rootRef: string;
  repoUrl?: string;
  cacheDir?: string;
  forceRefresh?: boolean;
}

export interface IndexCommandOptions extends FetchCommandOptions, WindowFlags {
  /** Parent of `{index_id}/` directories. */
  outputDir?: string;
}

export interface ChunkCommandOptions extends CommonOptions, WindowFlags {
  manifest: string;
  out?: string;
}

export interface SearchCommandOptions {
  index: string;
  query: string;
  limit?: number;
  any?: boolean;
}

function fail(io: CliIO, prefix: string, err: unknown): ExitCode {
  io.error(`${prefix}: ${errorMessage(err)}`);
  return exitCodeForError(err);
}

function resolveFlagPath(p: string | undefined, fallback: string): string {
  return p ? path.resolve(p) : fallback;
}

function gitFor(config: Config, deps: CliDeps): GitClient {
  return deps.git ?? createGitClient({ timeouts: config.fetch.timeouts, log: deps.log });
}

async function fetchWithConfig(opts: FetchCommandOptions, config: Config, deps: CliDeps) {
  return fetchCorpus({
    repoUrl: opts.repoUrl ?? config.repoUrl,
    rootRef: opts.rootRef,
    cacheDir: resolveFlagPath(opts.cacheDir, config.paths.cacheDir),
    forceRefresh: opts.forceRefresh ?? false,
    verifyCache: config.fetch.verifyCache,
    git: gitFor(config, deps),
    now: deps.now,
    log: deps.log,
  });
}

export async function runFetchCommand(
  opts: FetchCommandOptions,
  io: CliIO,
  deps: CliDeps = {},
): Promise<ExitCode> {
  try {
    const config = await loadConfig(opts.config);
    const result = await fetchWithConfig(opts, config, deps);

    io.print(`[OK] Corpus fetched: ${opts.rootRef}${result.cacheHit ? " (cached)" : ""}`);
    io.print(`  Commit: ${result.manifest.resolved_commit.slice(0, 12)}`);
    io.print(`  Path: ${result.manifest.local_path}`);
    io.print(`  Manifest: ${result.manifestPath}`);
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    return fail(io, "Fetch failed", err);
  }
}

export async function runIndexCommand(
  opts: IndexCommandOptions,
  io: CliIO,
  deps: CliDeps = {},
): Promise<ExitCode> {
  const log = deps.log ?? createLogger("cli");
  try {
    const config = await loadConfig(opts.config);
    const fetched = await fetchWithConfig(opts, config, deps);

    const result = await buildFullIndex({
      manifest: fetched.manifest,
      indexDir: resolveFlagPath(opts.outputDir, config.paths.indexDir),
      chunksDir: config.paths.chunksDir,
      windowLines: opts.windowLines ?? config.chunking.windowLines,
      overlapLines: opts.overlapLines ?? config.chunking.overlapLines,
      discovery: config.discovery,
      now: deps.now,
      log,
      isFts5Available: deps.isFts5Available,
    });

    for (const skip of result.skipped) {
      io.warn?.(`Skipped ${skip.filePath}: ${skip.reason}`);
    }

    if (result.status === "failed") {
      const detail = result.detail ? ` (${result.detail})` : "";
      io.error(`Index build failed at stage ${result.stage}: ${result.error}${detail}`);
      return result.error === "fts5_unavailable" ? EXIT_CODES.FTS_UNAVAILABLE : EXIT_CODES.FAILURE;
    }

    io.print(`[OK] Index created: ${result.indexId}`);
    io.print(`  Corpus ID: ${result.corpusId}`);
    io.print(`  Root Ref: ${result.manifest.root_ref}`);
    io.print(`  Commit: ${result.manifest.resolved_commit.slice(0, 12)}`);
    io.print(`  Schema Version: ${result.manifest.index_schema_version}`);
    io.print(`  Chunks: ${result.chunkCount}`);
    io.print(`  Files: ${result.fileCount}`);
    io.print(`  Retrieval Modes: ${result.retrievalModes.join(", ")}`);
    io.print(`  FTS DB: ${result.ftsDbPath}`);
    io.print(`  Manifest: ${result.indexManifestPath}`);
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    return fail(io, "Index failed", err);
  }
}

export async function runChunkCommand(
  opts: ChunkCommandOptions,
  io: CliIO,
  deps: CliDeps = {},
): Promise<ExitCode> {
  try {
    const config = await loadConfig(opts.config);
    const manifest = await loadCorpusManifest(path.resolve(opts.manifest));

    const result = await buildChunksFile({
      manifest,
      outputDir: resolveFlagPath(opts.out, config.paths.chunksDir),
      windowLines: opts.windowLines ?? config.chunking.windowLines,
      overlapLines: opts.overlapLines ?? config.chunking.overlapLines,
      discovery: config.discovery,
      log: deps.log,
    });

    for (const skip of result.skipped) {
      io.warn?.(`Skipped ${skip.filePath}: ${skip.reason}`);
    }

    if (result.status === "failed") {
      const detail = result.detail ? ` (${result.detail})` : "";
      io.error(`Chunking failed: ${result.error}${detail}`);
      return EXIT_CODES.FAILURE;
    }

    io.print(`[OK] Chunks written: ${result.chunksPath}`);
    io.print(`  Corpus ID: ${result.corpusId}`);
    io.print(`  Schema Version: ${INDEX_SCHEMA_VERSION}`);
    io.print(`  Chunks: ${result.chunkCount}`);
    io.print(`  Files: ${result.fileCount}`);
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    return fail(io, "Chunk failed", err);
  }
}

export async function runSearchCommand(
  opts: SearchCommandOptions,
  io: CliIO,
): Promise<ExitCode> {
  try {
    const dbPath = path.join(path.resolve(opts.index), FTS_DB_FILE);
    if (!existsSync(dbPath)) {
      io.error(`No FTS database at ${dbPath}`);
      return EXIT_CODES.FAILURE;
    }

    const hits = searchFtsIndex(dbPath, opts.query, {
      limit: opts.limit,
      mode: opts.any ? "any" : "all",
    });

    if (hits.length === 0) {
      io.print("No results.");
      return EXIT_CODES.SUCCESS;
    }

    hits.forEach((hit, i) => {
      io.print(
        `${i + 1}. ${hit.file_path}:${hit.start_line}-${hit.end_line} ` +
          `[${hit.chunk_id}] ${hit.root_ref}@${hit.resolved_commit.slice(0, 12)}`,
      );
    });
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    return fail(io, "Search failed", err);
  }
}
