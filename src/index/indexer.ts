/**
 * Index builder: corpus → chunks.jsonl → FTS5 database → index manifest.
 *
 * Build stages, in order:
 *   not-started → available-checked → schema-created → chunks-inserted → manifest-persisted
 *
 * Every failure is terminal and reported as a typed reason string together
 * with the last stage reached. Invalid inputs (window options, a corpus root
 * that is not a directory) still throw.
 */

import { mkdir } from "node:fs/promises";
import path from "node:path";

import { errorMessage } from "../core/errors.js";
import type { CorpusManifest } from "../corpus/manifest.js";
import { TOOL_VERSION } from "../version.js";
import { createLogger, type LogSink } from "../utils/logger.js";
import type { WindowOptions } from "./chunker.js";
import { chunkCorpus, type SkippedFile } from "./corpus-chunker.js";
import { buildFtsIndex, checkFts5Available, FTS_DB_FILE } from "./db.js";
import { CHUNKS_FILE, writeChunksJsonl } from "./jsonl.js";
import { INDEX_MANIFEST_FILE, saveIndexManifest } from "./manifest.js";
import type { DiscoveryOptions } from "./scanner.js";
import {
  computeCorpusId,
  computeIndexId,
  createIndexManifest,
  type Chunk,
  type IndexManifest,
  type RetrievalMode,
} from "./schema.js";

const defaultLog = createLogger("indexer");

export type BuildStage =
  | "not-started"
  | "available-checked"
  | "schema-created"
  | "chunks-inserted"
  | "manifest-persisted";

export type BuildFailureReason =
  | "fts5_unavailable"
  | "no_chunks"
  | "chunks_write_failed"
  | "fts_schema_failed"
  | "fts_insert_partial"
  | "fts_insert_failed"
  | "manifest_write_failed";

export type IndexSourceManifest = Pick<
  CorpusManifest,
  "root_ref" | "resolved_commit" | "local_path" | "repo_url"
>;

export interface IndexBuildSuccess {
  status: "success";
  stage: "manifest-persisted";
  indexId: string;
  corpusId: string;
  chunkCount: number;
  fileCount: number;
  chunksPath: string;
  ftsDbPath: string;
  indexManifestPath: string;
  retrievalModes: RetrievalMode[];
  createdAt: string;
  manifest: IndexManifest;
  skipped: SkippedFile[];
}

export interface IndexBuildFailure {
  status: "failed";
  /** Last stage completed before the failure. */
  stage: BuildStage;
  error: BuildFailureReason;
  detail?: string;
  /** Row counts, once insertion was attempted. */
  inserted?: number;
  errored?: number;
  skipped: SkippedFile[];
}

export type IndexBuildResult = IndexBuildSuccess | IndexBuildFailure;

export interface BuildFullIndexParams extends WindowOptions {
  manifest: IndexSourceManifest;
  /** Parent of `{index_id}/` directories. */
  indexDir: string;
  /** Parent of `{corpus_id}/chunks.jsonl`. */
  chunksDir: string;
  discovery?: DiscoveryOptions;
  toolVersion?: string;
  now?: () => Date;
  log?: LogSink;
  isFts5Available?: () => boolean;
  /** FTS5 store builder; defaults to `buildFtsIndex`. */
  buildFts?: typeof buildFtsIndex;
}

/** Distinct source files among the chunks. */
export function countFiles(chunks: readonly Chunk[]): number {
  return new Set(chunks.map((c) => c.file_path)).size;
}

export async function buildFullIndex(params: BuildFullIndexParams): Promise<IndexBuildResult> {
  const log = params.log ?? defaultLog;
  const now = params.now ?? (() => new Date());
  const isFts5Available = params.isFts5Available ?? (() => checkFts5Available(log));
  const { manifest } = params;

  const corpusId = computeCorpusId(manifest.root_ref, manifest.resolved_commit);
  log.info(`Building full index for ${corpusId}`);

  if (!isFts5Available()) {
    log.error("FTS5 not available on this system");
    return { status: "failed", stage: "not-started", error: "fts5_unavailable", skipped: [] };
  }

  const { chunks, skipped } = await chunkCorpus({
    manifest,
    windowLines: params.windowLines,
    overlapLines: params.overlapLines,
    discovery: params.discovery,
    log,
  });

  if (chunks.length === 0) {
    log.error("No chunks generated from corpus");
    return { status: "failed", stage: "available-checked", error: "no_chunks", skipped };
  }

  const chunksPath = path.join(params.chunksDir, corpusId, CHUNKS_FILE);
  try {
    await writeChunksJsonl(chunksPath, chunks);
    log.info(`Wrote ${chunks.length} chunks to ${chunksPath}`);
  } catch (err) {
    log.error(`Failed to write chunks file: ${errorMessage(err)}`);
    return {
      status: "failed",
      stage: "available-checked",
      error: "chunks_write_failed",
      detail: errorMessage(err),
      skipped,
    };
  }

  const createdAt = now().toISOString();
  const indexId = computeIndexId(corpusId, createdAt);
  const indexPath = path.join(params.indexDir, indexId);
  const ftsDbPath = path.join(indexPath, FTS_DB_FILE);

  try {
    await mkdir(indexPath, { recursive: true });
  } catch (err) {
    log.error(`Failed to create index directory: ${errorMessage(err)}`);
    return {
      status: "failed",
      stage: "available-checked",
      error: "fts_schema_failed",
      detail: errorMessage(err),
      skipped,
    };
  }

  const buildFts = params.buildFts ?? buildFtsIndex;
  const fts = buildFts(ftsDbPath, chunks, { now, log });
  if (fts.status === "failed") {
    const error = fts.error === "fts_insert_failed" ? "fts_insert_failed" : "fts_schema_failed";
    return {
      status: "failed",
      stage: error === "fts_insert_failed" ? "schema-created" : "available-checked",
      error,
      inserted: fts.chunkCount,
      errored: fts.errorCount,
      skipped,
    };
  }
  if (fts.status === "partial") {
    log.error(`FTS5 index build partial: ${fts.errorCount} rows failed`);
    return {
      status: "failed",
      stage: "chunks-inserted",
      error: "fts_insert_partial",
      inserted: fts.chunkCount,
      errored: fts.errorCount,
      skipped,
    };
  }

  const fileCount = countFiles(chunks);
  const indexManifest = createIndexManifest({
    index_id: indexId,
    corpus_id: corpusId,
    root_ref: manifest.root_ref,
    resolved_commit: manifest.resolved_commit,
    corpus_url: manifest.repo_url,
    chunks_path: chunksPath,
    fts_db_path: ftsDbPath,
    chunk_count: chunks.length,
    file_count: fileCount,
    retrieval_modes: ["lexical"],
    created_at: createdAt,
    tool_version: params.toolVersion ?? TOOL_VERSION,
  });

  const indexManifestPath = path.join(indexPath, INDEX_MANIFEST_FILE);
  try {
    await saveIndexManifest(indexManifestPath, indexManifest);
    log.info(`Saved index manifest to ${indexManifestPath}`);
  } catch (err) {
    log.error(`Failed to save index manifest: ${errorMessage(err)}`);
    return {
      status: "failed",
      stage: "chunks-inserted",
      error: "manifest_write_failed",
      detail: errorMessage(err),
      inserted: fts.chunkCount,
      errored: fts.errorCount,
      skipped,
    };
  }

  log.info(
    `Index ready: ${indexId}, retrieval_modes=[lexical], chunks=${chunks.length}, files=${fileCount}`,
  );

  return {
    status: "success",
    stage: "manifest-persisted",
    indexId,
    corpusId,
    chunkCount: chunks.length,
    fileCount,
    chunksPath,
    ftsDbPath,
    indexManifestPath,
    retrievalModes: ["lexical"],
    createdAt,
    manifest: indexManifest,
    skipped,
  };
}

export interface BuildChunksFileParams extends WindowOptions {
  manifest: Pick<CorpusManifest, "root_ref" | "resolved_commit" | "local_path">;
  /** Parent of `{corpus_id}/chunks.jsonl`. */
  outputDir: string;
  discovery?: DiscoveryOptions;
  log?: LogSink;
}

export type ChunksFileResult =
  | {
      status: "success";
      corpusId: string;
      chunkCount: number;
      fileCount: number;
      chunksPath: string;
      skipped: SkippedFile[];
    }
  | {
      status: "failed";
      error: "no_chunks" | "chunks_write_failed";
      detail?: string;
      chunksPath: string;
      skipped: SkippedFile[];
    };

/** Chunk a corpus and persist only `chunks.jsonl` (no FTS store). */
export async function buildChunksFile(params: BuildChunksFileParams): Promise<ChunksFileResult> {
  const log = params.log ?? defaultLog;
  const corpusId = computeCorpusId(params.manifest.root_ref, params.manifest.resolved_commit);
  const chunksPath = path.join(params.outputDir, corpusId, CHUNKS_FILE);

  log.info(`Chunking corpus at ${params.manifest.local_path}`);
  const { chunks, skipped } = await chunkCorpus({
    manifest: params.manifest,
    windowLines: params.windowLines,
    overlapLines: params.overlapLines,
    discovery: params.discovery,
    log,
  });

  if (chunks.length === 0) {
    log.warn("No chunks generated from corpus");
    return { status: "failed", error: "no_chunks", chunksPath, skipped };
  }

  try {
    await writeChunksJsonl(chunksPath, chunks);
  } catch (err) {
    log.error(`Failed to write chunks file: ${errorMessage(err)}`);
    return {
      status: "failed",
      error: "chunks_write_failed",
      detail: errorMessage(err),
      chunksPath,
      skipped,
    };
  }

  log.info(`Wrote ${chunks.length} chunks to ${chunksPath}`);
  return {
    status: "success",
    corpusId,
    chunkCount: chunks.length,
    fileCount: countFiles(chunks),
    chunksPath,
    skipped,
  };
}
