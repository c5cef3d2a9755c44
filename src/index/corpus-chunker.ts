import path from "node:path";

import { errorMessage } from "../core/errors.js";
import type { CorpusManifest } from "../corpus/manifest.js";
import { createLogger, type LogSink } from "../utils/logger.js";
import { chunkFile, resolveWindowOptions, type WindowOptions } from "./chunker.js";
import { discoverSourceFiles, type DiscoveryOptions } from "./scanner.js";
import type { Chunk } from "./schema.js";

const defaultLog = createLogger("corpus-chunker");

export interface SkippedFile {
  filePath: string;
  reason: string;
}

export interface CorpusChunkingResult {
  /** Chunks of every file, in discovery order. */
  chunks: Chunk[];
  /** Files returned by discovery (including skipped and empty ones). */
  fileCount: number;
  skipped: SkippedFile[];
}

export interface ChunkCorpusParams extends WindowOptions {
  manifest: Pick<CorpusManifest, "root_ref" | "resolved_commit" | "local_path">;
  /** Defaults to the manifest's `local_path`. */
  repoRoot?: string;
  discovery?: DiscoveryOptions;
  log?: LogSink;
}

/**
 * Chunk every discovered file of a corpus. A failing file is logged and
 * recorded in `skipped`; it never aborts the corpus.
 */
export async function chunkCorpus(params: ChunkCorpusParams): Promise<CorpusChunkingResult> {
  const log = params.log ?? defaultLog;
  const window = resolveWindowOptions(params);
  const repoRoot = path.resolve(params.repoRoot ?? params.manifest.local_path);

  const files = await discoverSourceFiles(repoRoot, params.discovery);
  log.info(`Discovered ${files.length} source files in ${repoRoot}`);

  const chunks: Chunk[] = [];
  const skipped: SkippedFile[] = [];

  for (const filePath of files) {
    try {
      const fileChunks = await chunkFile({
        filePath,
        repoRoot,
        rootRef: params.manifest.root_ref,
        resolvedCommit: params.manifest.resolved_commit,
        windowLines: window.windowLines,
        overlapLines: window.overlapLines,
        log,
        onReadError: (err) => skipped.push({ filePath, reason: errorMessage(err) }),
      });
      chunks.push(...fileChunks);
    } catch (err) {
      const reason = errorMessage(err);
      log.warn(`Error chunking ${filePath}: ${reason}`);
      skipped.push({ filePath, reason });
    }
  }

  log.info(
    `Corpus chunked: ${files.length} files, ${chunks.length} chunks, ${skipped.length} skipped`,
  );
  return { chunks, fileCount: files.length, skipped };
}
