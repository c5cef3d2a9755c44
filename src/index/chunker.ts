import { readFile } from "node:fs/promises";
import path from "node:path";

import { errorMessage, ValidationError } from "../core/errors.js";
import { createLogger, type LogSink } from "../utils/logger.js";
import { createChunkFromSlice, type Chunk, type DocOrigin } from "./schema.js";

const defaultLog = createLogger("chunker");

export const DEFAULT_WINDOW_LINES = 80;
export const DEFAULT_OVERLAP_LINES = 10;

const DOXYGEN_PATTERN = /\/\*\*|\/\/!|\/\/\/</;

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  ".h": "cpp",
  ".hpp": "cpp",
  ".hh": "cpp",
  ".c": "c",
  ".cc": "cpp",
  ".cpp": "cpp",
  ".cxx": "cpp",
};

const HEADER_EXTENSIONS = new Set([".h", ".hpp", ".hh"]);

export interface WindowOptions {
  /** Lines per chunk. */
  windowLines?: number;
  /** Lines shared by consecutive chunks. */
  overlapLines?: number;
}

export function resolveWindowOptions(options: WindowOptions = {}): {
  windowLines: number;
  overlapLines: number;
} {
  const windowLines = options.windowLines ?? DEFAULT_WINDOW_LINES;
  const overlapLines = options.overlapLines ?? DEFAULT_OVERLAP_LINES;
  const issues: string[] = [];
  if (!Number.isInteger(windowLines) || windowLines < 1) {
    issues.push(`windowLines must be an integer >= 1, got ${windowLines}`);
  }
  if (!Number.isInteger(overlapLines) || overlapLines < 0) {
    issues.push(`overlapLines must be an integer >= 0, got ${overlapLines}`);
  }
  if (issues.length > 0) {
    throw new ValidationError(`Invalid window options: ${issues.join("; ")}`, issues);
  }
  return { windowLines, overlapLines };
}

export function detectLanguage(filePath: string): string {
  return LANGUAGE_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? "text";
}

export function detectDocOrigin(filePath: string): DocOrigin {
  return HEADER_EXTENSIONS.has(path.extname(filePath).toLowerCase())
    ? "source_header"
    : "source_impl";
}

export function hasDoxygenMarkers(text: string): boolean {
  return DOXYGEN_PATTERN.test(text);
}

/**
 * Split text into lines without terminators (`\r\n`, `\r` or `\n`).
 * A terminator at the very end does not open an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Read a source file as UTF-8. Invalid byte sequences are replaced with
 * U+FFFD rather than dropping the file.
 */
export async function readSourceLines(
  filePath: string,
  log: LogSink = defaultLog,
): Promise<string[]> {
  const bytes = await readFile(filePath);
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    log.warn(`Invalid UTF-8 in ${filePath}; decoding with replacement characters`);
    text = new TextDecoder("utf-8", { ignoreBOM: true }).decode(bytes);
  }
  return splitLines(text);
}

/**
 * Repository-relative path with forward slashes. Files outside `repoRoot`
 * keep the path as given (which chunk validation will then reject if absolute).
 */
export function toRepoRelativePath(filePath: string, repoRoot: string): string {
  const rel = path.relative(path.resolve(repoRoot), path.resolve(filePath));
  const inside =
    rel !== "" && rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
  const chosen = inside ? rel : filePath;
  return chosen.split(path.sep).join("/");
}

export interface ChunkLinesParams extends WindowOptions {
  lines: readonly string[];
  /** Repository-relative path recorded on every chunk. */
  filePath: string;
  rootRef: string;
  resolvedCommit: string;
  language: string;
  docOrigin: DocOrigin;
}

/**
 * Fixed-size sliding windows over `lines`.
 *
 * Window `i` covers 0-indexed lines [start, min(start + window - 1, n - 1)]
 * with `start` advancing by `window - overlap` (at least 1). The first window
 * that reaches the last line is the final one. Windows made only of
 * whitespace are not emitted.
 */
export function chunkLines(params: ChunkLinesParams): Chunk[] {
  const { windowLines, overlapLines } = resolveWindowOptions(params);
  const { lines } = params;
  const total = lines.length;
  const chunks: Chunk[] = [];
  if (total === 0) return chunks;

  const stride = Math.max(1, windowLines - overlapLines);

  for (let start = 0; start < total; start += stride) {
    const end = Math.min(start + windowLines - 1, total - 1);
    const content = lines.slice(start, end + 1).join("\n");
    if (content.trim()) {
      chunks.push(
        createChunkFromSlice({
          rootRef: params.rootRef,
          resolvedCommit: params.resolvedCommit,
          filePath: params.filePath,
          startLine: start + 1,
          endLine: end + 1,
          content,
          language: params.language,
          docOrigin: params.docOrigin,
          hasDoxygen: hasDoxygenMarkers(content),
        }),
      );
    }
    if (end === total - 1) break;
  }

  return chunks;
}

export interface ChunkFileParams extends WindowOptions {
  /** Path to the file on disk. */
  filePath: string;
  repoRoot: string;
  rootRef: string;
  resolvedCommit: string;
  log?: LogSink;
  /** Called by `chunkFile` after a read failure has been logged. */
  onReadError?: (err: unknown) => void;
}

function chunkReadFile(params: ChunkFileParams, lines: string[], log: LogSink): Chunk[] {
  if (lines.length === 0) return [];

  const relPath = toRepoRelativePath(params.filePath, params.repoRoot);
  const chunks = chunkLines({
    lines,
    filePath: relPath,
    rootRef: params.rootRef,
    resolvedCommit: params.resolvedCommit,
    language: detectLanguage(params.filePath),
    docOrigin: detectDocOrigin(params.filePath),
    windowLines: params.windowLines,
    overlapLines: params.overlapLines,
  });

  log.debug(`Chunked ${relPath}: ${chunks.length} chunks`);
  return chunks;
}

/** Chunk one file; read and validation failures propagate. */
export async function chunkFileStrict(params: ChunkFileParams): Promise<Chunk[]> {
  const log = params.log ?? defaultLog;
  const lines = await readSourceLines(params.filePath, log);
  return chunkReadFile(params, lines, log);
}

/**
 * Chunk one file; an unreadable file logs a warning and yields no chunks.
 * Validation failures still throw.
 */
export async function chunkFile(params: ChunkFileParams): Promise<Chunk[]> {
  const log = params.log ?? defaultLog;
  let lines: string[];
  try {
    lines = await readSourceLines(params.filePath, log);
  } catch (err) {
    log.warn(`Failed to read file ${params.filePath}: ${errorMessage(err)}`);
    params.onReadError?.(err);
    return [];
  }
  return chunkReadFile(params, lines, log);
}
