/**
 * SQLite FTS5 lexical store for chunks.
 *
 * One `chunks_fts` row per chunk. Text-searchable columns: content,
 * file_path, symbol_path, doc_origin. Every other column is UNINDEXED:
 * stored for provenance, never tokenized.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import path from "node:path";

import { errorMessage } from "../core/errors.js";
import { createLogger, type LogSink } from "../utils/logger.js";
import { comparePaths } from "./scanner.js";
import { INDEX_SCHEMA_VERSION, type Chunk } from "./schema.js";

const defaultLog = createLogger("fts");

export const FTS_DB_FILE = "fts.sqlite";
export const FTS_TABLE = "chunks_fts";

export type FtsBuildStatus = "success" | "partial" | "failed";

export interface InsertStats {
  inserted: number;
  errors: number;
}

export interface FtsBuildStats {
  dbPath: string;
  /** Rows inserted. */
  chunkCount: number;
  errorCount: number;
  createdAt: string;
  status: FtsBuildStatus;
  /** Set when status is "failed". */
  error?: string;
}

export interface FtsSearchHit {
  chunk_id: string;
  file_path: string;
  start_line: number;
  end_line: number;
  root_ref: string;
  resolved_commit: string;
  language: string;
  doc_origin: string;
  symbol_path: string;
  index_schema_version: string;
  content: string;
  /** FTS5 rank (bm25); lower is better. */
  rank: number;
}

/** Probe whether the linked SQLite build ships the FTS5 module. */
export function checkFts5Available(log: LogSink = defaultLog): boolean {
  const db = new Database(":memory:");
  try {
    db.exec("CREATE VIRTUAL TABLE fts5_probe USING fts5(content)");
    return true;
  } catch (err) {
    log.warn(`FTS5 not available: ${errorMessage(err)}`);
    return false;
  } finally {
    db.close();
  }
}

/**
 * Create a fresh FTS5 database. Fails if `chunks_fts` already exists: each
 * build owns its own file.
 */
export function createFtsDb(dbPath: string): Database.Database {
  mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  try {
    db.exec(`
      CREATE VIRTUAL TABLE ${FTS_TABLE} USING fts5(
        content,
        file_path,
        symbol_path,
        doc_origin,
        chunk_id UNINDEXED,
        start_line UNINDEXED,
        end_line UNINDEXED,
        root_ref UNINDEXED,
        resolved_commit UNINDEXED,
        language UNINDEXED,
        index_schema_version UNINDEXED
      );
      CREATE TABLE fts_meta (
        key TEXT PRIMARY KEY NOT NULL,
        value TEXT NOT NULL
      );
    `);
    db.prepare("INSERT INTO fts_meta (key, value) VALUES (?, ?)").run(
      "index_schema_version",
      INDEX_SCHEMA_VERSION,
    );
    return db;
  } catch (err) {
    db.close();
    throw err;
  }
}

export function compareChunksForInsert(a: Chunk, b: Chunk): number {
  return (
    comparePaths(a.file_path, b.file_path) ||
    a.start_line - b.start_line ||
    a.end_line - b.end_line ||
    comparePaths(a.chunk_id, b.chunk_id)
  );
}

/**
 * Insert chunks sorted by (file_path, start_line, end_line, chunk_id), so
 * identical chunk sets always produce identical row order. A failing row is
 * logged and counted; the batch continues.
 */
export function insertChunks(
  db: Database.Database,
  chunks: readonly Chunk[],
  log: LogSink = defaultLog,
): InsertStats {
  const sorted = [...chunks].sort(compareChunksForInsert);
  const insert = db.prepare(`
    INSERT INTO ${FTS_TABLE} (
      content, file_path, symbol_path, doc_origin,
      chunk_id, start_line, end_line, root_ref, resolved_commit, language, index_schema_version
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const stats: InsertStats = { inserted: 0, errors: 0 };

  const insertAll = db.transaction((rows: Chunk[]) => {
    for (const chunk of rows) {
      try {
        insert.run(
          chunk.content,
          chunk.file_path,
          chunk.symbol_path ?? "",
          chunk.doc_origin,
          chunk.chunk_id,
          chunk.start_line,
          chunk.end_line,
          chunk.root_ref,
          chunk.resolved_commit,
          chunk.language,
          chunk.index_schema_version,
        );
        stats.inserted += 1;
      } catch (err) {
        log.error(`Failed to insert chunk ${chunk.chunk_id}: ${errorMessage(err)}`);
        stats.errors += 1;
      }
    }
  });
  insertAll(sorted);

  log.info(`Inserted ${stats.inserted} chunks into FTS5 (errors: ${stats.errors})`);
  return stats;
}

/** Create the database and insert every chunk. Never throws. */
export function buildFtsIndex(
  dbPath: string,
  chunks: readonly Chunk[],
  options: { now?: () => Date; log?: LogSink } = {},
): FtsBuildStats {
  const log = options.log ?? defaultLog;
  const now = options.now ?? (() => new Date());

  let db: Database.Database;
  try {
    db = createFtsDb(dbPath);
  } catch (err) {
    log.error(`Failed to create FTS5 database ${dbPath}: ${errorMessage(err)}`);
    return {
      dbPath,
      chunkCount: 0,
      errorCount: 0,
      createdAt: now().toISOString(),
      status: "failed",
      error: "fts_schema_failed",
    };
  }

  try {
    const stats = insertChunks(db, chunks, log);
    log.info(`FTS5 index ready: ${dbPath} (${stats.inserted} chunks)`);
    return {
      dbPath,
      chunkCount: stats.inserted,
      errorCount: stats.errors,
      createdAt: now().toISOString(),
      status: stats.errors === 0 ? "success" : "partial",
    };
  } catch (err) {
    log.error(`Failed to build FTS5 index ${dbPath}: ${errorMessage(err)}`);
    return {
      dbPath,
      chunkCount: 0,
      errorCount: chunks.length,
      createdAt: now().toISOString(),
      status: "failed",
      error: "fts_insert_failed",
    };
  } finally {
    db.close();
  }
}

/** Open an existing FTS database read-only; null if the file is missing. */
export function openFtsDbReadOnly(dbPath: string): Database.Database | null {
  if (!existsSync(dbPath)) return null;
  return new Database(dbPath, { readonly: true, fileMustExist: true });
}

export interface FtsSearchOptions {
  limit?: number;
  /** "all": every token must match (default). "any": at least one. */
  mode?: "all" | "any";
}

/** Quote each word token so user input cannot inject FTS5 syntax. */
export function toFtsQuery(query: string, mode: "all" | "any" = "all"): string {
  const tokens = query.match(/[\p{L}\p{N}_]+/gu) ?? [];
  return tokens.map((t) => `"${t}"`).join(mode === "any" ? " OR " : " ");
}

/**
 * Lexical search. Ties in rank are broken by provenance so a query always
 * returns rows in the same order.
 */
export function searchFtsIndex(
  dbPath: string,
  query: string,
  options: FtsSearchOptions = {},
): FtsSearchHit[] {
  const match = toFtsQuery(query, options.mode);
  if (!match) return [];

  const db = openFtsDbReadOnly(dbPath);
  if (!db) return [];

  try {
    const stmt = db.prepare<[string, number], FtsSearchHit>(`
      SELECT chunk_id, file_path, start_line, end_line, root_ref, resolved_commit,
             language, doc_origin, symbol_path, index_schema_version, content, rank
      FROM ${FTS_TABLE}
      WHERE ${FTS_TABLE} MATCH ?
      ORDER BY rank, file_path, start_line, chunk_id
      LIMIT ?
    `);
    return stmt.all(match, Math.max(1, options.limit ?? 10));
  } finally {
    db.close();
  }
}
