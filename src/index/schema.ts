/**
 * Chunk and index manifest schemas.
 *
 * Chunks are the unit of both the JSONL artifact and the FTS5 rows; the
 * index manifest records the provenance of one index build. Field names are
 * the persisted (snake_case) names.
 */

import { createHash } from "node:crypto";
import { z } from "zod";

import { unwrap, validateWith, type ValidationResult } from "../core/validation.js";

export const INDEX_SCHEMA_VERSION = "1.0.0";
export const INDEX_MANIFEST_SCHEMA_VERSION = "1.0.0";
export const MAX_CHUNK_CONTENT_CHARS = 1_000_000;
export const CHUNK_ID_LENGTH = 12;

export const DOC_ORIGINS = [
  "source_header",
  "source_impl",
  "doxygen_comment",
  "reference_doc",
  "tutorial_doc",
] as const;

export type DocOrigin = (typeof DOC_ORIGINS)[number];

export const RETRIEVAL_MODES = ["lexical"] as const;

export type RetrievalMode = (typeof RETRIEVAL_MODES)[number];

/** 7–40 lowercase hex characters (abbreviated or full git SHA). */
export const commitShaSchema = z
  .string()
  .regex(/^[0-9a-f]{7,40}$/, "must be 7-40 lowercase hex characters");

/**
 * Repository-relative, forward-slash path that cannot escape the root.
 */
export const relativeFilePathSchema = z
  .string()
  .min(1, "must not be empty")
  .refine((p) => !p.startsWith("/") && !p.startsWith("\\"), "must be relative")
  .refine((p) => !p.includes("\\"), "must use forward slashes")
  .refine((p) => !/^[A-Za-z]:/.test(p), "must not carry a drive letter")
  .refine(
    (p) => p !== "." && !p.split("/").includes(".."),
    "must not escape the repository root",
  );

export const chunkSchema = z
  .object({
    chunk_id: z
      .string()
      .regex(/^[0-9a-f]{12}$/, "must be 12 lowercase hex characters"),
    root_ref: z.string().min(1),
    resolved_commit: commitShaSchema,
    file_path: relativeFilePathSchema,
    language: z
      .string()
      .regex(/^[a-z][a-z0-9_+#-]*$/, "must be a lowercase identifier"),
    start_line: z.number().int().min(1),
    end_line: z.number().int().min(1),
    content: z
      .string()
      .refine((c) => c.trim().length > 0, "must not be empty or whitespace-only")
      .refine(
        (c) => c.length <= MAX_CHUNK_CONTENT_CHARS,
        `exceeds ${MAX_CHUNK_CONTENT_CHARS} characters`,
      ),
    doc_origin: z.enum(DOC_ORIGINS),
    index_schema_version: z.string().min(1).default(INDEX_SCHEMA_VERSION),
    symbol_path: z.string().nullable().default(null),
    has_doxygen: z.boolean().default(false),
  })
  .refine((c) => c.end_line >= c.start_line, {
    message: "end_line must be >= start_line",
    path: ["end_line"],
  });

export type Chunk = Readonly<z.output<typeof chunkSchema>>;
export type ChunkInput = z.input<typeof chunkSchema>;

export interface ChunkProvenance {
  rootRef: string;
  resolvedCommit: string;
  filePath: string;
  startLine: number;
  endLine: number;
}

/**
 * Stable chunk identifier: the first 12 hex chars of SHA-256 over
 * `root_ref:resolved_commit:file_path:start_line:end_line`.
 */
export function computeChunkId(p: ChunkProvenance): string {
  const provenance = `${p.rootRef}:${p.resolvedCommit}:${p.filePath}:${p.startLine}:${p.endLine}`;
  return createHash("sha256").update(provenance).digest("hex").slice(0, CHUNK_ID_LENGTH);
}

export function validateChunk(input: unknown): ValidationResult<Chunk> {
  return validateWith(chunkSchema, input, "chunk");
}

export function parseChunk(input: unknown): Chunk {
  return unwrap(validateChunk(input));
}

export function createChunkFromSlice(
  params: ChunkProvenance & {
    content: string;
    language: string;
    docOrigin: DocOrigin;
    symbolPath?: string | null;
    hasDoxygen?: boolean;
  },
): Chunk {
  return parseChunk({
    chunk_id: computeChunkId(params),
    root_ref: params.rootRef,
    resolved_commit: params.resolvedCommit,
    file_path: params.filePath,
    language: params.language,
    start_line: params.startLine,
    end_line: params.endLine,
    content: params.content,
    doc_origin: params.docOrigin,
    index_schema_version: INDEX_SCHEMA_VERSION,
    symbol_path: params.symbolPath ?? null,
    has_doxygen: params.hasDoxygen ?? false,
  });
}

export function chunkToJsonLine(chunk: Chunk): string {
  return `${JSON.stringify(chunk)}\n`;
}

/** `{root_ref}__{commit[:12]}` */
export function computeCorpusId(rootRef: string, resolvedCommit: string): string {
  return `${rootRef}__${resolvedCommit.slice(0, 12)}`;
}

/** `{corpus_id}__{created_at with "-", ":" and "." removed}` */
export function computeIndexId(corpusId: string, createdAt: string): string {
  return `${corpusId}__${createdAt.replace(/[-:.]/g, "")}`;
}

export const indexManifestSchema = z
  .object({
    index_id: z.string().min(1),
    corpus_id: z.string().min(1),
    root_ref: z.string().min(1),
    resolved_commit: commitShaSchema,
    corpus_url: z.string().min(1),
    chunks_path: z.string().min(1),
    fts_db_path: z.string().min(1),
    schema_version: z.string().min(1).default(INDEX_MANIFEST_SCHEMA_VERSION),
    index_schema_version: z.string().min(1).default(INDEX_SCHEMA_VERSION),
    chunk_count: z.number().int().nonnegative(),
    file_count: z.number().int().nonnegative(),
    retrieval_modes: z.array(z.enum(RETRIEVAL_MODES)).default(["lexical"]),
    created_at: z.string().min(1),
    tool_version: z.string().min(1),
  })
  .refine((m) => m.corpus_id === computeCorpusId(m.root_ref, m.resolved_commit), {
    message: "corpus_id does not match root_ref/resolved_commit",
    path: ["corpus_id"],
  })
  .refine((m) => m.index_id === computeIndexId(m.corpus_id, m.created_at), {
    message: "index_id does not match corpus_id/created_at",
    path: ["index_id"],
  });

export type IndexManifest = Readonly<z.output<typeof indexManifestSchema>>;
export type IndexManifestInput = z.input<typeof indexManifestSchema>;

export function validateIndexManifest(input: unknown): ValidationResult<IndexManifest> {
  return validateWith(indexManifestSchema, input, "index manifest");
}

export function createIndexManifest(input: IndexManifestInput): IndexManifest {
  return unwrap(validateIndexManifest(input));
}
