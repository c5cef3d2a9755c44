/**
 * Corpus manifest: the provenance root of a fetched corpus.
 *
 * Created once per successful fetch and never mutated; a re-fetch produces a
 * new manifest (identical content on a cache hit).
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

import { CorpusError } from "../core/errors.js";
import { unwrap, validateWith, type ValidationResult } from "../core/validation.js";
import { commitShaSchema } from "../index/schema.js";

export const CORPUS_MANIFEST_SCHEMA_VERSION = "corpus_manifest_v1";

export const corpusManifestSchema = z.object({
  schema_version: z.string().min(1).default(CORPUS_MANIFEST_SCHEMA_VERSION),
  repo_url: z.string().min(1),
  root_ref: z.string().min(1),
  resolved_commit: commitShaSchema,
  local_path: z.string().min(1),
  fetched_at: z.string().min(1),
  dirty: z.boolean().default(false),
  tool_version: z.string().min(1),
});

export type CorpusManifest = Readonly<z.output<typeof corpusManifestSchema>>;
export type CorpusManifestInput = z.input<typeof corpusManifestSchema>;

export function validateCorpusManifest(input: unknown): ValidationResult<CorpusManifest> {
  return validateWith(corpusManifestSchema, input, "corpus manifest");
}

export function createCorpusManifest(input: CorpusManifestInput): CorpusManifest {
  return unwrap(validateCorpusManifest(input));
}

export async function saveCorpusManifest(
  path: string,
  manifest: CorpusManifest,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(manifest, null, 2)}\n`, "utf-8");
}

export async function loadCorpusManifest(path: string): Promise<CorpusManifest> {
  const content = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new CorpusError(`Corpus manifest at ${path} is not valid JSON`, err);
  }
  return unwrap(validateCorpusManifest(raw));
}
