import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { CorpusError } from "../core/errors.js";
import { unwrap } from "../core/validation.js";
import { validateIndexManifest, type IndexManifest } from "./schema.js";

export const INDEX_MANIFEST_FILE = "index_manifest.json";

export async function saveIndexManifest(path: string, manifest: IndexManifest): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(manifest, null, 2)}\n`, "utf-8");
}

/**
 * Load and re-verify an index manifest, including that `corpus_id` and
 * `index_id` still derive from the recorded provenance.
 */
export async function loadIndexManifest(path: string): Promise<IndexManifest> {
  const content = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new CorpusError(`Index manifest at ${path} is not valid JSON`, err);
  }
  return unwrap(validateIndexManifest(raw));
}
