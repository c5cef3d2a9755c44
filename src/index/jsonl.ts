import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { ValidationError } from "../core/errors.js";
import { chunkToJsonLine, validateChunk, type Chunk } from "./schema.js";

export const CHUNKS_FILE = "chunks.jsonl";

/** Write one compact JSON object per line, replacing any previous file. */
export async function writeChunksJsonl(path: string, chunks: readonly Chunk[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, chunks.map(chunkToJsonLine).join(""), "utf-8");
}

export async function readChunksJsonl(path: string): Promise<Chunk[]> {
  const content = await readFile(path, "utf-8");
  const chunks: Chunk[] = [];
  const lines = content.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? "";
    if (!raw.trim()) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new ValidationError(`${path}:${i + 1}: not valid JSON`);
    }

    const result = validateChunk(parsed);
    if (!result.success) {
      throw new ValidationError(`${path}:${i + 1}: ${result.error.message}`, result.error.issues);
    }
    chunks.push(result.data);
  }

  return chunks;
}
