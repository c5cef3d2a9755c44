import { describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { ValidationError } from "../core/errors.js";
import { readChunksJsonl, writeChunksJsonl } from "./jsonl.js";
import { createChunkFromSlice, type Chunk } from "./schema.js";

const COMMIT = "00112233445566778899aabbccddeeff00112233";

function chunkAt(startLine: number, content: string): Chunk {
  return createChunkFromSlice({
    rootRef: "main",
    resolvedCommit: COMMIT,
    filePath: "lib/x.cc",
    startLine,
    endLine: startLine,
    content,
    language: "cpp",
    docOrigin: "source_impl",
  });
}

describe("chunks.jsonl store", () => {
  it("writes one compact object per line and reads them back", async () => {
    const dir = await mkdtemp(join(tmpdir(), "corpus-index-jsonl-"));
    try {
      const path = join(dir, "nested", "chunks.jsonl");
      const chunks = [chunkAt(1, "int a;"), chunkAt(2, 'const char* s = "x\\ny";')];
      await writeChunksJsonl(path, chunks);

      const raw = await readFile(path, "utf-8");
      expect(raw.split("\n")).toHaveLength(3);
      expect(raw.endsWith("\n")).toBe(true);
      expect(await readChunksJsonl(path)).toEqual(chunks);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("overwrites instead of appending", async () => {
    const dir = await mkdtemp(join(tmpdir(), "corpus-index-jsonl-"));
    try {
      const path = join(dir, "chunks.jsonl");
      await writeChunksJsonl(path, [chunkAt(1, "a"), chunkAt(2, "b")]);
      await writeChunksJsonl(path, [chunkAt(3, "c")]);

      const chunks = await readChunksJsonl(path);
      expect(chunks.map((c) => c.content)).toEqual(["c"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("names the offending line", async () => {
    const dir = await mkdtemp(join(tmpdir(), "corpus-index-jsonl-"));
    try {
      const path = join(dir, "chunks.jsonl");
      const good = JSON.stringify(chunkAt(1, "a"));
      await writeFile(path, `${good}\n\n{"chunk_id":"nope"}\n`, "utf-8");

      await expect(readChunksJsonl(path)).rejects.toThrow(ValidationError);
      await expect(readChunksJsonl(path)).rejects.toThrow(`${path}:3: Invalid chunk:`);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("rejects a line that is not JSON", async () => {
    const dir = await mkdtemp(join(tmpdir(), "corpus-index-jsonl-"));
    try {
      const path = join(dir, "chunks.jsonl");
      await writeFile(path, "{not json\n", "utf-8");
      await expect(readChunksJsonl(path)).rejects.toThrow(`${path}:1: not valid JSON`);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
