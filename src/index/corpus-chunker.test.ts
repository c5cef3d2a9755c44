import { describe, expect, it, vi } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { LogSink } from "../utils/logger.js";
import { chunkCorpus } from "./corpus-chunker.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    readFile: (...args: Parameters<typeof actual.readFile>) =>
      String(args[0]).endsWith("locked.cpp")
        ? Promise.reject(new Error("EACCES: permission denied"))
        : actual.readFile(...args),
  };
});

const COMMIT = "fedcba9876543210fedcba9876543210fedcba98";

async function makeCorpus(files: Record<string, string>) {
  const dir = await mkdtemp(join(tmpdir(), "corpus-index-corpus-"));
  for (const [rel, content] of Object.entries(files)) {
    const abs = join(dir, ...rel.split("/"));
    await mkdir(join(abs, ".."), { recursive: true });
    await writeFile(abs, content, "utf-8");
  }
  return dir;
}

function quietLog(): LogSink & { warn: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("chunkCorpus", () => {
  it("concatenates per-file chunks in discovery order", async () => {
    const dir = await makeCorpus({
      "src/b.cxx": "void b() {}\n",
      "inc/a.h": "void a();\n",
      "inc/empty.h": "",
    });
    try {
      const result = await chunkCorpus({
        manifest: { root_ref: "v2.0", resolved_commit: COMMIT, local_path: dir },
        log: quietLog(),
      });

      expect(result.fileCount).toBe(3);
      expect(result.skipped).toEqual([]);
      expect(result.chunks.map((c) => c.file_path)).toEqual(["inc/a.h", "src/b.cxx"]);
      for (const chunk of result.chunks) {
        expect(chunk.root_ref).toBe("v2.0");
        expect(chunk.resolved_commit).toBe(COMMIT);
      }
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("records a failing file and keeps going", async () => {
    const dir = await makeCorpus({
      "a.cpp": "int a;\n",
      "huge.cpp": `${"x".repeat(1_000_001)}\n`,
      "z.cpp": "int z;\n",
    });
    try {
      const log = quietLog();
      const result = await chunkCorpus({
        manifest: { root_ref: "v2.0", resolved_commit: COMMIT, local_path: dir },
        log,
      });

      expect(result.chunks.map((c) => c.file_path)).toEqual(["a.cpp", "z.cpp"]);
      expect(result.skipped).toHaveLength(1);
      expect(result.skipped[0]?.filePath).toBe(join(dir, "huge.cpp"));
      expect(result.skipped[0]?.reason).toContain("content: exceeds 1000000 characters");
      expect(log.warn).toHaveBeenCalledTimes(1);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("skips an unreadable file with zero chunks", async () => {
    const dir = await makeCorpus({ "a.cpp": "int a;\n", "locked.cpp": "int locked;\n" });
    try {
      const log = quietLog();
      const result = await chunkCorpus({
        manifest: { root_ref: "v2.0", resolved_commit: COMMIT, local_path: dir },
        log,
      });

      expect(result.fileCount).toBe(2);
      expect(result.chunks.map((c) => c.file_path)).toEqual(["a.cpp"]);
      expect(result.skipped).toEqual([
        { filePath: join(dir, "locked.cpp"), reason: "EACCES: permission denied" },
      ]);
      expect(log.warn).toHaveBeenCalledWith(
        `Failed to read file ${join(dir, "locked.cpp")}: EACCES: permission denied`,
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("treats an empty corpus as a valid empty result", async () => {
    const dir = await makeCorpus({ "README.md": "# nothing to chunk\n" });
    try {
      const result = await chunkCorpus({
        manifest: { root_ref: "v2.0", resolved_commit: COMMIT, local_path: dir },
        log: quietLog(),
      });
      expect(result).toEqual({ chunks: [], fileCount: 0, skipped: [] });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("passes window options and discovery options through", async () => {
    const lines = Array.from({ length: 12 }, (_, i) => `// ${i + 1}`).join("\n");
    const dir = await makeCorpus({ "a.hpp": lines, "skip/b.hpp": lines });
    try {
      const result = await chunkCorpus({
        manifest: { root_ref: "v2.0", resolved_commit: COMMIT, local_path: dir },
        windowLines: 5,
        overlapLines: 1,
        discovery: { excludedDirs: ["skip"] },
        log: quietLog(),
      });
      expect(result.chunks.map((c) => [c.start_line, c.end_line])).toEqual([
        [1, 5],
        [5, 9],
        [9, 12],
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
