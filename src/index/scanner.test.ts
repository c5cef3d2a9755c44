import { describe, expect, it } from "vitest";
import { mkdtemp, mkdir, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { CorpusError } from "../core/errors.js";
import { discoverSourceFiles } from "./scanner.js";

async function makeTmpDir() {
  return mkdtemp(join(tmpdir(), "corpus-index-scan-"));
}

async function touch(root: string, rel: string, content = "int x;\n") {
  const parts = rel.split("/");
  if (parts.length > 1) {
    await mkdir(join(root, ...parts.slice(0, -1)), { recursive: true });
  }
  await writeFile(join(root, ...parts), content, "utf-8");
}

describe("discoverSourceFiles", () => {
  it("returns eligible files sorted by code-unit order", async () => {
    const dir = await makeTmpDir();
    try {
      await touch(dir, "b.cpp");
      await touch(dir, "a.h");
      await touch(dir, "src/a.c");
      await touch(dir, "src/Z.cc");
      await touch(dir, "README.md");
      await touch(dir, "src/notes.txt");

      const files = await discoverSourceFiles(dir);
      expect(files).toEqual([
        join(dir, "a.h"),
        join(dir, "b.cpp"),
        join(dir, "src", "Z.cc"),
        join(dir, "src", "a.c"),
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("skips excluded directories at any depth", async () => {
    const dir = await makeTmpDir();
    try {
      await touch(dir, "core/base/TObject.cxx");
      await touch(dir, "build/gen.h");
      await touch(dir, "core/build/gen.h");
      await touch(dir, ".git/hooks/x.c");
      await touch(dir, "interpreter/external/llvm.cpp");
      await touch(dir, "venv/lib/mod.c");

      const files = await discoverSourceFiles(dir);
      expect(files).toEqual([join(dir, "core", "base", "TObject.cxx")]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("matches extensions exactly (case-sensitive)", async () => {
    const dir = await makeTmpDir();
    try {
      await touch(dir, "upper.H");
      await touch(dir, "lower.h");
      await touch(dir, "archive.h.bak");

      expect(await discoverSourceFiles(dir)).toEqual([join(dir, "lower.h")]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("honors custom extensions and exclusions", async () => {
    const dir = await makeTmpDir();
    try {
      await touch(dir, "docs/guide.md");
      await touch(dir, "drafts/todo.md");
      await touch(dir, "src/a.cpp");

      const files = await discoverSourceFiles(dir, {
        includeExtensions: [".md"],
        excludedDirs: ["drafts"],
      });
      expect(files).toEqual([join(dir, "docs", "guide.md")]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("follows file symlinks that stay inside the root", async () => {
    const dir = await makeTmpDir();
    const outside = await makeTmpDir();
    try {
      await touch(dir, "inc/real.h");
      await touch(outside, "foreign.h");
      await symlink(join(dir, "inc", "real.h"), join(dir, "inc", "alias.h"));
      await symlink(join(outside, "foreign.h"), join(dir, "escape.h"));
      await symlink(join(dir, "missing.h"), join(dir, "dangling.h"));
      await symlink(join(dir, "inc"), join(dir, "linked-dir"));

      expect(await discoverSourceFiles(dir)).toEqual([
        join(dir, "inc", "alias.h"),
        join(dir, "inc", "real.h"),
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
      await rm(outside, { recursive: true, force: true });
    }
  });

  it("returns the same list on repeated calls", async () => {
    const dir = await makeTmpDir();
    try {
      await touch(dir, "x/y/z.hpp");
      await touch(dir, "x/a.hh");
      const first = await discoverSourceFiles(dir);
      const second = await discoverSourceFiles(dir);
      expect(second).toEqual(first);
      expect(first).toHaveLength(2);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("rejects a root that is not a directory", async () => {
    const dir = await makeTmpDir();
    try {
      await touch(dir, "file.h");
      await expect(discoverSourceFiles(join(dir, "file.h"))).rejects.toThrow(CorpusError);
      await expect(discoverSourceFiles(join(dir, "missing"))).rejects.toThrow(
        `repo root must be a directory: ${join(dir, "missing")}`,
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
