import { readdir, realpath, stat } from "node:fs/promises";
import path from "node:path";

import { CorpusError } from "../core/errors.js";

export const DEFAULT_INCLUDED_EXTENSIONS: readonly string[] = [
  ".h",
  ".hpp",
  ".hh",
  ".cxx",
  ".cpp",
  ".cc",
  ".c",
];

export const DEFAULT_EXCLUDED_DIRS: readonly string[] = [
  "build",
  ".git",
  ".github",
  "external",
  "qa",
  ".pytest_cache",
  "__pycache__",
  ".venv",
  "venv",
];

export interface DiscoveryOptions {
  /** Exact, case-sensitive extension matches (with leading dot). */
  includeExtensions?: readonly string[];
  /** Directory names skipped wherever they appear below the root. */
  excludedDirs?: readonly string[];
}

/** Plain code-unit ordering; locale-aware comparison is not stable across hosts. */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Enumerate eligible source files under `rootDir`.
 *
 * Returns absolute paths sorted by full path string; downstream chunk order
 * depends on this ordering. A symlink counts when it resolves to a regular
 * file inside the root; symlinked directories are not descended into.
 */
export async function discoverSourceFiles(
  rootDir: string,
  options: DiscoveryOptions = {},
): Promise<string[]> {
  const root = path.resolve(rootDir);

  let isDir = false;
  try {
    isDir = (await stat(root)).isDirectory();
  } catch {
    isDir = false;
  }
  if (!isDir) {
    throw new CorpusError(`repo root must be a directory: ${rootDir}`);
  }

  const included = new Set(options.includeExtensions ?? DEFAULT_INCLUDED_EXTENSIONS);
  const excluded = new Set(options.excludedDirs ?? DEFAULT_EXCLUDED_DIRS);
  const files: string[] = [];
  const realRoot = await realpath(root);

  async function linksToFileInRoot(linkAbs: string): Promise<boolean> {
    try {
      if (!(await stat(linkAbs)).isFile()) return false;
      const rel = path.relative(realRoot, await realpath(linkAbs));
      return rel !== "" && rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
    } catch {
      // dangling link
      return false;
    }
  }

  async function walk(dirAbs: string): Promise<void> {
    const entries = await readdir(dirAbs, { withFileTypes: true });
    for (const entry of entries) {
      const abs = path.join(dirAbs, entry.name);

      if (entry.isDirectory()) {
        if (excluded.has(entry.name)) continue;
        await walk(abs);
        continue;
      }

      if (!included.has(path.extname(entry.name))) continue;
      if (entry.isSymbolicLink()) {
        if (!(await linksToFileInRoot(abs))) continue;
      } else if (!entry.isFile()) {
        continue;
      }
      files.push(abs);
    }
  }

  await walk(root);
  files.sort(comparePaths);
  return files;
}
