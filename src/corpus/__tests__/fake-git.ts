import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { GitOperationError, InvalidRefError } from "../../core/errors.js";
import type { GitClient } from "../git.js";

export const FAKE_HEAD_FILE = join(".git", "FAKE_HEAD");

/**
 * In-process stand-in for git: refs map to commits, and a "clone" writes the
 * given files plus a HEAD marker that `revParseHead` reads back.
 */
export function createFakeGit(opts: {
  refs: Record<string, string>;
  files?: Record<string, string>;
  failClone?: boolean;
}) {
  const calls = { resolveRef: 0, cloneAndCheckout: 0, revParseHead: 0 };

  const git: GitClient = {
    async resolveRef(repoUrl, ref) {
      calls.resolveRef += 1;
      const sha = opts.refs[ref];
      if (!sha) throw new InvalidRefError(`Reference '${ref}' not found in ${repoUrl}`);
      return sha;
    },

    async cloneAndCheckout(repoUrl, ref, targetPath) {
      calls.cloneAndCheckout += 1;
      await mkdir(join(targetPath, ".git"), { recursive: true });
      if (opts.failClone) throw new GitOperationError(`Failed to clone ${repoUrl}: boom`);
      const sha = opts.refs[ref];
      if (!sha) throw new InvalidRefError(`Cannot checkout ref '${ref}'`);
      for (const [rel, content] of Object.entries(opts.files ?? {})) {
        const abs = join(targetPath, ...rel.split("/"));
        await mkdir(join(abs, ".."), { recursive: true });
        await writeFile(abs, content, "utf-8");
      }
      await writeFile(join(targetPath, FAKE_HEAD_FILE), sha, "utf-8");
    },

    async revParseHead(repoPath) {
      calls.revParseHead += 1;
      return (await readFile(join(repoPath, FAKE_HEAD_FILE), "utf-8")).trim();
    },
  };

  return { git, calls };
}
