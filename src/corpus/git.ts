/**
 * Thin git adapter. Everything that talks to a remote or a working copy goes
 * through `GitClient`, so the fetcher can run against an in-process fake.
 */

import { execFile } from "node:child_process";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";

import { GitOperationError, InvalidRefError } from "../core/errors.js";
import type { GitTimeouts } from "../config/schema.js";
import { createLogger, type LogSink } from "../utils/logger.js";

const defaultLog = createLogger("git");

export interface GitClient {
  /** Resolve a branch or tag of a remote to its commit SHA. */
  resolveRef(repoUrl: string, ref: string): Promise<string>;
  /** Clone into `targetPath` (which must not exist) and check out `ref`. */
  cloneAndCheckout(repoUrl: string, ref: string, targetPath: string): Promise<void>;
  revParseHead(repoPath: string): Promise<string>;
}

export const DEFAULT_GIT_TIMEOUTS: GitTimeouts = {
  resolveMs: 30_000,
  cloneMs: 300_000,
  checkoutMs: 60_000,
};

interface GitRun {
  ok: boolean;
  stdout: string;
  stderr: string;
}

function runGit(args: string[], timeoutMs: number, what: string): Promise<GitRun> {
  return new Promise((resolve, reject) => {
    execFile(
      "git",
      args,
      { timeout: timeoutMs, maxBuffer: 20 * 1024 * 1024 },
      (err, stdout, stderr) => {
        if (!err) return resolve({ ok: true, stdout, stderr });
        if (err.killed) {
          return reject(new GitOperationError(`git ${what} timed out after ${timeoutMs}ms`, err));
        }
        // A string code (ENOENT, EACCES) means git never ran
        if (typeof err.code === "string") {
          return reject(new GitOperationError(`Failed to run git ${what}: ${err.message}`, err));
        }
        resolve({ ok: false, stdout, stderr });
      },
    );
  });
}

/**
 * Pick the commit for `ref` out of `git ls-remote` output.
 *
 * Prefers `refs/heads/<ref>`, then the peeled commit of `refs/tags/<ref>`
 * (`^{}`), then the tag object itself, then the first listed line.
 */
export function parseLsRemote(output: string, ref: string): string | null {
  const entries = output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      const [sha = "", name = ""] = line.split(/\s+/);
      return { sha, name };
    })
    .filter((e) => e.sha.length > 0);

  if (entries.length === 0) return null;

  const preferred = [`refs/heads/${ref}`, `refs/tags/${ref}^{}`, `refs/tags/${ref}`];
  for (const name of preferred) {
    const hit = entries.find((e) => e.name === name);
    if (hit) return hit.sha;
  }
  return entries[0]?.sha ?? null;
}

export function createGitClient(
  options: { timeouts?: Partial<GitTimeouts>; log?: LogSink } = {},
): GitClient {
  const timeouts: GitTimeouts = { ...DEFAULT_GIT_TIMEOUTS, ...options.timeouts };
  const log = options.log ?? defaultLog;

  return {
    async resolveRef(repoUrl, ref) {
      const run = await runGit(
        ["ls-remote", "--heads", "--tags", repoUrl, ref],
        timeouts.resolveMs,
        "ls-remote",
      );
      if (!run.ok) {
        throw new InvalidRefError(`Cannot resolve ref '${ref}' in ${repoUrl}: ${run.stderr.trim()}`);
      }
      const sha = parseLsRemote(run.stdout, ref);
      if (!sha) {
        throw new InvalidRefError(`Reference '${ref}' not found in ${repoUrl}`);
      }
      log.info(`Resolved ${ref} → ${sha.slice(0, 12)}`);
      return sha;
    },

    async cloneAndCheckout(repoUrl, ref, targetPath) {
      await mkdir(dirname(targetPath), { recursive: true });

      log.info(`Cloning ${repoUrl} to ${targetPath}`);
      const clone = await runGit(["clone", "--quiet", repoUrl, targetPath], timeouts.cloneMs, "clone");
      if (!clone.ok) {
        throw new GitOperationError(`Failed to clone ${repoUrl}: ${clone.stderr.trim()}`);
      }

      log.info(`Checking out ${ref}`);
      const checkout = await runGit(
        ["-C", targetPath, "checkout", "--quiet", ref],
        timeouts.checkoutMs,
        "checkout",
      );
      if (!checkout.ok) {
        throw new InvalidRefError(`Cannot checkout ref '${ref}': ${checkout.stderr.trim()}`);
      }
    },

    async revParseHead(repoPath) {
      const run = await runGit(["-C", repoPath, "rev-parse", "HEAD"], timeouts.resolveMs, "rev-parse");
      if (!run.ok) {
        throw new GitOperationError(`Failed to get commit SHA: ${run.stderr.trim()}`);
      }
      return run.stdout.trim();
    },
  };
}
