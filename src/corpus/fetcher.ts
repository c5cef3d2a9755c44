/**
 * Corpus fetcher: resolve a ref, materialize the working copy in the cache
 * and record a corpus manifest next to it.
 *
 * Cache layout: `{cacheDir}/{repo_slug}__{commit[:12]}/{repo/, manifest.json}`
 */

import { existsSync } from "node:fs";
import { mkdir, mkdtemp, rename, rm } from "node:fs/promises";
import path from "node:path";

import { errorMessage } from "../core/errors.js";
import { createLogger, type LogSink } from "../utils/logger.js";
import { TOOL_VERSION } from "../version.js";
import type { GitClient } from "./git.js";
import {
  createCorpusManifest,
  loadCorpusManifest,
  saveCorpusManifest,
  type CorpusManifest,
} from "./manifest.js";

const defaultLog = createLogger("fetcher");

export const CORPUS_MANIFEST_FILE = "manifest.json";
export const CORPUS_REPO_DIR = "repo";

/**
 * Cache-friendly name for a repository.
 *
 *   https://github.com/root-project/root.git → root-project__root
 *   /local/path/to/repo                      → repo
 */
export function repoSlug(repoUrl: string): string {
  let clean = repoUrl.replace(/\/+$/, "");
  if (clean.endsWith(".git")) clean = clean.slice(0, -4);

  let url: URL | null = null;
  try {
    url = new URL(clean);
  } catch {
    url = null;
  }

  if (url && url.host) {
    const parts = url.pathname.split("/").filter((p) => p.length > 0);
    if (parts.length === 0) return url.host;
    return parts.slice(-2).join("__");
  }
  return path.basename(clean);
}

export interface FetchCorpusParams {
  repoUrl: string;
  rootRef: string;
  cacheDir: string;
  forceRefresh?: boolean;
  /** Check the cached working copy's HEAD before trusting a cache hit. */
  verifyCache?: boolean;
  toolVersion?: string;
  git: GitClient;
  now?: () => Date;
  log?: LogSink;
}

export interface FetchCorpusResult {
  manifest: CorpusManifest;
  manifestPath: string;
  /** `{repo_slug}__{commit[:12]}`, the cache directory name. */
  corpusKey: string;
  cacheHit: boolean;
}

async function readCachedManifest(
  params: FetchCorpusParams,
  repoPath: string,
  manifestPath: string,
  log: LogSink,
): Promise<CorpusManifest | null> {
  if (params.forceRefresh) return null;
  if (!existsSync(repoPath) || !existsSync(manifestPath)) return null;

  let manifest: CorpusManifest;
  try {
    manifest = await loadCorpusManifest(manifestPath);
  } catch (err) {
    log.warn(`Ignoring unreadable cached manifest ${manifestPath}: ${errorMessage(err)}`);
    return null;
  }

  if (params.verifyCache) {
    let head: string;
    try {
      head = await params.git.revParseHead(repoPath);
    } catch (err) {
      log.warn(`Cannot read HEAD of cached corpus ${repoPath}: ${errorMessage(err)}; re-fetching`);
      return null;
    }
    if (head !== manifest.resolved_commit) {
      log.warn(
        `Cached corpus HEAD ${head.slice(0, 12)} does not match manifest commit ` +
          `${manifest.resolved_commit.slice(0, 12)}; re-fetching`,
      );
      return null;
    }
  }

  if (manifest.root_ref !== params.rootRef) {
    log.warn(
      `Cached corpus was fetched as '${manifest.root_ref}', not '${params.rootRef}'; ` +
        `reusing it since both resolve to ${manifest.resolved_commit.slice(0, 12)}`,
    );
  }
  return manifest;
}

/**
 * Fetch `rootRef` of `repoUrl` into the cache. Repeated calls for the same
 * resolved commit return the persisted manifest without touching the remote
 * copy again.
 */
export async function fetchCorpus(params: FetchCorpusParams): Promise<FetchCorpusResult> {
  const log = params.log ?? defaultLog;
  const now = params.now ?? (() => new Date());
  const cacheDir = path.resolve(params.cacheDir);

  const resolvedCommit = await params.git.resolveRef(params.repoUrl, params.rootRef);

  const corpusKey = `${repoSlug(params.repoUrl)}__${resolvedCommit.slice(0, 12)}`;
  const corpusDir = path.join(cacheDir, corpusKey);
  const repoPath = path.join(corpusDir, CORPUS_REPO_DIR);
  const manifestPath = path.join(corpusDir, CORPUS_MANIFEST_FILE);

  const cached = await readCachedManifest(params, repoPath, manifestPath, log);
  if (cached) {
    log.info(`Using cached corpus: ${corpusKey}`);
    return { manifest: cached, manifestPath, corpusKey, cacheHit: true };
  }

  // Temp dir on the cache's filesystem so the final rename is atomic
  await mkdir(cacheDir, { recursive: true });
  const tmpDir = await mkdtemp(path.join(cacheDir, ".fetch-"));
  try {
    const tmpRepo = path.join(tmpDir, CORPUS_REPO_DIR);
    await params.git.cloneAndCheckout(params.repoUrl, params.rootRef, tmpRepo);

    const actualCommit = await params.git.revParseHead(tmpRepo);
    if (actualCommit !== resolvedCommit) {
      log.warn(`Resolved commit mismatch: ${resolvedCommit} vs ${actualCommit}`);
    }

    log.info(`Installing corpus to ${repoPath}`);
    await mkdir(corpusDir, { recursive: true });
    await rm(repoPath, { recursive: true, force: true });
    await rename(tmpRepo, repoPath);
  } finally {
    await rm(tmpDir, { recursive: true, force: true });
  }

  const manifest = createCorpusManifest({
    repo_url: params.repoUrl,
    root_ref: params.rootRef,
    resolved_commit: resolvedCommit,
    local_path: repoPath,
    fetched_at: now().toISOString(),
    dirty: false,
    tool_version: params.toolVersion ?? TOOL_VERSION,
  });

  await saveCorpusManifest(manifestPath, manifest);
  log.info(`Manifest saved to ${manifestPath}`);

  return { manifest, manifestPath, corpusKey, cacheHit: false };
}
