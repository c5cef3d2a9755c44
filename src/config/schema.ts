/**
 * Configuration schema (Zod)
 */

import { z } from "zod";

import { DEFAULT_OVERLAP_LINES, DEFAULT_WINDOW_LINES } from "../index/chunker.js";
import { DEFAULT_EXCLUDED_DIRS, DEFAULT_INCLUDED_EXTENSIONS } from "../index/scanner.js";

export const DEFAULT_REPO_URL = "https://github.com/root-project/root.git";

export const pathsSchema = z
  .object({
    /** Parent of `{repo_slug}__{commit12}/` corpus directories. */
    cacheDir: z.string().min(1).default("data/raw/corpora"),
    chunksDir: z.string().min(1).default("data/processed/chunks"),
    indexDir: z.string().min(1).default("data/indexes"),
  })
  .default({});

export const chunkingSchema = z
  .object({
    windowLines: z.number().int().min(1).default(DEFAULT_WINDOW_LINES),
    overlapLines: z.number().int().min(0).default(DEFAULT_OVERLAP_LINES),
  })
  .default({});

export const discoverySchema = z
  .object({
    includeExtensions: z
      .array(z.string().regex(/^\./, "must start with '.'"))
      .default([...DEFAULT_INCLUDED_EXTENSIONS]),
    excludedDirs: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDED_DIRS]),
  })
  .default({});

export const fetchSchema = z
  .object({
    // Compare the cached working copy's HEAD with its manifest before reuse
    verifyCache: z.boolean().default(false),
    timeouts: z
      .object({
        resolveMs: z.number().int().positive().default(30_000),
        cloneMs: z.number().int().positive().default(300_000),
        checkoutMs: z.number().int().positive().default(60_000),
      })
      .default({}),
  })
  .default({});

export const configSchema = z.object({
  repoUrl: z.string().min(1).default(DEFAULT_REPO_URL),
  paths: pathsSchema,
  chunking: chunkingSchema,
  discovery: discoverySchema,
  fetch: fetchSchema,
});

export type Config = z.infer<typeof configSchema>;
export type PathsConfig = z.infer<typeof pathsSchema>;
export type FetchConfig = z.infer<typeof fetchSchema>;
export type GitTimeouts = FetchConfig["timeouts"];
