/**
 * Config loader with environment variable expansion
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, isAbsolute, resolve } from "node:path";
import { parse } from "yaml";

import { ConfigError, errorMessage, hasErrorCode } from "../core/errors.js";
import { formatZodIssues } from "../core/validation.js";
import { createLogger } from "../utils/logger.js";
import { expandEnvVarsDeep } from "./expand-env.js";
import { configSchema, type Config, type PathsConfig } from "./schema.js";

const log = createLogger("config");

/** Expand a leading `~` ("~" or "~/x") to the home directory. */
export function expandHome(path: string): string {
  const home = process.env.HOME ?? process.env.USERPROFILE ?? homedir();
  if (path === "~") return home;
  if (path.startsWith("~/")) return resolve(home, path.slice(2));
  return path;
}

function resolvePaths(paths: PathsConfig, baseDir: string): PathsConfig {
  const at = (p: string): string => {
    const expanded = expandHome(p);
    return isAbsolute(expanded) ? expanded : resolve(baseDir, expanded);
  };
  return {
    cacheDir: at(paths.cacheDir),
    chunksDir: at(paths.chunksDir),
    indexDir: at(paths.indexDir),
  };
}

function parseConfig(raw: unknown, baseDir: string): Config {
  // An empty document parses to null
  const expanded = expandEnvVarsDeep(raw ?? {}, process.env);
  const result = configSchema.safeParse(expanded);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigError(
      `Config validation failed:\n${issues.map((line) => `- ${line}`).join("\n")}`,
      issues,
    );
  }
  return { ...result.data, paths: resolvePaths(result.data.paths, baseDir) };
}

/** Schema defaults with `paths.*` resolved against `baseDir`. */
export function defaultConfig(baseDir: string = process.cwd()): Config {
  return parseConfig({}, baseDir);
}

/**
 * Load a YAML (or JSON) config file. Without a path, returns the defaults
 * resolved against the working directory.
 */
export async function loadConfig(path?: string): Promise<Config> {
  if (!path) return defaultConfig();

  const expandedPath = resolve(expandHome(path));
  log.info(`Loading config from ${expandedPath}`);

  let content: string;
  try {
    content = await readFile(expandedPath, "utf-8");
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      throw new ConfigError(`Config file not found: ${expandedPath}`);
    }
    throw new ConfigError(`Cannot read config file ${expandedPath}: ${errorMessage(err)}`, err);
  }

  let raw: unknown;
  try {
    raw = parse(content);
  } catch (err) {
    throw new ConfigError(`Config file ${expandedPath} is not valid YAML: ${errorMessage(err)}`, err);
  }

  const config = parseConfig(raw, dirname(expandedPath));
  log.debug(`Resolved paths: ${JSON.stringify(config.paths)}`);
  log.info("Config loaded successfully");
  return config;
}
