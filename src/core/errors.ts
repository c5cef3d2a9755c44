/**
 * Error taxonomy and process exit codes.
 */

export type CorpusIndexErrorCode =
  | "INVALID_REF"
  | "GIT_OPERATION_FAILED"
  | "CORPUS_ERROR"
  | "VALIDATION_FAILED"
  | "CONFIG_ERROR";

export class CorpusIndexError extends Error {
  constructor(
    message: string,
    public code: CorpusIndexErrorCode,
    public details?: unknown,
  ) {
    super(message);
    this.name = "CorpusIndexError";
  }
}

/** The requested ref does not exist or cannot be resolved. */
export class InvalidRefError extends CorpusIndexError {
  constructor(message: string, details?: unknown) {
    super(message, "INVALID_REF", details);
    this.name = "InvalidRefError";
  }
}

/** A git invocation failed, timed out or could not be spawned. */
export class GitOperationError extends CorpusIndexError {
  constructor(message: string, details?: unknown) {
    super(message, "GIT_OPERATION_FAILED", details);
    this.name = "GitOperationError";
  }
}

export class CorpusError extends CorpusIndexError {
  constructor(message: string, details?: unknown) {
    super(message, "CORPUS_ERROR", details);
    this.name = "CorpusError";
  }
}

export class ValidationError extends CorpusIndexError {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(message, "VALIDATION_FAILED", issues);
    this.name = "ValidationError";
  }
}

export class ConfigError extends CorpusIndexError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIG_ERROR", details);
    this.name = "ConfigError";
  }
}

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
  INVALID_REF: 3,
  CONFIG_ERROR: 7,
  FTS_UNAVAILABLE: 8,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForError(err: unknown): ExitCode {
  if (err instanceof InvalidRefError) return EXIT_CODES.INVALID_REF;
  if (err instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  return EXIT_CODES.FAILURE;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
