import { describe, expect, it } from "vitest";

import {
  ConfigError,
  CorpusError,
  CorpusIndexError,
  errorMessage,
  EXIT_CODES,
  exitCodeForError,
  GitOperationError,
  hasErrorCode,
  InvalidRefError,
  ValidationError,
} from "../errors.js";

describe("errors", () => {
  it("tags each subclass with its code", () => {
    expect(new InvalidRefError("x").code).toBe("INVALID_REF");
    expect(new GitOperationError("x").code).toBe("GIT_OPERATION_FAILED");
    expect(new CorpusError("x").code).toBe("CORPUS_ERROR");
    expect(new ConfigError("x").code).toBe("CONFIG_ERROR");

    const err = new ValidationError("bad", ["a: b"]);
    expect(err.code).toBe("VALIDATION_FAILED");
    expect(err.issues).toEqual(["a: b"]);
    expect(err).toBeInstanceOf(CorpusIndexError);
    expect(err.name).toBe("ValidationError");
  });

  it("maps errors to exit codes", () => {
    expect(exitCodeForError(new InvalidRefError("x"))).toBe(3);
    expect(exitCodeForError(new ConfigError("x"))).toBe(7);
    expect(exitCodeForError(new GitOperationError("x"))).toBe(EXIT_CODES.FAILURE);
    expect(exitCodeForError("nope")).toBe(1);
  });

  it("extracts messages from anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });

  it("matches node error codes", () => {
    const err = Object.assign(new Error("missing"), { code: "ENOENT" });
    expect(hasErrorCode(err, "ENOENT")).toBe(true);
    expect(hasErrorCode(err, "EISDIR")).toBe(false);
    expect(hasErrorCode({ code: "ENOENT" }, "ENOENT")).toBe(false);
  });
});
