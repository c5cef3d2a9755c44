import type { z, ZodError, ZodTypeAny } from "zod";

import { ValidationError } from "./errors.js";

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: ValidationError };

export function formatZodIssues(error: ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Run a zod schema and fold its failure into a `ValidationError`.
 * Successful values are frozen: validated entities are never mutated.
 */
export function validateWith<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string,
): ValidationResult<Readonly<z.output<S>>> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    return {
      success: false,
      error: new ValidationError(`Invalid ${label}: ${issues.join("; ")}`, issues),
    };
  }
  return { success: true, data: Object.freeze(result.data) };
}

export function unwrap<T>(result: ValidationResult<T>): T {
  if (!result.success) throw result.error;
  return result.data;
}
