/**
 * @sip-provenance/resolver: Resolution errors.
 *
 * A single error class covers every fatal condition of a transformation.
 * There is no local recovery: the first error aborts the whole SIP.
 */

import type { ZodError } from "zod";

export type ResolutionErrorCode =
  | "AGENT_NOT_FOUND"
  | "MISSING_MATCH"
  | "MULTIPLE_MATCHES"
  | "UNKNOWN_VOCABULARY"
  | "MISSING_FIELD"
  | "INVALID_IDENTIFIER"
  | "INVALID_DATETIME"
  | "DUPLICATE_IDENTIFIER"
  | "INVALID_RECORD";

/**
 * Structured error from the resolver.
 * Always thrown, never returned.
 */
export class ResolutionError extends Error {
  public readonly code: ResolutionErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: ResolutionErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "ResolutionError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Return the single element of `items`.
 *
 * @param what - Human-readable description used in the error message
 * @throws {ResolutionError} MISSING_MATCH on zero, MULTIPLE_MATCHES on several
 */
export function exactlyOne<T>(items: readonly T[], what: string): T {
  const [first, ...rest] = items;
  if (first === undefined) {
    throw new ResolutionError("MISSING_MATCH", `Expected exactly one ${what}, found none`);
  }
  if (rest.length > 0) {
    throw new ResolutionError(
      "MULTIPLE_MATCHES",
      `Expected exactly one ${what}, found ${items.length}`,
    );
  }
  return first;
}

/**
 * Return the single element of `items`, or null when empty.
 *
 * @throws {ResolutionError} MULTIPLE_MATCHES on several
 */
export function atMostOne<T>(items: readonly T[], what: string): T | null {
  if (items.length > 1) {
    throw new ResolutionError(
      "MULTIPLE_MATCHES",
      `Expected at most one ${what}, found ${items.length}`,
    );
  }
  return items[0] ?? null;
}

/**
 * Wrap a Zod validation failure on input records.
 */
export function invalidRecord(what: string, error: ZodError): ResolutionError {
  return new ResolutionError("INVALID_RECORD", `Invalid ${what}`, {
    issues: formatZodIssues(error),
  });
}

function formatZodIssues(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
