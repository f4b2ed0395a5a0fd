/**
 * Error Types and Reporting
 *
 * Every failure evaldiff knows about is fatal: nothing is retried, the
 * command reports the error once and exits. Callers tell the kinds apart
 * by class (or by `code` once the error has been serialized).
 *
 * Usage:
 *   import { AlignmentError, reportError } from "./errors.js";
 *   reportError(err, { context: "compare", challenge: "entropy" });
 */

export type ErrorCode =
  | "ALIGNMENT"
  | "MALFORMED_RECORD"
  | "INVARIANT_VIOLATION"
  | "USAGE";

export class EvalDiffError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = "EvalDiffError";
  }
}

/**
 * The two logs cannot be compared position by position: one ended early,
 * or the records at some position have different targets.
 */
export class AlignmentError extends EvalDiffError {
  constructor(
    message: string,
    public readonly position: number
  ) {
    super(message, "ALIGNMENT");
    this.name = "AlignmentError";
  }
}

/** A log entry does not have the shape the active challenge needs. */
export class MalformedRecordError extends EvalDiffError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly line?: number
  ) {
    super(line === undefined ? `${source}: ${message}` : `${source}:${line}: ${message}`, "MALFORMED_RECORD");
    this.name = "MalformedRecordError";
  }
}

/** Internal logic reached a state that should not exist. */
export class InvariantViolation extends EvalDiffError {
  constructor(
    message: string,
    public readonly details: Record<string, unknown>
  ) {
    super(message, "INVARIANT_VIOLATION");
    this.name = "InvariantViolation";
  }
}

/** Bad options, or logs whose challenge cannot be worked out. */
export class UsageError extends EvalDiffError {
  constructor(message: string) {
    super(message, "USAGE");
    this.name = "UsageError";
  }
}

interface ErrorContext {
  /** Where the error occurred (e.g., "compare", "config-set") */
  context: string;
  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Report an error with structured context on stderr.
 * Non-throwing — safe to call in catch blocks.
 */
export function reportError(error: unknown, meta: ErrorContext): void {
  try {
    const err = error instanceof Error ? error : new Error(String(error));
    const extra =
      err instanceof InvariantViolation ? { details: err.details } : {};

    console.error(
      JSON.stringify({
        level: "error",
        timestamp: new Date().toISOString(),
        message: err.message,
        code: err instanceof EvalDiffError ? err.code : undefined,
        stack: err.stack?.split("\n").slice(0, 5).join("\n"),
        ...extra,
        ...meta,
      })
    );
  } catch {
    // Last resort — never throw from the error reporter
    console.error("Error reporter failed:", error);
  }
}
