/**
 * @file utils/errors
 * @description Typed failures raised by search engines and tool handlers.
 *
 * A `ToolError` never escapes as a protocol error: the registry turns it into
 * an `isError` tool result carrying `{ error, error_type, retryable }`.
 * Anything else that a handler throws is an internal error.
 */

export type ToolErrorType =
  | "invalid_input"
  | "embedding_failed"
  | "backend_unavailable"
  | "backend_query";

export class ToolError extends Error {
  readonly errorType: ToolErrorType;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    errorType: ToolErrorType,
    message: string,
    retryable: boolean,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ToolError";
    this.errorType = errorType;
    this.retryable = retryable;
    this.details = details;
  }

  toPayload(): Record<string, unknown> {
    return {
      error: this.message,
      error_type: this.errorType,
      retryable: this.retryable,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

/** Caller supplied a value outside the accepted domain. Never retried. */
export class InvalidInputError extends ToolError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super("invalid_input", message, false, field ? { field } : undefined);
    this.name = "InvalidInputError";
    this.field = field;
  }
}

export type BackendFailureKind = "unavailable" | "query";

/**
 * The graph backend failed. `unavailable` (connection refused, circuit open)
 * is retryable; `query` (syntax, constraint) is not.
 */
export class BackendError extends ToolError {
  readonly kind: BackendFailureKind;

  constructor(kind: BackendFailureKind, message: string) {
    super(
      kind === "unavailable" ? "backend_unavailable" : "backend_query",
      message,
      kind === "unavailable",
    );
    this.name = "BackendError";
    this.kind = kind;
  }
}

export class EmbeddingError extends ToolError {
  constructor(message: string, retryable = false) {
    super("embedding_failed", message, retryable);
    this.name = "EmbeddingError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ── Sub-step outcomes ─────────────────────────────────────────────────────────

/** Outcome of an optional pipeline step the caller may degrade around. */
export type StepResult<T> = { ok: true; value: T } | { ok: false; error: string };

export function stepOk<T>(value: T): StepResult<T> {
  return { ok: true, value };
}

export function stepFailed(error: string): StepResult<never> {
  return { ok: false, error };
}
