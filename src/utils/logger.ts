/**
 * Structured logger for the memory graph server.
 *
 * In stdio mode stdout carries protocol frames, so every record goes to
 * stderr as one line of JSON. The active `sessionId` and `requestId` from
 * AsyncLocalStorage are attached automatically. The minimum level comes from
 * `MEMORY_MCP_LOG_LEVEL` (default "info").
 *
 * Usage:
 *   import { logger } from "../utils/logger.js";
 *   logger.info("[Sessions] Admitted", { sessionId, active });
 *   logger.error("[Neo4j] Query failed", error);
 */

import { MEMORY_MCP_LOG_LEVEL } from "../env.js";
import { getRequestContext, requestElapsedMs } from "../request-context.js";

// ── Level priority map ────────────────────────────────────────────────────────

type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Accepted context for logger methods: structured fields (preferred), an
 * `Error` (mapped to `{ cause, stack }`), a string (mapped to `{ detail }`),
 * or whatever a `catch` clause produced.
 */
export type LogContext = Record<string, unknown> | Error | string | unknown;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

const MIN_LEVEL_PRIORITY: number =
  LEVEL_PRIORITY[isLogLevel(MEMORY_MCP_LOG_LEVEL) ? MEMORY_MCP_LOG_LEVEL : "info"];

// ── Core emitter ──────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeContext(ctx: LogContext | undefined): Record<string, unknown> | undefined {
  if (ctx === undefined || ctx === null) return undefined;
  if (ctx instanceof Error) {
    return { cause: ctx.message, stack: ctx.stack };
  }
  if (typeof ctx === "string") {
    return ctx.length > 0 ? { detail: ctx } : undefined;
  }
  if (isRecord(ctx)) {
    return ctx;
  }
  return { value: String(ctx) };
}

/**
 * Writes one record to stderr. Serialization failures (circular context) are
 * reported as a minimal fallback record instead of propagating.
 */
function emit(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_PRIORITY[level] < MIN_LEVEL_PRIORITY) return;

  const { sessionId, requestId, method } = getRequestContext();
  const record: Record<string, unknown> = {
    level,
    msg: message,
    ts: new Date().toISOString(),
  };
  if (sessionId) record.sessionId = sessionId;
  if (requestId !== undefined) record.requestId = requestId;
  if (method) record.method = method;
  const elapsedMs = requestElapsedMs();
  if (elapsedMs !== undefined) record.elapsedMs = elapsedMs;

  const normalized = normalizeContext(context);
  if (normalized) Object.assign(record, normalized);

  let line: string;
  try {
    line = JSON.stringify(record);
  } catch (error) {
    line = JSON.stringify({
      level,
      msg: message,
      ts: record.ts,
      logError: error instanceof Error ? error.message : String(error),
    });
  }
  process.stderr.write(line + "\n");
}

// ── Public logger interface ───────────────────────────────────────────────────

export const logger = {
  /** Verbose diagnostics, only at MEMORY_MCP_LOG_LEVEL=debug. */
  debug(message: string, context?: LogContext): void {
    emit("debug", message, context);
  },

  info(message: string, context?: LogContext): void {
    emit("info", message, context);
  },

  /** Degraded operation: partial results, rejected connections, retries. */
  warn(message: string, context?: LogContext): void {
    emit("warn", message, context);
  },

  error(message: string, context?: LogContext): void {
    emit("error", message, context);
  },
};
