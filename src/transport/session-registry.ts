/**
 * @file transport/session-registry
 * @description Owns every live SSE session: admission under the session
 * ceiling and memory limit, frame delivery, idle sweep, keepalive and
 * shutdown.
 * @remarks All mutations run synchronously on the event loop; no `await`
 * separates the capacity check from the insertion in `admit()`.
 */

import { randomUUID } from "node:crypto";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { formatSseEvent, isWritable, KEEPALIVE_FRAME, type EventStream } from "./sse-stream.js";

export type SessionState = "connecting" | "open" | "active" | "closing" | "closed";

export interface Session {
  readonly id: string;
  readonly stream: EventStream;
  readonly createdAt: number;
  lastActivity: number;
  state: SessionState;
}

export type RejectionReason = "capacity" | "memory" | "stream_closed";

export type AdmitResult =
  | { ok: true; session: Session; endpoint: string }
  | { ok: false; reason: RejectionReason; message: string; retryAfterSeconds: number };

export interface SessionRegistryOptions {
  maxSessions: number;
  sessionTimeoutMs: number;
  sweepIntervalMs: number;
  memoryLimitMb: number;
  memoryCheckIntervalMs: number;
  keepaliveIntervalMs: number;
  retryAfterSeconds: number;
  /** Path clients POST to; the session id is appended as `session_id`. */
  messagesPath?: string;
  now?: () => number;
  /** Resident set size in MB. */
  sampleMemoryMb?: () => number;
  generateId?: () => string;
}

export interface SessionRegistryStats {
  activeSessions: number;
  maxSessions: number;
  memoryPressure: boolean;
  lastMemorySampleMb: number | null;
}

function residentSetSizeMb(): number {
  return process.memoryUsage().rss / (1024 * 1024);
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly timers: NodeJS.Timeout[] = [];
  private readonly now: () => number;
  private readonly sampleMemoryMb: () => number;
  private readonly generateId: () => string;
  private lastMemorySampleMb: number | null = null;
  private memoryPressure = false;

  constructor(private readonly options: SessionRegistryOptions) {
    this.now = options.now ?? Date.now;
    this.sampleMemoryMb = options.sampleMemoryMb ?? residentSetSizeMb;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * @param beforeFirstFrame runs once admission is granted, before the
   * endpoint event is written (the HTTP layer sends its headers here)
   */
  admit(stream: EventStream, beforeFirstFrame?: () => void): AdmitResult {
    if (this.sessions.size >= this.options.maxSessions) {
      logger.warn("[Sessions] Rejected: at capacity", {
        active: this.sessions.size,
        maxSessions: this.options.maxSessions,
      });
      return {
        ok: false,
        reason: "capacity",
        message: `Server at capacity (${this.options.maxSessions} sessions)`,
        retryAfterSeconds: this.options.retryAfterSeconds,
      };
    }

    if (this.memoryPressure) {
      const sampled = Math.round(this.lastMemorySampleMb ?? 0);
      logger.warn("[Sessions] Rejected: memory pressure", {
        sampledMb: sampled,
        limitMb: this.options.memoryLimitMb,
      });
      return {
        ok: false,
        reason: "memory",
        message: `Server under memory pressure (${sampled} MB of ${this.options.memoryLimitMb} MB)`,
        retryAfterSeconds: this.options.retryAfterSeconds,
      };
    }

    beforeFirstFrame?.();
    const createdAt = this.now();
    const session: Session = {
      id: this.generateId(),
      stream,
      createdAt,
      lastActivity: createdAt,
      state: "connecting",
    };
    this.sessions.set(session.id, session);

    const endpoint = `${this.options.messagesPath ?? "/messages"}?session_id=${session.id}`;
    if (!this.write(session, formatSseEvent("endpoint", endpoint))) {
      return {
        ok: false,
        reason: "stream_closed",
        message: "Stream closed before the session opened",
        retryAfterSeconds: this.options.retryAfterSeconds,
      };
    }
    session.state = "open";

    logger.info("[Sessions] Admitted", {
      sessionId: session.id,
      active: this.sessions.size,
    });
    return { ok: true, session, endpoint };
  }

  lookup(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  touch(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    session.lastActivity = this.now();
    if (session.state === "open") session.state = "active";
    return true;
  }

  /**
   * Writes one SSE event to the session's stream.
   * @returns false when the session is unknown or the write failed
   */
  send(id: string, event: string, payload: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    return this.write(session, formatSseEvent(event, payload));
  }

  /** Idempotent. */
  release(id: string, reason: string): void {
    const session = this.sessions.get(id);
    if (!session) return;

    session.state = "closing";
    this.sessions.delete(id);
    if (isWritable(session.stream)) {
      try {
        session.stream.end();
      } catch (error) {
        logger.warn("[Sessions] Failed to end stream", { sessionId: id, cause: errorMessage(error) });
      }
    }
    session.state = "closed";

    logger.info("[Sessions] Released", { sessionId: id, reason, active: this.sessions.size });
  }

  start(): void {
    if (this.timers.length > 0) return;
    this.checkMemory();

    this.timers.push(
      setInterval(() => this.sweep(), this.options.sweepIntervalMs),
      setInterval(() => this.checkMemory(), this.options.memoryCheckIntervalMs),
      setInterval(() => this.keepalive(), this.options.keepaliveIntervalMs),
    );
    for (const timer of this.timers) timer.unref();
  }

  stop(): void {
    for (const timer of this.timers) clearInterval(timer);
    this.timers.length = 0;
    for (const id of [...this.sessions.keys()]) {
      this.release(id, "shutdown");
    }
  }

  /** Releases sessions idle for longer than the timeout. */
  sweep(): number {
    const cutoff = this.now() - this.options.sessionTimeoutMs;
    let released = 0;
    for (const session of [...this.sessions.values()]) {
      if (session.lastActivity >= cutoff) continue;
      try {
        this.release(session.id, "idle timeout");
        released += 1;
      } catch (error) {
        logger.error("[Sessions] Sweep failed to release session", {
          sessionId: session.id,
          cause: errorMessage(error),
        });
      }
    }
    return released;
  }

  checkMemory(): void {
    let sampled: number;
    try {
      sampled = this.sampleMemoryMb();
    } catch (error) {
      logger.warn("[Sessions] Memory sample failed", { cause: errorMessage(error) });
      return;
    }

    const pressure = sampled > this.options.memoryLimitMb;
    if (pressure !== this.memoryPressure) {
      logger.warn(pressure ? "[Sessions] Memory pressure detected" : "[Sessions] Memory pressure cleared", {
        sampledMb: Math.round(sampled),
        limitMb: this.options.memoryLimitMb,
      });
    }
    this.lastMemorySampleMb = sampled;
    this.memoryPressure = pressure;
  }

  keepalive(): void {
    for (const session of [...this.sessions.values()]) {
      this.write(session, KEEPALIVE_FRAME);
    }
  }

  stats(): SessionRegistryStats {
    return {
      activeSessions: this.sessions.size,
      maxSessions: this.options.maxSessions,
      memoryPressure: this.memoryPressure,
      lastMemorySampleMb: this.lastMemorySampleMb,
    };
  }

  /** Releases the session on any write failure. */
  private write(session: Session, frame: string): boolean {
    if (!isWritable(session.stream)) {
      this.release(session.id, "stream closed");
      return false;
    }
    try {
      session.stream.write(frame, (error) => {
        if (error) this.release(session.id, `write failed: ${error.message}`);
      });
      return true;
    } catch (error) {
      this.release(session.id, `write failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
