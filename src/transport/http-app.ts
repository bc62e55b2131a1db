/**
 * @file transport/http-app
 * @description HTTP+SSE transport: `GET /sse` opens a session stream,
 * `POST /messages?session_id=<id>` carries JSON-RPC requests whose responses
 * go out on the stream and back in the POST body.
 */

import express, { type NextFunction, type Request, type Response } from "express";
import type { QueryBackend } from "../graph/types.js";
import type { ProtocolRouter } from "../protocol/router.js";
import { RPC_ERROR_CODES, rpcError, SESSION_ERROR_CODE } from "../protocol/messages.js";
import { logger } from "../utils/logger.js";
import type { SessionRegistry } from "./session-registry.js";
import { SSE_HEADERS, type EventStream } from "./sse-stream.js";

export const INVALID_SESSION_MESSAGE = "Invalid or expired session";

const CORS_HEADERS: Record<string, string> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, Authorization, Mcp-Session-Id",
  "Access-Control-Max-Age": "86400",
};

/** The slice of an HTTP response the handlers use. Express's `Response` fits. */
export interface Reply {
  status(code: number): this;
  json(body: unknown): unknown;
  setHeader(name: string, value: string): unknown;
  end(): unknown;
}

export interface StreamReply extends Reply, EventStream {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
}

export interface StreamRequest {
  on(event: "close", listener: () => void): unknown;
}

export interface MessageRequest {
  query: Record<string, unknown>;
  body: unknown;
}

export interface HttpAppOptions {
  sessions: SessionRegistry;
  router: ProtocolRouter;
  backend: QueryBackend;
  serverName: string;
  version: string;
  toolCount: () => number;
}

function sessionIdFrom(query: Record<string, unknown>): string | undefined {
  const raw = query.session_id ?? query.sessionId;
  return typeof raw === "string" && raw.length > 0 ? raw : undefined;
}

/** Route handlers, kept free of Express types so tests can drive them directly. */
export class SseEndpoints {
  constructor(private readonly options: HttpAppOptions) {}

  openStream(req: StreamRequest, res: StreamReply): void {
    const admitted = this.options.sessions.admit(res, () => {
      res.writeHead(200, SSE_HEADERS);
    });
    if (!admitted.ok) {
      if (admitted.reason === "stream_closed") return;
      res.setHeader("Retry-After", String(admitted.retryAfterSeconds));
      res.status(503).json({
        error: admitted.message,
        reason: admitted.reason,
        retryAfterSeconds: admitted.retryAfterSeconds,
      });
      return;
    }

    const { id } = admitted.session;
    req.on("close", () => {
      this.options.sessions.release(id, "client disconnected");
    });
  }

  async postMessage(req: MessageRequest, res: Reply): Promise<void> {
    const sessionId = sessionIdFrom(req.query);
    if (!sessionId || !this.options.sessions.touch(sessionId)) {
      logger.warn("[HTTP] Message for unknown session", { sessionId });
      res.status(400).json(rpcError(null, SESSION_ERROR_CODE, INVALID_SESSION_MESSAGE));
      return;
    }

    const response = await this.options.router.handle(req.body, sessionId);
    if (!response) {
      res.status(204).end();
      return;
    }

    const body = JSON.stringify(response);
    if (!this.options.sessions.send(sessionId, "message", body)) {
      logger.debug("[HTTP] Stream delivery skipped; replying on POST only", { sessionId });
    }
    res.status(200).json(response);
  }

  health(res: Reply): void {
    const stats = this.options.sessions.stats();
    const graphConnected = this.options.backend.isConnected();
    res.status(200).json({
      status: graphConnected ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      graphConnected,
      activeSessions: stats.activeSessions,
      maxSessions: stats.maxSessions,
      memoryPressure: stats.memoryPressure,
      toolsAvailable: this.options.toolCount(),
      version: this.options.version,
    });
  }

  info(res: Reply): void {
    res.status(200).json({
      name: this.options.serverName,
      version: this.options.version,
      transport: "sse",
      endpoints: {
        sse: "GET /sse",
        messages: "POST /messages?session_id=<id>",
        health: "GET /health",
      },
      toolsAvailable: this.options.toolCount(),
    });
  }
}

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

export function createHttpApp(options: HttpAppOptions): express.Express {
  const endpoints = new SseEndpoints(options);
  const app = express();

  app.use((req: Request, res: Response, next: NextFunction) => {
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });

  app.get("/sse", (req: Request, res: Response) => {
    endpoints.openStream(req, res);
  });

  app.post("/messages", express.json({ limit: "4mb" }), (req: Request, res: Response, next: NextFunction) => {
    endpoints.postMessage(req, res).catch(next);
  });

  app.get("/health", (_req: Request, res: Response) => {
    endpoints.health(res);
  });

  app.get("/", (_req: Request, res: Response) => {
    endpoints.info(res);
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isBodyParseError(error)) {
      res.status(400).json(rpcError(null, RPC_ERROR_CODES.parseError, "Parse error"));
      return;
    }
    logger.error("[HTTP] Request failed", error);
    res.status(500).json(rpcError(null, RPC_ERROR_CODES.internalError, "Internal server error"));
  });

  return app;
}
