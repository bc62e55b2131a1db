import * as z from "zod";
import { describe, expect, it } from "vitest";
import { ProtocolRouter } from "../protocol/router.js";
import { FakeBackend } from "../testing/fake-backend.js";
import { FakeStream } from "../testing/fake-stream.js";
import { createTestToolContext } from "../testing/tool-context.js";
import { ToolRegistry } from "../tools/registry.js";
import { INVALID_SESSION_MESSAGE, SseEndpoints, type StreamReply } from "./http-app.js";
import { SessionRegistry } from "./session-registry.js";

class FakeReply extends FakeStream implements StreamReply {
  statusCode = 200;
  body: unknown = undefined;
  readonly headers: Record<string, string> = {};
  headWritten = false;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }

  setHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  writeHead(statusCode: number, headers: Record<string, string>): this {
    this.statusCode = statusCode;
    Object.assign(this.headers, headers);
    this.headWritten = true;
    return this;
  }
}

class FakeRequest {
  private closeListener: (() => void) | null = null;

  on(_event: "close", listener: () => void): this {
    this.closeListener = listener;
    return this;
  }

  close(): void {
    this.closeListener?.();
  }
}

function createEndpoints(maxSessions = 2) {
  let ids = 0;
  const sessions = new SessionRegistry({
    maxSessions,
    sessionTimeoutMs: 60_000,
    sweepIntervalMs: 1_000,
    memoryLimitMb: 1_024,
    memoryCheckIntervalMs: 1_000,
    keepaliveIntervalMs: 1_000,
    retryAfterSeconds: 30,
    sampleMemoryMb: () => 64,
    generateId: () => `s${++ids}`,
  });
  const backend = new FakeBackend();
  const registry = new ToolRegistry([
    {
      name: "echo",
      category: "graph",
      description: "Echo",
      inputShape: { text: z.string() },
      async impl(args) {
        return { echoed: args.text };
      },
    },
  ]);
  const router = new ProtocolRouter({
    registry,
    context: createTestToolContext({ backend }),
    serverInfo: { name: "memory-graph-mcp", version: "1.0.0" },
  });
  const endpoints = new SseEndpoints({
    sessions,
    router,
    backend,
    serverName: "memory-graph-mcp",
    version: "1.0.0",
    toolCount: () => registry.size,
  });
  return { endpoints, sessions, backend };
}

describe("SseEndpoints", () => {
  it("opens a stream with SSE headers and the endpoint event", () => {
    const { endpoints } = createEndpoints();
    const reply = new FakeReply();

    endpoints.openStream(new FakeRequest(), reply);

    expect(reply.headWritten).toBe(true);
    expect(reply.headers["Content-Type"]).toBe("text/event-stream");
    expect(reply.frames).toEqual(["event: endpoint\ndata: /messages?session_id=s1\n\n"]);
  });

  it("answers 503 with Retry-After when at capacity", () => {
    const { endpoints } = createEndpoints(1);
    endpoints.openStream(new FakeRequest(), new FakeReply());
    const rejected = new FakeReply();

    endpoints.openStream(new FakeRequest(), rejected);

    expect(rejected.headWritten).toBe(false);
    expect(rejected.statusCode).toBe(503);
    expect(rejected.headers["Retry-After"]).toBe("30");
    expect(rejected.body).toEqual({
      error: "Server at capacity (1 sessions)",
      reason: "capacity",
      retryAfterSeconds: 30,
    });
  });

  it("releases the session when the client disconnects", () => {
    const { endpoints, sessions } = createEndpoints();
    const request = new FakeRequest();
    endpoints.openStream(request, new FakeReply());

    request.close();

    expect(sessions.lookup("s1")).toBeUndefined();
  });

  it("delivers a response on the stream and in the POST body", async () => {
    const { endpoints } = createEndpoints();
    const stream = new FakeReply();
    endpoints.openStream(new FakeRequest(), stream);
    const reply = new FakeReply();
    const message = { jsonrpc: "2.0", id: 1, method: "ping" };

    await endpoints.postMessage({ query: { session_id: "s1" }, body: message }, reply);

    const expected = { jsonrpc: "2.0", id: 1, result: {} };
    expect(reply.statusCode).toBe(200);
    expect(reply.body).toEqual(expected);
    expect(stream.frames.at(-1)).toBe(`event: message\ndata: ${JSON.stringify(expected)}\n\n`);
  });

  it("accepts the camelCase sessionId parameter", async () => {
    const { endpoints } = createEndpoints();
    endpoints.openStream(new FakeRequest(), new FakeReply());
    const reply = new FakeReply();

    await endpoints.postMessage(
      { query: { sessionId: "s1" }, body: { jsonrpc: "2.0", id: 2, method: "ping" } },
      reply,
    );

    expect(reply.statusCode).toBe(200);
  });

  it("replies 204 with no body to notifications", async () => {
    const { endpoints } = createEndpoints();
    const stream = new FakeReply();
    endpoints.openStream(new FakeRequest(), stream);
    const reply = new FakeReply();

    await endpoints.postMessage(
      { query: { session_id: "s1" }, body: { jsonrpc: "2.0", method: "notifications/initialized" } },
      reply,
    );

    expect(reply.statusCode).toBe(204);
    expect(reply.body).toBeUndefined();
    expect(reply.endCalls).toBe(1);
    expect(stream.frames).toHaveLength(1);
  });

  it("rejects messages for a released session", async () => {
    const { endpoints, sessions } = createEndpoints();
    endpoints.openStream(new FakeRequest(), new FakeReply());
    sessions.release("s1", "client disconnected");
    const reply = new FakeReply();

    await endpoints.postMessage(
      { query: { session_id: "s1" }, body: { jsonrpc: "2.0", id: 3, method: "ping" } },
      reply,
    );

    expect(reply.statusCode).toBe(400);
    expect(reply.body).toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32000, message: INVALID_SESSION_MESSAGE },
    });
  });

  it("still answers the POST when the stream write fails", async () => {
    const { endpoints, sessions } = createEndpoints();
    const stream = new FakeReply();
    endpoints.openStream(new FakeRequest(), stream);
    stream.throwOnWrite = true;
    const reply = new FakeReply();

    await endpoints.postMessage(
      { query: { session_id: "s1" }, body: { jsonrpc: "2.0", id: 4, method: "ping" } },
      reply,
    );

    expect(reply.body).toEqual({ jsonrpc: "2.0", id: 4, result: {} });
    expect(sessions.lookup("s1")).toBeUndefined();
  });

  it("reports health", () => {
    const { endpoints, backend } = createEndpoints();
    backend.connected = false;
    const reply = new FakeReply();

    endpoints.health(reply);

    expect(reply.body).toMatchObject({
      status: "degraded",
      graphConnected: false,
      activeSessions: 0,
      maxSessions: 2,
      memoryPressure: false,
      toolsAvailable: 1,
      version: "1.0.0",
    });
  });
});
