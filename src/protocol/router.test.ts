import * as z from "zod";
import { describe, expect, it } from "vitest";
import { getRequestContext } from "../request-context.js";
import { createTestToolContext } from "../testing/tool-context.js";
import { ToolRegistry } from "../tools/registry.js";
import type { ToolDefinition } from "../tools/types.js";
import { InvalidInputError } from "../utils/errors.js";
import { FALLBACK_PROTOCOL_VERSION, negotiateProtocolVersion, ProtocolRouter } from "./router.js";

const seenSessions: Array<string | undefined> = [];

const lookupTool: ToolDefinition = {
  name: "lookup",
  category: "memory",
  description: "Look up a value",
  inputShape: { key: z.string() },
  async impl(args) {
    seenSessions.push(getRequestContext().sessionId);
    if (args.key === "bad") throw new InvalidInputError("key must not be 'bad'", "key");
    if (args.key === "crash") throw new Error("driver exploded");
    return { value: `value-of-${String(args.key)}` };
  },
};

function createRouter(): ProtocolRouter {
  return new ProtocolRouter({
    registry: new ToolRegistry([lookupTool]),
    context: createTestToolContext(),
    serverInfo: { name: "memory-graph-mcp", version: "1.0.0" },
    instructions: "Test instructions",
  });
}

describe("negotiateProtocolVersion", () => {
  it("echoes a supported version and falls back otherwise", () => {
    expect(negotiateProtocolVersion("2024-11-05")).toBe("2024-11-05");
    expect(negotiateProtocolVersion("1999-01-01")).toBe(FALLBACK_PROTOCOL_VERSION);
    expect(negotiateProtocolVersion(undefined)).toBe(FALLBACK_PROTOCOL_VERSION);
  });
});

describe("ProtocolRouter", () => {
  it("answers initialize with capabilities and server info", async () => {
    const response = await createRouter().handle({
      jsonrpc: "2.0",
      id: 1,
      method: "initialize",
      params: { protocolVersion: "2024-11-05", capabilities: {} },
    });

    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 1,
      result: {
        protocolVersion: "2024-11-05",
        capabilities: { tools: { listChanged: false } },
        serverInfo: { name: "memory-graph-mcp", version: "1.0.0", toolCount: 1 },
        instructions: "Test instructions",
      },
    });
  });

  it("answers ping with an empty result", async () => {
    const response = await createRouter().handle({ jsonrpc: "2.0", id: "p1", method: "ping" });
    expect(response).toEqual({ jsonrpc: "2.0", id: "p1", result: {} });
  });

  it("lists registered tools", async () => {
    const response = await createRouter().handle({ jsonrpc: "2.0", id: 2, method: "tools/list" });
    expect(response).toMatchObject({
      id: 2,
      result: { tools: [{ name: "lookup", description: "Look up a value" }] },
    });
  });

  it("runs a tool inside the session's request context", async () => {
    const response = await createRouter().handle(
      { jsonrpc: "2.0", id: 3, method: "tools/call", params: { name: "lookup", arguments: { key: "k1" } } },
      "session-abc",
    );

    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 3,
      result: { content: [{ type: "text", text: '{\n  "value": "value-of-k1"\n}' }] },
    });
    expect(seenSessions.at(-1)).toBe("session-abc");
  });

  it("returns tool errors as isError results, not protocol errors", async () => {
    const response = await createRouter().handle({
      jsonrpc: "2.0",
      id: 4,
      method: "tools/call",
      params: { name: "lookup", arguments: { key: "bad" } },
    });

    expect(response).toMatchObject({ id: 4, result: { isError: true } });
    expect(response).not.toHaveProperty("error");
  });

  it("rejects malformed tools/call params", async () => {
    const response = await createRouter().handle({
      jsonrpc: "2.0",
      id: 5,
      method: "tools/call",
      params: { arguments: {} },
    });

    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 5,
      error: {
        code: -32602,
        message: "Invalid params: tools/call expects {name: string, arguments?: object}",
      },
    });
  });

  it("reports unknown tools and unknown methods as -32601", async () => {
    const router = createRouter();

    const unknownTool = await router.handle({
      jsonrpc: "2.0",
      id: 6,
      method: "tools/call",
      params: { name: "missing" },
    });
    const unknownMethod = await router.handle({ jsonrpc: "2.0", id: 7, method: "resources/list" });

    expect(unknownTool).toEqual({
      jsonrpc: "2.0",
      id: 6,
      error: { code: -32601, message: "Tool not found: missing" },
    });
    expect(unknownMethod).toEqual({
      jsonrpc: "2.0",
      id: 7,
      error: { code: -32601, message: "Unknown method: resources/list" },
    });
  });

  it("maps unexpected handler failures to -32603", async () => {
    const response = await createRouter().handle({
      jsonrpc: "2.0",
      id: 8,
      method: "tools/call",
      params: { name: "lookup", arguments: { key: "crash" } },
    });

    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 8,
      error: { code: -32603, message: "Internal error: driver exploded" },
    });
  });

  it("produces no response for notifications", async () => {
    const router = createRouter();
    await expect(
      router.handle({ jsonrpc: "2.0", method: "notifications/initialized" }),
    ).resolves.toBeNull();
    await expect(router.handle({ jsonrpc: "2.0", method: "ping" })).resolves.toBeNull();
  });

  it("answers a request whose id is null with id null", async () => {
    const router = createRouter();

    await expect(router.handle({ jsonrpc: "2.0", id: null, method: "ping" })).resolves.toEqual({
      jsonrpc: "2.0",
      id: null,
      result: {},
    });
    await expect(router.handle({ jsonrpc: "2.0", id: null, method: "resources/list" })).resolves.toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32601, message: "Unknown method: resources/list" },
    });
  });

  it("rejects invalid envelopes and batches with -32600", async () => {
    const router = createRouter();

    await expect(router.handle({ jsonrpc: "1.0", id: 9, method: "ping" })).resolves.toEqual({
      jsonrpc: "2.0",
      id: 9,
      error: { code: -32600, message: "Invalid Request" },
    });
    await expect(router.handle("ping")).resolves.toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32600, message: "Invalid Request" },
    });
    await expect(router.handle([{ jsonrpc: "2.0", id: 10, method: "ping" }])).resolves.toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32600, message: "Batch requests are not supported" },
    });
  });
});
