/**
 * @file protocol/router
 * @description Decodes one JSON-RPC message, dispatches it to the MCP method
 * it names and encodes the response. Transport-agnostic: the SSE and stdio
 * transports both feed it parsed message bodies.
 */

import {
  LATEST_PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
} from "@modelcontextprotocol/sdk/types.js";
import { runWithRequestContext } from "../request-context.js";
import { ToolNotFoundError, type ToolRegistry } from "../tools/registry.js";
import type { ToolContext } from "../tools/types.js";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import {
  isNotification,
  RPC_ERROR_CODES,
  RpcError,
  rpcEnvelopeSchema,
  rpcError,
  rpcResult,
  salvageId,
  toolCallParamsSchema,
  type RequestId,
  type RpcEnvelope,
  type RpcResponse,
} from "./messages.js";

/** Offered when the client asks for a version the SDK does not list. */
export const FALLBACK_PROTOCOL_VERSION = "2024-11-05";

export interface ServerInfo {
  name: string;
  version: string;
}

export interface ProtocolRouterOptions {
  registry: ToolRegistry;
  context: ToolContext;
  serverInfo: ServerInfo;
  instructions?: string;
}

type MethodHandler = (params: Record<string, unknown>) => Promise<Record<string, unknown>>;

const DEFAULT_INSTRUCTIONS =
  "Use graphrag_global_search for broad or thematic questions and graphrag_local_search for questions about a specific entity. search_nodes, search_observations and raw_cypher_query give direct access to stored entities and observations; the conversation tools cover preserved sessions.";

export function negotiateProtocolVersion(requested: unknown): string {
  if (typeof requested === "string" && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)) {
    return requested;
  }
  return FALLBACK_PROTOCOL_VERSION;
}

export class ProtocolRouter {
  private readonly methods: Map<string, MethodHandler>;

  constructor(private readonly options: ProtocolRouterOptions) {
    this.methods = new Map<string, MethodHandler>([
      ["initialize", (params) => this.initialize(params)],
      ["ping", async () => ({})],
      ["tools/list", async () => ({ tools: this.options.registry.list() })],
      ["tools/call", (params) => this.callTool(params)],
    ]);
  }

  /**
   * Handles one decoded message body.
   * @returns the response to deliver, or null for notifications
   */
  async handle(message: unknown, sessionId?: string): Promise<RpcResponse | null> {
    if (Array.isArray(message)) {
      return rpcError(null, RPC_ERROR_CODES.invalidRequest, "Batch requests are not supported");
    }

    const parsed = rpcEnvelopeSchema.safeParse(message);
    if (!parsed.success) {
      logger.debug("[Router] Invalid request envelope", {
        sessionId,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return rpcError(salvageId(message), RPC_ERROR_CODES.invalidRequest, "Invalid Request");
    }

    const envelope = parsed.data;
    const { id } = envelope;
    if (id === undefined || isNotification(envelope)) {
      logger.debug("[Router] Notification received", { sessionId, method: envelope.method });
      return null;
    }

    return runWithRequestContext({ sessionId, requestId: id ?? undefined, method: envelope.method }, () =>
      this.dispatch(envelope, id),
    );
  }

  private async dispatch(envelope: RpcEnvelope, id: RequestId): Promise<RpcResponse> {
    const handler = this.methods.get(envelope.method);
    if (!handler) {
      logger.warn("[Router] Unknown method", { method: envelope.method });
      return rpcError(id, RPC_ERROR_CODES.methodNotFound, `Unknown method: ${envelope.method}`);
    }

    try {
      const result = await handler(envelope.params ?? {});
      return rpcResult(id, result);
    } catch (error) {
      if (error instanceof RpcError) {
        return rpcError(id, error.code, error.message, error.data);
      }
      logger.error("[Router] Method failed", error);
      return rpcError(id, RPC_ERROR_CODES.internalError, `Internal error: ${errorMessage(error)}`);
    }
  }

  private async initialize(params: Record<string, unknown>): Promise<Record<string, unknown>> {
    const protocolVersion = negotiateProtocolVersion(params.protocolVersion);
    logger.info("[Router] Client initialized", {
      requested: params.protocolVersion,
      protocolVersion,
      latest: LATEST_PROTOCOL_VERSION,
    });

    return {
      protocolVersion,
      capabilities: { tools: { listChanged: false } },
      serverInfo: {
        name: this.options.serverInfo.name,
        version: this.options.serverInfo.version,
        toolCount: this.options.registry.size,
      },
      instructions: this.options.instructions ?? DEFAULT_INSTRUCTIONS,
    };
  }

  private async callTool(params: Record<string, unknown>): Promise<Record<string, unknown>> {
    const parsed = toolCallParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new RpcError(
        RPC_ERROR_CODES.invalidParams,
        "Invalid params: tools/call expects {name: string, arguments?: object}",
      );
    }

    const { name, arguments: args = {} } = parsed.data;
    if (!this.options.registry.has(name)) {
      logger.warn("[Router] Unknown tool", { tool: name });
      throw new RpcError(RPC_ERROR_CODES.methodNotFound, new ToolNotFoundError(name).message);
    }
    const result = await this.options.registry.dispatch(name, args, this.options.context);
    return { ...result };
  }
}
