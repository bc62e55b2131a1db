#!/usr/bin/env node
/**
 * @file server
 * @description Process entrypoint: builds every component, connects Neo4j and
 * serves the memory tools over the HTTP+SSE or stdio transport.
 */

import type { Server } from "node:http";
import * as env from "./env.js";
import { loadSearchConfig } from "./config.js";
import { GlobalSearchEngine } from "./engines/global-search.js";
import { LocalSearchEngine } from "./engines/local-search.js";
import { Neo4jClient } from "./graph/client.js";
import { ProtocolRouter } from "./protocol/router.js";
import { conversationToolDefinitions } from "./tools/handlers/conversation-tools.js";
import { graphragToolDefinitions } from "./tools/handlers/graphrag-tools.js";
import { memoryToolDefinitions } from "./tools/handlers/memory-tools.js";
import { ToolRegistry } from "./tools/registry.js";
import type { ToolContext } from "./tools/types.js";
import { createHttpApp } from "./transport/http-app.js";
import { SessionRegistry } from "./transport/session-registry.js";
import { startStdioTransport } from "./transport/stdio.js";
import { errorMessage } from "./utils/errors.js";
import { logger } from "./utils/logger.js";
import { EmbeddingCache } from "./vector/embedding-cache.js";
import { HttpEmbeddingClient } from "./vector/embedding-client.js";

const SERVER_VERSION = "1.0.0";

async function main() {
  const config = loadSearchConfig(env.MEMORY_MCP_CONFIG_PATH);

  const backend = new Neo4jClient({
    uri: env.NEO4J_URI,
    username: env.NEO4J_USERNAME,
    password: env.NEO4J_PASSWORD,
    database: env.NEO4J_DATABASE,
    accessMode: "READ",
  });
  try {
    await backend.connect();
  } catch (error) {
    // queries reconnect on demand
    logger.warn("[MCP] Neo4j unreachable at startup", { cause: errorMessage(error) });
  }

  const embeddingCache = new EmbeddingCache(env.MEMORY_MCP_EMBEDDING_CACHE_SIZE);
  const embeddings = new HttpEmbeddingClient({
    url: env.MEMORY_MCP_EMBEDDING_URL,
    apiKey: env.MEMORY_MCP_EMBEDDING_API_KEY,
    model: env.MEMORY_MCP_EMBEDDING_MODEL,
    dimension: config.embeddingDimension,
    timeoutMs: env.MEMORY_MCP_EMBEDDING_TIMEOUT_MS,
    cache: embeddingCache,
  });
  if (!embeddings.isAvailable()) {
    logger.warn("[MCP] MEMORY_MCP_EMBEDDING_URL is not set; semantic search is disabled");
  }

  const sessions = new SessionRegistry({
    maxSessions: env.MEMORY_MCP_MAX_SESSIONS,
    sessionTimeoutMs: env.MEMORY_MCP_SESSION_TIMEOUT_MS,
    sweepIntervalMs: env.MEMORY_MCP_SWEEP_INTERVAL_MS,
    memoryLimitMb: env.MEMORY_MCP_MEMORY_LIMIT_MB,
    memoryCheckIntervalMs: env.MEMORY_MCP_MEMORY_CHECK_INTERVAL_MS,
    keepaliveIntervalMs: env.MEMORY_MCP_KEEPALIVE_INTERVAL_MS,
    retryAfterSeconds: env.MEMORY_MCP_RETRY_AFTER_SECONDS,
  });

  const registry = new ToolRegistry([
    ...graphragToolDefinitions,
    ...memoryToolDefinitions,
    ...conversationToolDefinitions,
  ]);
  const context: ToolContext = {
    backend,
    embeddings,
    embeddingCache,
    config,
    globalSearch: new GlobalSearchEngine(backend, embeddings, config),
    localSearch: new LocalSearchEngine(backend, config),
    serverStats: () => ({
      transport: env.MEMORY_MCP_TRANSPORT,
      activeSessions: env.MEMORY_MCP_TRANSPORT === "sse" ? sessions.stats().activeSessions : 1,
      maxSessions: env.MEMORY_MCP_TRANSPORT === "sse" ? env.MEMORY_MCP_MAX_SESSIONS : 1,
    }),
    toolCatalog: () => registry.byCategory(),
  };

  const router = new ProtocolRouter({
    registry,
    context,
    serverInfo: { name: env.MEMORY_MCP_SERVER_NAME, version: SERVER_VERSION },
  });

  let httpServer: Server | null = null;

  if (env.MEMORY_MCP_TRANSPORT === "stdio") {
    await startStdioTransport(router);
    logger.info("[MCP] Server started on stdio transport", { tools: registry.names() });
  } else {
    const app = createHttpApp({
      sessions,
      router,
      backend,
      serverName: env.MEMORY_MCP_SERVER_NAME,
      version: SERVER_VERSION,
      toolCount: () => registry.size,
    });
    sessions.start();
    httpServer = app.listen(env.PORT, env.MEMORY_MCP_HOST, () => {
      logger.info("[MCP] Server started on SSE transport", {
        host: env.MEMORY_MCP_HOST,
        port: env.PORT,
        endpoints: ["GET /sse", "POST /messages", "GET /health"],
        tools: registry.names(),
      });
    });
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("[MCP] Shutting down", { signal });

    sessions.stop();
    const server = httpServer;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close((error) => {
          if (error) logger.warn("[MCP] HTTP server close failed", { cause: error.message });
          resolve();
        });
      });
    }
    await backend.disconnect();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("[MCP] Shutdown failed", error);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  logger.error("[MCP] Fatal error:", error);
  process.exit(1);
});
