/**
 * @file tools/types
 * @description Shared type contracts for tool registration and runtime dispatch.
 */

import type * as z from "zod";
import type { SearchConfig } from "../config.js";
import type { GlobalSearchEngine } from "../engines/global-search.js";
import type { LocalSearchEngine } from "../engines/local-search.js";
import type { QueryBackend } from "../graph/types.js";
import type { EmbeddingCache } from "../vector/embedding-cache.js";
import type { EmbeddingService } from "../vector/embedding-client.js";

/**
 * Raw `arguments` object of a `tools/call`. Handlers decode it with their
 * own zod schema.
 */
export type ToolArgs = Record<string, unknown>;

export type ToolCategory = "search" | "memory" | "conversation" | "graph";

/** Registered tool names per category, in registration order. */
export type ToolCatalog = Record<ToolCategory, string[]>;

export interface ServerStats {
  transport: "sse" | "stdio";
  activeSessions: number;
  maxSessions: number;
}

/**
 * Everything a tool implementation may touch. Built once in server.ts and
 * shared by every session.
 */
export interface ToolContext {
  backend: QueryBackend;
  embeddings: EmbeddingService;
  embeddingCache: EmbeddingCache;
  config: SearchConfig;
  globalSearch: GlobalSearchEngine;
  localSearch: LocalSearchEngine;
  serverStats(): ServerStats;
  toolCatalog(): ToolCatalog;
}

/**
 * Registry contract for a single tool definition.
 */
export interface ToolDefinition {
  name: string;
  category: ToolCategory;
  description: string;
  inputShape: z.ZodRawShape;
  /** Returns a JSON-serializable payload; throws `ToolError` for expected failures. */
  impl(args: ToolArgs, ctx: ToolContext): Promise<unknown>;
}
