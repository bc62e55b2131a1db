/**
 * @file tools/registry
 * @description Name-keyed catalogue of tool definitions plus the dispatcher
 * that runs a handler and shapes its outcome as a `CallToolResult`.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import * as z from "zod";
import { ToolError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { ResponseFormatter } from "./response-formatter.js";
import type { ToolArgs, ToolCatalog, ToolContext, ToolDefinition } from "./types.js";

export class DuplicateToolError extends Error {
  constructor(readonly toolName: string) {
    super(`Tool '${toolName}' is already registered`);
    this.name = "DuplicateToolError";
  }
}

export class ToolNotFoundError extends Error {
  constructor(readonly toolName: string) {
    super(`Tool not found: ${toolName}`);
    this.name = "ToolNotFoundError";
  }
}

export interface ToolListing {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();
  private listingCache: ToolListing[] | null = null;

  constructor(
    definitions: ToolDefinition[] = [],
    private readonly formatter: ResponseFormatter = new ResponseFormatter(),
  ) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  /** @throws DuplicateToolError when the name is taken */
  register(definition: ToolDefinition): void {
    if (this.tools.has(definition.name)) {
      throw new DuplicateToolError(definition.name);
    }
    this.tools.set(definition.name, definition);
    this.listingCache = null;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  byCategory(): ToolCatalog {
    const catalog: ToolCatalog = { search: [], memory: [], conversation: [], graph: [] };
    for (const definition of this.tools.values()) {
      catalog[definition.category].push(definition.name);
    }
    return catalog;
  }

  /** Catalogue in registration order, with JSON Schema derived from each zod shape. */
  list(): ToolListing[] {
    if (!this.listingCache) {
      this.listingCache = [...this.tools.values()].map((definition) => {
        const { $schema: _dialect, ...inputSchema } = z.toJSONSchema(
          z.object(definition.inputShape),
          { io: "input" },
        );
        return { name: definition.name, description: definition.description, inputSchema };
      });
    }
    return this.listingCache;
  }

  /**
   * Runs a tool. `ToolError`s become `isError` results; anything else
   * propagates to the caller as an internal failure.
   * @throws ToolNotFoundError for an unregistered name
   */
  async dispatch(name: string, args: ToolArgs, ctx: ToolContext): Promise<CallToolResult> {
    const definition = this.tools.get(name);
    if (!definition) {
      throw new ToolNotFoundError(name);
    }

    const startedAt = performance.now();
    try {
      const payload = await definition.impl(args, ctx);
      logger.debug("[Tools] Call completed", {
        tool: name,
        durationMs: Math.round(performance.now() - startedAt),
      });
      return this.formatter.formatSuccess(payload);
    } catch (error) {
      if (error instanceof ToolError) {
        logger.warn("[Tools] Call failed", {
          tool: name,
          errorType: error.errorType,
          retryable: error.retryable,
          cause: error.message,
        });
        return this.formatter.formatError(error);
      }
      throw error;
    }
  }
}
