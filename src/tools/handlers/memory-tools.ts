/**
 * @file tools/handlers/memory-tools
 * @description Entity lookup, observation search, statistics and read-only
 * Cypher tool definitions.
 */

import { MEMORY_QUERIES } from "../../engines/memory-queries.js";
import type { QueryResult } from "../../graph/types.js";
import {
  memoryStatsShape,
  parseToolArgs,
  rawCypherArgs,
  rawCypherShape,
  searchNodesArgs,
  searchNodesShape,
  searchObservationsArgs,
  searchObservationsShape,
  type SearchNodesArgs,
} from "../../types/tool-args.js";
import { toOptionalString, toSafeNumber, toStringArray } from "../../utils/conversions.js";
import { BackendError, EmbeddingError, InvalidInputError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import {
  ensureLimit,
  validateIsoDate,
  validateReadOnlyCypher,
} from "../../utils/validation.js";
import type { ToolArgs, ToolContext, ToolDefinition } from "../types.js";

/** @throws BackendError carrying the result's error kind */
export function ensureOk(result: QueryResult, operation: string): QueryResult {
  if (result.error) {
    throw new BackendError(result.errorKind ?? "query", `${operation} failed: ${result.error}`);
  }
  return result;
}

/** Stored node fields minus vector properties, plus the node's labels. */
export function entityPayload(
  labels: unknown,
  properties: unknown,
  vectorProperties: readonly string[],
): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  if (typeof properties === "object" && properties !== null && !Array.isArray(properties)) {
    for (const [key, value] of Object.entries(properties)) {
      if (!vectorProperties.includes(key)) fields[key] = value;
    }
  }
  return { ...fields, labels: toStringArray(labels) };
}

const MAX_LINKED_CONCEPTS = 5;

/** Strongest concept links first. */
function linkedConcepts(value: unknown): Array<{ entity: string; confidence: number | null }> {
  if (!Array.isArray(value)) return [];
  const concepts: Array<{ entity: string; confidence: number | null }> = [];
  for (const entry of value) {
    if (typeof entry !== "object" || entry === null || !("entity" in entry)) continue;
    const entity = toOptionalString(entry.entity);
    if (entity === null) continue;
    concepts.push({ entity, confidence: "confidence" in entry ? toSafeNumber(entry.confidence) : null });
  }
  return concepts
    .sort((a, b) => (b.confidence ?? 0) - (a.confidence ?? 0))
    .slice(0, MAX_LINKED_CONCEPTS);
}

async function lookupByName(args: SearchNodesArgs, names: string[], ctx: ToolContext) {
  const result = ensureOk(
    await ctx.backend.executeCypher(MEMORY_QUERIES.entitiesByName, { names }),
    "Entity lookup",
  );
  const found = new Set(result.data.map((row) => toOptionalString(row.requested)));
  return {
    entities: result.data.map((row) =>
      entityPayload(row.labels, row.properties, ctx.config.vectorProperties),
    ),
    search_type: "exact_lookup",
    not_found: names.filter((name) => !found.has(name)),
    ...(args.query ? { note: "names take precedence over query" } : {}),
  };
}

async function semanticOrTextSearch(query: string, args: SearchNodesArgs, ctx: ToolContext) {
  let fallbackReason: string | undefined;

  if (!args.use_embeddings) {
    fallbackReason = "embeddings disabled by request";
  } else if (!ctx.embeddings.isAvailable()) {
    fallbackReason = "embedding service not configured";
  } else {
    let vector: number[] | undefined;
    try {
      vector = await ctx.embeddings.embed(query);
    } catch (error) {
      if (!(error instanceof EmbeddingError)) throw error;
      logger.warn("[search_nodes] Embedding failed, falling back to text search", {
        cause: error.message,
      });
      fallbackReason = `embedding failed: ${error.message}`;
    }

    if (vector) {
      const scanned = await ctx.backend.vectorQuery(ctx.config.entityIndex, args.limit, vector);
      if (scanned.error) {
        throw new BackendError(
          scanned.errorKind ?? "query",
          `Entity vector search failed: ${scanned.error}`,
        );
      }
      const entities = scanned.matches.map((match) => ({
        ...entityPayload(match.labels, match.properties, ctx.config.vectorProperties),
        similarity: match.score,
      }));
      return {
        entities,
        search_metadata: {
          query,
          search_type: "semantic",
          index: ctx.config.entityIndex,
          results_found: entities.length,
        },
      };
    }
  }

  const result = ensureOk(
    await ctx.backend.executeCypher(MEMORY_QUERIES.entityTextSearch, {
      text: query.toLowerCase(),
      limit: args.limit,
    }),
    "Entity text search",
  );
  const entities = result.data.map((row) =>
    entityPayload(row.labels, row.properties, ctx.config.vectorProperties),
  );
  return {
    entities,
    search_metadata: {
      query,
      search_type: "text",
      fallback_reason: fallbackReason,
      results_found: entities.length,
    },
  };
}

export const memoryToolDefinitions: ToolDefinition[] = [
  {
    name: "search_nodes",
    category: "memory",
    description:
      "Find entities by exact name or alias (`names`) or by semantic similarity (`query`). Falls back to text matching when embeddings are unavailable.",
    inputShape: searchNodesShape,
    async impl(rawArgs: ToolArgs, ctx: ToolContext): Promise<unknown> {
      const args = parseToolArgs(searchNodesArgs, rawArgs);

      if (args.names && args.names.length > 0) {
        return lookupByName(args, args.names, ctx);
      }

      const query = args.query?.trim();
      if (!query) {
        throw new InvalidInputError("Must provide either 'query' or 'names'", "query");
      }
      return semanticOrTextSearch(query, args, ctx);
    },
  },
  {
    name: "search_observations",
    category: "memory",
    description:
      "List observations filtered by text, theme, owning entity and date range, newest first, with their linked concepts. Supports paging with limit and offset.",
    inputShape: searchObservationsShape,
    async impl(rawArgs: ToolArgs, ctx: ToolContext): Promise<unknown> {
      const args = parseToolArgs(searchObservationsArgs, rawArgs);
      const startDate =
        args.start_date === undefined ? null : validateIsoDate(args.start_date, "start_date");
      const endDate = args.end_date === undefined ? null : validateIsoDate(args.end_date, "end_date");
      if (startDate && endDate && startDate > endDate) {
        throw new InvalidInputError("start_date must not be after end_date", "start_date");
      }

      const text = args.query?.trim().toLowerCase() || null;

      const result = ensureOk(
        await ctx.backend.executeCypher(MEMORY_QUERIES.searchObservations, {
          entityName: args.entity_name ?? null,
          theme: args.theme ?? null,
          text,
          startDate,
          endDate,
          confidenceMin: args.confidence_min,
          offset: args.offset,
          limit: args.limit,
        }),
        "Observation search",
      );

      const observations = result.data.map((row) => ({
        entity_name: toOptionalString(row.entityName),
        content: toOptionalString(row.content),
        theme: toOptionalString(row.theme),
        importance: toSafeNumber(row.importance),
        created_at: toOptionalString(row.createdAt),
        occurred_on: toOptionalString(row.occurredOn),
        linked_concepts: linkedConcepts(row.linkedConcepts),
      }));

      return {
        observations,
        count: observations.length,
        filters: {
          query: text,
          theme: args.theme ?? null,
          entity_name: args.entity_name ?? null,
          start_date: startDate,
          end_date: endDate,
          confidence_min: args.confidence_min,
        },
        limit: args.limit,
        offset: args.offset,
        has_more: observations.length === args.limit,
      };
    },
  },
  {
    name: "memory_stats",
    category: "graph",
    description: "Graph node and relationship counts plus server session and cache statistics.",
    inputShape: memoryStatsShape,
    async impl(_rawArgs: ToolArgs, ctx: ToolContext): Promise<unknown> {
      const result = ensureOk(
        await ctx.backend.executeCypher(MEMORY_QUERIES.graphStatistics),
        "Statistics query",
      );
      const row = result.data[0] ?? {};
      const count = (value: unknown): number => toSafeNumber(value) ?? 0;
      const server = ctx.serverStats();
      const cache = ctx.embeddingCache.stats();
      const catalog = ctx.toolCatalog();

      return {
        graph_statistics: {
          entities: count(row.entities),
          relationships: count(row.relationships),
          observations: count(row.observations),
          communities: count(row.communities),
          conversation_sessions: count(row.conversationSessions),
          chunks: count(row.chunks),
        },
        server: {
          transport: server.transport,
          active_sessions: server.activeSessions,
          max_sessions: server.maxSessions,
          tool_count: Object.values(catalog).reduce((total, names) => total + names.length, 0),
          tools_by_category: catalog,
          graph_connected: ctx.backend.isConnected(),
          embeddings_available: ctx.embeddings.isAvailable(),
        },
        embedding_cache: {
          size: cache.size,
          max_entries: cache.maxEntries,
          hits: cache.hits,
          misses: cache.misses,
        },
      };
    },
  },
  {
    name: "raw_cypher_query",
    category: "graph",
    description:
      "Run a read-only Cypher query. A LIMIT is appended when the query has none; write clauses are rejected.",
    inputShape: rawCypherShape,
    async impl(rawArgs: ToolArgs, ctx: ToolContext): Promise<unknown> {
      const args = parseToolArgs(rawCypherArgs, rawArgs);
      const query = ensureLimit(validateReadOnlyCypher(args.query), args.limit);

      const result = ensureOk(await ctx.backend.executeCypher(query, args.parameters), "Cypher query");
      const results = result.data.slice(0, args.limit);

      return {
        query,
        parameters: args.parameters,
        results,
        count: results.length,
      };
    },
  },
];
