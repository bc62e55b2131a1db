/**
 * @file tools/handlers/graphrag-tools
 * @description Global (community) and local (entity neighborhood) search tool
 * definitions.
 * @remarks Engine results are camelCase; the wire payload is snake_case.
 */

import type { GlobalSearchResult } from "../../engines/global-search.js";
import type { LocalSearchResult, ObservationRecord } from "../../engines/local-search.js";
import {
  globalSearchArgs,
  globalSearchShape,
  localSearchArgs,
  localSearchShape,
  parseToolArgs,
} from "../../types/tool-args.js";
import type { ToolArgs, ToolContext, ToolDefinition } from "../types.js";

function observationPayload(observation: ObservationRecord): Record<string, unknown> {
  return {
    content: observation.content,
    created_at: observation.createdAt,
    theme: observation.theme,
    importance: observation.importance,
  };
}

export function globalSearchPayload(result: GlobalSearchResult): Record<string, unknown> {
  return {
    query: result.query,
    communities: result.communities.map((community) => ({
      community_id: community.communityId,
      name: community.name,
      summary: community.summary,
      member_count: community.memberCount,
      similarity_score: community.score,
      rank: community.rank,
    })),
    ...(result.message ? { message: result.message } : {}),
    ranking: {
      strategy: result.strategy,
      min_similarity: result.minSimilarity,
      applied_threshold: result.appliedThreshold,
      candidate_count: result.candidateCount,
      scan_limit: result.scanLimit,
    },
    query_embedding_time_ms: result.timings.embeddingMs,
    search_time_ms: result.timings.searchMs,
    total_time_ms: result.timings.totalMs,
  };
}

export function localSearchPayload(result: LocalSearchResult): Record<string, unknown> {
  if (result.status === "not_found") {
    return {
      error: result.message,
      error_type: result.errorType,
      suggestions: result.suggestions,
      retry_suggestion: result.retryHint,
    };
  }

  return {
    query: result.query,
    center_entity: {
      name: result.center.name,
      entity_type: result.center.entityType,
      aliases: result.center.aliases,
      labels: result.center.labels,
      observations: result.center.observations.map(observationPayload),
    },
    one_hop_neighbors: result.oneHop.map((neighbor) => ({
      name: neighbor.name,
      entity_type: neighbor.entityType,
      relationship_type: neighbor.relationshipType,
      direction: neighbor.direction,
      observations: neighbor.observations.map(observationPayload),
    })),
    two_hop_neighbors: result.twoHop.map((neighbor) => ({
      name: neighbor.name,
      entity_type: neighbor.entityType,
      via_entity: neighbor.viaEntity,
      relationship_path: neighbor.relationshipPath,
    })),
    summary: {
      total_neighbors: result.summary.totalNeighbors,
      one_hop_count: result.summary.oneHopCount,
      two_hop_count: result.summary.twoHopCount,
      entities_with_observations: result.summary.entitiesWithObservations,
      ...(result.summary.message ? { message: result.summary.message } : {}),
    },
    ...(result.warnings.length > 0 ? { warnings: result.warnings } : {}),
    lookup_time_ms: result.timings.lookupMs,
    traversal_time_ms: result.timings.traversalMs,
    observation_time_ms: result.timings.observationMs,
    total_time_ms: result.timings.totalMs,
  };
}

export const graphragToolDefinitions: ToolDefinition[] = [
  {
    name: "graphrag_global_search",
    category: "search",
    description:
      "Community-level search for broad or thematic questions. Returns the most similar community summaries with member counts and similarity scores; synthesize the answer from them.",
    inputShape: globalSearchShape,
    async impl(rawArgs: ToolArgs, ctx: ToolContext): Promise<unknown> {
      const args = parseToolArgs(globalSearchArgs, rawArgs);
      const result = await ctx.globalSearch.search({
        query: args.query,
        limit: args.limit,
        minSimilarity: args.min_similarity,
      });
      return globalSearchPayload(result);
    },
  },
  {
    name: "graphrag_local_search",
    category: "search",
    description:
      "Entity-neighborhood search for questions about a specific person, project or concept. Resolves the entity by name or alias and returns its 1-hop and 2-hop neighbors with recent observations.",
    inputShape: localSearchShape,
    async impl(rawArgs: ToolArgs, ctx: ToolContext): Promise<unknown> {
      const args = parseToolArgs(localSearchArgs, rawArgs);
      const result = await ctx.localSearch.search({
        entityName: args.entity_name,
        depth: args.depth,
        hop1Limit: args.hop1_limit,
        hop2Limit: args.hop2_limit,
        observationLimit: args.observation_limit,
      });
      return localSearchPayload(result);
    },
  },
];
