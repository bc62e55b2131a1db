/**
 * @file tools/handlers/conversation-tools
 * @description Read-only tools over preserved `ConversationSession` nodes:
 * topic search, entity provenance, date windows and high-importance sessions.
 */

import { MEMORY_QUERIES } from "../../engines/memory-queries.js";
import {
  breakthroughSessionsArgs,
  breakthroughSessionsShape,
  parseToolArgs,
  searchConversationsArgs,
  searchConversationsShape,
  temporalContextArgs,
  temporalContextShape,
  traceEntityOriginArgs,
  traceEntityOriginShape,
} from "../../types/tool-args.js";
import { toOptionalString, toSafeNumber } from "../../utils/conversions.js";
import { InvalidInputError } from "../../utils/errors.js";
import { validateIsoDate } from "../../utils/validation.js";
import type { ToolArgs, ToolContext, ToolDefinition } from "../types.js";
import { ensureOk } from "./memory-tools.js";

export function conversationPayload(row: Record<string, unknown>): Record<string, unknown> {
  return {
    conversation_id: toOptionalString(row.conversationId),
    first_message_at: toOptionalString(row.firstMessageAt),
    last_message_at: toOptionalString(row.lastMessageAt),
    message_count: toSafeNumber(row.messageCount),
    entity_count: toSafeNumber(row.entityCount),
    chunk_count: toSafeNumber(row.chunkCount),
    importance_score: toSafeNumber(row.importanceScore),
  };
}

export const conversationToolDefinitions: ToolDefinition[] = [
  {
    name: "search_conversations",
    category: "conversation",
    description:
      "Search preserved conversation sessions by topic keyword, start date range or message count, most important first.",
    inputShape: searchConversationsShape,
    async impl(rawArgs: ToolArgs, ctx: ToolContext): Promise<unknown> {
      const args = parseToolArgs(searchConversationsArgs, rawArgs);
      const startDate =
        args.start_date === undefined ? null : validateIsoDate(args.start_date, "start_date");
      const endDate = args.end_date === undefined ? null : validateIsoDate(args.end_date, "end_date");
      if (startDate && endDate && startDate > endDate) {
        throw new InvalidInputError("start_date must not be after end_date", "start_date");
      }
      const topic = args.topic?.trim().toLowerCase() || null;

      const result = ensureOk(
        await ctx.backend.executeCypher(MEMORY_QUERIES.searchConversations, {
          topic,
          startDate,
          endDate,
          minMessages: args.min_messages ?? null,
          limit: args.max_results,
        }),
        "Conversation search",
      );
      const conversations = result.data.map(conversationPayload);

      return {
        conversations,
        count: conversations.length,
        filters: {
          topic,
          start_date: startDate,
          end_date: endDate,
          min_messages: args.min_messages ?? null,
        },
      };
    },
  },
  {
    name: "trace_entity_origin",
    category: "conversation",
    description: "List the conversation sessions that created an entity, most recent first.",
    inputShape: traceEntityOriginShape,
    async impl(rawArgs: ToolArgs, ctx: ToolContext): Promise<unknown> {
      const args = parseToolArgs(traceEntityOriginArgs, rawArgs);

      const result = ensureOk(
        await ctx.backend.executeCypher(MEMORY_QUERIES.entityOrigins, {
          entityName: args.entity_name,
        }),
        "Entity origin lookup",
      );
      const origins = result.data.map((row) => ({
        ...conversationPayload(row),
        creation_timestamp: toOptionalString(row.createdAt),
        confidence: toSafeNumber(row.confidence),
        creation_method: toOptionalString(row.creationMethod),
      }));

      return {
        entity: args.entity_name,
        origin_conversations: origins,
        count: origins.length,
      };
    },
  },
  {
    name: "get_temporal_context",
    category: "conversation",
    description:
      "Conversation sessions that started within window_days of a date, in chronological order.",
    inputShape: temporalContextShape,
    async impl(rawArgs: ToolArgs, ctx: ToolContext): Promise<unknown> {
      const args = parseToolArgs(temporalContextArgs, rawArgs);
      const date = validateIsoDate(args.date, "date");

      const result = ensureOk(
        await ctx.backend.executeCypher(MEMORY_QUERIES.temporalContext, {
          date,
          windowDays: args.window_days,
          limit: args.max_results,
        }),
        "Temporal context query",
      );
      const conversations = result.data.map(conversationPayload);

      return {
        center_date: date,
        window_days: args.window_days,
        conversations,
        count: conversations.length,
      };
    },
  },
  {
    name: "get_breakthrough_sessions",
    category: "conversation",
    description: "Conversation sessions whose importance score meets a threshold, most important first.",
    inputShape: breakthroughSessionsShape,
    async impl(rawArgs: ToolArgs, ctx: ToolContext): Promise<unknown> {
      const args = parseToolArgs(breakthroughSessionsArgs, rawArgs);

      const result = ensureOk(
        await ctx.backend.executeCypher(MEMORY_QUERIES.breakthroughSessions, {
          minImportance: args.min_importance,
          limit: args.max_results,
        }),
        "Breakthrough session query",
      );
      const sessions = result.data.map(conversationPayload);

      return {
        min_importance: args.min_importance,
        breakthrough_sessions: sessions,
        count: sessions.length,
      };
    },
  },
];
