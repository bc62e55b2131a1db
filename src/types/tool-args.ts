/**
 * Argument schemas for every tool. Each shape doubles as the advertised
 * JSON Schema (via the registry) and as the decoder the handler runs on its
 * raw arguments.
 */

import * as z from "zod";
import { InvalidInputError } from "../utils/errors.js";

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected a date in YYYY-MM-DD format");

export const globalSearchShape = {
  query: z.string().describe("Natural-language question about broad themes or topics"),
  limit: z.number().int().min(1).max(20).default(5).describe("Maximum communities to return (1-20)"),
  min_similarity: z
    .number()
    .min(0)
    .max(1)
    .default(0.6)
    .describe("Minimum cosine similarity (0-1); relaxed automatically when nothing matches"),
};

export const localSearchShape = {
  entity_name: z.string().describe("Entity name or alias (case-insensitive)"),
  depth: z.number().int().min(1).max(2).default(2).describe("Traversal depth: 1 or 2 hops"),
  hop1_limit: z.number().int().min(1).max(50).default(20).describe("Maximum 1-hop neighbors"),
  hop2_limit: z.number().int().min(1).max(30).default(10).describe("Maximum 2-hop neighbors"),
  observation_limit: z
    .number()
    .int()
    .min(1)
    .max(20)
    .default(10)
    .describe("Maximum observations per entity"),
};

export const searchNodesShape = {
  query: z.string().optional().describe("Semantic search query"),
  names: z.array(z.string().min(1)).optional().describe("Exact entity names or aliases"),
  limit: z.number().int().min(1).max(50).default(5).describe("Maximum results for query search"),
  use_embeddings: z
    .boolean()
    .default(true)
    .describe("Use the entity vector index; false forces text matching"),
};

export const searchObservationsShape = {
  query: z.string().optional().describe("Case-insensitive text the observation content must contain"),
  theme: z.string().optional().describe("Semantic theme, e.g. 'partnership'"),
  entity_name: z.string().optional().describe("Only observations owned by this entity"),
  start_date: isoDate.optional().describe("Inclusive start date (YYYY-MM-DD)"),
  end_date: isoDate.optional().describe("Inclusive end date (YYYY-MM-DD)"),
  limit: z.number().int().min(1).max(100).default(50).describe("Maximum observations"),
  offset: z.number().int().min(0).default(0).describe("Observations to skip"),
  confidence_min: z
    .number()
    .min(0)
    .max(1)
    .default(0.5)
    .describe("Minimum confidence of the concept links listed with each observation (0-1)"),
};

export const searchConversationsShape = {
  topic: z.string().optional().describe("Keyword that must appear in one of the session's chunks"),
  start_date: isoDate.optional().describe("Sessions starting on or after this date (YYYY-MM-DD)"),
  end_date: isoDate.optional().describe("Sessions starting on or before this date (YYYY-MM-DD)"),
  min_messages: z.number().int().min(1).optional().describe("Minimum message count"),
  max_results: z.number().int().min(1).max(50).default(10).describe("Maximum sessions"),
};

export const traceEntityOriginShape = {
  entity_name: z.string().min(1).describe("Exact entity name"),
};

export const temporalContextShape = {
  date: isoDate.describe("Center date (YYYY-MM-DD)"),
  window_days: z.number().int().min(0).max(365).default(7).describe("Days before and after the date"),
  max_results: z.number().int().min(1).max(200).default(50).describe("Maximum sessions"),
};

export const breakthroughSessionsShape = {
  min_importance: z.number().min(0).max(1).default(0.5).describe("Minimum importance score (0-1)"),
  max_results: z.number().int().min(1).max(100).default(20).describe("Maximum sessions"),
};

export const memoryStatsShape = {};

export const rawCypherShape = {
  query: z.string().describe("Read-only Cypher query"),
  parameters: z.record(z.string(), z.unknown()).default({}).describe("Query parameters"),
  limit: z
    .number()
    .int()
    .min(1)
    .max(1000)
    .default(100)
    .describe("LIMIT appended when the query has none"),
};

export const globalSearchArgs = z.object(globalSearchShape);
export const localSearchArgs = z.object(localSearchShape);
export const searchNodesArgs = z.object(searchNodesShape);
export const searchObservationsArgs = z.object(searchObservationsShape);
export const searchConversationsArgs = z.object(searchConversationsShape);
export const traceEntityOriginArgs = z.object(traceEntityOriginShape);
export const temporalContextArgs = z.object(temporalContextShape);
export const breakthroughSessionsArgs = z.object(breakthroughSessionsShape);
export const memoryStatsArgs = z.object(memoryStatsShape);
export const rawCypherArgs = z.object(rawCypherShape);

export type GlobalSearchArgs = z.infer<typeof globalSearchArgs>;
export type LocalSearchArgs = z.infer<typeof localSearchArgs>;
export type SearchNodesArgs = z.infer<typeof searchNodesArgs>;
export type SearchObservationsArgs = z.infer<typeof searchObservationsArgs>;
export type SearchConversationsArgs = z.infer<typeof searchConversationsArgs>;
export type TraceEntityOriginArgs = z.infer<typeof traceEntityOriginArgs>;
export type TemporalContextArgs = z.infer<typeof temporalContextArgs>;
export type BreakthroughSessionsArgs = z.infer<typeof breakthroughSessionsArgs>;
export type MemoryStatsArgs = z.infer<typeof memoryStatsArgs>;
export type RawCypherArgs = z.infer<typeof rawCypherArgs>;

/**
 * Decodes raw tool arguments, applying defaults.
 * @throws InvalidInputError naming the first offending field
 */
export function parseToolArgs<T extends z.ZodType>(schema: T, raw: unknown): z.output<T> {
  const parsed = schema.safeParse(raw ?? {});
  if (parsed.success) {
    return parsed.data;
  }

  const issues = parsed.error.issues;
  const field = issues[0]?.path.join(".");
  const detail = issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
  throw new InvalidInputError(`Invalid arguments: ${detail}`, field || undefined);
}
