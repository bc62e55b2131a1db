/**
 * Search tuning loader.
 *
 * Index names, over-scan factor, thresholds and label filters have defaults
 * matching the memory graph schema. A JSON file at `MEMORY_MCP_CONFIG_PATH`
 * may override any subset of them; it is validated with zod at startup.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as z from "zod";
import * as env from "./env.js";
import { logger } from "./utils/logger.js";

const searchConfigSchema = z.object({
  /** Vector index over `CommunitySummary` nodes. */
  communityIndex: z.string().min(1),
  /** Vector index over `Entity` nodes. */
  entityIndex: z.string().min(1),
  /** Global search scans `limit * overscanFactor` candidates before filtering. */
  overscanFactor: z.number().int().min(1).max(100),
  minMemberCount: z.number().int().min(0),
  /** Multiplier applied to the threshold on the relaxed pass. */
  relaxationFactor: z.number().gt(0).max(1),
  /** Candidates returned when both threshold passes come back empty. */
  fallbackCount: z.number().int().min(1),
  embeddingDimension: z.number().int().min(1),
  /** Labels never reported as neighbors in local search. */
  excludedLabels: z.array(z.string().min(1)),
  /** Node properties holding vectors; stripped from every tool result. */
  vectorProperties: z.array(z.string().min(1)),
  /** Neighbors whose observations are collected alongside the center's. */
  observationNeighborCount: z.number().int().min(0),
  observationsPerNeighbor: z.number().int().min(0),
  suggestionLimit: z.number().int().min(1),
});

export type SearchConfig = z.infer<typeof searchConfigSchema>;

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  communityIndex: "community_summary_vector_idx",
  entityIndex: "entity_jina_vec_v3_idx",
  overscanFactor: 10,
  minMemberCount: 3,
  relaxationFactor: 0.8,
  fallbackCount: 3,
  embeddingDimension: env.MEMORY_MCP_EMBEDDING_DIMENSION,
  excludedLabels: [
    "Day",
    "Month",
    "Year",
    "ConversationSession",
    "ConversationMessage",
    "Chunk",
    "ConversationSummary",
    "Observation",
  ],
  vectorProperties: ["jina_vec_v3", "embedding", "summary_embedding"],
  observationNeighborCount: 5,
  observationsPerNeighbor: 3,
  suggestionLimit: 5,
};

/**
 * Validates an override object and merges it over the defaults.
 * @throws Error listing every invalid field
 */
export function parseSearchConfig(raw: unknown): SearchConfig {
  const parsed = searchConfigSchema.partial().strict().safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid search configuration: ${issues}`);
  }

  const overrides = Object.fromEntries(
    Object.entries(parsed.data).filter(([, value]) => value !== undefined),
  );
  return searchConfigSchema.parse({ ...DEFAULT_SEARCH_CONFIG, ...overrides });
}

/**
 * Loads the tuning file. A missing file yields the defaults; an unreadable or
 * invalid one throws so the server refuses to start half-configured.
 */
export function loadSearchConfig(configPath: string = env.MEMORY_MCP_CONFIG_PATH): SearchConfig {
  const resolved = path.resolve(process.cwd(), configPath);
  if (!fs.existsSync(resolved)) {
    logger.debug("[Config] No tuning file, using defaults", { path: resolved });
    return DEFAULT_SEARCH_CONFIG;
  }

  const text = fs.readFileSync(resolved, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(
      `Invalid search configuration: ${resolved} is not valid JSON (${error instanceof Error ? error.message : String(error)})`,
    );
  }

  const config = parseSearchConfig(raw);
  logger.info("[Config] Loaded search tuning", { path: resolved });
  return config;
}
