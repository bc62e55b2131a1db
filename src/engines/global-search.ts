/**
 * @file engines/global-search
 * @description Community-level search: embeds the query, over-scans the
 * community summary vector index, drops small communities and ranks the rest
 * with a cascading similarity threshold.
 */

import type { SearchConfig } from "../config.js";
import type { QueryBackend, VectorMatch } from "../graph/types.js";
import type { EmbeddingService } from "../vector/embedding-client.js";
import { BackendError, EmbeddingError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { toOptionalString, toSafeNumber } from "../utils/conversions.js";
import {
  validateIntInRange,
  validateNumberInRange,
  validateQuery,
} from "../utils/validation.js";

export const GLOBAL_SEARCH_LIMITS = {
  minLimit: 1,
  maxLimit: 20,
  defaultLimit: 5,
  defaultMinSimilarity: 0.6,
} as const;

export const NO_COMMUNITIES_MESSAGE =
  "No relevant communities found. Try broader search terms or local search.";

const COMMUNITY_LABEL = "CommunitySummary";

export interface GlobalSearchRequest {
  query: string;
  limit?: number;
  minSimilarity?: number;
}

export interface CommunityCandidate {
  communityId: string | number | null;
  name: string;
  summary: string;
  memberCount: number;
  score: number;
}

export interface RankedCommunity extends CommunityCandidate {
  rank: number;
}

/**
 * - `threshold`: at least one candidate met `minSimilarity`
 * - `relaxed_threshold`: none did, but some met `minSimilarity * relaxationFactor`
 * - `top_candidates`: neither pass matched; best few candidates returned anyway
 * - `none`: no candidate survived the member-count filter
 */
export type ThresholdStrategy = "threshold" | "relaxed_threshold" | "top_candidates" | "none";

export interface RankingOutcome {
  communities: RankedCommunity[];
  strategy: ThresholdStrategy;
  appliedThreshold: number | null;
}

export interface GlobalSearchResult extends RankingOutcome {
  query: string;
  limit: number;
  minSimilarity: number;
  scanLimit: number;
  candidateCount: number;
  message?: string;
  timings: {
    embeddingMs: number;
    searchMs: number;
    totalMs: number;
  };
}

function elapsed(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}

function toCandidate(match: VectorMatch): CommunityCandidate | null {
  if (!match.labels.includes(COMMUNITY_LABEL)) return null;
  const { properties } = match;
  const id = properties.community_id;
  return {
    communityId: typeof id === "string" || typeof id === "number" ? id : null,
    name: toOptionalString(properties.name) ?? "",
    summary: toOptionalString(properties.summary) ?? "",
    memberCount: toSafeNumber(properties.member_count) ?? 0,
    score: match.score,
  };
}

/**
 * Keeps candidates with at least `minMemberCount` members, ordered by
 * descending score (ties keep index order), truncated to `limit`.
 */
export function selectCandidates(
  matches: VectorMatch[],
  limit: number,
  minMemberCount: number,
): CommunityCandidate[] {
  return matches
    .map(toCandidate)
    .filter((candidate): candidate is CommunityCandidate => candidate !== null)
    .filter((candidate) => candidate.memberCount >= minMemberCount)
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => b.candidate.score - a.candidate.score || a.index - b.index)
    .slice(0, limit)
    .map(({ candidate }) => candidate);
}

/**
 * Threshold cascade over score-ordered candidates.
 */
export function rankCommunities(
  candidates: CommunityCandidate[],
  minSimilarity: number,
  config: Pick<SearchConfig, "relaxationFactor" | "fallbackCount">,
): RankingOutcome {
  const withRank = (list: CommunityCandidate[]): RankedCommunity[] =>
    list.map((candidate, index) => ({ ...candidate, rank: index + 1 }));

  if (candidates.length === 0) {
    return { communities: [], strategy: "none", appliedThreshold: null };
  }

  const strict = candidates.filter((candidate) => candidate.score >= minSimilarity);
  if (strict.length > 0) {
    return { communities: withRank(strict), strategy: "threshold", appliedThreshold: minSimilarity };
  }

  const relaxedThreshold = minSimilarity * config.relaxationFactor;
  const relaxed = candidates.filter((candidate) => candidate.score >= relaxedThreshold);
  if (relaxed.length > 0) {
    return {
      communities: withRank(relaxed),
      strategy: "relaxed_threshold",
      appliedThreshold: relaxedThreshold,
    };
  }

  return {
    communities: withRank(candidates.slice(0, config.fallbackCount)),
    strategy: "top_candidates",
    appliedThreshold: null,
  };
}

export class GlobalSearchEngine {
  constructor(
    private readonly backend: QueryBackend,
    private readonly embeddings: EmbeddingService,
    private readonly config: SearchConfig,
  ) {}

  async search(request: GlobalSearchRequest): Promise<GlobalSearchResult> {
    const startedAt = performance.now();

    const query = validateQuery(request.query);
    const limit = validateIntInRange(
      request.limit ?? GLOBAL_SEARCH_LIMITS.defaultLimit,
      "limit",
      GLOBAL_SEARCH_LIMITS.minLimit,
      GLOBAL_SEARCH_LIMITS.maxLimit,
    );
    const minSimilarity = validateNumberInRange(
      request.minSimilarity ?? GLOBAL_SEARCH_LIMITS.defaultMinSimilarity,
      "min_similarity",
      0,
      1,
    );

    const embedStart = performance.now();
    const vector = await this.embeddings.embed(query);
    if (vector.length !== this.config.embeddingDimension) {
      throw new EmbeddingError(
        `Invalid embedding dimension: ${vector.length} (expected ${this.config.embeddingDimension})`,
      );
    }
    const embeddingMs = elapsed(embedStart);

    const searchStart = performance.now();
    const scanLimit = limit * this.config.overscanFactor;
    const scanned = await this.backend.vectorQuery(this.config.communityIndex, scanLimit, vector);
    if (scanned.error) {
      throw new BackendError(
        scanned.errorKind ?? "query",
        `Community vector search failed: ${scanned.error}`,
      );
    }

    const candidates = selectCandidates(scanned.matches, limit, this.config.minMemberCount);
    const ranking = rankCommunities(candidates, minSimilarity, this.config);
    const searchMs = elapsed(searchStart);

    if (ranking.strategy === "relaxed_threshold" || ranking.strategy === "top_candidates") {
      logger.info("[GlobalSearch] Similarity threshold relaxed", {
        strategy: ranking.strategy,
        minSimilarity,
        candidates: candidates.length,
      });
    }

    return {
      query,
      limit,
      minSimilarity,
      scanLimit,
      candidateCount: candidates.length,
      ...ranking,
      ...(ranking.communities.length === 0 ? { message: NO_COMMUNITIES_MESSAGE } : {}),
      timings: { embeddingMs, searchMs, totalMs: elapsed(startedAt) },
    };
  }
}
