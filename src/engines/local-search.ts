/**
 * @file engines/local-search
 * @description Entity-neighborhood search: resolves an entity by name or
 * alias, walks its 1-hop and 2-hop neighborhood (skipping infrastructure
 * nodes) and attaches the newest observations of the center and its closest
 * neighbors.
 *
 * The 2-hop walk, observation gathering and suggestion lookup are optional
 * steps: their failures are logged and reported in `warnings` while the rest
 * of the result is still returned.
 */

import type { SearchConfig } from "../config.js";
import type { QueryBackend } from "../graph/types.js";
import {
  BackendError,
  stepFailed,
  stepOk,
  type StepResult,
} from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { toOptionalString, toSafeNumber, toStringArray } from "../utils/conversions.js";
import { validateIntInRange, validateQuery } from "../utils/validation.js";
import { MEMORY_QUERIES } from "./memory-queries.js";

export const LOCAL_SEARCH_LIMITS = {
  depth: { min: 1, max: 2, default: 2 },
  hop1Limit: { min: 1, max: 50, default: 20 },
  hop2Limit: { min: 1, max: 30, default: 10 },
  observationLimit: { min: 1, max: 20, default: 10 },
} as const;

export const ISOLATED_ENTITY_MESSAGE =
  "Entity has no connections in the graph. This may indicate an isolated entity or incomplete data.";

export const NOT_FOUND_RETRY_HINT =
  "Try one of the suggested entity names or use search_nodes() for semantic search";

export interface LocalSearchRequest {
  entityName: string;
  depth?: number;
  hop1Limit?: number;
  hop2Limit?: number;
  observationLimit?: number;
}

export interface ObservationRecord {
  content: string;
  createdAt: string | null;
  theme: string | null;
  importance: number | null;
}

export interface CenterEntity {
  name: string;
  entityType: string | null;
  aliases: string[];
  labels: string[];
  observations: ObservationRecord[];
}

export type RelationshipDirection = "outgoing" | "incoming";

export interface OneHopNeighbor {
  name: string;
  entityType: string | null;
  relationshipType: string;
  direction: RelationshipDirection;
  observations: ObservationRecord[];
}

export interface TwoHopNeighbor {
  name: string;
  entityType: string | null;
  viaEntity: string;
  relationshipPath: string;
}

export interface LocalSearchFound {
  status: "found";
  query: string;
  depth: number;
  center: CenterEntity;
  oneHop: OneHopNeighbor[];
  twoHop: TwoHopNeighbor[];
  summary: {
    totalNeighbors: number;
    oneHopCount: number;
    twoHopCount: number;
    entitiesWithObservations: number;
    message?: string;
  };
  timings: {
    lookupMs: number;
    traversalMs: number;
    observationMs: number;
    totalMs: number;
  };
  warnings: string[];
}

export interface LocalSearchNotFound {
  status: "not_found";
  errorType: "entity_not_found";
  query: string;
  message: string;
  suggestions: string[];
  retryHint: string;
}

export type LocalSearchResult = LocalSearchFound | LocalSearchNotFound;

interface NormalizedRequest {
  entityName: string;
  depth: number;
  hop1Limit: number;
  hop2Limit: number;
  observationLimit: number;
}

type OneHopRow = Omit<OneHopNeighbor, "observations">;

function elapsed(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}

function normalizeRequest(request: LocalSearchRequest): NormalizedRequest {
  const { depth, hop1Limit, hop2Limit, observationLimit } = LOCAL_SEARCH_LIMITS;
  return {
    entityName: validateQuery(request.entityName, "entity_name", 500),
    depth: validateIntInRange(request.depth ?? depth.default, "depth", depth.min, depth.max),
    hop1Limit: validateIntInRange(
      request.hop1Limit ?? hop1Limit.default,
      "hop1_limit",
      hop1Limit.min,
      hop1Limit.max,
    ),
    hop2Limit: validateIntInRange(
      request.hop2Limit ?? hop2Limit.default,
      "hop2_limit",
      hop2Limit.min,
      hop2Limit.max,
    ),
    observationLimit: validateIntInRange(
      request.observationLimit ?? observationLimit.default,
      "observation_limit",
      observationLimit.min,
      observationLimit.max,
    ),
  };
}

export class LocalSearchEngine {
  constructor(
    private readonly backend: QueryBackend,
    private readonly config: SearchConfig,
  ) {}

  async search(request: LocalSearchRequest): Promise<LocalSearchResult> {
    const startedAt = performance.now();
    const params = normalizeRequest(request);
    const warnings: string[] = [];

    const lookupStart = performance.now();
    const center = await this.findEntity(params.entityName);
    const lookupMs = elapsed(lookupStart);

    if (!center) {
      const suggestions = await this.findSimilarEntities(params.entityName);
      if (!suggestions.ok) {
        logger.warn("[LocalSearch] Suggestion lookup failed", { cause: suggestions.error });
      }
      return {
        status: "not_found",
        errorType: "entity_not_found",
        query: params.entityName,
        message: `Entity '${params.entityName}' not found`,
        suggestions: suggestions.ok ? suggestions.value : [],
        retryHint: NOT_FOUND_RETRY_HINT,
      };
    }

    const traversalStart = performance.now();
    const oneHopRows = await this.oneHop(center.name, params.hop1Limit);

    let twoHop: TwoHopNeighbor[] = [];
    if (params.depth === 2 && oneHopRows.length > 0) {
      const outcome = await this.twoHop(center.name, params.hop2Limit);
      if (outcome.ok) {
        twoHop = outcome.value;
      } else {
        logger.warn("[LocalSearch] 2-hop traversal failed, returning 1-hop only", {
          entity: center.name,
          cause: outcome.error,
        });
        warnings.push(`2-hop traversal failed: ${outcome.error}`);
      }
    }
    const traversalMs = elapsed(traversalStart);

    const observationStart = performance.now();
    const observedNeighbors = oneHopRows
      .slice(0, this.config.observationNeighborCount)
      .map((row) => row.name);
    const observed = await this.observations(
      [center.name, ...observedNeighbors],
      params.observationLimit,
    );
    let observationsByEntity = new Map<string, ObservationRecord[]>();
    if (observed.ok) {
      observationsByEntity = observed.value;
    } else {
      logger.warn("[LocalSearch] Observation gathering failed", {
        entity: center.name,
        cause: observed.error,
      });
      warnings.push(`Observation gathering failed: ${observed.error}`);
    }
    const observationMs = elapsed(observationStart);

    const neighborObservationNames = new Set(observedNeighbors);
    const oneHop: OneHopNeighbor[] = oneHopRows.map((row) => ({
      ...row,
      observations: neighborObservationNames.has(row.name)
        ? (observationsByEntity.get(row.name) ?? []).slice(0, this.config.observationsPerNeighbor)
        : [],
    }));

    const totalNeighbors = oneHop.length + twoHop.length;
    const entitiesWithObservations = [...observationsByEntity.values()].filter(
      (list) => list.length > 0,
    ).length;

    return {
      status: "found",
      query: params.entityName,
      depth: params.depth,
      center: { ...center, observations: observationsByEntity.get(center.name) ?? [] },
      oneHop,
      twoHop,
      summary: {
        totalNeighbors,
        oneHopCount: oneHop.length,
        twoHopCount: twoHop.length,
        entitiesWithObservations,
        ...(totalNeighbors === 0 ? { message: ISOLATED_ENTITY_MESSAGE } : {}),
      },
      timings: { lookupMs, traversalMs, observationMs, totalMs: elapsed(startedAt) },
      warnings,
    };
  }

  // ── Steps ─────────────────────────────────────────────────────────────────

  private async findEntity(entityName: string): Promise<Omit<CenterEntity, "observations"> | null> {
    const result = await this.backend.executeCypher(MEMORY_QUERIES.findEntity, {
      nameLower: entityName.toLowerCase(),
    });
    if (result.error) {
      throw new BackendError(result.errorKind ?? "query", `Entity lookup failed: ${result.error}`);
    }

    const row = result.data[0];
    const name = row ? toOptionalString(row.name) : null;
    if (!row || name === null) return null;

    return {
      name,
      entityType: toOptionalString(row.entityType),
      aliases: toStringArray(row.aliases),
      labels: toStringArray(row.labels),
    };
  }

  private async findSimilarEntities(entityName: string): Promise<StepResult<string[]>> {
    const result = await this.backend.executeCypher(MEMORY_QUERIES.suggestEntities, {
      fragment: entityName.toLowerCase(),
      limit: this.config.suggestionLimit,
    });
    if (result.error) return stepFailed(result.error);

    const names = result.data
      .map((row) => toOptionalString(row.name))
      .filter((name): name is string => name !== null);
    return stepOk(names);
  }

  private async oneHop(name: string, limit: number): Promise<OneHopRow[]> {
    const result = await this.backend.executeCypher(MEMORY_QUERIES.oneHopNeighbors, {
      name,
      limit,
      excludedLabels: this.config.excludedLabels,
    });
    if (result.error) {
      throw new BackendError(result.errorKind ?? "query", `1-hop traversal failed: ${result.error}`);
    }

    return result.data.map((row): OneHopRow => ({
      name: toOptionalString(row.name) ?? "",
      entityType: toOptionalString(row.entityType),
      relationshipType: toOptionalString(row.relationshipType) ?? "",
      direction: row.direction === "outgoing" ? "outgoing" : "incoming",
    }));
  }

  private async twoHop(name: string, limit: number): Promise<StepResult<TwoHopNeighbor[]>> {
    const result = await this.backend.executeCypher(MEMORY_QUERIES.twoHopNeighbors, {
      name,
      limit,
      excludedLabels: this.config.excludedLabels,
    });
    if (result.error) return stepFailed(result.error);

    return stepOk(
      result.data.map((row): TwoHopNeighbor => ({
        name: toOptionalString(row.name) ?? "",
        entityType: toOptionalString(row.entityType),
        viaEntity: toOptionalString(row.viaEntity) ?? "",
        relationshipPath: `${toOptionalString(row.firstRelationship) ?? ""} → ${
          toOptionalString(row.secondRelationship) ?? ""
        }`,
      })),
    );
  }

  private async observations(
    names: string[],
    perEntityLimit: number,
  ): Promise<StepResult<Map<string, ObservationRecord[]>>> {
    const uniqueNames = [...new Set(names)];
    const result = await this.backend.executeCypher(MEMORY_QUERIES.entityObservations, {
      names: uniqueNames,
    });
    if (result.error) return stepFailed(result.error);

    const grouped = new Map<string, ObservationRecord[]>();
    for (const row of result.data) {
      const owner = toOptionalString(row.entityName);
      const content = toOptionalString(row.content);
      if (owner === null || content === null) continue;

      const list = grouped.get(owner) ?? [];
      if (list.length >= perEntityLimit) continue;
      list.push({
        content,
        createdAt: toOptionalString(row.createdAt),
        theme: toOptionalString(row.theme),
        importance: toSafeNumber(row.importance),
      });
      grouped.set(owner, list);
    }
    return stepOk(grouped);
  }
}
