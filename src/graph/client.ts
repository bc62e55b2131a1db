/**
 * @file graph/client
 * @description Neo4j client wrapper for Cypher execution, vector index queries
 * and connection lifecycle.
 * @remarks Every query result flows through `toPlainRecord`, so callers never
 * see driver Integer or temporal objects.
 */

import neo4j, { type Driver } from "neo4j-driver";
import * as env from "../env.js";
import { logger } from "../utils/logger.js";
import { toPlainRecord, toSafeNumber, toStringArray } from "../utils/conversions.js";
import type {
  BackendErrorKind,
  QueryBackend,
  QueryResult,
  VectorMatch,
  VectorQueryResult,
} from "./types.js";

export type AccessMode = "READ" | "WRITE";

export interface Neo4jConfig {
  uri: string;
  username: string;
  password: string;
  database?: string;
  /** Access mode of every session the client opens. */
  accessMode: AccessMode;
}

/** Narrow view of a driver session; rows are already `toObject()`-ed. */
export interface GraphSession {
  run(query: string, params: Record<string, unknown>): Promise<Record<string, unknown>[]>;
  close(): Promise<void>;
}

export interface GraphDriver {
  session(accessMode: AccessMode, database?: string): GraphSession;
  close(): Promise<void>;
}

export type DriverFactory = (config: Neo4jConfig) => GraphDriver;

// ── Retry / resilience constants ─────────────────────────────────────────────

/** Delays (ms) between successive retry attempts: 100 → 400 → 1600 ms. */
const BACKOFF_INTERVALS_MS = [100, 400, 1600] as const;

/** Consecutive failures that open the circuit breaker. */
const CIRCUIT_BREAKER_THRESHOLD = 5;

/** Milliseconds the circuit stays open before entering half-open state. */
const CIRCUIT_BREAKER_COOLDOWN_MS = 30_000;

/** Interval for background liveness pings while connected (ms). */
const HEALTH_CHECK_INTERVAL_MS = 30_000;

const VECTOR_QUERY = `
CALL db.index.vector.queryNodes($indexName, $k, $vector)
YIELD node, score
RETURN labels(node) AS labels, properties(node) AS properties, score`;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function wrapDriver(driver: Driver): GraphDriver {
  return {
    session(accessMode, database) {
      const session = driver.session({ defaultAccessMode: accessMode, database });
      return {
        async run(query, params) {
          const result = await session.run(query, params);
          return result.records.map((record) => record.toObject());
        },
        close: () => session.close(),
      };
    },
    close: () => driver.close(),
  };
}

export const createNeo4jDriver: DriverFactory = (config) =>
  wrapDriver(
    neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password), {
      maxConnectionPoolSize: env.MEMORY_MCP_NEO4J_MAX_POOL_SIZE,
      connectionAcquisitionTimeout: env.MEMORY_MCP_NEO4J_CONNECTION_TIMEOUT_MS,
      maxConnectionLifetime: env.MEMORY_MCP_NEO4J_MAX_CONNECTION_LIFETIME_MS,
    }),
  );

/**
 * Bolt rejects JS floats where Cypher expects an integer (`LIMIT $limit`,
 * `queryNodes(..., $k, ...)`), so top-level safe integers are sent as driver
 * Integers. Undefined becomes null.
 */
export function toDriverParams(params: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(params).map(([key, value]) => {
      if (value === undefined) return [key, null];
      if (typeof value === "number" && Number.isSafeInteger(value)) return [key, neo4j.int(value)];
      return [key, value];
    }),
  );
}

/**
 * Neo4j client implementing the query backend.
 *
 * Resilience features:
 *  - **3-retry with exponential backoff** (100ms → 400ms → 1600ms) for
 *    transient errors (ServiceUnavailable, session expired, connection lost).
 *  - **Circuit breaker**: after 5 consecutive connection or transient failures
 *    the circuit opens and all queries fail fast for 30 s, then a single trial
 *    query is let through. Rejected queries (syntax, constraint) never count.
 *  - **Periodic health check**: background ping every 30 s while connected;
 *    a failed ping marks the client disconnected so the next query reconnects.
 */
export class Neo4jClient implements QueryBackend {
  private readonly config: Neo4jConfig;
  private driver: GraphDriver;
  private connected = false;
  private readonly queryRetryAttempts = 3;

  // ── Circuit breaker state ─────────────────────────────────────────────────

  private consecutiveFailures = 0;
  private circuitOpen = false;
  private circuitOpenAt = 0;

  private healthCheckHandle: NodeJS.Timeout | null = null;

  constructor(config: Partial<Neo4jConfig> = {}, driverFactory: DriverFactory = createNeo4jDriver) {
    this.config = {
      uri: config.uri || env.NEO4J_URI,
      username: config.username || env.NEO4J_USERNAME,
      password: config.password ?? env.NEO4J_PASSWORD,
      database: config.database ?? env.NEO4J_DATABASE,
      accessMode: config.accessMode || "READ",
    };
    this.driver = driverFactory(this.config);
    logger.info("[Neo4jClient] Initialized", {
      uri: this.config.uri,
      database: this.config.database ?? "(default)",
      accessMode: this.config.accessMode,
    });
  }

  async connect(): Promise<void> {
    const session = this.driver.session(this.config.accessMode, this.config.database);
    try {
      await session.run("RETURN 1", {});
      this.connected = true;
      this.resetCircuitBreaker();
      logger.info("[Neo4j] Connected successfully");
      this.startHealthCheck();
    } catch (error) {
      this.connected = false;
      logger.error("[Neo4j] Connection failed", error);
      throw error;
    } finally {
      await session.close();
    }
  }

  // ── Circuit breaker ───────────────────────────────────────────────────────

  private resetCircuitBreaker(): void {
    this.consecutiveFailures = 0;
    this.circuitOpen = false;
    this.circuitOpenAt = 0;
  }

  /** Open → half-open once the cooldown has elapsed. */
  private isCircuitOpen(): boolean {
    if (!this.circuitOpen) return false;
    if (Date.now() - this.circuitOpenAt >= CIRCUIT_BREAKER_COOLDOWN_MS) {
      logger.info("[Neo4j] Circuit breaker half-open, probing");
      this.circuitOpen = false;
      return false;
    }
    return true;
  }

  private recordQuerySuccess(): void {
    this.consecutiveFailures = 0;
    this.circuitOpen = false;
  }

  private recordQueryFailure(): void {
    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= CIRCUIT_BREAKER_THRESHOLD && !this.circuitOpen) {
      this.circuitOpen = true;
      this.circuitOpenAt = Date.now();
      logger.error("[Neo4j] Circuit breaker OPENED after consecutive failures", {
        threshold: CIRCUIT_BREAKER_THRESHOLD,
        cooldownMs: CIRCUIT_BREAKER_COOLDOWN_MS,
      });
    }
  }

  // ── Periodic health check ─────────────────────────────────────────────────

  private startHealthCheck(): void {
    if (this.healthCheckHandle) return;
    this.healthCheckHandle = setInterval(() => {
      void this.ping();
    }, HEALTH_CHECK_INTERVAL_MS);
    this.healthCheckHandle.unref();
  }

  private async ping(): Promise<void> {
    const session = this.driver.session(this.config.accessMode, this.config.database);
    try {
      await session.run("RETURN 1", {});
    } catch (error) {
      logger.warn("[Neo4j] Health check failed, marking as disconnected", {
        cause: error instanceof Error ? error.message : String(error),
      });
      this.connected = false;
      this.stopHealthCheck();
    } finally {
      await session.close().catch((closeError: unknown) => {
        logger.debug("[Neo4j] Session close after ping failed", closeError);
      });
    }
  }

  private stopHealthCheck(): void {
    if (this.healthCheckHandle) {
      clearInterval(this.healthCheckHandle);
      this.healthCheckHandle = null;
    }
  }

  // ── Public methods ────────────────────────────────────────────────────────

  async disconnect(): Promise<void> {
    this.stopHealthCheck();
    await this.driver.close();
    this.connected = false;
    logger.info("[Neo4j] Disconnected");
  }

  isConnected(): boolean {
    return this.connected;
  }

  async executeCypher(query: string, params: Record<string, unknown> = {}): Promise<QueryResult> {
    if (this.isCircuitOpen()) {
      return this.failure(
        "unavailable",
        "Circuit breaker open: Neo4j unavailable, retrying after cooldown",
      );
    }

    if (!this.connected) {
      logger.warn("[Neo4j] Not connected, attempting to connect before executing query");
      try {
        await this.connect();
      } catch (error) {
        this.recordQueryFailure();
        return this.failure(
          "unavailable",
          `Connection failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    const driverParams = toDriverParams(params);

    for (let attempt = 0; attempt <= this.queryRetryAttempts; attempt++) {
      if (attempt > 0) {
        const delayMs = BACKOFF_INTERVALS_MS[attempt - 1] ?? 1600;
        logger.warn("[Neo4j] Retrying query after backoff", {
          attempt,
          maxAttempts: this.queryRetryAttempts,
          delayMs,
        });
        await sleep(delayMs);
      }

      const session = this.driver.session(this.config.accessMode, this.config.database);
      try {
        const rows = await session.run(query, driverParams);
        this.recordQuerySuccess();
        return { data: rows.map(toPlainRecord) };
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        const transient = this.isRetryableQueryError(error);

        if (transient && attempt < this.queryRetryAttempts) {
          logger.warn("[Neo4j] Transient query error, will retry", {
            attempt: attempt + 1,
            maxAttempts: this.queryRetryAttempts,
            cause: errorMsg,
          });
          continue;
        }

        // malformed or rejected queries say nothing about backend health
        if (transient) this.recordQueryFailure();
        logger.error("[Neo4j] Query execution failed", {
          cause: errorMsg,
          query: query.substring(0, 200),
        });
        return this.failure(transient ? "unavailable" : "query", `Query failed: ${errorMsg}`);
      } finally {
        await session.close();
      }
    }

    this.recordQueryFailure();
    return this.failure("unavailable", "Query failed: exhausted retry attempts");
  }

  async vectorQuery(indexName: string, k: number, vector: number[]): Promise<VectorQueryResult> {
    const result = await this.executeCypher(VECTOR_QUERY, { indexName, k, vector });
    if (result.error) {
      return { matches: [], error: result.error, errorKind: result.errorKind };
    }

    const matches: VectorMatch[] = result.data.map((row) => ({
      labels: toStringArray(row.labels),
      properties:
        typeof row.properties === "object" && row.properties !== null && !Array.isArray(row.properties)
          ? toPlainRecord({ ...row.properties })
          : {},
      score: toSafeNumber(row.score) ?? 0,
    }));
    return { matches };
  }

  private failure(errorKind: BackendErrorKind, error: string): QueryResult {
    return { data: [], error, errorKind };
  }

  private isRetryableQueryError(error: unknown): boolean {
    const code =
      typeof error === "object" && error !== null && "code" in error ? String(error.code) : "";
    if (code === "ServiceUnavailable" || code === "SessionExpired" || code.includes("TransientError")) {
      return true;
    }
    const normalized = (error instanceof Error ? error.message : String(error)).toLowerCase();
    return (
      normalized.includes("serviceunavailable") ||
      normalized.includes("session expired") ||
      normalized.includes("connection") ||
      normalized.includes("temporarily unavailable")
    );
  }
}

export default Neo4jClient;
