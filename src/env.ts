/**
 * Centralized environment configuration.
 *
 * This is the ONLY place in the codebase that reads `process.env`.
 * Every other module imports the constants it needs from here.
 *
 * Copy `.env.example` to `.env` and adjust the values for your setup.
 */

import * as dotenv from "dotenv";

// Load .env file as early as possible so all subsequent reads see the values.
dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

// ── Transport ─────────────────────────────────────────────────────────────────

/**
 * Transport mode for the MCP server.
 * Env: MEMORY_MCP_TRANSPORT
 * Default: "sse"
 */
export const MEMORY_MCP_TRANSPORT: "sse" | "stdio" =
  process.env.MEMORY_MCP_TRANSPORT === "stdio" ? "stdio" : "sse";

/**
 * HTTP port for the SSE transport.
 * Env: PORT
 * Default: 8080
 */
export const PORT: number = intFromEnv("PORT", 8080);

/**
 * Interface the HTTP server binds to.
 * Env: MEMORY_MCP_HOST
 * Default: "0.0.0.0"
 */
export const MEMORY_MCP_HOST: string = process.env.MEMORY_MCP_HOST || "0.0.0.0";

/**
 * Display name reported by the MCP server.
 * Env: MEMORY_MCP_SERVER_NAME
 * Default: "memory-graph-mcp"
 */
export const MEMORY_MCP_SERVER_NAME: string =
  process.env.MEMORY_MCP_SERVER_NAME || "memory-graph-mcp";

// ── Neo4j (graph database) ────────────────────────────────────────────────────

/**
 * Bolt/neo4j URI of the graph database.
 * Env: NEO4J_URI
 * Default: "neo4j://localhost:7687"
 */
export const NEO4J_URI: string = process.env.NEO4J_URI || "neo4j://localhost:7687";

/**
 * Env: NEO4J_USERNAME
 * Default: "neo4j"
 */
export const NEO4J_USERNAME: string = process.env.NEO4J_USERNAME || "neo4j";

/**
 * Env: NEO4J_PASSWORD
 * Default: "" (no password)
 */
export const NEO4J_PASSWORD: string = process.env.NEO4J_PASSWORD || "";

/**
 * Target database name. Undefined uses the server's default database.
 * Env: NEO4J_DATABASE
 */
export const NEO4J_DATABASE: string | undefined = process.env.NEO4J_DATABASE || undefined;

/**
 * Maximum Neo4j connection pool size.
 * Env: MEMORY_MCP_NEO4J_MAX_POOL_SIZE
 * Default: 50
 */
export const MEMORY_MCP_NEO4J_MAX_POOL_SIZE: number = intFromEnv(
  "MEMORY_MCP_NEO4J_MAX_POOL_SIZE",
  50,
);

/**
 * Neo4j connection acquisition timeout in milliseconds.
 * Env: MEMORY_MCP_NEO4J_CONNECTION_TIMEOUT_MS
 * Default: 60000 (60 seconds)
 */
export const MEMORY_MCP_NEO4J_CONNECTION_TIMEOUT_MS: number = intFromEnv(
  "MEMORY_MCP_NEO4J_CONNECTION_TIMEOUT_MS",
  60_000,
);

/**
 * Maximum lifetime of a pooled connection in milliseconds.
 * Env: MEMORY_MCP_NEO4J_MAX_CONNECTION_LIFETIME_MS
 * Default: 1800000 (30 minutes)
 */
export const MEMORY_MCP_NEO4J_MAX_CONNECTION_LIFETIME_MS: number = intFromEnv(
  "MEMORY_MCP_NEO4J_MAX_CONNECTION_LIFETIME_MS",
  30 * 60 * 1000,
);

// ── Embeddings ────────────────────────────────────────────────────────────────

/**
 * OpenAI/Jina-compatible embeddings endpoint. When unset, semantic search
 * features fall back to text matching and global search reports an
 * embedding failure.
 * Env: MEMORY_MCP_EMBEDDING_URL
 */
export const MEMORY_MCP_EMBEDDING_URL: string | undefined =
  process.env.MEMORY_MCP_EMBEDDING_URL || undefined;

/**
 * Bearer token sent to the embeddings endpoint.
 * Env: MEMORY_MCP_EMBEDDING_API_KEY
 */
export const MEMORY_MCP_EMBEDDING_API_KEY: string | undefined =
  process.env.MEMORY_MCP_EMBEDDING_API_KEY || undefined;

/**
 * Env: MEMORY_MCP_EMBEDDING_MODEL
 * Default: "jina-embeddings-v3"
 */
export const MEMORY_MCP_EMBEDDING_MODEL: string =
  process.env.MEMORY_MCP_EMBEDDING_MODEL || "jina-embeddings-v3";

/**
 * Vector width every index in the deployment expects.
 * Env: MEMORY_MCP_EMBEDDING_DIMENSION
 * Default: 256
 */
export const MEMORY_MCP_EMBEDDING_DIMENSION: number = intFromEnv(
  "MEMORY_MCP_EMBEDDING_DIMENSION",
  256,
);

/**
 * Entries kept in the in-process embedding cache.
 * Env: MEMORY_MCP_EMBEDDING_CACHE_SIZE
 * Default: 1000
 */
export const MEMORY_MCP_EMBEDDING_CACHE_SIZE: number = intFromEnv(
  "MEMORY_MCP_EMBEDDING_CACHE_SIZE",
  1000,
);

/**
 * Per-request timeout for the embeddings endpoint in milliseconds.
 * Env: MEMORY_MCP_EMBEDDING_TIMEOUT_MS
 * Default: 15000
 */
export const MEMORY_MCP_EMBEDDING_TIMEOUT_MS: number = intFromEnv(
  "MEMORY_MCP_EMBEDDING_TIMEOUT_MS",
  15_000,
);

// ── Sessions ──────────────────────────────────────────────────────────────────

/**
 * Ceiling on concurrently open SSE sessions.
 * Env: MEMORY_MCP_MAX_SESSIONS
 * Default: 50
 */
export const MEMORY_MCP_MAX_SESSIONS: number = intFromEnv("MEMORY_MCP_MAX_SESSIONS", 50);

/**
 * Idle time after which the sweep releases a session.
 * Env: MEMORY_MCP_SESSION_TIMEOUT_MS
 * Default: 7200000 (2 hours)
 */
export const MEMORY_MCP_SESSION_TIMEOUT_MS: number = intFromEnv(
  "MEMORY_MCP_SESSION_TIMEOUT_MS",
  2 * 60 * 60 * 1000,
);

/**
 * Interval of the idle-session sweep.
 * Env: MEMORY_MCP_SWEEP_INTERVAL_MS
 * Default: 60000
 */
export const MEMORY_MCP_SWEEP_INTERVAL_MS: number = intFromEnv(
  "MEMORY_MCP_SWEEP_INTERVAL_MS",
  60_000,
);

/**
 * Resident set size (MB) above which new sessions are refused.
 * Env: MEMORY_MCP_MEMORY_LIMIT_MB
 * Default: 1024
 */
export const MEMORY_MCP_MEMORY_LIMIT_MB: number = intFromEnv("MEMORY_MCP_MEMORY_LIMIT_MB", 1024);

/**
 * Interval of the memory-pressure sample.
 * Env: MEMORY_MCP_MEMORY_CHECK_INTERVAL_MS
 * Default: 10000
 */
export const MEMORY_MCP_MEMORY_CHECK_INTERVAL_MS: number = intFromEnv(
  "MEMORY_MCP_MEMORY_CHECK_INTERVAL_MS",
  10_000,
);

/**
 * Interval between SSE keepalive comments.
 * Env: MEMORY_MCP_KEEPALIVE_INTERVAL_MS
 * Default: 30000
 */
export const MEMORY_MCP_KEEPALIVE_INTERVAL_MS: number = intFromEnv(
  "MEMORY_MCP_KEEPALIVE_INTERVAL_MS",
  30_000,
);

/**
 * Retry-After hint (seconds) sent with rejected connections.
 * Env: MEMORY_MCP_RETRY_AFTER_SECONDS
 * Default: 30
 */
export const MEMORY_MCP_RETRY_AFTER_SECONDS: number = intFromEnv(
  "MEMORY_MCP_RETRY_AFTER_SECONDS",
  30,
);

// ── Search tuning ─────────────────────────────────────────────────────────────

/**
 * Optional JSON file with search tuning overrides (see config.ts).
 * Env: MEMORY_MCP_CONFIG_PATH
 * Default: "memory-mcp.config.json" in the working directory
 */
export const MEMORY_MCP_CONFIG_PATH: string =
  process.env.MEMORY_MCP_CONFIG_PATH || "memory-mcp.config.json";

// ── Logging ───────────────────────────────────────────────────────────────────

/**
 * Minimum log level: debug | info | warn | error.
 * Env: MEMORY_MCP_LOG_LEVEL
 * Default: "info"
 */
export const MEMORY_MCP_LOG_LEVEL: string = (
  process.env.MEMORY_MCP_LOG_LEVEL || "info"
).toLowerCase();
