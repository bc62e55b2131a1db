/**
 * Builds a `ToolContext` around a `FakeBackend` for handler and router tests.
 */

import { DEFAULT_SEARCH_CONFIG, type SearchConfig } from "../config.js";
import { GlobalSearchEngine } from "../engines/global-search.js";
import { LocalSearchEngine } from "../engines/local-search.js";
import type { ServerStats, ToolCatalog, ToolContext } from "../tools/types.js";
import { EmbeddingError } from "../utils/errors.js";
import { EmbeddingCache } from "../vector/embedding-cache.js";
import type { EmbeddingService } from "../vector/embedding-client.js";
import { FakeBackend } from "./fake-backend.js";

/** Returns a constant vector, or throws when `failWith` is set. */
export class FakeEmbeddings implements EmbeddingService {
  readonly requests: string[] = [];
  available = true;
  failWith: string | null = null;

  constructor(readonly dimension: number) {}

  async embed(text: string): Promise<number[]> {
    this.requests.push(text);
    if (this.failWith !== null) {
      throw new EmbeddingError(this.failWith);
    }
    return Array.from({ length: this.dimension }, () => 0.5);
  }

  isAvailable(): boolean {
    return this.available;
  }
}

export interface TestToolContextOptions {
  backend?: FakeBackend;
  embeddings?: FakeEmbeddings;
  config?: SearchConfig;
  stats?: ServerStats;
  catalog?: ToolCatalog;
}

export function createTestToolContext(options: TestToolContextOptions = {}): ToolContext {
  const backend = options.backend ?? new FakeBackend();
  const config = options.config ?? DEFAULT_SEARCH_CONFIG;
  const embeddings = options.embeddings ?? new FakeEmbeddings(config.embeddingDimension);
  const stats = options.stats ?? { transport: "sse", activeSessions: 0, maxSessions: 50 };

  return {
    backend,
    embeddings,
    embeddingCache: new EmbeddingCache(10),
    config,
    globalSearch: new GlobalSearchEngine(backend, embeddings, config),
    localSearch: new LocalSearchEngine(backend, config),
    serverStats: () => stats,
    toolCatalog: () => options.catalog ?? { search: [], memory: [], conversation: [], graph: [] },
  };
}
