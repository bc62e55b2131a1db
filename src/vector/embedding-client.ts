/**
 * @file vector/embedding-client
 * @description HTTP client for an OpenAI/Jina-compatible embeddings endpoint.
 */

import * as z from "zod";
import { EmbeddingError, errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { EmbeddingCache } from "./embedding-cache.js";

export interface EmbeddingService {
  /** Returns a vector of exactly `dimension` numbers or throws `EmbeddingError`. */
  embed(text: string): Promise<number[]>;
  isAvailable(): boolean;
  readonly dimension: number;
}

export interface EmbeddingClientOptions {
  url?: string;
  apiKey?: string;
  model: string;
  dimension: number;
  timeoutMs: number;
  cache?: EmbeddingCache;
}

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number()),
      }),
    )
    .min(1),
});

export class HttpEmbeddingClient implements EmbeddingService {
  readonly dimension: number;

  constructor(private readonly options: EmbeddingClientOptions) {
    this.dimension = options.dimension;
  }

  isAvailable(): boolean {
    return Boolean(this.options.url);
  }

  async embed(text: string): Promise<number[]> {
    const input = text.trim();
    if (input.length === 0) {
      throw new EmbeddingError("Cannot embed empty text");
    }
    if (!this.options.url) {
      throw new EmbeddingError("Embedding service is not configured (MEMORY_MCP_EMBEDDING_URL)");
    }

    const cacheKey = EmbeddingCache.keyFor(this.options.model, input);
    const cached = this.options.cache?.get(cacheKey);
    if (cached) {
      return cached;
    }

    const vector = await this.request(this.options.url, input);
    if (vector.length !== this.dimension) {
      throw new EmbeddingError(
        `Invalid embedding dimension: ${vector.length} (expected ${this.dimension})`,
      );
    }

    this.options.cache?.set(cacheKey, vector);
    return vector;
  }

  private async request(url: string, input: string): Promise<number[]> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify({
          model: this.options.model,
          input: [input],
          dimensions: this.dimension,
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      logger.warn("[Embeddings] Request failed", { cause: errorMessage(error) });
      throw new EmbeddingError(`Embedding service unreachable: ${errorMessage(error)}`, true);
    }

    if (!response.ok) {
      const retryable = response.status === 429 || response.status >= 500;
      logger.warn("[Embeddings] Service returned an error status", { status: response.status });
      throw new EmbeddingError(`Embedding service returned HTTP ${response.status}`, retryable);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new EmbeddingError(`Embedding service returned invalid JSON: ${errorMessage(error)}`);
    }

    const parsed = embeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingError("Embedding service returned an unexpected payload");
    }
    return parsed.data.data[0].embedding;
  }
}
