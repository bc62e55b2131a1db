import { createHash } from "node:crypto";

/**
 * Bounded least-recently-used cache of query embeddings, keyed by the
 * SHA-256 of the model name and input text. Owned by whoever constructs it
 * and injected into the embedding client.
 */
export class EmbeddingCache {
  private readonly entries = new Map<string, number[]>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxEntries: number) {}

  static keyFor(model: string, text: string): string {
    return createHash("sha256").update(`${model}\u0000${text}`).digest("hex");
  }

  get(key: string): number[] | undefined {
    const vector = this.entries.get(key);
    if (vector === undefined) {
      this.misses += 1;
      return undefined;
    }
    // refresh recency
    this.entries.delete(key);
    this.entries.set(key, vector);
    this.hits += 1;
    return vector;
  }

  set(key: string, vector: number[]): void {
    if (this.maxEntries <= 0) return;
    this.entries.delete(key);
    this.entries.set(key, vector);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): { size: number; maxEntries: number; hits: number; misses: number } {
    return { size: this.entries.size, maxEntries: this.maxEntries, hits: this.hits, misses: this.misses };
  }
}
