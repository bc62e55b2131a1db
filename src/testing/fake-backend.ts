/**
 * In-process stand-in for the Neo4j client used by engine and tool tests.
 * Handlers are registered per named statement from `MEMORY_QUERIES`; any
 * other Cypher falls through to the `onOther` handler.
 */

import { MEMORY_QUERIES, type MemoryQueryName } from "../engines/memory-queries.js";
import type { QueryBackend, QueryResult, VectorQueryResult } from "../graph/types.js";

export type QueryHandler = (
  params: Record<string, unknown>,
) => QueryResult | Record<string, unknown>[];

export interface RecordedCall {
  query: string;
  params: Record<string, unknown>;
}

export class FakeBackend implements QueryBackend {
  readonly calls: RecordedCall[] = [];
  readonly vectorCalls: Array<{ indexName: string; k: number; vector: number[] }> = [];
  connected = true;

  private readonly handlers = new Map<string, QueryHandler>();
  private readonly vectorResults = new Map<string, VectorQueryResult>();
  private fallback: QueryHandler = () => [];

  on(name: MemoryQueryName, handler: QueryHandler): this {
    this.handlers.set(MEMORY_QUERIES[name], handler);
    return this;
  }

  onOther(handler: QueryHandler): this {
    this.fallback = handler;
    return this;
  }

  onVector(indexName: string, result: VectorQueryResult): this {
    this.vectorResults.set(indexName, result);
    return this;
  }

  callsTo(name: MemoryQueryName): RecordedCall[] {
    return this.calls.filter((call) => call.query === MEMORY_QUERIES[name]);
  }

  async executeCypher(query: string, params: Record<string, unknown> = {}): Promise<QueryResult> {
    this.calls.push({ query, params });
    const handler = this.handlers.get(query) ?? this.fallback;
    const outcome = handler(params);
    return Array.isArray(outcome) ? { data: outcome } : outcome;
  }

  async vectorQuery(indexName: string, k: number, vector: number[]): Promise<VectorQueryResult> {
    this.vectorCalls.push({ indexName, k, vector });
    return this.vectorResults.get(indexName) ?? { matches: [] };
  }

  isConnected(): boolean {
    return this.connected;
  }
}

export function failing(error: string, errorKind: QueryResult["errorKind"] = "query"): QueryHandler {
  return () => ({ data: [], error, errorKind });
}
