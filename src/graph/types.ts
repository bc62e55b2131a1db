/**
 * @file graph/types
 * @description Query backend contract shared by the Neo4j client, the search
 * engines and their in-memory test doubles.
 */

export type BackendErrorKind = "unavailable" | "query";

/**
 * Result envelope for a Cypher round trip. `executeCypher` never throws:
 * failures are reported through `error` with `errorKind` distinguishing a
 * down backend from a rejected query.
 */
export interface QueryResult {
  data: Record<string, unknown>[];
  error?: string;
  errorKind?: BackendErrorKind;
}

export interface VectorMatch {
  labels: string[];
  properties: Record<string, unknown>;
  score: number;
}

export interface VectorQueryResult {
  matches: VectorMatch[];
  error?: string;
  errorKind?: BackendErrorKind;
}

export interface QueryBackend {
  executeCypher(query: string, params?: Record<string, unknown>): Promise<QueryResult>;
  vectorQuery(indexName: string, k: number, vector: number[]): Promise<VectorQueryResult>;
  isConnected(): boolean;
}
