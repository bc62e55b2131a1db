import { describe, expect, it } from "vitest";
import { ISOLATED_ENTITY_MESSAGE, NOT_FOUND_RETRY_HINT } from "../../engines/local-search.js";
import { FakeBackend } from "../../testing/fake-backend.js";
import { createTestToolContext } from "../../testing/tool-context.js";
import { InvalidInputError } from "../../utils/errors.js";
import type { ToolDefinition } from "../types.js";
import { graphragToolDefinitions } from "./graphrag-tools.js";

function tool(name: string): ToolDefinition {
  const definition = graphragToolDefinitions.find((candidate) => candidate.name === name);
  if (!definition) throw new Error(`missing tool ${name}`);
  return definition;
}

describe("graphrag_global_search", () => {
  it("maps ranked communities to the snake_case payload", async () => {
    const backend = new FakeBackend().onVector("community_summary_vector_idx", {
      matches: [
        {
          labels: ["CommunitySummary"],
          properties: { community_id: 7, name: "Climbing", summary: "Weekend climbing trips", member_count: 5 },
          score: 0.82,
        },
      ],
    });
    const ctx = createTestToolContext({ backend });

    const payload = await tool("graphrag_global_search").impl({ query: "outdoor hobbies" }, ctx);

    expect(payload).toMatchObject({
      query: "outdoor hobbies",
      communities: [
        {
          community_id: 7,
          name: "Climbing",
          summary: "Weekend climbing trips",
          member_count: 5,
          similarity_score: 0.82,
          rank: 1,
        },
      ],
      ranking: {
        strategy: "threshold",
        min_similarity: 0.6,
        applied_threshold: 0.6,
        candidate_count: 1,
        scan_limit: 50,
      },
    });
    expect(backend.vectorCalls[0]?.k).toBe(50);
  });

  it("rejects arguments of the wrong type", async () => {
    const ctx = createTestToolContext();
    await expect(tool("graphrag_global_search").impl({ query: 5 }, ctx)).rejects.toMatchObject({
      errorType: "invalid_input",
      field: "query",
    });
    await expect(
      tool("graphrag_global_search").impl({ query: "x", limit: 21 }, ctx),
    ).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe("graphrag_local_search", () => {
  it("returns suggestions when the entity is unknown", async () => {
    const backend = new FakeBackend()
      .on("findEntity", () => [])
      .on("suggestEntities", () => [{ name: "Acme Corp" }]);
    const ctx = createTestToolContext({ backend });

    const payload = await tool("graphrag_local_search").impl({ entity_name: "Acme" }, ctx);

    expect(payload).toEqual({
      error: "Entity 'Acme' not found",
      error_type: "entity_not_found",
      suggestions: ["Acme Corp"],
      retry_suggestion: NOT_FOUND_RETRY_HINT,
    });
  });

  it("describes an isolated entity", async () => {
    const backend = new FakeBackend().on("findEntity", () => [
      { name: "Lonely Island", entityType: "Place", aliases: [], labels: ["Entity"] },
    ]);
    const ctx = createTestToolContext({ backend });

    const payload = await tool("graphrag_local_search").impl(
      { entity_name: "lonely island", depth: 1 },
      ctx,
    );

    expect(payload).toMatchObject({
      query: "lonely island",
      center_entity: {
        name: "Lonely Island",
        entity_type: "Place",
        aliases: [],
        labels: ["Entity"],
        observations: [],
      },
      one_hop_neighbors: [],
      two_hop_neighbors: [],
      summary: {
        total_neighbors: 0,
        one_hop_count: 0,
        two_hop_count: 0,
        entities_with_observations: 0,
        message: ISOLATED_ENTITY_MESSAGE,
      },
    });
    expect(payload).not.toHaveProperty("warnings");
    expect(backend.callsTo("twoHopNeighbors")).toHaveLength(0);
  });
});
