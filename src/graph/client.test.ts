import neo4j from "neo4j-driver";
import { describe, expect, it, vi } from "vitest";
import { Neo4jClient, toDriverParams, type GraphSession } from "./client.js";

function fakeSession(run: GraphSession["run"]): GraphSession & { close: ReturnType<typeof vi.fn> } {
  return { run, close: vi.fn().mockResolvedValue(undefined) };
}

function fakeDriver(sessions: GraphSession[]) {
  const session = vi.fn();
  for (const entry of sessions) session.mockReturnValueOnce(entry);
  return { session, close: vi.fn().mockResolvedValue(undefined) };
}

async function connectedClient(sessions: GraphSession[]) {
  const driver = fakeDriver([fakeSession(vi.fn().mockResolvedValue([])), ...sessions]);
  const client = new Neo4jClient(
    { uri: "neo4j://graph.test:7687", username: "neo4j", password: "test-secret", database: "memory" },
    () => driver,
  );
  await client.connect();
  return { client, driver };
}

describe("Neo4jClient", () => {
  it("opens READ sessions against the configured database", async () => {
    const { client, driver } = await connectedClient([]);

    expect(client.isConnected()).toBe(true);
    expect(driver.session).toHaveBeenCalledWith("READ", "memory");
    await client.disconnect();
    expect(driver.close).toHaveBeenCalledTimes(1);
    expect(client.isConnected()).toBe(false);
  });

  it("sends integers as driver Integers and undefined as null", () => {
    const params = toDriverParams({ limit: 5, name: undefined, threshold: 0.5, vector: [1, 2] });

    expect(neo4j.isInt(params.limit)).toBe(true);
    expect(String(params.limit)).toBe("5");
    expect(params.name).toBeNull();
    expect(params.threshold).toBe(0.5);
    expect(params.vector).toEqual([1, 2]);
  });

  it("returns plain rows with driver Integers converted", async () => {
    const run = vi.fn().mockResolvedValue([{ entities: neo4j.int(42), name: "Acme Corp" }]);
    const { client } = await connectedClient([fakeSession(run)]);

    const result = await client.executeCypher("MATCH (e:Entity) RETURN count(e) AS entities");

    expect(result.error).toBeUndefined();
    expect(result.data).toEqual([{ entities: 42, name: "Acme Corp" }]);
  });

  it("retries transient query errors once and succeeds", async () => {
    const first = fakeSession(
      vi.fn().mockRejectedValue(new Error("ServiceUnavailable: temporary network hiccup")),
    );
    const second = fakeSession(vi.fn().mockResolvedValue([{ ok: true }]));
    const { client, driver } = await connectedClient([first, second]);

    const result = await client.executeCypher("RETURN true AS ok");

    expect(result.error).toBeUndefined();
    expect(result.data).toEqual([{ ok: true }]);
    expect(driver.session).toHaveBeenCalledTimes(3);
    expect(first.close).toHaveBeenCalledTimes(1);
    expect(second.close).toHaveBeenCalledTimes(1);
  });

  it("reports non-transient failures as query errors without retrying", async () => {
    const session = fakeSession(vi.fn().mockRejectedValue(new Error("SyntaxError: invalid cypher")));
    const { client, driver } = await connectedClient([session]);

    const result = await client.executeCypher("BROKEN QUERY");

    expect(result.data).toEqual([]);
    expect(result.errorKind).toBe("query");
    expect(result.error).toBe("Query failed: SyntaxError: invalid cypher");
    expect(driver.session).toHaveBeenCalledTimes(2);
  });

  it("returns an unavailable envelope when auto-connect fails", async () => {
    const driver = fakeDriver([fakeSession(vi.fn().mockRejectedValue(new Error("dial timeout")))]);
    const client = new Neo4jClient({ password: "test-secret" }, () => driver);

    const result = await client.executeCypher("RETURN 1");

    expect(result).toEqual({
      data: [],
      error: "Connection failed: dial timeout",
      errorKind: "unavailable",
    });
  });

  it("opens the circuit after five consecutive connection failures", async () => {
    const failing = Array.from({ length: 5 }, () =>
      fakeSession(vi.fn().mockRejectedValue(new Error("dial timeout"))),
    );
    const driver = fakeDriver(failing);
    const client = new Neo4jClient({ password: "test-secret" }, () => driver);

    for (let i = 0; i < 5; i++) {
      await client.executeCypher("RETURN 1");
    }
    const blocked = await client.executeCypher("RETURN 1");

    expect(blocked).toEqual({
      data: [],
      error: "Circuit breaker open: Neo4j unavailable, retrying after cooldown",
      errorKind: "unavailable",
    });
    expect(driver.session).toHaveBeenCalledTimes(5);
  });

  it("keeps the circuit closed after repeated malformed queries", async () => {
    const malformed = Array.from({ length: 5 }, () =>
      fakeSession(
        vi.fn().mockRejectedValue(
          Object.assign(new Error("Invalid input 'RETRN'"), {
            code: "Neo.ClientError.Statement.SyntaxError",
          }),
        ),
      ),
    );
    const valid = fakeSession(vi.fn().mockResolvedValue([{ n: 1 }]));
    const { client, driver } = await connectedClient([...malformed, valid]);

    for (let i = 0; i < 5; i++) {
      const result = await client.executeCypher("MATCH (n) RETRN n");
      expect(result.errorKind).toBe("query");
    }
    const result = await client.executeCypher("MATCH (n) RETURN 1 AS n LIMIT 1");

    expect(result).toEqual({ data: [{ n: 1 }] });
    expect(driver.session).toHaveBeenCalledTimes(7);
  });

  it("maps vector index rows to matches", async () => {
    const run = vi.fn().mockResolvedValue([
      {
        labels: ["CommunitySummary"],
        properties: { community_id: neo4j.int(7), name: "Infrastructure" },
        score: 0.91,
      },
    ]);
    const { client } = await connectedClient([fakeSession(run)]);

    const result = await client.vectorQuery("community_summary_vector_idx", 30, [0.1, 0.2]);

    expect(result.error).toBeUndefined();
    expect(result.matches).toEqual([
      {
        labels: ["CommunitySummary"],
        properties: { community_id: 7, name: "Infrastructure" },
        score: 0.91,
      },
    ]);
    const params = run.mock.calls[0][1];
    expect(params.indexName).toBe("community_summary_vector_idx");
    expect(String(params.k)).toBe("30");
    expect(params.vector).toEqual([0.1, 0.2]);
  });

  it("propagates vector query failures", async () => {
    const session = fakeSession(vi.fn().mockRejectedValue(new Error("There is no such vector schema index")));
    const { client } = await connectedClient([session]);

    const result = await client.vectorQuery("missing_idx", 10, [0.1]);

    expect(result.matches).toEqual([]);
    expect(result.errorKind).toBe("query");
  });
});
