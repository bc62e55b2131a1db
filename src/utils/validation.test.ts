import { describe, expect, it } from "vitest";
import { InvalidInputError } from "./errors.js";
import {
  ensureLimit,
  validateIntInRange,
  validateIsoDate,
  validateNumberInRange,
  validateQuery,
  validateReadOnlyCypher,
} from "./validation.js";

describe("validation utils", () => {
  it("validateQuery trims and rejects blank or non-string input", () => {
    expect(validateQuery("  who is Julian?  ")).toBe("who is Julian?");
    expect(() => validateQuery("   ")).toThrow("query must not be empty");
    expect(() => validateQuery(42, "entity_name")).toThrow("entity_name must be a string");
    expect(() => validateQuery("abcdef", "query", 5)).toThrow(
      "query must be at most 5 characters (received 6)",
    );
  });

  it("validateIntInRange names the field and the received value", () => {
    expect(validateIntInRange(20, "limit", 1, 20)).toBe(20);
    expect(() => validateIntInRange(0, "limit", 1, 20)).toThrow(
      "limit must be between 1 and 20 (received 0)",
    );
    expect(() => validateIntInRange(2.5, "depth", 1, 2)).toThrow("depth must be an integer");
  });

  it("validateNumberInRange accepts fractional values at the bounds", () => {
    expect(validateNumberInRange(0, "min_similarity", 0, 1)).toBe(0);
    expect(validateNumberInRange(1, "min_similarity", 0, 1)).toBe(1);
    expect(() => validateNumberInRange(1.5, "min_similarity", 0, 1)).toThrow(
      "min_similarity must be between 0 and 1 (received 1.5)",
    );
    expect(() => validateNumberInRange(Number.NaN, "min_similarity", 0, 1)).toThrow(
      "min_similarity must be a number",
    );
  });

  it("validateIsoDate accepts real calendar dates only", () => {
    expect(validateIsoDate("2024-02-29", "start_date")).toBe("2024-02-29");
    expect(() => validateIsoDate("2023-02-29", "start_date")).toThrow(
      "start_date is not a valid calendar date (received 2023-02-29)",
    );
    expect(() => validateIsoDate("29/02/2024", "end_date")).toThrow(
      "end_date must be a date in YYYY-MM-DD format",
    );
  });

  it("validation errors carry the offending field", () => {
    try {
      validateIntInRange(99, "hop1_limit", 1, 50);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({ field: "hop1_limit", errorType: "invalid_input" });
    }
  });
});

describe("validateReadOnlyCypher", () => {
  it("accepts read queries, including write keywords inside literals and comments", () => {
    expect(validateReadOnlyCypher("MATCH (n) WHERE n.note = 'CREATE' RETURN n")).toBe(
      "MATCH (n) WHERE n.note = 'CREATE' RETURN n",
    );
    expect(validateReadOnlyCypher("// DELETE everything\nMATCH (n) RETURN n.offset")).toBe(
      "// DELETE everything\nMATCH (n) RETURN n.offset",
    );
  });

  it("rejects write clauses", () => {
    expect(() => validateReadOnlyCypher("MATCH (n) DETACH DELETE n")).toThrow(
      "query must be read-only (found DETACH)",
    );
    expect(() => validateReadOnlyCypher("match (n) set n.x = 1")).toThrow(
      "query must be read-only (found SET)",
    );
  });

  it("rejects write procedures", () => {
    expect(() => validateReadOnlyCypher("CALL apoc.create.node(['X'], {})")).toThrow(
      "query must not call write procedures",
    );
  });
});

describe("ensureLimit", () => {
  it("appends a LIMIT when the query has none", () => {
    expect(ensureLimit("MATCH (n) RETURN n;", 10)).toBe("MATCH (n) RETURN n\nLIMIT 10");
    expect(ensureLimit("MATCH (n) WHERE n.note = 'LIMIT' RETURN n", 3)).toBe(
      "MATCH (n) WHERE n.note = 'LIMIT' RETURN n\nLIMIT 3",
    );
  });

  it("places the LIMIT below a trailing line comment", () => {
    expect(ensureLimit("MATCH (n) RETURN n // every node", 20)).toBe(
      "MATCH (n) RETURN n // every node\nLIMIT 20",
    );
  });

  it("keeps an existing LIMIT", () => {
    expect(ensureLimit("MATCH (n) RETURN n limit 5", 100)).toBe("MATCH (n) RETURN n limit 5");
  });
});
