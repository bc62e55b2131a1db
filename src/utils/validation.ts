/**
 * Input validation for search parameters and raw Cypher.
 *
 * Every validator throws `InvalidInputError` naming the offending field, so
 * callers can surface it to the client unchanged.
 */

import { InvalidInputError } from "./errors.js";

/**
 * Validate a free-text query: a string that is non-empty after trimming.
 * @returns the trimmed query
 */
export function validateQuery(query: unknown, field = "query", maxLength = 10000): string {
  if (typeof query !== "string") {
    throw new InvalidInputError(`${field} must be a string`, field);
  }

  const trimmed = query.trim();
  if (trimmed.length === 0) {
    throw new InvalidInputError(`${field} must not be empty`, field);
  }
  if (trimmed.length > maxLength) {
    throw new InvalidInputError(
      `${field} must be at most ${maxLength} characters (received ${trimmed.length})`,
      field,
    );
  }

  return trimmed;
}

/**
 * Validate an integer inside an inclusive range.
 */
export function validateIntInRange(value: unknown, field: string, min: number, max: number): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new InvalidInputError(`${field} must be an integer`, field);
  }
  if (value < min || value > max) {
    throw new InvalidInputError(
      `${field} must be between ${min} and ${max} (received ${value})`,
      field,
    );
  }
  return value;
}

/**
 * Validate a finite number inside an inclusive range.
 */
export function validateNumberInRange(
  value: unknown,
  field: string,
  min: number,
  max: number,
): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidInputError(`${field} must be a number`, field);
  }
  if (value < min || value > max) {
    throw new InvalidInputError(
      `${field} must be between ${min} and ${max} (received ${value})`,
      field,
    );
  }
  return value;
}

/** Accepts `YYYY-MM-DD` calendar dates only. */
export function validateIsoDate(value: unknown, field: string): string {
  if (typeof value !== "string" || !/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new InvalidInputError(`${field} must be a date in YYYY-MM-DD format`, field);
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value) {
    throw new InvalidInputError(`${field} is not a valid calendar date (received ${value})`, field);
  }
  return value;
}

// ── Cypher ────────────────────────────────────────────────────────────────────

const WRITE_CLAUSE_PATTERN =
  /\b(CREATE|MERGE|DELETE|DETACH|SET|REMOVE|DROP|FOREACH|LOAD\s+CSV)\b/i;
const WRITE_PROCEDURE_PATTERN = /\bCALL\s+(apoc\.(create|merge|refactor|periodic)|db\.create)/i;

/** Removes string literals and comments so keywords inside them are ignored. */
function stripLiterals(query: string): string {
  return query
    .replace(/\/\/[^\n]*/g, " ")
    .replace(/\/\*[\s\S]*?\*\//g, " ")
    .replace(/'(?:\\.|[^'\\])*'/g, "''")
    .replace(/"(?:\\.|[^"\\])*"/g, '""')
    .replace(/`(?:[^`])*`/g, "``");
}

/**
 * Validate a client-supplied Cypher query for the read-only raw query tool.
 * Rejects write clauses outside string literals; the query still runs in a
 * READ access session.
 */
export function validateReadOnlyCypher(query: unknown, maxLength = 50000): string {
  const text = validateQuery(query, "query", maxLength);
  const bare = stripLiterals(text);

  const clause = WRITE_CLAUSE_PATTERN.exec(bare);
  if (clause) {
    throw new InvalidInputError(
      `query must be read-only (found ${clause[1].toUpperCase()})`,
      "query",
    );
  }
  if (WRITE_PROCEDURE_PATTERN.test(bare)) {
    throw new InvalidInputError("query must not call write procedures", "query");
  }

  return text;
}

/**
 * Appends `LIMIT <limit>` when the query has no LIMIT clause of its own.
 */
export function ensureLimit(query: string, limit: number): string {
  if (/\bLIMIT\b/i.test(stripLiterals(query))) {
    return query;
  }
  // own line, so a trailing line comment cannot swallow it
  return `${query.replace(/;\s*$/, "").trimEnd()}\nLIMIT ${limit}`;
}
