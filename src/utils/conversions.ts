import {
  isDate,
  isDateTime,
  isDuration,
  isInt,
  isLocalDateTime,
  isLocalTime,
  isNode,
  isRelationship,
  isTime,
} from "neo4j-driver";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Converts driver values (Integer, Node, Relationship, temporal types) into
 * JSON-friendly equivalents, recursing through arrays and plain objects.
 * Integers outside the safe range become decimal strings.
 */
export function toPlainValue(value: unknown): unknown {
  if (isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toPlainValue);
  }
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (isNode(value)) {
    return { labels: [...value.labels], properties: toPlainRecord(value.properties) };
  }
  if (isRelationship(value)) {
    return { type: value.type, properties: toPlainRecord(value.properties) };
  }
  if (
    isDate(value) ||
    isDateTime(value) ||
    isLocalDateTime(value) ||
    isLocalTime(value) ||
    isTime(value) ||
    isDuration(value)
  ) {
    return value.toString();
  }
  if (isPlainObject(value)) {
    return toPlainRecord(value);
  }
  return value;
}

export function toPlainRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(record)) {
    result[key] = toPlainValue(entry);
  }
  return result;
}

export function toSafeNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === "bigint") {
    return Number(value);
  }

  if (isInt(value)) {
    return value.toNumber();
  }

  if (typeof value === "string" && /^-?\d+(?:\.\d+)?$/.test(value)) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}

export function toOptionalString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (value === null || value === undefined) return null;
  return String(toPlainValue(value));
}

export function toStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === "string");
}
