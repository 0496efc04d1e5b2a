// packages/sieve-predicates/mod.ts
// Default predicate library: flat, name-indexed boolean checks.
//
// Every predicate takes its arguments first and the value under test last:
//   filled(value), gt(threshold, value), in(candidates, value)

export type Predicate = (...args: unknown[]) => boolean;

export type PredicateTable = Readonly<Record<string, Predicate>>;

export function isPlainObject(
  value: unknown,
): value is Record<PropertyKey, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function sizeOf(value: unknown): number | undefined {
  if (typeof value === "string" || Array.isArray(value)) return value.length;
  if (isPlainObject(value)) return Reflect.ownKeys(value).length;
  return undefined;
}

function bothNumbers(a: unknown, b: unknown): [number, number] | undefined {
  return typeof a === "number" && typeof b === "number" ? [a, b] : undefined;
}

function isKind(kind: unknown, value: unknown): boolean {
  switch (kind) {
    case "any":
      return true;
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
    case "null":
      return value === null;
    case "date":
      return value instanceof Date && !Number.isNaN(value.getTime());
    case "list":
      return Array.isArray(value);
    case "map":
      return isPlainObject(value);
    default:
      return false;
  }
}

function filled(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  const size = sizeOf(value);
  return size === undefined ? true : size > 0;
}

function compare(
  threshold: unknown,
  value: unknown,
  test: (value: number, threshold: number) => boolean,
): boolean {
  const pair = bothNumbers(value, threshold);
  return pair !== undefined && test(pair[0], pair[1]);
}

function matchPattern(pattern: unknown, value: unknown): boolean {
  if (typeof value !== "string") return false;
  if (pattern instanceof RegExp) {
    // g and y patterns advance lastIndex on test(); use a fresh copy.
    const regex = pattern.global || pattern.sticky
      ? new RegExp(pattern.source, pattern.flags)
      : pattern;
    return regex.test(value);
  }
  if (typeof pattern === "string") return new RegExp(pattern).test(value);
  return false;
}

function includes(element: unknown, value: unknown): boolean {
  if (Array.isArray(value)) return value.includes(element);
  if (typeof value === "string" && typeof element === "string") {
    return value.includes(element);
  }
  return false;
}

function isUrl(value: unknown): boolean {
  if (typeof value !== "string") return false;
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

// Not RFC-compliant; rejects whitespace and requires a dotted domain.
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export const defaultPredicates: PredicateTable = {
  type: (kind, value) => isKind(kind, value),

  filled: (value) => filled(value),
  empty: (value) => sizeOf(value) === 0,

  eql: (expected, value) => Object.is(value, expected),
  notEql: (expected, value) => !Object.is(value, expected),

  gt: (threshold, value) => compare(threshold, value, (v, t) => v > t),
  gteq: (threshold, value) => compare(threshold, value, (v, t) => v >= t),
  lt: (threshold, value) => compare(threshold, value, (v, t) => v < t),
  lteq: (threshold, value) => compare(threshold, value, (v, t) => v <= t),

  positive: (value) => typeof value === "number" && value > 0,
  negative: (value) => typeof value === "number" && value < 0,

  size: (expected, value) => sizeOf(value) === expected,
  minSize: (min, value) => compare(min, sizeOf(value), (v, t) => v >= t),
  maxSize: (max, value) => compare(max, sizeOf(value), (v, t) => v <= t),

  match: (pattern, value) => matchPattern(pattern, value),

  includes: (element, value) => includes(element, value),
  excludes: (element, value) => !includes(element, value),

  in: (candidates, value) =>
    Array.isArray(candidates) && candidates.includes(value),
  notIn: (candidates, value) =>
    Array.isArray(candidates) && !candidates.includes(value),

  email: (value) => typeof value === "string" && EMAIL_PATTERN.test(value),
  url: (value) => isUrl(value),
};
