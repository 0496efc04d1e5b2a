// packages/sieve-type-runtime/map-key.ts
// Key presence policy and key-namespace normalization for map nodes.

import type { KeySegment } from "../sieve-type-spec/src/mod.ts";
import { isPlainObject } from "../sieve-predicates/mod.ts";
import type {
  KeyFailure,
  KeyOutcome,
  KeySuccess,
  MissingKeyFailure,
  Outcome,
} from "./outcome.ts";
import { Result } from "./result.ts";
import type { MapKey, TypeNode } from "./type-node.ts";

type Container = Record<PropertyKey, unknown>;

function hasOwn(target: unknown, segment: KeySegment): target is object {
  return typeof target === "object" && target !== null &&
    Object.prototype.hasOwnProperty.call(target, segment);
}

/** Missing or non-object intermediate levels count as absence. */
export function keyPresent(
  container: unknown,
  path: readonly KeySegment[],
): boolean {
  let current = container;
  for (const segment of path) {
    if (!hasOwn(current, segment)) return false;
    current = Reflect.get(current, segment);
  }
  return true;
}

export function getIn(
  container: unknown,
  path: readonly KeySegment[],
): unknown {
  let current = container;
  for (const segment of path) {
    if (!hasOwn(current, segment)) return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

/**
 * Returns a copy of `target` with `value` stored at `path`. Objects along the
 * path are copied, never written in place.
 */
export function setIn(
  target: Container,
  path: readonly KeySegment[],
  value: unknown,
): Container {
  if (path.length === 0) return target;
  const [head, ...rest] = path;
  if (rest.length === 0) return { ...target, [head]: value };
  const existing = target[head];
  const child: Container = isPlainObject(existing) ? existing : {};
  return { ...target, [head]: setIn(child, rest, value) };
}

export function stringifySegment(segment: KeySegment): string {
  if (typeof segment === "symbol") return segment.description ?? "";
  return String(segment);
}

export function stringifyPath(path: readonly KeySegment[]): string[] {
  return path.map(stringifySegment);
}

/**
 * Copy every declared key found under its string-keyed path into the
 * declared key namespace. Undeclared input keys are not carried over and
 * `input` is left untouched.
 */
export function atomize(input: unknown, keys: readonly MapKey[]): Container {
  let normalized: Container = {};
  for (const key of keys) {
    const stringPath = stringifyPath(key.path);
    if (keyPresent(input, stringPath)) {
      normalized = setIn(normalized, key.path, getIn(input, stringPath));
    }
  }
  return normalized;
}

export type NodeValidator = (node: TypeNode, value: unknown) => Outcome;

/**
 * Validate one declared key. Produces zero outcomes for an absent optional
 * key, otherwise exactly one.
 */
export function validateKey(
  key: MapKey,
  container: unknown,
  validateNode: NodeValidator,
): KeyOutcome[] {
  const { path } = key;
  if (!keyPresent(container, path)) {
    if (key.presence === "optional") return [];
    return [
      Result.err<KeySuccess, MissingKeyFailure>({ kind: "missing_key", path }),
    ];
  }
  const outcome = validateNode(key.type, getIn(container, path));
  if (outcome.ok) {
    return [
      Result.ok<KeySuccess, KeyFailure>({
        kind: "key",
        path,
        value: outcome.value,
      }),
    ];
  }
  return [
    Result.err<KeySuccess, KeyFailure>({
      kind: "key",
      path,
      error: outcome.error,
    }),
  ];
}
