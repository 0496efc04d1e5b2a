// packages/sieve-type-runtime/messages.ts
// Turns a structured failure into flat, path-addressed messages.

import type { KeySegment } from "../sieve-type-spec/src/mod.ts";
import type { ConstraintFailure, Failure } from "./outcome.ts";
import { stringifySegment } from "./map-key.ts";

// Validation error with path context
export type ValidationError = {
  readonly path: string;
  readonly message: string;
};

export type MessageOverrides = Readonly<
  Record<string, (failure: ConstraintFailure) => string>
>;

export type FormatOptions = {
  /** Per-predicate message builders, consulted before the defaults. */
  readonly messages?: MessageOverrides;
};

// Build path string from segments: user.tags[2].name
export function buildPath(segments: readonly KeySegment[]): string {
  let path = "";
  for (let i = 0; i < segments.length; i++) {
    const seg = segments[i];
    if (typeof seg === "number") {
      path += `[${seg}]`;
    } else {
      const name = stringifySegment(seg);
      path += i === 0 ? name : `.${name}`;
    }
  }
  return path;
}

const KIND_LABELS: Readonly<Record<string, string>> = {
  string: "a string",
  integer: "an integer",
  number: "a number",
  boolean: "a boolean",
  null: "null",
  date: "a date",
  list: "a list",
  map: "a map",
};

function formatValue(value: unknown): string {
  if (Array.isArray(value)) return value.map(formatValue).join(", ");
  if (value instanceof RegExp) return value.toString();
  if (value !== null && typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

/** The predicate's own argument; `args` ends with the value under test. */
function argumentOf(failure: ConstraintFailure): unknown {
  return failure.args.length > 1 ? failure.args[0] : undefined;
}

export function constraintMessage(
  failure: ConstraintFailure,
  overrides: MessageOverrides = {},
): string {
  const override = Object.prototype.hasOwnProperty.call(
      overrides,
      failure.predicate,
    )
    ? overrides[failure.predicate]
    : undefined;
  if (override) return override(failure);

  const arg = formatValue(argumentOf(failure));
  switch (failure.predicate) {
    case "type": {
      const label = KIND_LABELS[String(argumentOf(failure))];
      return label ? `must be ${label}` : `must be of type ${arg}`;
    }
    case "filled":
      return "must be filled";
    case "empty":
      return "must be empty";
    case "eql":
      return `must be equal to ${arg}`;
    case "notEql":
      return `must not be equal to ${arg}`;
    case "gt":
      return `must be greater than ${arg}`;
    case "gteq":
      return `must be greater than or equal to ${arg}`;
    case "lt":
      return `must be less than ${arg}`;
    case "lteq":
      return `must be less than or equal to ${arg}`;
    case "positive":
      return "must be positive";
    case "negative":
      return "must be negative";
    case "size":
      return `size must be ${arg}`;
    case "minSize":
      return `size cannot be less than ${arg}`;
    case "maxSize":
      return `size cannot be greater than ${arg}`;
    case "match":
      return "must have a valid format";
    case "includes":
      return `must include ${arg}`;
    case "excludes":
      return `must exclude ${arg}`;
    case "in":
      return `must be one of: ${arg}`;
    case "notIn":
      return `must not be one of: ${arg}`;
    case "email":
      return "must be a valid email";
    case "url":
      return "must be a valid URL";
    default:
      return `must satisfy ${failure.predicate}`;
  }
}

function collect(
  failure: Failure,
  path: readonly KeySegment[],
  overrides: MessageOverrides,
  out: ValidationError[],
): void {
  switch (failure.kind) {
    case "constraint":
      out.push({
        path: buildPath(path),
        message: constraintMessage(failure, overrides),
      });
      return;
    case "missing_key":
      out.push({
        path: buildPath([...path, ...failure.path]),
        message: "key must be present",
      });
      return;
    case "key":
      collect(failure.error, [...path, ...failure.path], overrides, out);
      return;
    case "list":
      failure.results.forEach((r, i) => {
        if (!r.ok) collect(r.error, [...path, i], overrides, out);
      });
      return;
    case "map":
      for (const r of failure.results) {
        if (!r.ok) collect(r.error, path, overrides, out);
      }
      return;
    case "or": {
      const left: ValidationError[] = [];
      const right: ValidationError[] = [];
      collect(failure.left, path, overrides, left);
      collect(failure.right, path, overrides, right);
      if (
        left.length === 1 && right.length === 1 &&
        left[0].path === right[0].path
      ) {
        out.push({
          path: left[0].path,
          message: `${left[0].message} or ${right[0].message}`,
        });
      } else {
        out.push(...left, ...right);
      }
      return;
    }
  }
}

/**
 * Flatten a failure into `{ path, message }` entries in report order.
 *
 * @example
 * ```ts
 * formatErrors(result.error);
 * // [{ path: "tags[1]", message: "must be a string" },
 * //  { path: "name", message: "key must be present" }]
 * ```
 */
export function formatErrors(
  failure: Failure,
  options: FormatOptions = {},
): ValidationError[] {
  const out: ValidationError[] = [];
  collect(failure, [], options.messages ?? {}, out);
  return out;
}
