// packages/sieve-type-runtime/compiler.ts
// Builds an immutable type tree from a declarative specification.

import { match } from "ts-pattern";
import {
  PRIMITIVE_KINDS,
  type ConstraintSpec,
  type KeySegment,
  type KeySpec,
  type ListSpec,
  type MapSpec,
  type PrimitiveKind,
  type PrimitiveSpec,
  type TypeSpec,
  type UnionSpec,
} from "../sieve-type-spec/src/mod.ts";
import { isPlainObject } from "../sieve-predicates/mod.ts";
import {
  MalformedSpecError,
  UnknownPredicateError,
  type SpecLocation,
} from "./errors.ts";
import {
  resolveCompileOptions,
  type CompileOptions,
  type ResolvedCompileOptions,
} from "./options.ts";
import {
  adapterFor,
  bindPredicates,
  type PredicateAdapter,
} from "./predicate-adapter.ts";
import {
  listNode,
  mapKey,
  mapNode,
  primitiveNode,
  refine,
  unionNode,
  type Constraint,
  type MapKey,
  type TypeNode,
} from "./type-node.ts";

type CompileContext = {
  readonly options: ResolvedCompileOptions;
  readonly adapter: PredicateAdapter;
};

function at(location: SpecLocation, segment: string | number): SpecLocation {
  if (typeof segment === "number") return `${location}[${segment}]`;
  return location ? `${location}.${segment}` : segment;
}

// Array.isArray without losing readonly element types.
function isList(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

function describe(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  return String(value);
}

// ============================================================================
// Constraints
// ============================================================================

function compileConstraint(
  raw: ConstraintSpec,
  ctx: CompileContext,
  location: SpecLocation,
): Constraint {
  if (typeof raw === "string") {
    return predicateRef(raw, [], ctx, location);
  }
  if (isList(raw)) {
    const [name, ...args] = raw;
    if (typeof name !== "string") {
      throw new MalformedSpecError(
        "constraint tuple must start with a predicate name",
        location,
      );
    }
    return predicateRef(name, args, ctx, location);
  }
  if (isPlainObject(raw) && isList(raw.and)) {
    return Object.freeze({
      and: compileConstraints(raw.and, ctx, at(location, "and")),
    });
  }
  throw new MalformedSpecError(
    `unrecognized constraint ${describe(raw)}`,
    location,
  );
}

function predicateRef(
  name: string,
  args: readonly unknown[],
  ctx: CompileContext,
  location: SpecLocation,
): Constraint {
  if (!ctx.adapter.has(name)) throw new UnknownPredicateError(name, location);
  return Object.freeze({ predicate: name, args: Object.freeze([...args]) });
}

function compileConstraints(
  raw: readonly ConstraintSpec[] | undefined,
  ctx: CompileContext,
  location: SpecLocation,
): Constraint[] {
  if (raw === undefined) return [];
  if (!isList(raw)) {
    throw new MalformedSpecError("constraints must be an array", location);
  }
  return raw.map((c: ConstraintSpec, i: number) =>
    compileConstraint(c, ctx, at(location, i))
  );
}

// ============================================================================
// Nodes
// ============================================================================

function isPrimitiveKind(kind: unknown): kind is PrimitiveKind {
  return PRIMITIVE_KINDS.some((k) => k === kind);
}

function visitPrimitive(
  spec: PrimitiveSpec,
  ctx: CompileContext,
  location: SpecLocation,
): TypeNode {
  if (!isPrimitiveKind(spec.kind)) {
    throw new MalformedSpecError(
      `unknown primitive kind ${describe(spec.kind)}`,
      at(location, "kind"),
    );
  }
  return primitiveNode(
    spec.kind,
    compileConstraints(spec.constraints, ctx, at(location, "constraints")),
  );
}

function visitList(
  spec: ListSpec,
  ctx: CompileContext,
  location: SpecLocation,
): TypeNode {
  const constraints = compileConstraints(
    spec.constraints,
    ctx,
    at(location, "constraints"),
  );
  // A list without a member type is only checked for being a list.
  if (spec.member === undefined) return primitiveNode("list", constraints);
  return listNode(visit(spec.member, ctx, at(location, "member")), constraints);
}

function isKeySegment(segment: unknown): segment is KeySegment {
  return typeof segment === "string" || typeof segment === "number" ||
    typeof segment === "symbol";
}

function keyPath(
  raw: KeySpec["path"],
  location: SpecLocation,
): readonly KeySegment[] {
  const path: readonly unknown[] = isList(raw) ? raw : [raw];
  if (path.length === 0) {
    throw new MalformedSpecError("key path must not be empty", location);
  }
  const segments: KeySegment[] = [];
  for (const segment of path) {
    if (!isKeySegment(segment)) {
      throw new MalformedSpecError(
        `invalid key segment ${describe(segment)}`,
        location,
      );
    }
    segments.push(segment);
  }
  return segments;
}

function samePath(a: readonly KeySegment[], b: readonly KeySegment[]): boolean {
  return a.length === b.length && a.every((s, i) => Object.is(s, b[i]));
}

function visitKey(
  raw: KeySpec,
  ctx: CompileContext,
  location: SpecLocation,
): MapKey {
  if (!isPlainObject(raw)) {
    throw new MalformedSpecError("key spec must be an object", location);
  }
  if (raw.presence !== "required" && raw.presence !== "optional") {
    throw new MalformedSpecError(
      `invalid presence ${describe(raw.presence)}`,
      at(location, "presence"),
    );
  }
  return mapKey(
    keyPath(raw.path, at(location, "path")),
    raw.presence,
    visit(raw.type, ctx, at(location, "type")),
  );
}

function visitMap(
  spec: MapSpec,
  ctx: CompileContext,
  location: SpecLocation,
): TypeNode {
  if (!isList(spec.keys)) {
    throw new MalformedSpecError("map keys must be an array", location);
  }

  const keys: MapKey[] = [];
  spec.keys.forEach((raw: KeySpec, i: number) => {
    const keyLocation = at(at(location, "keys"), i);
    const key = visitKey(raw, ctx, keyLocation);
    if (keys.some((k) => samePath(k.path, key.path))) {
      throw new MalformedSpecError(
        `duplicate key path [${key.path.map(describe).join(", ")}]`,
        keyLocation,
      );
    }
    keys.push(key);
  });

  return mapNode(
    keys,
    spec.atomize ?? ctx.options.atomize,
    compileConstraints(spec.constraints, ctx, at(location, "constraints")),
  );
}

function visitUnion(
  spec: UnionSpec,
  ctx: CompileContext,
  location: SpecLocation,
): TypeNode {
  const { alternatives } = spec;
  if (!isList(alternatives) || alternatives.length < 2) {
    throw new MalformedSpecError(
      "union needs at least two alternatives",
      location,
    );
  }
  const nodes = alternatives.map((alt: TypeSpec, i: number) =>
    visit(alt, ctx, at(at(location, "alternatives"), i))
  );
  // (a | b | c) compiles to ((a | b) | c)
  const options = { atomize: ctx.options.atomize };
  return nodes
    .slice(1)
    .reduce(
      (left: TypeNode, right: TypeNode) => unionNode(left, right, options),
      nodes[0],
    );
}

function visit(
  spec: TypeSpec,
  ctx: CompileContext,
  location: SpecLocation,
): TypeNode {
  if (!isPlainObject(spec)) {
    throw new MalformedSpecError(
      `spec must be an object, got ${describe(spec)}`,
      location,
    );
  }
  return match<TypeSpec, TypeNode>(spec)
    .with({ tag: "primitive" }, (s) => visitPrimitive(s, ctx, location))
    .with({ tag: "list" }, (s) => visitList(s, ctx, location))
    .with({ tag: "map" }, (s) => visitMap(s, ctx, location))
    .with({ tag: "union" }, (s) => visitUnion(s, ctx, location))
    .otherwise(() => {
      throw new MalformedSpecError(
        `unrecognized spec tag ${describe(spec.tag)}`,
        location,
      );
    });
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Compile a specification into a frozen type tree.
 *
 * Throws a `SchemaConfigurationError` for malformed specs, unknown predicate
 * names and invalid options. Compile once and reuse the tree; the returned
 * root remembers `options.predicates` for later `validate` calls.
 *
 * @example
 * ```ts
 * const User = compile(
 *   spec.map([
 *     spec.required("name", spec.string(["filled"])),
 *     spec.optional("age", spec.integer([["gteq", 0]])),
 *   ]),
 *   { atomize: true },
 * );
 * ```
 */
export function compile(spec: TypeSpec, options?: CompileOptions): TypeNode {
  const resolved = resolveCompileOptions(options);
  const ctx: CompileContext = {
    options: resolved,
    adapter: adapterFor(resolved.predicates),
  };
  const root = refine(
    visit(spec, ctx, ""),
    compileConstraints(resolved.constraints, ctx, "options.constraints"),
  );
  bindPredicates(root, resolved.predicates);
  return root;
}
