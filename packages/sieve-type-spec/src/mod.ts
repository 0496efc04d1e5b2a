// packages/sieve-type-spec/src/mod.ts
// Declarative type specification: the plain data shape the compiler consumes.

export type PrimitiveKind =
  | "any"
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "null"
  | "date"
  | "list"
  | "map";

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
  "any",
  "string",
  "integer",
  "number",
  "boolean",
  "null",
  "date",
  "list",
  "map",
];

export type KeySegment = string | number | symbol;

export type Presence = "required" | "optional";

// "filled" | ["gt", 0] | { and: [...] }
export type ConstraintSpec =
  | string
  | readonly [string, ...unknown[]]
  | { readonly and: readonly ConstraintSpec[] };

export type PrimitiveSpec = {
  readonly tag: "primitive";
  readonly kind: PrimitiveKind;
  readonly constraints?: readonly ConstraintSpec[];
};

export type ListSpec = {
  readonly tag: "list";
  readonly member?: TypeSpec;
  readonly constraints?: readonly ConstraintSpec[];
};

export type KeySpec = {
  readonly path: KeySegment | readonly KeySegment[];
  readonly presence: Presence;
  readonly type: TypeSpec;
};

export type MapSpec = {
  readonly tag: "map";
  readonly keys: readonly KeySpec[];
  readonly constraints?: readonly ConstraintSpec[];
  readonly atomize?: boolean;
};

export type UnionSpec = {
  readonly tag: "union";
  readonly alternatives: readonly TypeSpec[];
};

export type TypeSpec = PrimitiveSpec | ListSpec | MapSpec | UnionSpec;

export type TypeSpecTag = TypeSpec["tag"];

/**
 * Constructors for specification values.
 *
 * @example
 * ```ts
 * const User = spec.map([
 *   spec.required("name", spec.string(["filled"])),
 *   spec.optional("age", spec.integer([["gteq", 0]])),
 *   spec.optional("tags", spec.list(spec.string())),
 * ]);
 * ```
 */
export const spec = {
  primitive: (
    kind: PrimitiveKind,
    constraints: readonly ConstraintSpec[] = [],
  ): PrimitiveSpec => ({ tag: "primitive", kind, constraints }),

  any: (constraints: readonly ConstraintSpec[] = []): PrimitiveSpec =>
    spec.primitive("any", constraints),
  string: (constraints: readonly ConstraintSpec[] = []): PrimitiveSpec =>
    spec.primitive("string", constraints),
  integer: (constraints: readonly ConstraintSpec[] = []): PrimitiveSpec =>
    spec.primitive("integer", constraints),
  number: (constraints: readonly ConstraintSpec[] = []): PrimitiveSpec =>
    spec.primitive("number", constraints),
  boolean: (constraints: readonly ConstraintSpec[] = []): PrimitiveSpec =>
    spec.primitive("boolean", constraints),
  nil: (): PrimitiveSpec => spec.primitive("null"),
  date: (constraints: readonly ConstraintSpec[] = []): PrimitiveSpec =>
    spec.primitive("date", constraints),

  list: (
    member?: TypeSpec,
    constraints: readonly ConstraintSpec[] = [],
  ): ListSpec =>
    member === undefined
      ? { tag: "list", constraints }
      : { tag: "list", member, constraints },

  map: (
    keys: readonly KeySpec[],
    constraints: readonly ConstraintSpec[] = [],
  ): MapSpec => ({ tag: "map", keys, constraints }),

  required: (
    path: KeySegment | readonly KeySegment[],
    type: TypeSpec,
  ): KeySpec => ({ path, presence: "required", type }),

  optional: (
    path: KeySegment | readonly KeySegment[],
    type: TypeSpec,
  ): KeySpec => ({ path, presence: "optional", type }),

  union: (...alternatives: TypeSpec[]): UnionSpec => ({
    tag: "union",
    alternatives,
  }),

  and: (...constraints: ConstraintSpec[]): ConstraintSpec => ({
    and: constraints,
  }),
};
