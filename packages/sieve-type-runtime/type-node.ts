// packages/sieve-type-runtime/type-node.ts
// Compiled type tree. Nodes are created by the compiler and frozen; nothing
// downstream mutates them.

import type {
  KeySegment,
  Presence,
  PrimitiveKind,
} from "../sieve-type-spec/src/mod.ts";

// ============================================================================
// Constraints
// ============================================================================

/** The kind-check predicate every typed node carries first. */
export const KIND_CHECK = "type";

export type PredicateRef = {
  readonly predicate: string;
  readonly args: readonly unknown[];
};

export type AndGroup = {
  readonly and: readonly Constraint[];
};

export type Constraint = PredicateRef | AndGroup;

export function isAndGroup(constraint: Constraint): constraint is AndGroup {
  return "and" in constraint;
}

export function kindCheck(kind: PrimitiveKind): readonly PredicateRef[] {
  return kind === "any" ? [] : [{ predicate: KIND_CHECK, args: [kind] }];
}

// ============================================================================
// Compile options carried by nodes
// ============================================================================

export type NodeOptions = {
  readonly atomize: boolean;
};

// ============================================================================
// Node variants
// ============================================================================

export type PrimitiveNode = {
  readonly type: "primitive";
  readonly kind: PrimitiveKind;
  readonly constraints: readonly Constraint[];
};

export type ListNode = {
  readonly type: "list";
  readonly memberType: TypeNode;
  readonly constraints: readonly Constraint[];
};

export type MapKey = {
  readonly path: readonly KeySegment[];
  readonly presence: Presence;
  readonly type: TypeNode;
};

export type MapNode = {
  readonly type: "map";
  readonly keys: readonly MapKey[];
  readonly atomize: boolean;
  readonly constraints: readonly Constraint[];
};

export type UnionNode = {
  readonly type: "union";
  readonly left: TypeNode;
  readonly right: TypeNode;
  readonly options: NodeOptions;
  readonly constraints: readonly Constraint[];
};

export type TypeNode = PrimitiveNode | ListNode | MapNode | UnionNode;

// ============================================================================
// Constructors
// ============================================================================

export function primitiveNode(
  kind: PrimitiveKind,
  constraints: readonly Constraint[] = [],
): PrimitiveNode {
  return Object.freeze({
    type: "primitive",
    kind,
    constraints: Object.freeze([...kindCheck(kind), ...constraints]),
  });
}

export function listNode(
  memberType: TypeNode,
  constraints: readonly Constraint[] = [],
): ListNode {
  return Object.freeze({
    type: "list",
    memberType,
    constraints: Object.freeze([...kindCheck("list"), ...constraints]),
  });
}

export function mapKey(
  path: readonly KeySegment[],
  presence: Presence,
  type: TypeNode,
): MapKey {
  return Object.freeze({ path: Object.freeze([...path]), presence, type });
}

export function mapNode(
  keys: readonly MapKey[],
  atomize = false,
  constraints: readonly Constraint[] = [],
): MapNode {
  return Object.freeze({
    type: "map",
    keys: Object.freeze([...keys]),
    atomize,
    constraints: Object.freeze([...kindCheck("map"), ...constraints]),
  });
}

export function unionNode(
  left: TypeNode,
  right: TypeNode,
  options: NodeOptions = { atomize: false },
): UnionNode {
  return Object.freeze({
    type: "union",
    left,
    right,
    options: Object.freeze({ ...options }),
    constraints: Object.freeze([]),
  });
}

/**
 * Layer extra constraints onto an existing node. The node's own constraints
 * run first. A union passes them down to both of its branches.
 */
export function refine(
  node: TypeNode,
  constraints: readonly Constraint[],
): TypeNode {
  if (constraints.length === 0) return node;
  const merged = Object.freeze([...node.constraints, ...constraints]);
  switch (node.type) {
    case "primitive":
      return Object.freeze({ ...node, constraints: merged });
    case "list":
      return Object.freeze({ ...node, constraints: merged });
    case "map":
      return Object.freeze({ ...node, constraints: merged });
    case "union":
      return Object.freeze({
        ...node,
        left: refine(node.left, constraints),
        right: refine(node.right, constraints),
      });
  }
}

// ============================================================================
// Structural equality
// ============================================================================

function valuesEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((x, i) => valuesEqual(x, b[i]));
  }
  if (a instanceof RegExp && b instanceof RegExp) {
    return a.source === b.source && a.flags === b.flags;
  }
  if (
    a !== null && b !== null && typeof a === "object" &&
    typeof b === "object" &&
    Object.getPrototypeOf(a) === Object.getPrototypeOf(b)
  ) {
    const aKeys = Reflect.ownKeys(a);
    const bKeys = Reflect.ownKeys(b);
    return aKeys.length === bKeys.length &&
      aKeys.every((k) =>
        bKeys.includes(k) && valuesEqual(Reflect.get(a, k), Reflect.get(b, k))
      );
  }
  return false;
}

/** Structural (value) equality of two compiled trees. */
export function nodesEqual(a: TypeNode, b: TypeNode): boolean {
  return valuesEqual(a, b);
}
