// packages/sieve-type-runtime/validator.ts
// Walks a compiled type tree against input data. Data failures are returned,
// never thrown; only configuration mistakes (unknown predicates) throw.

import { match } from "ts-pattern";
import {
  defaultPredicates,
  isPlainObject,
  type PredicateTable,
} from "../sieve-predicates/mod.ts";
import { applyConstraints } from "./constraints.ts";
import { atomize, validateKey } from "./map-key.ts";
import {
  listAggregate,
  mapAggregate,
  type AlternativeFailure,
  type Failure,
  type Outcome,
} from "./outcome.ts";
import {
  adapterFor,
  boundPredicates,
  type PredicateAdapter,
} from "./predicate-adapter.ts";
import { Result } from "./result.ts";
import {
  KIND_CHECK,
  type ListNode,
  type MapNode,
  type PrimitiveNode,
  type TypeNode,
  type UnionNode,
} from "./type-node.ts";

export type ValidateOptions = {
  /**
   * Predicate table to evaluate against. Defaults to the table the root was
   * compiled with, then to the default table.
   */
  readonly predicates?: PredicateTable;
};

function validatePrimitive(
  node: PrimitiveNode,
  input: unknown,
  adapter: PredicateAdapter,
): Outcome {
  return applyConstraints(input, node.constraints, adapter);
}

function validateList(
  node: ListNode,
  input: unknown,
  adapter: PredicateAdapter,
): Outcome {
  const checked = applyConstraints(input, node.constraints, adapter);
  if (!checked.ok) return checked;
  if (!Array.isArray(checked.value)) {
    // Only reachable with a predicate table whose kind-check admits non-arrays.
    return Result.ok(listAggregate([]));
  }

  // Holes are validated as undefined.
  const results = Array.from(checked.value, (member: unknown) =>
    validateNode(node.memberType, member, adapter)
  );
  const aggregate = listAggregate(results);
  return results.every((r) => r.ok)
    ? Result.ok(aggregate)
    : Result.err(aggregate);
}

function validateMap(
  node: MapNode,
  input: unknown,
  adapter: PredicateAdapter,
): Outcome {
  const data = node.atomize && isPlainObject(input)
    ? atomize(input, node.keys)
    : input;

  const checked = applyConstraints(data, node.constraints, adapter);
  if (!checked.ok) return checked;

  const results = node.keys.flatMap((key) =>
    validateKey(key, checked.value, (type, value) =>
      validateNode(type, value, adapter)
    )
  );
  const aggregate = mapAggregate(results);
  return results.every((r) => r.ok)
    ? Result.ok(aggregate)
    : Result.err(aggregate);
}

// A leaf-vs-leaf union only falls through to the right branch when the left
// side rejected the input's kind. A refinement failure (right kind, failed a
// deeper check) is reported as-is.
function leftFailureIsFinal(node: UnionNode, error: Failure): boolean {
  return node.left.type === "primitive" &&
    node.right.type === "primitive" &&
    error.kind === "constraint" &&
    error.predicate !== KIND_CHECK;
}

function validateUnion(
  node: UnionNode,
  input: unknown,
  adapter: PredicateAdapter,
): Outcome {
  const left = validateNode(node.left, input, adapter);
  if (left.ok) return left;
  if (leftFailureIsFinal(node, left.error)) return left;

  const right = validateNode(node.right, input, adapter);
  if (right.ok) return right;

  return Result.err<unknown, AlternativeFailure>({
    kind: "or",
    left: left.error,
    right: right.error,
    options: node.options,
  });
}

function validateNode(
  node: TypeNode,
  input: unknown,
  adapter: PredicateAdapter,
): Outcome {
  return match<TypeNode, Outcome>(node)
    .with({ type: "primitive" }, (n) => validatePrimitive(n, input, adapter))
    .with({ type: "list" }, (n) => validateList(n, input, adapter))
    .with({ type: "map" }, (n) => validateMap(n, input, adapter))
    .with({ type: "union" }, (n) => validateUnion(n, input, adapter))
    .exhaustive();
}

/**
 * Validate `input` against a compiled node.
 *
 * @example
 * ```ts
 * const node = compile(spec.list(spec.integer()));
 * validate(node, [1, "x", 3]);
 * // { ok: false, error: { kind: "list", results: [ok 1, err "x", ok 3] } }
 * ```
 */
export function validate(
  node: TypeNode,
  input: unknown,
  options: ValidateOptions = {},
): Outcome {
  return validateNode(
    node,
    input,
    adapterFor(
      options.predicates ?? boundPredicates(node) ?? defaultPredicates,
    ),
  );
}
