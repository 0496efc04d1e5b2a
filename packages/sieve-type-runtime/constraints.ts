// packages/sieve-type-runtime/constraints.ts
// Applies an ordered constraint sequence to a value, stopping at the first failure.

import type { PredicateAdapter } from "./predicate-adapter.ts";
import { Result } from "./result.ts";
import { isAndGroup, type Constraint, type PredicateRef } from "./type-node.ts";

export type ConstraintFailure = {
  readonly kind: "constraint";
  readonly input: unknown;
  readonly predicate: string;
  readonly args: readonly unknown[];
};

/** AND groups collapse into the surrounding sequence, preserving order. */
export function flattenConstraints(
  constraints: readonly Constraint[],
): PredicateRef[] {
  const flat: PredicateRef[] = [];
  for (const constraint of constraints) {
    if (isAndGroup(constraint)) {
      flat.push(...flattenConstraints(constraint.and));
    } else {
      flat.push(constraint);
    }
  }
  return flat;
}

export function applyConstraints<T>(
  value: T,
  constraints: readonly Constraint[],
  adapter: PredicateAdapter,
): Result<T, ConstraintFailure> {
  for (const { predicate, args } of flattenConstraints(constraints)) {
    const { passed, callArgs } = adapter.evaluate(predicate, args, value);
    if (!passed) {
      return Result.err<T, ConstraintFailure>({
        kind: "constraint",
        input: value,
        predicate,
        args: callArgs,
      });
    }
  }
  return Result.ok(value);
}
