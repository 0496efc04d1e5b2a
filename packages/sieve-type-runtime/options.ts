// packages/sieve-type-runtime/options.ts
// Compile options: defaults and validation of caller-supplied values.

import type { ConstraintSpec } from "../sieve-type-spec/src/mod.ts";
import {
  defaultPredicates,
  type PredicateTable,
} from "../sieve-predicates/mod.ts";
import { InvalidOptionsError } from "./errors.ts";

export type CompileOptions = {
  /** Normalize string-keyed input into each map's declared key namespace. */
  readonly atomize?: boolean;
  /** Table every constraint name is resolved against. */
  readonly predicates?: PredicateTable;
  /** Extra constraints layered onto the root node at use site. */
  readonly constraints?: readonly ConstraintSpec[];
};

export type ResolvedCompileOptions = {
  readonly atomize: boolean;
  readonly predicates: PredicateTable;
  readonly constraints: readonly ConstraintSpec[];
};

export const DEFAULT_COMPILE_OPTIONS: ResolvedCompileOptions = Object.freeze({
  atomize: false,
  predicates: defaultPredicates,
  constraints: Object.freeze([]),
});

export function resolveCompileOptions(
  options: CompileOptions = {},
): ResolvedCompileOptions {
  const { atomize, predicates, constraints } = options;

  if (atomize !== undefined && typeof atomize !== "boolean") {
    throw new InvalidOptionsError("atomize", "expected boolean");
  }
  if (
    predicates !== undefined &&
    (predicates === null || typeof predicates !== "object")
  ) {
    throw new InvalidOptionsError("predicates", "expected predicate table");
  }
  if (predicates !== undefined) {
    for (const [name, fn] of Object.entries(predicates)) {
      if (typeof fn !== "function") {
        throw new InvalidOptionsError(
          "predicates",
          `entry ${JSON.stringify(name)} is not a function`,
        );
      }
    }
  }
  if (constraints !== undefined && !Array.isArray(constraints)) {
    throw new InvalidOptionsError("constraints", "expected array");
  }

  return {
    atomize: atomize ?? DEFAULT_COMPILE_OPTIONS.atomize,
    predicates: predicates ?? DEFAULT_COMPILE_OPTIONS.predicates,
    constraints: constraints ?? DEFAULT_COMPILE_OPTIONS.constraints,
  };
}
