// packages/sieve-type-runtime/outcome.ts
// Shapes returned by validation. Successes and failures mirror the node that
// produced them; aggregates keep every per-element / per-key outcome in order.

import type { KeySegment } from "../sieve-type-spec/src/mod.ts";
import type { ConstraintFailure } from "./constraints.ts";
import type { Result } from "./result.ts";
import type { NodeOptions } from "./type-node.ts";

export type { ConstraintFailure };

type AggregateBrand = { readonly __brand: "Aggregate" };

export type ListAggregate = {
  readonly kind: "list";
  readonly results: readonly Outcome[];
} & AggregateBrand;

export type MapAggregate = {
  readonly kind: "map";
  readonly results: readonly KeyOutcome[];
} & AggregateBrand;

export type Aggregate = ListAggregate | MapAggregate;

export type KeySuccess = {
  readonly kind: "key";
  readonly path: readonly KeySegment[];
  readonly value: unknown;
};

export type KeyFailure = {
  readonly kind: "key";
  readonly path: readonly KeySegment[];
  readonly error: Failure;
};

export type MissingKeyFailure = {
  readonly kind: "missing_key";
  readonly path: readonly KeySegment[];
};

export type AlternativeFailure = {
  readonly kind: "or";
  readonly left: Failure;
  readonly right: Failure;
  readonly options: NodeOptions;
};

export type Failure =
  | ConstraintFailure
  | MissingKeyFailure
  | KeyFailure
  | Aggregate
  | AlternativeFailure;

/** Success value is the input itself for primitives, an Aggregate otherwise. */
export type Outcome = Result<unknown, Failure>;

export type KeyOutcome = Result<KeySuccess, KeyFailure | MissingKeyFailure>;

export function listAggregate(results: readonly Outcome[]): ListAggregate {
  return { __brand: "Aggregate", kind: "list", results };
}

export function mapAggregate(results: readonly KeyOutcome[]): MapAggregate {
  return { __brand: "Aggregate", kind: "map", results };
}

export function isAggregate(x: unknown): x is Aggregate {
  return typeof x === "object" && x !== null && "__brand" in x &&
    x.__brand === "Aggregate";
}
