// packages/sieve-type-runtime/predicate-adapter.ts
// Resolves predicate references against an injected predicate table.

import {
  defaultPredicates,
  type Predicate,
  type PredicateTable,
} from "../sieve-predicates/mod.ts";
import { UnknownPredicateError } from "./errors.ts";

export type Evaluation = {
  readonly passed: boolean;
  /** Arguments exactly as the predicate received them (value last). */
  readonly callArgs: readonly unknown[];
};

export interface PredicateAdapter {
  readonly table: PredicateTable;
  has(name: string): boolean;
  resolve(name: string): Predicate;
  evaluate(name: string, args: readonly unknown[], value: unknown): Evaluation;
}

/**
 * Build the argument list for a predicate call:
 *   []        -> (value)
 *   [arg]     -> (arg, value)
 *   [a, b, …] -> ([a, b, …], value)
 */
export function callArguments(
  args: readonly unknown[],
  value: unknown,
): unknown[] {
  if (args.length === 0) return [value];
  if (args.length === 1) return [args[0], value];
  return [args, value];
}

export function createPredicateAdapter(
  table: PredicateTable = defaultPredicates,
): PredicateAdapter {
  const has = (name: string): boolean =>
    Object.prototype.hasOwnProperty.call(table, name);

  const resolve = (name: string): Predicate => {
    if (!has(name)) throw new UnknownPredicateError(name);
    return table[name];
  };

  return {
    table,
    has,
    resolve,
    evaluate(name, args, value) {
      const predicate = resolve(name);
      const callArgs = callArguments(args, value);
      return { passed: predicate(...callArgs) === true, callArgs };
    },
  };
}

// Adapters are stateless; share one per table.
const adapterCache = new WeakMap<PredicateTable, PredicateAdapter>();

export function adapterFor(table: PredicateTable): PredicateAdapter {
  let adapter = adapterCache.get(table);
  if (!adapter) {
    adapter = createPredicateAdapter(table);
    adapterCache.set(table, adapter);
  }
  return adapter;
}

// Root nodes remember the table they were compiled against.
const compiledTables = new WeakMap<object, PredicateTable>();

export function bindPredicates(node: object, table: PredicateTable): void {
  compiledTables.set(node, table);
}

/** Table `node` was compiled against, if it is a compiled root. */
export function boundPredicates(node: object): PredicateTable | undefined {
  return compiledTables.get(node);
}
