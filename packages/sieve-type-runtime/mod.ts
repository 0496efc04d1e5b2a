// packages/sieve-type-runtime/mod.ts
// Public entry point: compile a specification once, validate many times.

export { compile } from "./compiler.ts";
export { validate, type ValidateOptions } from "./validator.ts";

export {
  DEFAULT_COMPILE_OPTIONS,
  resolveCompileOptions,
  type CompileOptions,
  type ResolvedCompileOptions,
} from "./options.ts";

export {
  KIND_CHECK,
  isAndGroup,
  listNode,
  mapKey,
  mapNode,
  nodesEqual,
  primitiveNode,
  refine,
  unionNode,
  type AndGroup,
  type Constraint,
  type ListNode,
  type MapKey,
  type MapNode,
  type NodeOptions,
  type PredicateRef,
  type PrimitiveNode,
  type TypeNode,
  type UnionNode,
} from "./type-node.ts";

export {
  adapterFor,
  bindPredicates,
  boundPredicates,
  callArguments,
  createPredicateAdapter,
  type Evaluation,
  type PredicateAdapter,
} from "./predicate-adapter.ts";

export { applyConstraints, flattenConstraints } from "./constraints.ts";

export {
  atomize,
  getIn,
  keyPresent,
  stringifyPath,
  validateKey,
} from "./map-key.ts";

export {
  isAggregate,
  type Aggregate,
  type AlternativeFailure,
  type ConstraintFailure,
  type Failure,
  type KeyFailure,
  type KeyOutcome,
  type KeySuccess,
  type ListAggregate,
  type MapAggregate,
  type MissingKeyFailure,
  type Outcome,
} from "./outcome.ts";

export {
  buildPath,
  constraintMessage,
  formatErrors,
  type FormatOptions,
  type MessageOverrides,
  type ValidationError,
} from "./messages.ts";

export { toOutput } from "./output.ts";

export { defineSchema, Schema, type SchemaOptions } from "./schema.ts";

export {
  createObservableSchema,
  inspect,
  type InspectableSchema,
  type InspectionContext,
  type Logger,
  type SchemaMetadata,
} from "./inspect.ts";

export { Result, type Err, type Ok } from "./result.ts";

export {
  InvalidOptionsError,
  MalformedSpecError,
  SchemaConfigurationError,
  UnknownPredicateError,
} from "./errors.ts";

export {
  spec,
  type ConstraintSpec,
  type KeySegment,
  type KeySpec,
  type PrimitiveKind,
  type TypeSpec,
} from "../sieve-type-spec/src/mod.ts";

export {
  defaultPredicates,
  type Predicate,
  type PredicateTable,
} from "../sieve-predicates/mod.ts";
