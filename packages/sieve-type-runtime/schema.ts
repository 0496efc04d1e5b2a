// packages/sieve-type-runtime/schema.ts
// Compile-once wrapper: holds a compiled tree plus the options it was built with.

import type { TypeSpec } from "../sieve-type-spec/src/mod.ts";
import { compile } from "./compiler.ts";
import {
  formatErrors,
  type MessageOverrides,
  type ValidationError,
} from "./messages.ts";
import {
  resolveCompileOptions,
  type CompileOptions,
  type ResolvedCompileOptions,
} from "./options.ts";
import type { Outcome } from "./outcome.ts";
import { toOutput } from "./output.ts";
import { Result } from "./result.ts";
import { nodesEqual, type TypeNode } from "./type-node.ts";
import { validate } from "./validator.ts";

export type SchemaOptions = CompileOptions & {
  readonly messages?: MessageOverrides;
};

export class Schema {
  readonly node: TypeNode;
  readonly options: ResolvedCompileOptions;
  readonly messages: MessageOverrides;

  constructor(spec: TypeSpec, options: SchemaOptions = {}) {
    this.options = resolveCompileOptions(options);
    this.node = compile(spec, this.options);
    this.messages = options.messages ?? {};
  }

  /** Structured outcome, shaped like the tree. */
  validate(input: unknown): Outcome {
    return validate(this.node, input, { predicates: this.options.predicates });
  }

  /**
   * Validate and either rebuild the normalized value or flatten the failure
   * into path-addressed messages.
   */
  validateSafe(input: unknown): Result<unknown, readonly ValidationError[]> {
    const outcome = this.validate(input);
    if (outcome.ok) return Result.ok(toOutput(outcome.value));
    return Result.err(formatErrors(outcome.error, { messages: this.messages }));
  }

  /** Empty when `input` is valid. */
  errors(input: unknown): ValidationError[] {
    const outcome = this.validate(input);
    return outcome.ok
      ? []
      : formatErrors(outcome.error, { messages: this.messages });
  }

  equals(other: Schema): boolean {
    return nodesEqual(this.node, other.node);
  }

  toString(): string {
    return `Schema<${this.node.type}>`;
  }
}

export function defineSchema(spec: TypeSpec, options?: SchemaOptions): Schema {
  return new Schema(spec, options);
}
