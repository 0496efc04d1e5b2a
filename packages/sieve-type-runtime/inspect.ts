// packages/sieve-type-runtime/inspect.ts
// Observability hooks around a compiled schema.

import type { ValidationError } from "./messages.ts";
import type { Result } from "./result.ts";
import type { Schema } from "./schema.ts";

export type Logger = {
  log: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
};

export type SchemaMetadata = {
  readonly name?: string;
  readonly source?: string;
};

/**
 * Introspection context provided to hook callbacks.
 * Allows observing validation events without mutating data.
 */
export type InspectionContext = {
  readonly schemaName?: string;
  readonly schemaSource?: string;
  onFailure: (callback: (errors: readonly ValidationError[]) => void) => void;
  onSuccess: (callback: (value: unknown) => void) => void;
};

export type InspectableSchema = {
  readonly schema: Schema;
  readonly metadata: SchemaMetadata;
  validate: (input: unknown) => Result<unknown, readonly ValidationError[]>;
};

/**
 * Wrap a schema with success/failure hooks.
 *
 * A hook that throws is reported through `logger.error` and does not affect
 * the validation result.
 *
 * @example
 * ```ts
 * const Orders = inspect(OrderSchema, (ctx) => {
 *   ctx.onFailure((errors) => metrics.increment("order.invalid"));
 * }, { name: "Order" });
 * ```
 */
export function inspect(
  schema: Schema,
  configure?: (ctx: InspectionContext) => void,
  metadata: SchemaMetadata = {},
  logger: Logger = console,
): InspectableSchema {
  const onSuccessCallbacks: Array<(value: unknown) => void> = [];
  const onFailureCallbacks: Array<
    (errors: readonly ValidationError[]) => void
  > = [];

  configure?.({
    schemaName: metadata.name,
    schemaSource: metadata.source,
    onSuccess: (callback) => {
      onSuccessCallbacks.push(callback);
    },
    onFailure: (callback) => {
      onFailureCallbacks.push(callback);
    },
  });

  const trigger = <T>(
    callbacks: ReadonlyArray<(arg: T) => void>,
    arg: T,
    hook: string,
  ) => {
    for (const callback of callbacks) {
      try {
        callback(arg);
      } catch (err) {
        logger.error(`Introspection hook error (${hook}):`, err);
      }
    }
  };

  return {
    schema,
    metadata,
    validate: (input) => {
      const result = schema.validateSafe(input);
      if (result.ok) {
        trigger(onSuccessCallbacks, result.value, "onSuccess");
      } else {
        trigger(onFailureCallbacks, result.error, "onFailure");
      }
      return result;
    },
  };
}

/**
 * Inspectable schema that logs every validation.
 *
 * @example
 * ```ts
 * const Input = createObservableSchema(InputSchema, "ProcessOrder-Input");
 * Input.validate(data);
 * // ✓ ProcessOrder-Input: validation passed { timestamp: ..., properties: [...] }
 * ```
 */
export function createObservableSchema(
  schema: Schema,
  stageName: string,
  logger: Logger = console,
): InspectableSchema {
  return inspect(
    schema,
    (ctx) => {
      ctx.onSuccess((value) => {
        logger.log(`✓ ${stageName}: validation passed`, {
          timestamp: new Date().toISOString(),
          properties: typeof value === "object" && value !== null
            ? Object.keys(value)
            : [],
        });
      });

      ctx.onFailure((errors) => {
        logger.error(`✗ ${stageName}: validation failed`, {
          timestamp: new Date().toISOString(),
          errors,
        });
      });
    },
    { name: stageName },
    logger,
  );
}
