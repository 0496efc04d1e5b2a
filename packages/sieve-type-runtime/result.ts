// packages/sieve-type-runtime/result.ts

// Two-armed outcome shared by the validator and the schema wrapper.
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export type Ok<T> = Extract<Result<T, never>, { ok: true }>;
export type Err<E> = Extract<Result<never, E>, { ok: false }>;

export const Result = {
  ok<T, E = never>(value: T): Result<T, E> {
    return { ok: true, value };
  },

  err<T = never, E = unknown>(error: E): Result<T, E> {
    return { ok: false, error };
  },
};
