// packages/sieve-type-runtime/output.ts

import { setIn } from "./map-key.ts";
import { isAggregate } from "./outcome.ts";

/**
 * Rebuild a plain value from a success value. Maps keep only their declared
 * keys, at their declared paths; lists keep every element.
 */
export function toOutput(value: unknown): unknown {
  if (!isAggregate(value)) return value;
  if (value.kind === "list") {
    return value.results.map((r) => (r.ok ? toOutput(r.value) : undefined));
  }
  let output: Record<PropertyKey, unknown> = {};
  for (const r of value.results) {
    if (r.ok) output = setIn(output, r.value.path, toOutput(r.value.value));
  }
  return output;
}
