// packages/sieve-type-runtime/schema.test.ts

import { expect, test } from "vitest";
import { spec } from "../sieve-type-spec/src/mod.ts";
import { defaultPredicates } from "../sieve-predicates/mod.ts";
import { UnknownPredicateError } from "./errors.ts";
import { defineSchema, Schema } from "./schema.ts";

const name = Symbol.for("name");
const age = Symbol.for("age");

const Person = defineSchema(
  spec.map([
    spec.required(name, spec.string(["filled"])),
    spec.required(age, spec.integer([["gteq", 0]])),
  ]),
  { atomize: true },
);

test("Schema - validateSafe returns the normalized value", () => {
  const result = Person.validateSafe({ name: "Ada", age: 36, extra: true });
  expect(result).toEqual({ ok: true, value: { [name]: "Ada", [age]: 36 } });
  if (result.ok && typeof result.value === "object" && result.value !== null) {
    expect(Reflect.ownKeys(result.value)).toEqual([name, age]);
  }
});

test("Schema - validateSafe flattens failures into messages", () => {
  expect(Person.validateSafe({ name: "", age: -1 })).toEqual({
    ok: false,
    error: [
      { path: "name", message: "must be filled" },
      { path: "age", message: "must be greater than or equal to 0" },
    ],
  });
});

test("Schema - validate keeps the structured outcome", () => {
  const outcome = Person.validate({ name: "Ada" });
  expect(outcome.ok).toBe(false);
  if (!outcome.ok && outcome.error.kind === "map") {
    expect(outcome.error.results).toEqual([
      { ok: true, value: { kind: "key", path: [name], value: "Ada" } },
      { ok: false, error: { kind: "missing_key", path: [age] } },
    ]);
  }
});

test("Schema - errors is empty for valid input", () => {
  expect(Person.errors({ name: "Ada", age: 36 })).toEqual([]);
  expect(Person.errors({ name: "Ada" })).toEqual([
    { path: "age", message: "key must be present" },
  ]);
});

test("Schema - message overrides", () => {
  const Contact = defineSchema(
    spec.map([spec.required("email", spec.string(["email"]))]),
    { messages: { email: () => "is not an email address" } },
  );
  expect(Contact.errors({ email: "nope" })).toEqual([
    { path: "email", message: "is not an email address" },
  ]);
  expect(Contact.errors({ email: "ada@example.com" })).toEqual([]);
});

test("Schema - custom predicates are used for compiling and validating", () => {
  const Even = defineSchema(spec.integer(["even"]), {
    predicates: {
      ...defaultPredicates,
      even: (value) => typeof value === "number" && value % 2 === 0,
    },
  });
  expect(Even.errors(4)).toEqual([]);
  expect(Even.errors(3)).toEqual([{ path: "", message: "must satisfy even" }]);
});

test("Schema - use-site constraints", () => {
  const Small = new Schema(spec.integer(), { constraints: [["lt", 10]] });
  expect(Small.errors(12)).toEqual([
    { path: "", message: "must be less than 10" },
  ]);
});

test("Schema - configuration errors throw on construction", () => {
  expect(() => defineSchema(spec.integer(["even"]))).toThrow(
    UnknownPredicateError,
  );
});

test("Schema - equals compares compiled trees", () => {
  const Tags = spec.list(spec.string(["filled"]));
  expect(defineSchema(Tags).equals(defineSchema(Tags))).toBe(true);
  expect(defineSchema(Tags).equals(defineSchema(spec.list(spec.string()))))
    .toBe(false);
});

test("Schema - toString names the root node type", () => {
  expect(String(Person)).toBe("Schema<map>");
  expect(String(defineSchema(spec.union(spec.string(), spec.nil())))).toBe(
    "Schema<union>",
  );
});

test("Schema - holes in a list are reported by index", () => {
  const Scores = defineSchema(spec.list(spec.integer()));
  expect(Scores.validateSafe([1, , 3])).toEqual({
    ok: false,
    error: [{ path: "[1]", message: "must be an integer" }],
  });
});
