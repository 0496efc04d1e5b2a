// packages/sieve-type-runtime/compiler.test.ts

import { expect, test } from "vitest";
import { spec } from "../sieve-type-spec/src/mod.ts";
import { defaultPredicates } from "../sieve-predicates/mod.ts";
import { compile } from "./compiler.ts";
import {
  InvalidOptionsError,
  MalformedSpecError,
  UnknownPredicateError,
} from "./errors.ts";
import { nodesEqual } from "./type-node.ts";

const even = (value: unknown) => typeof value === "number" && value % 2 === 0;

// ============================================================================
// Node shapes
// ============================================================================

test("compile - primitive carries its kind-check first", () => {
  expect(compile(spec.integer([["gt", 0]]))).toEqual({
    type: "primitive",
    kind: "integer",
    constraints: [
      { predicate: "type", args: ["integer"] },
      { predicate: "gt", args: [0] },
    ],
  });
});

test("compile - any kind has no kind-check", () => {
  expect(compile(spec.any(["filled"]))).toEqual({
    type: "primitive",
    kind: "any",
    constraints: [{ predicate: "filled", args: [] }],
  });
});

test("compile - multi-argument constraints keep every argument", () => {
  const predicates = { ...defaultPredicates, between: () => true };
  const node = compile(spec.number([["between", 1, 5]]), { predicates });
  expect(node.constraints[1]).toEqual({ predicate: "between", args: [1, 5] });
});

test("compile - and groups are kept as groups", () => {
  const node = compile(spec.integer([spec.and("positive", ["lt", 10])]));
  expect(node.constraints).toEqual([
    { predicate: "type", args: ["integer"] },
    {
      and: [
        { predicate: "positive", args: [] },
        { predicate: "lt", args: [10] },
      ],
    },
  ]);
});

test("compile - list without a member type is a list primitive", () => {
  expect(compile(spec.list())).toEqual({
    type: "primitive",
    kind: "list",
    constraints: [{ predicate: "type", args: ["list"] }],
  });
});

test("compile - list with a member type", () => {
  expect(compile(spec.list(spec.string()))).toEqual({
    type: "list",
    memberType: {
      type: "primitive",
      kind: "string",
      constraints: [{ predicate: "type", args: ["string"] }],
    },
    constraints: [{ predicate: "type", args: ["list"] }],
  });
});

test("compile - map keys normalize to paths in declaration order", () => {
  const node = compile(
    spec.map([
      spec.required("name", spec.string()),
      spec.optional(["meta", "tag"], spec.string()),
    ]),
  );
  expect(node.type).toBe("map");
  if (node.type === "map") {
    expect(node.keys.map((k) => [k.path, k.presence])).toEqual([
      [["name"], "required"],
      [["meta", "tag"], "optional"],
    ]);
    expect(node.atomize).toBe(false);
    expect(node.constraints).toEqual([{ predicate: "type", args: ["map"] }]);
  }
});

test("compile - atomize option reaches nested maps", () => {
  const node = compile(
    spec.map([spec.required("user", spec.map([]))]),
    { atomize: true },
  );
  expect(node.type === "map" && node.atomize).toBe(true);
  if (node.type === "map") {
    const inner = node.keys[0].type;
    expect(inner.type === "map" && inner.atomize).toBe(true);
  }
});

test("compile - map-level atomize overrides the options", () => {
  const node = compile({ tag: "map", keys: [], atomize: false }, {
    atomize: true,
  });
  expect(node.type === "map" && node.atomize).toBe(false);
});

test("compile - unions nest to the left and carry the options", () => {
  const node = compile(
    spec.union(spec.string(), spec.integer(), spec.boolean()),
    { atomize: true },
  );
  expect(node.type).toBe("union");
  if (node.type === "union") {
    expect(node.options).toEqual({ atomize: true });
    expect(node.constraints).toEqual([]);
    expect(node.right).toEqual(compile(spec.boolean()));
    expect(node.left).toEqual({
      type: "union",
      left: compile(spec.string()),
      right: compile(spec.integer()),
      options: { atomize: true },
      constraints: [],
    });
  }
});

// ============================================================================
// Use-site constraints
// ============================================================================

test("compile - option constraints follow the node's own", () => {
  const node = compile(spec.integer(["positive"]), { constraints: [["lt", 10]] });
  expect(node.constraints).toEqual([
    { predicate: "type", args: ["integer"] },
    { predicate: "positive", args: [] },
    { predicate: "lt", args: [10] },
  ]);
});

test("compile - option constraints on a union reach both branches", () => {
  const node = compile(spec.union(spec.integer(), spec.number()), {
    constraints: [["lt", 100]],
  });
  expect(node.type).toBe("union");
  if (node.type === "union") {
    expect(node.left.constraints).toEqual([
      { predicate: "type", args: ["integer"] },
      { predicate: "lt", args: [100] },
    ]);
    expect(node.right.constraints).toEqual([
      { predicate: "type", args: ["number"] },
      { predicate: "lt", args: [100] },
    ]);
  }
});

// ============================================================================
// Purity
// ============================================================================

test("compile - same spec compiles to equal, separate trees", () => {
  const User = spec.map([
    spec.required("name", spec.string([["match", /^[A-Z]/]])),
    spec.optional("tags", spec.list(spec.string())),
  ]);
  const a = compile(User);
  const b = compile(User);
  expect(a).not.toBe(b);
  expect(nodesEqual(a, b)).toBe(true);
  expect(a).toEqual(b);
});

test("compile - produced tree is frozen", () => {
  const node = compile(spec.map([spec.required("a", spec.integer())]));
  expect(Object.isFrozen(node)).toBe(true);
  expect(Object.isFrozen(node.constraints)).toBe(true);
  if (node.type === "map") {
    expect(Object.isFrozen(node.keys)).toBe(true);
    expect(Object.isFrozen(node.keys[0].path)).toBe(true);
  }
});

// ============================================================================
// Configuration errors
// ============================================================================

test("compile - unknown predicate names fail at compile time", () => {
  expect(() => compile(spec.integer(["even"]))).toThrow(UnknownPredicateError);
  expect(() => compile(spec.integer(["even"]))).toThrow(
    'unknown predicate "even" (at constraints[0])',
  );
});

test("compile - unknown predicate reports where it was declared", () => {
  const User = spec.map([
    spec.required(
      "tags",
      spec.list(spec.union(spec.string(), spec.integer(["even"]))),
    ),
  ]);
  try {
    compile(User);
    expect.unreachable();
  } catch (err) {
    expect(err).toBeInstanceOf(UnknownPredicateError);
    if (err instanceof UnknownPredicateError) {
      expect(err.predicate).toBe("even");
      expect(err.location).toBe(
        "keys[0].type.member.alternatives[1].constraints[0]",
      );
    }
  }
});

test("compile - predicates from a custom table resolve", () => {
  const predicates = { ...defaultPredicates, even };
  expect(compile(spec.integer(["even"]), { predicates }).constraints).toEqual([
    { predicate: "type", args: ["integer"] },
    { predicate: "even", args: [] },
  ]);
});

test("compile - unknown predicate inside an and group", () => {
  expect(() => compile(spec.integer([spec.and("positive", "even")]))).toThrow(
    'unknown predicate "even" (at constraints[0].and[1])',
  );
});

test("compile - unknown predicate in option constraints", () => {
  expect(() => compile(spec.integer(), { constraints: ["even"] })).toThrow(
    'unknown predicate "even" (at options.constraints[0])',
  );
});

test("compile - unrecognized spec tag", () => {
  expect(() => compile(JSON.parse('{"tag":"tuple"}'))).toThrow(
    MalformedSpecError,
  );
  expect(() => compile(JSON.parse('{"tag":"tuple"}'))).toThrow(
    'unrecognized spec tag "tuple"',
  );
});

test("compile - spec that is not an object", () => {
  expect(() => compile(JSON.parse("42"))).toThrow(
    "spec must be an object, got 42",
  );
});

test("compile - unknown primitive kind", () => {
  expect(() => compile(JSON.parse('{"tag":"primitive","kind":"float"}')))
    .toThrow('unknown primitive kind "float" (at kind)');
});

test("compile - union needs two alternatives", () => {
  expect(() => compile(spec.union(spec.string()))).toThrow(
    "union needs at least two alternatives",
  );
});

test("compile - duplicate key paths are rejected", () => {
  expect(() =>
    compile(
      spec.map([
        spec.required("a", spec.integer()),
        spec.optional("a", spec.string()),
      ]),
    )
  ).toThrow('duplicate key path ["a"] (at keys[1])');
});

test("compile - empty key path is rejected", () => {
  expect(() => compile(spec.map([spec.required([], spec.string())]))).toThrow(
    "key path must not be empty (at keys[0].path)",
  );
});

test("compile - invalid presence is rejected", () => {
  const key = JSON.parse(
    '{"path":"a","presence":"sometimes","type":{"tag":"primitive","kind":"string"}}',
  );
  expect(() => compile(spec.map([key]))).toThrow(
    'invalid presence "sometimes" (at keys[0].presence)',
  );
});

test("compile - constraint that is neither name, tuple nor group", () => {
  expect(() => compile(spec.integer([JSON.parse("42")]))).toThrow(
    "unrecognized constraint 42 (at constraints[0])",
  );
  expect(() => compile(spec.integer([JSON.parse("[1, 2]")]))).toThrow(
    "constraint tuple must start with a predicate name (at constraints[0])",
  );
});

test("compile - invalid options are rejected before compiling", () => {
  expect(() => compile(spec.string(), JSON.parse('{"atomize":"yes"}'))).toThrow(
    InvalidOptionsError,
  );
  expect(() => compile(spec.string(), JSON.parse('{"atomize":"yes"}'))).toThrow(
    'invalid option "atomize": expected boolean',
  );
});
