import { describe, expect, it } from "vitest";
import { type Argument, type Clause } from "../src/dl.js";
import { parseClause, parseProgram } from "../src/dl-parse.js";


describe("parseClause", () => {
  const X: Argument = { type: "variable", name: "X" };
  const Y: Argument = { type: "variable", name: "Y" };
  const int = (value: number): Argument => ({ type: "number", value, numType: "int" });

  const expectedParsings: [string, Clause][] = [
    ["r(1).", { head: { name: ["r"], args: [int(1)] }, body: [] }],
    ["ok().", { head: { name: ["ok"], args: [] }, body: [] }],
    ["a.b(X) :- c(X).", {
      head: { name: ["a", "b"], args: [X] },
      body: [{ type: "atom", name: ["c"], args: [X] }],
    }],
    ["r(X) :- s(X, _), !t(X).", {
      head: { name: ["r"], args: [X] },
      body: [
        { type: "atom", name: ["s"], args: [X, { type: "unnamed-variable" }] },
        { type: "negation", atom: { name: ["t"], args: [X] } },
      ],
    }],
    ["r(X) :- s(X), X <= 2, X != Y.", {
      head: { name: ["r"], args: [X] },
      body: [
        { type: "atom", name: ["s"], args: [X] },
        { type: "constraint", op: "<=", lhs: X, rhs: int(2) },
        { type: "constraint", op: "!=", lhs: X, rhs: Y },
      ],
    }],
    ["r(X - 1 - Y) :- s(X, Y).", {
      head: {
        name: ["r"],
        args: [{
          type: "functor",
          op: "-",
          args: [{ type: "functor", op: "-", args: [X, int(1)] }, Y],
        }],
      },
      body: [{ type: "atom", name: ["s"], args: [X, Y] }],
    }],
    ['r(-4, 5u, 0.5, "a\\"b") :- s().', {
      head: {
        name: ["r"],
        args: [
          int(-4),
          { type: "number", value: 5, numType: "unsigned" },
          { type: "number", value: 0.5, numType: "float" },
          { type: "string", value: 'a"b' },
        ],
      },
      body: [{ type: "atom", name: ["s"], args: [] }],
    }],
    ["r(N) :- N = count : { s(_) }.", {
      head: { name: ["r"], args: [{ type: "variable", name: "N" }] },
      body: [{
        type: "constraint",
        op: "=",
        lhs: { type: "variable", name: "N" },
        rhs: {
          type: "aggregator",
          fn: "count",
          body: [{ type: "atom", name: ["s"], args: [{ type: "unnamed-variable" }] }],
        },
      }],
    }],
    ["r(M) :- M = max(X, Y), s(X, Y).", {
      head: { name: ["r"], args: [{ type: "variable", name: "M" }] },
      body: [
        {
          type: "constraint",
          op: "=",
          lhs: { type: "variable", name: "M" },
          rhs: { type: "functor", op: "max", args: [X, Y] },
        },
        { type: "atom", name: ["s"], args: [X, Y] },
      ],
    }],
    ["r(@f(X), $, $2, @rule) :- s(X, @rule).", {
      head: {
        name: ["r"],
        args: [
          { type: "user-functor", name: "f", args: [X] },
          { type: "counter" },
          { type: "subroutine-argument", index: 2 },
          { type: "variable", name: "@rule" },
        ],
      },
      body: [{ type: "atom", name: ["s"], args: [X, { type: "variable", name: "@rule" }] }],
    }],
  ];

  for (const [input, expected] of expectedParsings) {
    it(`parses ${input}`, () => {
      expect(parseClause(input)).toEqual(expected);
    });
  }

  it("reports where parsing failed", () => {
    expect(() => parseClause("r(X) :- s(X)")).toThrow(/Expected/);
  });
});

describe("parseProgram", () => {
  it("skips whitespace and comments between clauses", () => {
    const clauses = parseProgram(`
      // facts
      edge(1, 2).
      /* rules */
      path(X, Y) :- edge(X, Y).
    `);
    expect(clauses).toHaveLength(2);
    expect(clauses[0].body).toEqual([]);
    expect(clauses[1].head.name).toEqual(["path"]);
  });

  it("accepts an empty program", () => {
    expect(parseProgram("  ")).toEqual([]);
  });
});
