/**
 * Tests for the individual tree passes.
 */

import { describe, it, expect } from "vitest";
import type { Node } from "../src/ast/elixir-ast";
import {
  eAssign,
  eAtom,
  eBinary,
  eBlock,
  eCall,
  eCase,
  eCond,
  eDef,
  eDefp,
  eDirective,
  eField,
  eFieldAssign,
  eFor,
  eIf,
  eInt,
  eList,
  eMap,
  eMatch,
  eModule,
  eNil,
  eParen,
  eRemote,
  eString,
  eTuple,
  eUnary,
  eVar,
  eWith,
  pLit,
  pVar,
  pWildcard,
} from "../src/ast/elixir-ast";
import { withMeta } from "../src/ast/traverse";
import { FreshNames } from "../src/fresh-names";
import { silentLogger } from "../src/logger";
import { addBitwiseRequire, bitwiseImport } from "../src/passes/bitwise-import";
import { resolveClauseLocals } from "../src/passes/clause-local-resolution";
import { hoistConditionalReassignment } from "../src/passes/conditional-reassignment";
import { effectLifting, liftEffects } from "../src/passes/effect-lifting";
import { reconstructEnumPatterns } from "../src/passes/enum-pattern-reconstruction";
import { deriveTemplate, reconstructLoop } from "../src/passes/loop-reconstruction";
import { mutableToImmutable } from "../src/passes/mutable-to-immutable";
import type { PassContext } from "../src/passes/pass";
import { buildPipes } from "../src/passes/pipe-operator";
import { removeRedundantNilInits } from "../src/passes/redundant-nil-init";
import { bindDiscardedUpdates } from "../src/passes/statement-context";
import { interpolate } from "../src/passes/string-interpolation";
import { collapseTempBindings } from "../src/passes/temp-binding-collapse";
import { findUnusedPrivateFunctions, unusedPrivateFunctions } from "../src/passes/unused-private-functions";
import { printNode } from "../src/printer/printer";

const passContext = (): PassContext => ({
  names: new FreshNames(),
  instanceParam: "struct",
  logger: silentLogger,
});

const lines = (...text: string[]) => text.join("\n");

// ============================================================================
// Clause-local resolution
// ============================================================================

describe("clause-local resolution", () => {
  it("renames bindings and reads by source id", () => {
    const node = eBlock([eMatch(pVar("x", 7), eInt(1)), eVar("x", 7), eVar("y", 8)], {
      clauseLocals: new Map([[7, "x_1"]]),
    });
    expect(resolveClauseLocals(node)).toEqual(eBlock([eMatch(pVar("x_1", 7), eInt(1)), eVar("x_1", 7), eVar("y", 8)]));
  });

  it("lets an inner map shadow an outer one", () => {
    const inner = withMeta(eParen(eVar("x", 7)), { clauseLocals: new Map([[7, "inner"]]) });
    const node = eBlock([eVar("x", 7), inner], { clauseLocals: new Map([[7, "outer"]]) });
    expect(resolveClauseLocals(node)).toEqual(eBlock([eVar("outer", 7), eParen(eVar("inner", 7))]));
  });

  it("leaves variables without a source id alone", () => {
    const node = eBlock([eVar("x")], { clauseLocals: new Map([[7, "x_1"]]) });
    expect(resolveClauseLocals(node)).toEqual(eBlock([eVar("x")]));
  });
});

// ============================================================================
// Mutable-to-immutable
// ============================================================================

describe("mutable-to-immutable", () => {
  const lower = (node: Node) => printNode(mutableToImmutable(node, "struct"));

  it("rebinds a pushed list", () => {
    expect(lower(eBlock([eRemote(eVar("items"), "push", [eInt(1)]), eVar("items")]))).toBe(
      lines("items = items ++ [1]", "items")
    );
  });

  it("updates a field of the instance parameter", () => {
    expect(lower(eBlock([eRemote(eField(eVar("struct"), "items"), "push", [eVar("v")]), eVar("struct")]))).toBe(
      lines("struct = %{struct | items: struct.items ++ [v]}", "struct")
    );
  });

  it("leaves a push on another object's field alone", () => {
    expect(lower(eBlock([eRemote(eField(eVar("other"), "items"), "push", [eVar("v")]), eVar("other")]))).toBe(
      lines("other.items.push(v)", "other")
    );
  });

  it("drops the last element on pop", () => {
    expect(lower(eBlock([eRemote(eVar("stack"), "pop", []), eVar("stack")]))).toBe(
      lines("stack = List.delete_at(stack, -1)", "stack")
    );
  });

  it("rebinds increments of variables and instance fields", () => {
    expect(lower(eBlock([eUnary("increment", eVar("x")), eVar("x")]))).toBe(lines("x = x + 1", "x"));
    expect(lower(eBlock([eUnary("decrement", eField(eVar("struct"), "count")), eVar("struct")]))).toBe(
      lines("struct = %{struct | count: struct.count - 1}", "struct")
    );
  });

  it("turns a field assignment into a struct update", () => {
    expect(lower(eBlock([eFieldAssign(eVar("struct"), "name", eString("n")), eVar("struct")]))).toBe(
      lines('struct = %{struct | name: "n"}', "struct")
    );
  });

  it("treats if branches as statement position", () => {
    expect(lower(eIf(eVar("c"), eUnary("increment", eVar("x"))))).toBe(lines("if c do", "  x = x + 1", "end"));
  });

  it("lowers % to Kernel.rem like the printer does", () => {
    const node = eBinary("%", eVar("a"), eVar("b"));
    expect(lower(node)).toBe("Kernel.rem(a, b)");
    expect(lower(node)).toBe(printNode(node));
  });
});

// ============================================================================
// Conditional reassignment
// ============================================================================

describe("conditional reassignment", () => {
  it("hoists the assignment out of an else-less if", () => {
    const node = eIf(eVar("c"), eAssign("x", eBinary("+", eVar("x"), eInt(1))));
    expect(printNode(hoistConditionalReassignment(node))).toBe("x = if c, do: x + 1, else: x");
  });

  it("keeps an if with an else branch", () => {
    const node = eIf(eVar("c"), eAssign("x", eBinary("+", eVar("x"), eInt(1))), eVar("x"));
    expect(hoistConditionalReassignment(node)).toBe(node);
  });

  it("keeps an assignment that does not read its target", () => {
    const node = eIf(eVar("c"), eAssign("x", eInt(1)));
    expect(hoistConditionalReassignment(node)).toBe(node);
  });
});

// ============================================================================
// Redundant nil init
// ============================================================================

describe("redundant nil init", () => {
  it("drops an init overwritten before any read", () => {
    const stmts = [eAssign("x", eNil), eAssign("y", eInt(1)), eAssign("x", eInt(5))];
    expect(removeRedundantNilInits(stmts)).toEqual([eAssign("y", eInt(1)), eAssign("x", eInt(5))]);
  });

  it("keeps an init read before the overwrite", () => {
    const stmts = [eAssign("x", eNil), eAssign("y", eVar("x")), eAssign("x", eInt(5))];
    expect(removeRedundantNilInits(stmts)).toEqual(stmts);
  });

  it("keeps an init whose overwrite reads it", () => {
    const stmts = [eAssign("x", eNil), eAssign("x", eBinary("+", eVar("x"), eInt(1)))];
    expect(removeRedundantNilInits(stmts)).toEqual(stmts);
  });

  it("looks past a second nil init", () => {
    const stmts = [eAssign("x", eNil), eAssign("x", eNil), eAssign("x", eInt(5))];
    expect(removeRedundantNilInits(stmts)).toEqual([eAssign("x", eInt(5))]);
  });

  it("keeps an init that is never overwritten", () => {
    const stmts = [eAssign("x", eNil), eCall("run", [])];
    expect(removeRedundantNilInits(stmts)).toEqual(stmts);
  });
});

// ============================================================================
// Loop reconstruction
// ============================================================================

describe("loop reconstruction", () => {
  const unrolled = (elements: Node[]) =>
    eBlock(
      [eAssign("g", eList([])), ...elements.map((e) => eAssign("g", eBinary("++", eVar("g"), eList([e])))), eVar("g")],
      { unrolledLoop: true }
    );

  it("recovers the index itself", () => {
    const node = reconstructLoop(unrolled([eInt(0), eInt(1), eInt(2)]), new FreshNames());
    expect(printNode(node)).toBe("for i <- 0..2, do: i");
  });

  it("recovers a call template", () => {
    const node = reconstructLoop(
      unrolled([eCall("f", [eInt(0)]), eCall("f", [eInt(1)]), eCall("f", [eInt(2)])]),
      new FreshNames()
    );
    expect(printNode(node)).toBe("for i <- 0..2, do: f(i)");
  });

  it("nests list elements", () => {
    const row = eList([eInt(0), eInt(1)]);
    const node = reconstructLoop(unrolled([row, row, row]), new FreshNames());
    expect(printNode(node)).toBe(lines("for i <- 0..2 do", "  for j <- 0..1, do: j", "end"));
  });

  it("skips taken index names", () => {
    const elements = [0, 1].map((k) => eTuple([eVar("i"), eInt(k)]));
    const node = reconstructLoop(unrolled(elements), new FreshNames());
    expect(printNode(node)).toBe("for j <- 0..1, do: {i, j}");
  });

  it("leaves elements without a template unchanged", () => {
    const block = unrolled([eInt(1), eInt(5), eInt(9)]);
    expect(reconstructLoop(block, new FreshNames())).toBe(block);
  });

  it("leaves unmarked blocks unchanged", () => {
    const block = eBlock([
      eAssign("g", eList([])),
      eAssign("g", eBinary("++", eVar("g"), eList([eInt(0)]))),
      eAssign("g", eBinary("++", eVar("g"), eList([eInt(1)]))),
      eVar("g"),
    ]);
    expect(reconstructLoop(block, new FreshNames())).toBe(block);
  });

  it("requires every element to fit the template", () => {
    expect(deriveTemplate([eInt(0), eInt(1), eInt(7)], "i")).toBeUndefined();
    expect(deriveTemplate([eInt(0)], "i")).toEqual(eVar("i"));
  });
});

// ============================================================================
// Enum pattern reconstruction
// ============================================================================

describe("enum pattern reconstruction", () => {
  const subject = eCall("elem", [eVar("x"), eInt(0)]);
  const clauses = [
    {
      pattern: pLit(eInt(0)),
      body: eBlock([eAssign("v", eCall("elem", [eVar("x"), eInt(1)])), eCall("use", [eVar("v")])]),
    },
    { pattern: pWildcard, body: eAtom("none") },
  ];

  it("matches the tuple directly", () => {
    expect(printNode(reconstructEnumPatterns(eCase(subject, clauses)))).toBe(
      lines("case x do", "  {0, v} -> use(v)", "  _ -> :none", "end")
    );
  });

  it("pads the tuple to the known arity", () => {
    const node = withMeta(eCase(subject, clauses), { tagArities: new Map([[0, 2]]) });
    expect(printNode(reconstructEnumPatterns(node))).toBe(
      lines("case x do", "  {0, v, _} -> use(v)", "  _ -> :none", "end")
    );
  });

  it("declines when the arity of a payload-free clause is unknown", () => {
    const node = eCase(subject, [{ pattern: pLit(eInt(2)), body: eAtom("empty") }]);
    expect(reconstructEnumPatterns(node)).toBe(node);
  });

  it("declines on a clause binding the whole tag", () => {
    const node = eCase(subject, [...clauses, { pattern: pVar("other"), body: eVar("other") }]);
    expect(reconstructEnumPatterns(node)).toBe(node);
  });
});

// ============================================================================
// Temp-binding collapse
// ============================================================================

describe("temp-binding collapse", () => {
  const tempBlock = () => eBlock([eAssign("tmp", eCall("f", [])), eBinary("+", eVar("tmp"), eInt(1))]);

  it("collapses a block in a list slot", () => {
    expect(printNode(collapseTempBindings(eList([tempBlock()])))).toBe("[f() + 1]");
  });

  it("never collapses case bodies, function bodies or if branches", () => {
    const inCase = eCase(eVar("x"), [{ pattern: pWildcard, body: tempBlock() }]);
    const inDef = eDef("g", [], tempBlock());
    const inIf = eIf(eVar("c"), tempBlock(), eInt(0));
    expect(collapseTempBindings(inCase)).toEqual(inCase);
    expect(collapseTempBindings(inDef)).toEqual(inDef);
    expect(collapseTempBindings(inIf)).toEqual(inIf);
  });

  it("keeps an impure value that is read twice", () => {
    const node = eList([eBlock([eAssign("tmp", eCall("f", [])), eBinary("+", eVar("tmp"), eVar("tmp"))])]);
    expect(collapseTempBindings(node)).toEqual(node);
  });

  it("duplicates a pure value", () => {
    const node = eList([eBlock([eAssign("tmp", eVar("y")), eBinary("+", eVar("tmp"), eVar("tmp"))])]);
    expect(printNode(collapseTempBindings(node))).toBe("[y + y]");
  });

  it("respects keepInline", () => {
    const node = eList([withMeta(tempBlock(), { keepInline: true })]);
    expect(collapseTempBindings(node)).toEqual(node);
  });
});

// ============================================================================
// Effect lifting
// ============================================================================

describe("effect lifting", () => {
  it("hoists an assignment out of a list", () => {
    const node = eBlock([eList([eAssign("a", eCall("f", [])), eVar("a")])]);
    expect(printNode(liftEffects(node))).toBe(lines("a = f()", "[a]"));
  });

  it("keeps the bound variable in a keyed slot", () => {
    const node = eBlock([eMap([{ key: eAtom("k"), value: eAssign("x", eCall("g", [])) }])]);
    expect(printNode(liftEffects(node))).toBe(lines("x = g()", "%{:k => x}"));
  });

  it("turns a function body into a block when it hoists", () => {
    const node = eDef("h", [], eList([eAssign("a", eCall("f", [])), eVar("a")]));
    expect(printNode(liftEffects(node))).toBe(lines("def h do", "  a = f()", "  [a]", "end"));
  });

  it("hoists the leading statements of a block slot", () => {
    const node = eBlock([eTuple([eBlock([eCall("log", []), eVar("v")]), eInt(1)])]);
    expect(printNode(liftEffects(node))).toBe(lines("log()", "{v, 1}"));
  });

  it("does not lift the right operand of a short-circuit operator", () => {
    const node = eBlock([eBinary("and", eVar("ok"), eBlock([eCall("log", []), eVar("done")]))]);
    expect(liftEffects(node)).toEqual(node);
  });

  it("binds an earlier call in a list so it still runs first", () => {
    const elements = [eCall("log", []), eAssign("a", eCall("f", [])), eVar("a")];
    const node = eBlock([eAssign("r", eList(elements)), eVar("r")]);
    expect(printNode(liftEffects(node))).toBe(lines("tmp_1 = log()", "a = f()", "r = [tmp_1, a]", "r"));
  });

  it("leaves earlier variables and literals in place", () => {
    const node = eBlock([eList([eVar("v"), eInt(1), eAssign("a", eCall("f", [])), eVar("a")])]);
    expect(printNode(liftEffects(node))).toBe(lines("a = f()", "[v, 1, a]"));
  });

  it("does not bind calls after the last hoisting slot", () => {
    const node = eBlock([eList([eAssign("a", eCall("f", [])), eCall("log", [])])]);
    expect(printNode(liftEffects(node))).toBe(lines("a = f()", "[log()]"));
  });

  it("orders call arguments and binary operands", () => {
    const hoisting = eList([eAssign("a", eCall("f", [])), eVar("a")]);
    expect(printNode(liftEffects(eBlock([eCall("g", [eCall("log", []), hoisting])])))).toBe(
      lines("tmp_1 = log()", "a = f()", "g(tmp_1, [a])")
    );
    expect(printNode(liftEffects(eBlock([eBinary("++", eCall("log", []), hoisting)])))).toBe(
      lines("tmp_1 = log()", "a = f()", "tmp_1 ++ [a]")
    );
  });

  it("takes temporaries from the unit's name counter", () => {
    const ctx = passContext();
    ctx.names.next("loop");
    const node = eBlock([eList([eCall("log", []), eAssign("a", eCall("f", [])), eVar("a")])]);
    expect(printNode(effectLifting.run(node, ctx))).toBe(lines("tmp_2 = log()", "a = f()", "[tmp_2, a]"));
  });
});

describe("effect lifting in clause bodies", () => {
  const slot = () => eList([eAssign("a", eCall("f", [])), eVar("a")]);
  const lifted = eBlock([eAssign("a", eCall("f", [])), eList([eVar("a")])]);

  it("lifts cond clause bodies", () => {
    const node = eCond([{ cond: eVar("c"), body: slot() }]);
    expect(liftEffects(node)).toEqual(eCond([{ cond: eVar("c"), body: lifted }]));
    expect(printNode(liftEffects(node))).toBe(lines("cond do", "  c ->", "    a = f()", "    [a]", "end"));
  });

  it("lifts a comprehension body", () => {
    const gen = { pattern: pVar("x"), source: eVar("xs") };
    expect(liftEffects(eFor([gen], slot()))).toEqual(eFor([gen], lifted));
  });

  it("lifts every body of a try", () => {
    const node: Node = {
      tag: "try",
      body: slot(),
      rescue: [{ pattern: pVar("e"), exceptions: ["RuntimeError"], body: slot() }],
      catch: [{ pattern: pVar("v"), body: slot() }],
      else: [{ pattern: pWildcard, body: slot() }],
      after: slot(),
    };
    expect(liftEffects(node)).toEqual({
      tag: "try",
      body: lifted,
      rescue: [{ pattern: pVar("e"), exceptions: ["RuntimeError"], body: lifted }],
      catch: [{ pattern: pVar("v"), body: lifted }],
      else: [{ pattern: pWildcard, body: lifted }],
      after: lifted,
    });
  });

  it("lifts with bodies but not its generators", () => {
    const clauses = [{ pattern: pVar("v"), expr: eCall("fetch", []) }];
    const node = eWith(clauses, slot(), [{ pattern: pWildcard, body: slot() }]);
    expect(liftEffects(node)).toEqual(eWith(clauses, lifted, [{ pattern: pWildcard, body: lifted }]));
  });

  it("lifts receive clauses and the after body", () => {
    const node: Node = {
      tag: "receive",
      clauses: [{ pattern: pVar("msg"), body: slot() }],
      after: { timeout: eInt(100), body: slot() },
    };
    expect(liftEffects(node)).toEqual({
      tag: "receive",
      clauses: [{ pattern: pVar("msg"), body: lifted }],
      after: { timeout: eInt(100), body: lifted },
    });
  });
});

// ============================================================================
// Statement context
// ============================================================================

describe("statement context", () => {
  it("binds a discarded immutable update back to its variable", () => {
    const node = eDef(
      "put",
      [pVar("m")],
      eBlock([eRemote("Map", "put", [eVar("m"), eAtom("k"), eInt(1)]), eVar("m")])
    );
    expect(printNode(bindDiscardedUpdates(node))).toBe(
      lines("def put(m) do", "  m = Map.put(m, :k, 1)", "  m", "end")
    );
  });

  it("leaves an update whose value is returned", () => {
    const node = eDef("put", [pVar("m")], eRemote("Map", "put", [eVar("m"), eAtom("k"), eInt(1)]));
    expect(bindDiscardedUpdates(node)).toEqual(node);
  });

  it("leaves calls that are not updates", () => {
    const node = eBlock([eRemote("IO", "puts", [eVar("m")]), eVar("m")]);
    expect(bindDiscardedUpdates(node)).toEqual(node);
  });

  it("rebinds around a discarded if whose branch updates", () => {
    const node = eDef(
      "put",
      [pVar("m"), pVar("c")],
      eBlock([eIf(eVar("c"), eRemote("Map", "put", [eVar("m"), eAtom("k"), eInt(1)])), eVar("m")])
    );
    expect(printNode(bindDiscardedUpdates(node))).toBe(
      lines("def put(m, c) do", "  m = if c do", "    Map.put(m, :k, 1)", "  else", "    m", "  end", "  m", "end")
    );
  });

  it("ends the other branch with the variable", () => {
    const node = eBlock([
      eIf(
        eVar("c"),
        eRemote("IO", "puts", [eString("x")]),
        eRemote("Map", "delete", [eVar("m"), eAtom("k")])
      ),
      eVar("m"),
    ]);
    expect(printNode(bindDiscardedUpdates(node))).toBe(
      lines("m = if c do", '  IO.puts("x")', "  m", "else", "  Map.delete(m, :k)", "end", "m")
    );
  });

  it("leaves an if whose value is returned", () => {
    const node = eDef(
      "put",
      [pVar("m"), pVar("c")],
      eIf(eVar("c"), eRemote("Map", "put", [eVar("m"), eAtom("k"), eInt(1)]))
    );
    expect(bindDiscardedUpdates(node)).toEqual(node);
  });
});

// ============================================================================
// Pipe operator
// ============================================================================

describe("pipe operator", () => {
  it("chains consecutive rebindings", () => {
    const stmts = buildPipes([
      eAssign("v", eRemote("String", "trim", [eVar("v")])),
      eAssign("v", eRemote("String", "replace", [eVar("v"), eString("a"), eString("b")])),
      eVar("v"),
    ]);
    expect(printNode(eBlock(stmts))).toBe(lines('v = v |> String.trim() |> String.replace("a", "b")', "v"));
  });

  it("leaves a single step alone", () => {
    const stmts = [eAssign("v", eRemote("String", "trim", [eVar("v")])), eVar("v")];
    expect(buildPipes(stmts)).toEqual(stmts);
  });

  it("stops at a step whose extra arguments read the variable", () => {
    const stmts = [
      eAssign("v", eRemote("String", "trim", [eVar("v")])),
      eAssign("v", eRemote("Map", "merge", [eVar("v"), eVar("v")])),
    ];
    expect(buildPipes(stmts)).toEqual(stmts);
  });
});

// ============================================================================
// String interpolation
// ============================================================================

describe("string interpolation", () => {
  it("merges a concatenation chain", () => {
    const node = eBinary("<>", eBinary("<>", eString("Hello "), eVar("name")), eString("!"));
    expect(printNode(interpolate(node))).toBe('"Hello #{name}!"');
  });

  it("escapes a literal #{ in the text", () => {
    const node = eBinary("<>", eString("#{x} "), eVar("y"));
    expect(printNode(interpolate(node))).toBe('"\\#{x} #{y}"');
  });

  it("keeps a chain of plain strings", () => {
    const node = eBinary("<>", eString("a"), eString("b"));
    expect(printNode(interpolate(node))).toBe('"a" <> "b"');
  });
});

// ============================================================================
// Unused private functions
// ============================================================================

describe("unused private functions", () => {
  it("ignores self-calls", () => {
    const module = eModule("M", [
      eDef("a", [], eCall("b", [])),
      eDefp("b", [], eInt(1)),
      eDefp("c", [], eCall("c", [])),
    ]);
    expect(findUnusedPrivateFunctions(module)).toEqual(["c/0"]);
  });

  it("counts calls through the module's own alias", () => {
    const module = eModule("M", [eDef("a", [], eRemote("M", "d", [eInt(1)])), eDefp("d", [pVar("x")], eVar("x"))]);
    expect(findUnusedPrivateFunctions(module)).toEqual([]);
  });

  it("records the list on the module", () => {
    const module = eModule("M", [eDefp("helper", [pVar("x")], eVar("x"))]);
    const result = unusedPrivateFunctions.run(module, passContext());
    expect(result.meta?.unusedPrivateFunctions).toEqual(["helper/1"]);
  });
});

// ============================================================================
// Bitwise import
// ============================================================================

describe("bitwise import", () => {
  it("requires Bitwise when an operator is used", () => {
    const module = eModule("B", [eDef("m", [pVar("a")], eBinary("&", eVar("a"), eInt(1)))]);
    expect(addBitwiseRequire(module).body[0]).toEqual(eDirective("require", "Bitwise"));
  });

  it("does not add a second directive", () => {
    const module = eModule("B", [
      eDirective("import", "Bitwise"),
      eDef("m", [pVar("a")], eUnary("~", eVar("a"))),
    ]);
    expect(addBitwiseRequire(module)).toBe(module);
  });

  it("only affects the module that uses the operator", () => {
    const inner = eModule("Inner", [eDef("m", [pVar("a")], eBinary("<<", eVar("a"), eInt(2)))]);
    const outer = eModule("Outer", [inner]);
    const result = bitwiseImport.run(outer, passContext());
    expect(result).toEqual(
      eModule("Outer", [
        eModule("Inner", [
          eDirective("require", "Bitwise"),
          eDef("m", [pVar("a")], eBinary("<<", eVar("a"), eInt(2))),
        ]),
      ])
    );
  });
});
