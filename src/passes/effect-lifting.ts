/**
 * Effect lifting.
 *
 * Assignments and multi-statement blocks inside collection literals are
 * hoisted into statements that run before the enclosing statement:
 *
 *   [a = f(), a]         ->  a = f(); [a]
 *   %{k: (x = g(); x)}   ->  x = g(); %{k: x}
 *
 * A list slot holding a bare assignment is dropped once hoisted; keyed and
 * tuple slots keep the bound variable so the shape is unchanged. Earlier
 * slots with effects are bound to temporaries so they still run first:
 *
 *   [log(), a = f(), a]  ->  tmp_1 = log(); a = f(); [tmp_1, a]
 */

import type { Node } from "../ast/elixir-ast";
import { eBlock, eMatch, eVar, pVar } from "../ast/elixir-ast";
import { isPure, patternToExpr } from "../ast/analysis";
import { rewrite } from "../ast/traverse";
import { FreshNames } from "../fresh-names";
import type { Pass } from "./pass";

interface Lifted {
  hoisted: Node[];
  expr: Node;
}

/** A slot after lifting; `undefined` as the value means the slot disappears. */
interface LiftedSlot {
  hoisted: Node[];
  value: Node | undefined;
}

/** Binary operators whose right operand may not run */
const SHORT_CIRCUIT = new Set(["and", "or", "&&", "||"]);

/** Evaluating the node cannot be observed. */
function effectFree(node: Node): boolean {
  if (isPure(node)) return true;
  switch (node.tag) {
    case "list":
    case "tuple":
      return node.elements.every(effectFree);
    case "map":
      return node.pairs.every((p) => effectFree(p.key) && effectFree(p.value));
    case "keyword":
      return node.pairs.every((p) => effectFree(p.value));
    case "interpolation":
      return node.parts.every((p) => p.kind === "text" || effectFree(p.expr));
    default:
      return false;
  }
}

/**
 * Split a slot value into the statements to hoist and the value left in
 * the slot.
 */
function liftSlot(value: Node, names: FreshNames, dropBareAssignment: boolean): LiftedSlot {
  const inner = liftExpr(value, names);
  const hoisted = [...inner.hoisted];
  let expr = inner.expr;

  if (expr.tag === "block" && expr.exprs.length > 1 && !expr.meta?.keepInline) {
    hoisted.push(...expr.exprs.slice(0, -1));
    expr = expr.exprs[expr.exprs.length - 1];
  }

  if (expr.tag === "match") {
    const bound = patternToExpr(expr.pattern);
    if (dropBareAssignment) {
      hoisted.push(expr);
      return { hoisted, value: undefined };
    }
    if (bound) {
      hoisted.push(expr);
      return { hoisted, value: bound };
    }
  }
  return { hoisted, value: expr };
}

/**
 * Lift a left-to-right sequence of slots. Once a later slot hoists, every
 * earlier slot with effects is bound to a temporary at its own position.
 */
function liftSequence(slots: LiftedSlot[], names: FreshNames): { hoisted: Node[]; values: (Node | undefined)[] } {
  let lastHoisting = -1;
  slots.forEach((slot, i) => {
    if (slot.hoisted.length > 0) lastHoisting = i;
  });

  const hoisted: Node[] = [];
  const values = slots.map((slot, i) => {
    hoisted.push(...slot.hoisted);
    if (i >= lastHoisting || slot.value === undefined || effectFree(slot.value)) return slot.value;
    const tmp = names.next("tmp");
    hoisted.push(eMatch(pVar(tmp), slot.value));
    return eVar(tmp);
  });
  return { hoisted, values };
}

function liftAll(nodes: Node[], names: FreshNames): { hoisted: Node[]; exprs: Node[] } {
  const slots = nodes.map((n): LiftedSlot => {
    const r = liftExpr(n, names);
    return { hoisted: r.hoisted, value: r.expr };
  });
  const r = liftSequence(slots, names);
  return { hoisted: r.hoisted, exprs: r.values.map((v, i) => v ?? nodes[i]) };
}

function liftPairs<P extends { value: Node }>(
  pairs: P[],
  names: FreshNames,
  head: Node[] = []
): { hoisted: Node[]; head: Node[]; pairs: P[] } {
  const slots = [
    ...head.map((n): LiftedSlot => {
      const r = liftExpr(n, names);
      return { hoisted: r.hoisted, value: r.expr };
    }),
    ...pairs.map((p) => liftSlot(p.value, names, false)),
  ];
  const r = liftSequence(slots, names);
  return {
    hoisted: r.hoisted,
    head: head.map((n, i) => r.values[i] ?? n),
    pairs: pairs.map((p, i) => ({ ...p, value: r.values[head.length + i] ?? p.value })),
  };
}

export function liftExpr(node: Node, names: FreshNames): Lifted {
  if (node.meta?.keepInline) return { hoisted: [], expr: node };

  switch (node.tag) {
    case "list": {
      const r = liftSequence(
        node.elements.map((el) => liftSlot(el, names, true)),
        names
      );
      return { hoisted: r.hoisted, expr: { ...node, elements: r.values.filter((v): v is Node => v !== undefined) } };
    }

    case "tuple": {
      const r = liftSequence(
        node.elements.map((el) => liftSlot(el, names, false)),
        names
      );
      return { hoisted: r.hoisted, expr: { ...node, elements: r.values.map((v, i) => v ?? node.elements[i]) } };
    }

    case "map": {
      const r = liftPairs(node.pairs, names);
      return { hoisted: r.hoisted, expr: { ...node, pairs: r.pairs } };
    }

    case "keyword": {
      const r = liftPairs(node.pairs, names);
      return { hoisted: r.hoisted, expr: { ...node, pairs: r.pairs } };
    }

    case "struct": {
      const r = liftPairs(node.fields, names);
      return { hoisted: r.hoisted, expr: { ...node, fields: r.pairs } };
    }

    case "update": {
      const r = liftPairs(node.fields, names, [node.target]);
      return { hoisted: r.hoisted, expr: { ...node, target: r.head[0], fields: r.pairs } };
    }

    case "call": {
      const r = liftAll(node.args, names);
      return { hoisted: r.hoisted, expr: { ...node, args: r.exprs } };
    }

    case "remoteCall": {
      const r = liftAll(node.args, names);
      return { hoisted: r.hoisted, expr: { ...node, args: r.exprs } };
    }

    case "applyFn": {
      const r = liftAll(node.args, names);
      return { hoisted: r.hoisted, expr: { ...node, args: r.exprs } };
    }

    case "binary": {
      if (SHORT_CIRCUIT.has(node.op)) {
        const left = liftExpr(node.left, names);
        return { hoisted: left.hoisted, expr: { ...node, left: left.expr } };
      }
      const r = liftAll([node.left, node.right], names);
      return { hoisted: r.hoisted, expr: { ...node, left: r.exprs[0], right: r.exprs[1] } };
    }

    case "unary": {
      const r = liftExpr(node.operand, names);
      return { hoisted: r.hoisted, expr: { ...node, operand: r.expr } };
    }

    case "paren": {
      const r = liftExpr(node.expr, names);
      return { hoisted: r.hoisted, expr: { ...node, expr: r.expr } };
    }

    case "match": {
      const r = liftExpr(node.value, names);
      return { hoisted: r.hoisted, expr: { ...node, value: r.expr } };
    }

    default:
      return { hoisted: [], expr: node };
  }
}

function liftStatements(stmts: Node[], names: FreshNames): Node[] {
  return stmts.flatMap((stmt) => {
    const r = liftExpr(stmt, names);
    return [...r.hoisted, r.expr];
  });
}

export function liftEffects(root: Node, names: FreshNames = new FreshNames()): Node {
  /** A non-block body that needed hoisting becomes a block. */
  const liftBody = (body: Node): Node => {
    if (body.tag === "block") return body;
    const r = liftExpr(body, names);
    return r.hoisted.length > 0 ? eBlock([...r.hoisted, r.expr]) : body;
  };
  const liftClauses = <C extends { body: Node }>(clauses: C[]): C[] =>
    clauses.map((c) => ({ ...c, body: liftBody(c.body) }));

  return rewrite(root, (node) => {
    switch (node.tag) {
      case "block":
        return node.meta?.keepInline ? node : { ...node, exprs: liftStatements(node.exprs, names) };
      case "def":
      case "defp":
      case "defmacro":
        return { ...node, body: liftBody(node.body) };
      case "fn":
        return { ...node, clauses: liftClauses(node.clauses) };
      case "case":
        return { ...node, clauses: liftClauses(node.clauses) };
      case "cond":
        return { ...node, clauses: liftClauses(node.clauses) };
      case "if":
        return {
          ...node,
          then: liftBody(node.then),
          ...(node.else ? { else: liftBody(node.else) } : {}),
        };
      case "for":
        return { ...node, body: liftBody(node.body) };
      case "with":
        return { ...node, body: liftBody(node.body), else: liftClauses(node.else) };
      case "try":
        return {
          ...node,
          body: liftBody(node.body),
          rescue: liftClauses(node.rescue),
          catch: liftClauses(node.catch),
          else: liftClauses(node.else),
          ...(node.after ? { after: liftBody(node.after) } : {}),
        };
      case "receive":
        return {
          ...node,
          clauses: liftClauses(node.clauses),
          ...(node.after ? { after: { ...node.after, body: liftBody(node.after.body) } } : {}),
        };
      default:
        return node;
    }
  });
}

export const effectLifting: Pass = {
  name: "effect-lifting",
  enabled: true,
  run: (root, ctx) => liftEffects(root, ctx.names),
};
