/**
 * Mutable-to-immutable lowering.
 *
 * Statement-level mutations become rebindings:
 *
 *   p.f.push(v)  ->  p = %{p | f: p.f ++ [v]}     (p is the instance parameter)
 *   a.push(v)    ->  a = a ++ [v]
 *   a.pop()      ->  a = List.delete_at(a, -1)
 *   x++ / x--    ->  x = x + 1 / x = x - 1
 *   p.f++        ->  p = %{p | f: p.f + 1}
 *   p.f = v      ->  p = %{p | f: v}
 *
 * Statement position means a block statement or an `if` branch. The binary
 * `%` becomes `Kernel.rem(a, b)` wherever it appears, the same spelling the
 * printer gives a surviving `%`.
 */

import type { EVar, Node } from "../ast/elixir-ast";
import {
  eBinary,
  eField,
  eInt,
  eList,
  eMatch,
  eRemote,
  eUpdate,
  pVar,
} from "../ast/elixir-ast";
import { rewrite } from "../ast/traverse";
import type { Pass } from "./pass";

/** `name = value`, keeping the binding id of the variable being rebound */
function rebind(target: EVar, value: Node): Node {
  return eMatch(pVar(target.name, target.sourceId), value);
}

/** `p.f` where p is the instance parameter */
function instanceField(node: Node, instanceParam: string): { instance: EVar; field: string } | undefined {
  if (node.tag !== "field" || node.target.tag !== "var" || node.target.name !== instanceParam) return undefined;
  return { instance: node.target, field: node.field };
}

function updateField(instance: EVar, field: string, value: Node): Node {
  return rebind(instance, eUpdate(instance, [{ key: field, value }]));
}

export function lowerStatement(stmt: Node, instanceParam: string): Node {
  switch (stmt.tag) {
    case "remoteCall": {
      if (stmt.name === "push" && stmt.args.length === 1) {
        const [value] = stmt.args;
        const owner = instanceField(stmt.module, instanceParam);
        if (owner) {
          const current = eField(owner.instance, owner.field);
          return updateField(owner.instance, owner.field, eBinary("++", current, eList([value])));
        }
        if (stmt.module.tag === "var") {
          return rebind(stmt.module, eBinary("++", stmt.module, eList([value])));
        }
      }
      if (stmt.name === "pop" && stmt.args.length === 0 && stmt.module.tag === "var") {
        return rebind(stmt.module, eRemote("List", "delete_at", [stmt.module, eInt(-1)]));
      }
      return stmt;
    }

    case "unary": {
      if (stmt.op !== "increment" && stmt.op !== "decrement") return stmt;
      const op = stmt.op === "increment" ? "+" : "-";
      if (stmt.operand.tag === "var") {
        return rebind(stmt.operand, eBinary(op, stmt.operand, eInt(1)));
      }
      const owner = instanceField(stmt.operand, instanceParam);
      if (owner) {
        return updateField(owner.instance, owner.field, eBinary(op, stmt.operand, eInt(1)));
      }
      return stmt;
    }

    case "fieldAssign": {
      if (stmt.target.tag !== "var" || stmt.target.name !== instanceParam) return stmt;
      return updateField(stmt.target, stmt.field, stmt.value);
    }

    default:
      return stmt;
  }
}

export function mutableToImmutable(root: Node, instanceParam: string): Node {
  return rewrite(root, (node) => {
    switch (node.tag) {
      case "block":
        return { ...node, exprs: node.exprs.map((s) => lowerStatement(s, instanceParam)) };
      case "if":
        return {
          ...node,
          then: lowerStatement(node.then, instanceParam),
          ...(node.else ? { else: lowerStatement(node.else, instanceParam) } : {}),
        };
      case "binary":
        return node.op === "%" ? eRemote("Kernel", "rem", [node.left, node.right]) : node;
      default:
        return node;
    }
  });
}

export const mutableToImmutablePass: Pass = {
  name: "mutable-to-immutable",
  enabled: true,
  run: (node, ctx) => mutableToImmutable(node, ctx.instanceParam),
};
