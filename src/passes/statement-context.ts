/**
 * Statement-context rebinding.
 *
 * A call into an immutable-update function whose result is discarded is a
 * lost update. When its first argument is a plain variable the result is
 * bound back to it:
 *
 *   Map.put(m, :k, 1)   ->   m = Map.put(m, :k, 1)
 *
 * A binding made inside an `if` branch does not leave it, so a discarded
 * `if` whose branches end in such an update rebinds the variable around it:
 *
 *   if c do Map.put(m, :k, 1) end   ->   m = if c do Map.put(m, :k, 1) else m end
 */

import type { EIf, Node, VarPattern } from "../ast/elixir-ast";
import { eBlock, eMatch, eVar, pVar } from "../ast/elixir-ast";
import { bindsVar } from "../ast/analysis";
import { mapChildren } from "../ast/traverse";
import type { Pass } from "./pass";

/** Module -> functions returning an updated copy of their first argument */
export const IMMUTABLE_UPDATES: ReadonlyMap<string, ReadonlySet<string>> = new Map([
  ["Map", new Set(["put", "put_new", "delete", "drop", "merge", "update", "update!", "replace!", "take"])],
  ["List", new Set(["insert_at", "delete_at", "replace_at", "update_at", "delete"])],
  ["Keyword", new Set(["put", "put_new", "delete", "merge", "update"])],
  ["MapSet", new Set(["put", "delete", "union"])],
  ["String", new Set(["replace", "trim", "upcase", "downcase"])],
]);

export function isImmutableUpdate(node: Node): boolean {
  if (node.tag !== "remoteCall" || node.module.tag !== "alias") return false;
  return IMMUTABLE_UPDATES.get(node.module.name)?.has(node.name) ?? false;
}

function statementsOf(node: Node): Node[] {
  return node.tag === "block" ? node.exprs : [node];
}

/** `v = M.f(v, ...)` ending a branch, with `v` not bound earlier in it */
function trailingUpdate(branch: Node): VarPattern | undefined {
  const stmts = statementsOf(branch);
  const last = stmts[stmts.length - 1];
  if (!last || last.tag !== "match" || last.pattern.tag !== "varPat" || !isImmutableUpdate(last.value)) {
    return undefined;
  }
  const name = last.pattern.name;
  if (last.value.tag !== "remoteCall") return undefined;
  const [first] = last.value.args;
  if (!first || first.tag !== "var" || first.name !== name) return undefined;
  if (stmts.slice(0, -1).some((s) => bindsVar(s, name))) return undefined;
  return last.pattern;
}

/** Replace a trailing `v = x` with `x`, or end the branch with `v`. */
function yieldVar(branch: Node | undefined, target: VarPattern): Node {
  const read = eVar(target.name, target.sourceId);
  if (!branch) return read;
  const stmts = statementsOf(branch);
  const last = stmts[stmts.length - 1];
  const exprs =
    last && last.tag === "match" && last.pattern.tag === "varPat" && last.pattern.name === target.name
      ? [...stmts.slice(0, -1), last.value]
      : [...stmts, read];
  if (exprs.length === 1) return exprs[0];
  return branch.tag === "block" ? { ...branch, exprs } : eBlock(exprs);
}

function hoistBranchUpdate(node: EIf): Node {
  const fromThen = trailingUpdate(node.then);
  const fromElse = node.else ? trailingUpdate(node.else) : undefined;
  const target = fromThen ?? fromElse;
  if (!target) return node;
  if (fromThen && fromElse && fromThen.name !== fromElse.name) return node;
  return eMatch(target, { ...node, then: yieldVar(node.then, target), else: yieldVar(node.else, target) });
}

/**
 * Walk with a flag telling whether the value of `node` is discarded. Inside
 * a block every statement but the last is discarded; the last inherits.
 */
function visit(node: Node, discarded: boolean): Node {
  switch (node.tag) {
    case "block": {
      const last = node.exprs.length - 1;
      return { ...node, exprs: node.exprs.map((e, i) => visit(e, i < last || discarded)) };
    }
    case "if": {
      const visited: EIf = {
        ...node,
        cond: visit(node.cond, false),
        then: visit(node.then, discarded),
        ...(node.else ? { else: visit(node.else, discarded) } : {}),
      };
      return discarded ? hoistBranchUpdate(visited) : visited;
    }
    case "case":
      return {
        ...node,
        subject: visit(node.subject, false),
        clauses: node.clauses.map((c) => ({ ...c, body: visit(c.body, discarded) })),
      };
    case "remoteCall": {
      const call = mapChildren(node, (c) => visit(c, false));
      if (!discarded || call.tag !== "remoteCall" || !isImmutableUpdate(call)) return call;
      const [first] = call.args;
      if (!first || first.tag !== "var") return call;
      return eMatch(pVar(first.name, first.sourceId), call);
    }
    default:
      return mapChildren(node, (c) => visit(c, false));
  }
}

export function bindDiscardedUpdates(root: Node): Node {
  return visit(root, false);
}

export const statementContext: Pass = {
  name: "statement-context",
  enabled: true,
  run: (root) => bindDiscardedUpdates(root),
};
