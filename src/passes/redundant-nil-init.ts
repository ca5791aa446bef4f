/**
 * Redundant nil-initialization removal.
 *
 * `x = nil` is dropped when a later statement of the same block assigns `x`
 * a non-nil value and nothing in between mentions `x`.
 */

import type { Node } from "../ast/elixir-ast";
import { assignedName } from "../ast/elixir-ast";
import { bindsVar, readsVar } from "../ast/analysis";
import { rewrite } from "../ast/traverse";
import type { Pass } from "./pass";

function nilInitName(stmt: Node): string | undefined {
  const name = assignedName(stmt);
  if (name === undefined || stmt.tag !== "match" || stmt.value.tag !== "nil") return undefined;
  return name;
}

/**
 * Scan forward from the statement after `start`. A second `x = nil` defers
 * the decision to what follows it.
 */
function isOverwritten(stmts: Node[], start: number, name: string): boolean {
  for (let i = start + 1; i < stmts.length; i++) {
    const stmt = stmts[i];
    if (stmt.tag === "match" && assignedName(stmt) === name) {
      if (readsVar(stmt.value, name)) return false;
      if (stmt.value.tag === "nil") continue;
      return true;
    }
    if (readsVar(stmt, name) || bindsVar(stmt, name)) return false;
  }
  return false;
}

export function removeRedundantNilInits(stmts: Node[]): Node[] {
  return stmts.filter((stmt, i) => {
    const name = nilInitName(stmt);
    return name === undefined || !isOverwritten(stmts, i, name);
  });
}

export const redundantNilInit: Pass = {
  name: "redundant-nil-init",
  enabled: true,
  run: (root) =>
    rewrite(root, (node) => (node.tag === "block" ? { ...node, exprs: removeRedundantNilInits(node.exprs) } : node)),
};
