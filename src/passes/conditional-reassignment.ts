/**
 * Conditional reassignment.
 *
 *   if c do x = f(x) end   ->   x = if c do f(x) else x end
 *
 * Only fires for an `if` without an else branch whose then-branch is a
 * single assignment to a variable read on its own right-hand side.
 */

import type { Node } from "../ast/elixir-ast";
import { eIf, eMatch, eVar, statementsOf } from "../ast/elixir-ast";
import { readsVar } from "../ast/analysis";
import { rewrite } from "../ast/traverse";
import type { Pass } from "./pass";

export function hoistConditionalReassignment(node: Node): Node {
  if (node.tag !== "if" || node.else) return node;

  const stmts = statementsOf(node.then);
  if (stmts.length !== 1) return node;
  const [assign] = stmts;
  if (assign.tag !== "match" || assign.pattern.tag !== "varPat") return node;

  const name = assign.pattern.name;
  if (!readsVar(assign.value, name)) return node;

  return eMatch(assign.pattern, eIf(node.cond, assign.value, eVar(name, assign.pattern.sourceId)));
}

export const conditionalReassignment: Pass = {
  name: "conditional-reassignment",
  enabled: true,
  run: (node) => rewrite(node, hoistConditionalReassignment),
};
