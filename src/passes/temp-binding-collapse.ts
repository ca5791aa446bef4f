/**
 * Temp-binding collapse.
 *
 * A two-statement block `tmp = a; b` sitting in an expression slot is
 * replaced by `b` with `a` substituted for `tmp`. Case clause bodies,
 * function bodies and if branches are not expression slots and are left
 * alone.
 */

import type { Node, NodeTag } from "../ast/elixir-ast";
import { assignedName } from "../ast/elixir-ast";
import { bindsVar, containsAssignment, countReads, isPure, substituteVar } from "../ast/analysis";
import { mapChildren, rewrite } from "../ast/traverse";
import type { Pass } from "./pass";

/** Parents whose direct children are expression slots */
const EXPRESSION_PARENTS: ReadonlySet<NodeTag> = new Set<NodeTag>([
  "list",
  "tuple",
  "map",
  "struct",
  "keyword",
  "update",
  "call",
  "remoteCall",
  "applyFn",
  "binary",
  "unary",
  "paren",
  "match",
  "field",
  "access",
  "bitstring",
  "range",
  "interpolation",
]);

export function collapseSlot(slot: Node): Node {
  if (slot.tag !== "block" || slot.exprs.length !== 2 || slot.meta?.keepInline) return slot;
  const [binding, body] = slot.exprs;

  const tmp = assignedName(binding);
  if (tmp === undefined || binding.tag !== "match") return slot;
  const value = binding.value;
  if (containsAssignment(value)) return slot;

  const reads = countReads(body, tmp);
  if (reads === 0) return slot;
  if (reads > 1 && !isPure(value)) return slot;
  if (bindsVar(body, tmp)) return slot;

  return substituteVar(body, tmp, value);
}

export function collapseTempBindings(root: Node): Node {
  return rewrite(root, (node) => (EXPRESSION_PARENTS.has(node.tag) ? mapChildren(node, collapseSlot) : node));
}

export const tempBindingCollapse: Pass = {
  name: "temp-binding-collapse",
  enabled: true,
  run: (root) => collapseTempBindings(root),
};
