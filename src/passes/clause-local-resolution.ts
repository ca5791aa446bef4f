/**
 * Clause-local resolution.
 *
 * Builders attach a `clauseLocals` map (binding id -> target name) to the
 * subtree of a clause that rebinds source locals under new names. This pass
 * renames every `var` and `varPat` whose `sourceId` is in scope and then
 * drops the consumed map. Nested maps shadow outer ones.
 */

import type { Node, Pattern } from "../ast/elixir-ast";
import { dropMeta, mapChildren, mapOwnPatterns, mapPattern } from "../ast/traverse";
import type { Pass } from "./pass";

type Scope = ReadonlyMap<number, string>;

export function resolveClauseLocals(node: Node, scope: Scope = new Map()): Node {
  let active = scope;
  let current = node;

  const locals = node.meta?.clauseLocals;
  if (locals) {
    active = new Map([...scope, ...locals]);
    current = dropMeta(node, "clauseLocals");
  }

  if (active.size > 0) {
    if (current.tag === "var" && current.sourceId !== undefined) {
      const name = active.get(current.sourceId);
      if (name !== undefined) current = { ...current, name };
    }
    current = mapOwnPatterns(current, (p) => renamePattern(p, active));
  }

  return mapChildren(current, (child) => resolveClauseLocals(child, active));
}

function renamePattern(pattern: Pattern, scope: Scope): Pattern {
  return mapPattern(pattern, (p) => {
    if (p.tag !== "varPat" || p.sourceId === undefined) return p;
    const name = scope.get(p.sourceId);
    return name !== undefined ? { ...p, name } : p;
  });
}

export const clauseLocalResolution: Pass = {
  name: "clause-local-resolution",
  enabled: true,
  run: (node) => resolveClauseLocals(node),
};
