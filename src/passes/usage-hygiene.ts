/**
 * Usage hygiene.
 *
 * Per function scope:
 * - a bound name that is never read gets a `_` prefix
 * - an `_`-prefixed name that is read loses its prefix
 *
 * A read of a name on the right-hand side of its only binding (a recursive
 * closure, say) is not a use. Renames apply to every occurrence in the
 * scope and are skipped when the new name is already taken. Running the
 * pass twice gives the same tree as running it once.
 */

import type { EMatch, Node } from "../ast/elixir-ast";
import { collectNames, collectPatterns, countReads } from "../ast/analysis";
import { forEachNode, mapChildren, mapOwnPatterns, mapPattern, patternVars, pinnedVars } from "../ast/traverse";
import type { Pass } from "./pass";

function isScope(node: Node): boolean {
  return node.tag === "def" || node.tag === "defp" || node.tag === "defmacro";
}

/** Replace every occurrence of `from` (reads, bindings, pins) in `node`. */
export function renameVar(node: Node, from: string, to: string): Node {
  let current: Node = node.tag === "var" && node.name === from ? { ...node, name: to } : node;
  current = mapOwnPatterns(current, (p) =>
    mapPattern(p, (q) => ((q.tag === "varPat" || q.tag === "pinPat") && q.name === from ? { ...q, name: to } : q))
  );
  return mapChildren(current, (child) => renameVar(child, from, to));
}

/** Raw code mentioning the name as a whole word counts as a read */
function mentionedInRaw(scope: Node, name: string): boolean {
  const escaped = name.replace(/\?/g, "\\?");
  const word = new RegExp(`(^|[^A-Za-z0-9_])${escaped}([^A-Za-z0-9_?!]|$)`);
  let found = false;
  forEachNode(scope, (n) => {
    if (n.tag === "raw" && word.test(n.code)) found = true;
  });
  return found;
}

/**
 * Reads of `name` that count as uses. When the name has a single binding
 * and that binding is a match, reads inside its own value are excluded.
 */
function useCount(scope: Node, name: string): number {
  const patterns = collectPatterns(scope);
  let reads = countReads(scope, name);
  for (const p of patterns) reads += pinnedVars(p).filter((n) => n === name).length;

  const matches: EMatch[] = [];
  forEachNode(scope, (n) => {
    if (n.tag === "match" && patternVars(n.pattern).includes(name)) matches.push(n);
  });
  const bindings = patterns.reduce((sum, p) => sum + patternVars(p).filter((n) => n === name).length, 0);
  if (bindings === 1 && matches.length === 1) reads -= countReads(matches[0].value, name);

  if (mentionedInRaw(scope, name)) reads++;
  return reads;
}

const VALID_NAME = /^[a-z_][A-Za-z0-9_]*[?!]?$/;

export function applyHygiene(scope: Node): Node {
  const bound = new Set<string>();
  for (const p of collectPatterns(scope)) for (const name of patternVars(p)) bound.add(name);

  let current = scope;
  for (const name of [...bound].sort()) {
    if (name === "_") continue;
    const taken = collectNames(current);
    const used = useCount(current, name) > 0;

    if (!name.startsWith("_") && !used) {
      const renamed = `_${name}`;
      if (!taken.has(renamed)) current = renameVar(current, name, renamed);
    } else if (name.startsWith("_") && used) {
      const stripped = name.replace(/^_+/, "");
      if (stripped.length > 0 && VALID_NAME.test(stripped) && !taken.has(stripped)) {
        current = renameVar(current, name, stripped);
      }
    }
  }
  return current;
}

function scopeHygiene(node: Node): Node {
  if (node.tag === "module") return mapChildren(node, scopeHygiene);
  return isScope(node) ? applyHygiene(node) : node;
}

/** Modules are walked for function scopes; any other root is one scope. */
export function usageHygiene(root: Node): Node {
  return root.tag === "module" ? scopeHygiene(root) : applyHygiene(root);
}

export const usageHygienePass: Pass = {
  name: "usage-hygiene",
  enabled: true,
  run: (root) => usageHygiene(root),
};
