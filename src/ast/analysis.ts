/**
 * Read-only queries over the Elixir AST used by several passes.
 */

import type { Node, Pattern } from "./elixir-ast";
import { eList, eTuple, eVar } from "./elixir-ast";
import { forEachNode, mapChildren, ownPatterns, patternVars, someNode } from "./traverse";

// ============================================
// Variable reads and writes
// ============================================

/** Number of `var` leaves named `name` anywhere under `node`. */
export function countReads(node: Node, name: string): number {
  let count = 0;
  forEachNode(node, (n) => {
    if (n.tag === "var" && n.name === name) count++;
  });
  return count;
}

export function readsVar(node: Node, name: string): boolean {
  return someNode(node, (n) => n.tag === "var" && n.name === name);
}

/** Every pattern reachable from `node` (match, clause heads, params, generators). */
export function collectPatterns(node: Node): Pattern[] {
  const patterns: Pattern[] = [];
  forEachNode(node, (n) => {
    patterns.push(...ownPatterns(n));
  });
  return patterns;
}

/** True if any pattern under `node` binds `name`. */
export function bindsVar(node: Node, name: string): boolean {
  return collectPatterns(node).some((p) => patternVars(p).includes(name));
}

/** All names bound or read under `node`. */
export function collectNames(node: Node): Set<string> {
  const names = new Set<string>();
  forEachNode(node, (n) => {
    if (n.tag === "var") names.add(n.name);
  });
  for (const p of collectPatterns(node)) {
    for (const name of patternVars(p)) names.add(name);
  }
  return names;
}

export function containsAssignment(node: Node): boolean {
  return someNode(node, (n) => n.tag === "match" || n.tag === "fieldAssign");
}

/**
 * Replace reads of `name` with `replacement`. Stops at anonymous functions
 * that rebind the name.
 */
export function substituteVar(node: Node, name: string, replacement: Node): Node {
  if (node.tag === "var" && node.name === name) return replacement;
  if (node.tag === "fn" && node.clauses.some((c) => c.params.some((p) => patternVars(p).includes(name)))) {
    return node;
  }
  return mapChildren(node, (child) => substituteVar(child, name, replacement));
}

/** Variables, literals and field chains over them: safe to evaluate twice. */
export function isPure(node: Node): boolean {
  switch (node.tag) {
    case "var":
    case "integer":
    case "float":
    case "string":
    case "boolean":
    case "atom":
    case "alias":
    case "nil":
      return true;
    case "field":
      return isPure(node.target);
    case "paren":
      return isPure(node.expr);
    default:
      return false;
  }
}

// ============================================
// Structural equality
// ============================================

/**
 * Structural equality ignoring metadata.
 */
export function nodesEqual(a: Node, b: Node): boolean {
  return fingerprint(a) === fingerprint(b);
}

function fingerprint(node: Node): string {
  return JSON.stringify(node, (key, value: unknown) => (key === "meta" ? undefined : value));
}

// ============================================
// Pattern <-> expression
// ============================================

/**
 * The expression a pattern would construct, when it has one.
 */
export function patternToExpr(pattern: Pattern): Node | undefined {
  switch (pattern.tag) {
    case "varPat":
      return eVar(pattern.name);
    case "litPat":
      return pattern.value;
    case "wildcardPat":
      return undefined;
    case "pinPat":
      return eVar(pattern.name);
    case "tuplePat":
    case "listPat": {
      const elements: Node[] = [];
      for (const el of pattern.elements) {
        const expr = patternToExpr(el);
        if (!expr) return undefined;
        elements.push(expr);
      }
      return pattern.tag === "tuplePat" ? eTuple(elements) : eList(elements);
    }
    case "consPat":
    case "mapPat":
    case "structPat":
    case "binPat":
      return undefined;
    default: {
      const _exhaustive: never = pattern;
      return _exhaustive;
    }
  }
}

// ============================================
// Diagnostics
// ============================================

/**
 * One-line summary of a node for error messages.
 */
export function describeNode(node: Node): string {
  switch (node.tag) {
    case "module":
      return `module ${node.name}`;
    case "def":
    case "defp":
    case "defmacro":
      return `${node.tag} ${node.name}/${node.params.length}`;
    case "call":
      return `call ${node.name}/${node.args.length}`;
    case "remoteCall":
      return `remoteCall .${node.name}/${node.args.length}`;
    case "var":
      return `var ${node.name}`;
    case "binary":
      return `binary ${node.op}`;
    case "block":
      return `block of ${node.exprs.length}`;
    default:
      return node.tag;
  }
}
