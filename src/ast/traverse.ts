/**
 * Generic traversal over the Elixir AST.
 *
 * `mapChildren` and `visitChildren` are the only places that know where each
 * variant keeps its children. Both switch exhaustively on `tag`, so a new
 * variant does not compile until it is handled here. Everything else
 * (`rewrite`, `forEachNode`, the passes) is built on top of them.
 */

import type {
  CaseClause,
  InterpolationPart,
  Node,
  NodeMetadata,
  Pattern,
} from "./elixir-ast";

export type NodeMapper = (node: Node) => Node;
export type NodeVisitor = (node: Node) => void;

// ============================================================================
// One level
// ============================================================================

function mapClauses(clauses: CaseClause[], f: NodeMapper): CaseClause[] {
  return clauses.map((c) => ({
    ...c,
    ...(c.guard ? { guard: f(c.guard) } : {}),
    body: f(c.body),
  }));
}

/**
 * Rebuild `node` with `f` applied to each direct child. Metadata and every
 * non-node field are carried over unchanged. Raw nodes are returned as-is.
 */
export function mapChildren(node: Node, f: NodeMapper): Node {
  switch (node.tag) {
    case "module":
      return { ...node, body: node.body.map(f) };

    case "def":
    case "defp":
    case "defmacro":
      return {
        ...node,
        ...(node.guard ? { guard: f(node.guard) } : {}),
        body: f(node.body),
      };

    case "attribute":
      return { ...node, value: f(node.value) };

    case "if":
      return {
        ...node,
        cond: f(node.cond),
        then: f(node.then),
        ...(node.else ? { else: f(node.else) } : {}),
      };

    case "case":
      return { ...node, subject: f(node.subject), clauses: mapClauses(node.clauses, f) };

    case "cond":
      return {
        ...node,
        clauses: node.clauses.map((c) => ({ cond: f(c.cond), body: f(c.body) })),
      };

    case "try":
      return {
        ...node,
        body: f(node.body),
        rescue: node.rescue.map((r) => ({ ...r, body: f(r.body) })),
        catch: node.catch.map((c) => ({
          ...c,
          ...(c.guard ? { guard: f(c.guard) } : {}),
          body: f(c.body),
        })),
        else: mapClauses(node.else, f),
        ...(node.after ? { after: f(node.after) } : {}),
      };

    case "with":
      return {
        ...node,
        clauses: node.clauses.map((c) => ({
          ...c,
          ...(c.guard ? { guard: f(c.guard) } : {}),
          expr: f(c.expr),
        })),
        body: f(node.body),
        else: mapClauses(node.else, f),
      };

    case "receive":
      return {
        ...node,
        clauses: mapClauses(node.clauses, f),
        ...(node.after
          ? { after: { timeout: f(node.after.timeout), body: f(node.after.body) } }
          : {}),
      };

    case "list":
    case "tuple":
      return { ...node, elements: node.elements.map(f) };

    case "map":
      return {
        ...node,
        pairs: node.pairs.map((p) => ({ key: f(p.key), value: f(p.value) })),
      };

    case "keyword":
      return { ...node, pairs: node.pairs.map((p) => ({ key: p.key, value: f(p.value) })) };

    case "struct":
      return { ...node, fields: node.fields.map((p) => ({ key: p.key, value: f(p.value) })) };

    case "update":
      return {
        ...node,
        target: f(node.target),
        fields: node.fields.map((p) => ({ key: p.key, value: f(p.value) })),
      };

    case "bitstring":
      return { ...node, segments: node.segments.map((s) => ({ ...s, value: f(s.value) })) };

    case "call":
      return { ...node, args: node.args.map(f) };

    case "remoteCall":
      return { ...node, module: f(node.module), args: node.args.map(f) };

    case "applyFn":
      return { ...node, fn: f(node.fn), args: node.args.map(f) };

    case "binary":
      return { ...node, left: f(node.left), right: f(node.right) };

    case "unary":
      return { ...node, operand: f(node.operand) };

    case "field":
      return { ...node, target: f(node.target) };

    case "access":
      return { ...node, target: f(node.target), key: f(node.key) };

    case "range":
      return {
        ...node,
        start: f(node.start),
        end: f(node.end),
        ...(node.step ? { step: f(node.step) } : {}),
      };

    case "interpolation":
      return {
        ...node,
        parts: node.parts.map((p): InterpolationPart =>
          p.kind === "expr" ? { kind: "expr", expr: f(p.expr) } : p
        ),
      };

    case "for":
      return {
        ...node,
        generators: node.generators.map((g) => ({ pattern: g.pattern, source: f(g.source) })),
        filters: node.filters.map(f),
        ...(node.into ? { into: f(node.into) } : {}),
        body: f(node.body),
      };

    case "paren":
      return { ...node, expr: f(node.expr) };

    case "block":
      return { ...node, exprs: node.exprs.map(f) };

    case "match":
      return { ...node, value: f(node.value) };

    case "fn":
      return {
        ...node,
        clauses: node.clauses.map((c) => ({
          ...c,
          ...(c.guard ? { guard: f(c.guard) } : {}),
          body: f(c.body),
        })),
      };

    case "fieldAssign":
      return { ...node, target: f(node.target), value: f(node.value) };

    case "directive":
    case "var":
    case "integer":
    case "float":
    case "string":
    case "boolean":
    case "atom":
    case "alias":
    case "nil":
    case "underscore":
    case "raw":
      return node;

    default: {
      const _exhaustive: never = node;
      return _exhaustive;
    }
  }
}

function visitClauses(clauses: CaseClause[], visit: NodeVisitor): void {
  for (const c of clauses) {
    if (c.guard) visit(c.guard);
    visit(c.body);
  }
}

/**
 * Call `visit` on each direct child of `node`, in source order.
 */
export function visitChildren(node: Node, visit: NodeVisitor): void {
  switch (node.tag) {
    case "module":
      node.body.forEach(visit);
      return;

    case "def":
    case "defp":
    case "defmacro":
      if (node.guard) visit(node.guard);
      visit(node.body);
      return;

    case "attribute":
      visit(node.value);
      return;

    case "if":
      visit(node.cond);
      visit(node.then);
      if (node.else) visit(node.else);
      return;

    case "case":
      visit(node.subject);
      visitClauses(node.clauses, visit);
      return;

    case "cond":
      for (const c of node.clauses) {
        visit(c.cond);
        visit(c.body);
      }
      return;

    case "try":
      visit(node.body);
      for (const r of node.rescue) visit(r.body);
      for (const c of node.catch) {
        if (c.guard) visit(c.guard);
        visit(c.body);
      }
      visitClauses(node.else, visit);
      if (node.after) visit(node.after);
      return;

    case "with":
      for (const c of node.clauses) {
        visit(c.expr);
        if (c.guard) visit(c.guard);
      }
      visit(node.body);
      visitClauses(node.else, visit);
      return;

    case "receive":
      visitClauses(node.clauses, visit);
      if (node.after) {
        visit(node.after.timeout);
        visit(node.after.body);
      }
      return;

    case "list":
    case "tuple":
      node.elements.forEach(visit);
      return;

    case "map":
      for (const p of node.pairs) {
        visit(p.key);
        visit(p.value);
      }
      return;

    case "keyword":
    case "struct":
      for (const p of node.tag === "keyword" ? node.pairs : node.fields) visit(p.value);
      return;

    case "update":
      visit(node.target);
      for (const p of node.fields) visit(p.value);
      return;

    case "bitstring":
      for (const s of node.segments) visit(s.value);
      return;

    case "call":
      node.args.forEach(visit);
      return;

    case "remoteCall":
      visit(node.module);
      node.args.forEach(visit);
      return;

    case "applyFn":
      visit(node.fn);
      node.args.forEach(visit);
      return;

    case "binary":
      visit(node.left);
      visit(node.right);
      return;

    case "unary":
      visit(node.operand);
      return;

    case "field":
      visit(node.target);
      return;

    case "access":
      visit(node.target);
      visit(node.key);
      return;

    case "range":
      visit(node.start);
      visit(node.end);
      if (node.step) visit(node.step);
      return;

    case "interpolation":
      for (const p of node.parts) {
        if (p.kind === "expr") visit(p.expr);
      }
      return;

    case "for":
      for (const g of node.generators) visit(g.source);
      node.filters.forEach(visit);
      if (node.into) visit(node.into);
      visit(node.body);
      return;

    case "paren":
      visit(node.expr);
      return;

    case "block":
      node.exprs.forEach(visit);
      return;

    case "match":
      visit(node.value);
      return;

    case "fn":
      for (const c of node.clauses) {
        if (c.guard) visit(c.guard);
        visit(c.body);
      }
      return;

    case "fieldAssign":
      visit(node.target);
      visit(node.value);
      return;

    case "directive":
    case "var":
    case "integer":
    case "float":
    case "string":
    case "boolean":
    case "atom":
    case "alias":
    case "nil":
    case "underscore":
    case "raw":
      return;

    default: {
      const _exhaustive: never = node;
      return _exhaustive;
    }
  }
}

// ============================================================================
// Recursive
// ============================================================================

/**
 * Bottom-up rewrite: children first, then `f` on the rebuilt node.
 * Raw code is opaque and passed through untouched.
 */
export function rewrite(node: Node, f: NodeMapper): Node {
  if (node.tag === "raw") return node;
  const rebuilt = mapChildren(node, (child) => rewrite(child, f));
  return f(rebuilt);
}

/** Pre-order walk over `node` and all of its descendants. */
export function forEachNode(node: Node, visit: NodeVisitor): void {
  visit(node);
  visitChildren(node, (child) => forEachNode(child, visit));
}

/** True if `pred` holds for `node` or any descendant. */
export function someNode(node: Node, pred: (n: Node) => boolean): boolean {
  if (pred(node)) return true;
  let found = false;
  visitChildren(node, (child) => {
    if (!found && someNode(child, pred)) found = true;
  });
  return found;
}

/** Copy `node` with extra metadata merged over its existing hints. */
export function withMeta<T extends Node>(node: T, meta: NodeMetadata): T {
  return { ...node, meta: { ...node.meta, ...meta } };
}

// ============================================================================
// Patterns
// ============================================================================

export type PatternMapper = (pattern: Pattern) => Pattern;

/**
 * Bottom-up rewrite over a pattern tree.
 */
export function mapPattern(pattern: Pattern, f: PatternMapper): Pattern {
  const recur = (p: Pattern): Pattern => mapPattern(p, f);
  switch (pattern.tag) {
    case "tuplePat":
    case "listPat":
      return f({ ...pattern, elements: pattern.elements.map(recur) });
    case "consPat":
      return f({ ...pattern, heads: pattern.heads.map(recur), tail: recur(pattern.tail) });
    case "mapPat":
      return f({ ...pattern, pairs: pattern.pairs.map((p) => ({ key: p.key, value: recur(p.value) })) });
    case "structPat":
      return f({ ...pattern, fields: pattern.fields.map((p) => ({ key: p.key, pattern: recur(p.pattern) })) });
    case "binPat":
      return f({ ...pattern, segments: pattern.segments.map((s) => ({ ...s, pattern: recur(s.pattern) })) });
    case "varPat":
    case "litPat":
    case "pinPat":
    case "wildcardPat":
      return f(pattern);
    default: {
      const _exhaustive: never = pattern;
      return _exhaustive;
    }
  }
}

/**
 * Names bound by a pattern, in source order. Pinned names are reads, not
 * bindings, and are excluded.
 */
export function patternVars(pattern: Pattern): string[] {
  const names: string[] = [];
  mapPattern(pattern, (p) => {
    if (p.tag === "varPat") names.push(p.name);
    return p;
  });
  return names;
}

/** Names a pattern reads through `^pin`. */
export function pinnedVars(pattern: Pattern): string[] {
  const names: string[] = [];
  mapPattern(pattern, (p) => {
    if (p.tag === "pinPat") names.push(p.name);
    return p;
  });
  return names;
}

/**
 * Patterns held directly by `node` (not by its children): match left-hand
 * sides, parameters, clause heads and generators.
 */
export function ownPatterns(node: Node): Pattern[] {
  switch (node.tag) {
    case "match":
      return [node.pattern];
    case "def":
    case "defp":
    case "defmacro":
      return node.params;
    case "case":
    case "receive":
      return node.clauses.map((c) => c.pattern);
    case "fn":
      return node.clauses.flatMap((c) => c.params);
    case "with":
      return [...node.clauses.map((c) => c.pattern), ...node.else.map((c) => c.pattern)];
    case "try":
      return [
        ...node.rescue.map((r) => r.pattern),
        ...node.catch.flatMap((c) => (c.kind ? [c.kind, c.pattern] : [c.pattern])),
        ...node.else.map((c) => c.pattern),
      ];
    case "for":
      return node.generators.map((g) => g.pattern);
    default:
      return [];
  }
}

/** Rebuild `node` with `f` applied to each of its own patterns. */
export function mapOwnPatterns(node: Node, f: PatternMapper): Node {
  const clause = <C extends { pattern: Pattern }>(c: C): C => ({ ...c, pattern: f(c.pattern) });
  switch (node.tag) {
    case "match":
      return { ...node, pattern: f(node.pattern) };
    case "def":
    case "defp":
    case "defmacro":
      return { ...node, params: node.params.map(f) };
    case "case":
    case "receive":
      return { ...node, clauses: node.clauses.map(clause) };
    case "fn":
      return { ...node, clauses: node.clauses.map((c) => ({ ...c, params: c.params.map(f) })) };
    case "with":
      return { ...node, clauses: node.clauses.map(clause), else: node.else.map(clause) };
    case "try":
      return {
        ...node,
        rescue: node.rescue.map(clause),
        catch: node.catch.map((c) => ({ ...clause(c), ...(c.kind ? { kind: f(c.kind) } : {}) })),
        else: node.else.map(clause),
      };
    case "for":
      return { ...node, generators: node.generators.map(clause) };
    default:
      return node;
  }
}

/** Copy of `node` without the metadata entry `key`. */
export function dropMeta<T extends Node>(node: T, key: keyof NodeMetadata): T {
  if (!node.meta || node.meta[key] === undefined) return node;
  const meta: NodeMetadata = { ...node.meta };
  delete meta[key];
  return { ...node, meta: Object.keys(meta).length > 0 ? meta : undefined };
}
