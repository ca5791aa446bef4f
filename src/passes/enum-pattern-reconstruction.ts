/**
 * Enum pattern reconstruction.
 *
 *   case elem(x, 0) do
 *     1 ->
 *       v = elem(x, 1)
 *       use(v)
 *   end
 *
 * becomes
 *
 *   case x do
 *     {1, v} -> use(v)
 *   end
 *
 * Only integer-literal clauses are rewritten; a wildcard clause is kept as
 * it is. Any other clause shape leaves the whole `case` untouched, because
 * it would bind the tuple instead of the tag.
 */

import type { CaseClause, ECase, EVar, Node, Pattern } from "../ast/elixir-ast";
import { fromStatements, pLit, pTuple, pVar, pWildcard, statementsOf } from "../ast/elixir-ast";
import { rewrite } from "../ast/traverse";
import type { Pass } from "./pass";

/** `elem(x, k)` with `x` the given variable name */
function elemIndex(node: Node, subject: string): number | undefined {
  if (node.tag !== "call" || node.name !== "elem" || node.args.length !== 2) return undefined;
  const [target, index] = node.args;
  if (target.tag !== "var" || target.name !== subject || index.tag !== "integer") return undefined;
  return index.value;
}

function tagSubject(node: ECase): EVar | undefined {
  const subject = node.subject;
  if (subject.tag !== "call" || subject.args.length !== 2) return undefined;
  const [target] = subject.args;
  if (target.tag !== "var" || elemIndex(subject, target.name) !== 0) return undefined;
  return target;
}

function rebuildClause(
  clause: CaseClause,
  tag: number,
  subject: string,
  arity: number | undefined
): CaseClause | undefined {
  const stmts = statementsOf(clause.body);
  const bound = new Map<number, string>();

  let consumed = 0;
  for (const stmt of stmts) {
    if (stmt.tag !== "match" || stmt.pattern.tag !== "varPat") break;
    const k = elemIndex(stmt.value, subject);
    if (k === undefined || k < 1 || bound.has(k)) break;
    bound.set(k, stmt.pattern.name);
    consumed++;
  }

  const widest = Math.max(0, ...bound.keys());
  const size = 1 + Math.max(arity ?? 0, widest);
  // Width unknown: a bare {tag} would not match a tuple with a payload
  if (arity === undefined && widest === 0) return undefined;

  const elements: Pattern[] = [pLit({ tag: "integer", value: tag })];
  for (let k = 1; k < size; k++) {
    const name = bound.get(k);
    elements.push(name !== undefined ? pVar(name) : pWildcard);
  }

  const rest = stmts.slice(consumed);
  const meta = clause.body.tag === "block" ? clause.body.meta : undefined;
  return { ...clause, pattern: pTuple(elements), body: fromStatements(rest, meta) };
}

export function reconstructEnumPatterns(node: Node): Node {
  if (node.tag !== "case") return node;
  const subject = tagSubject(node);
  if (!subject) return node;

  const clauses: CaseClause[] = [];
  for (const clause of node.clauses) {
    if (clause.pattern.tag === "wildcardPat") {
      clauses.push(clause);
      continue;
    }
    if (clause.pattern.tag !== "litPat" || clause.pattern.value.tag !== "integer") return node;
    const tag = clause.pattern.value.value;
    const rebuilt = rebuildClause(clause, tag, subject.name, node.meta?.tagArities?.get(tag));
    if (!rebuilt) return node;
    clauses.push(rebuilt);
  }

  return { ...node, subject, clauses };
}

export const enumPatternReconstruction: Pass = {
  name: "enum-pattern-reconstruction",
  enabled: true,
  run: (root) => rewrite(root, reconstructEnumPatterns),
};
