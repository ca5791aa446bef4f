/**
 * Key-value iterator protocol.
 *
 *   var it = m.keyValueIterator();
 *   while (it.hasNext()) {
 *     var g = it.next();
 *     var k = g.key;
 *     var v = g.value;
 *     ...
 *   }
 *
 * becomes `Enum.each(m, fn {k, v} -> ... end)`.
 */

import type { Node, Pattern } from "../ast/elixir-ast";
import { eLambda, eRemote, fromStatements, pTuple, pVar, pWildcard } from "../ast/elixir-ast";
import type { TypedExpr, TypedVar } from "../typed/typed-ast";
import { isLocalOf, isMethodCall, mentionsLocal, unwrapParens } from "../typed/typed-ast";
import type { IdiomPattern, PatternContext } from "./context";

export interface IteratorProtocolFields {
  collection: TypedExpr;
  key?: TypedVar;
  value?: TypedVar;
  body: TypedExpr[];
}

/** `it.method()` on the iterator local */
function isIteratorCall(expr: TypedExpr, iterator: TypedVar, method: string): boolean {
  const e = unwrapParens(expr);
  return isMethodCall(e, method, 0) && isLocalOf(e.callee.target, iterator);
}

/** `var x = g.key` / `var x = g.value` */
function entryField(expr: TypedExpr, entry: TypedVar): { field: "key" | "value"; v: TypedVar } | undefined {
  if (expr.tag !== "var" || !expr.init) return undefined;
  const init = unwrapParens(expr.init);
  if (init.tag !== "field" || !isLocalOf(init.target, entry)) return undefined;
  if (init.name !== "key" && init.name !== "value") return undefined;
  return { field: init.name, v: expr.v };
}

export function isIteratorProtocol(expr: TypedExpr): boolean {
  return extractIteratorProtocol(expr) !== undefined;
}

export function extractIteratorProtocol(expr: TypedExpr): IteratorProtocolFields | undefined {
  if (expr.tag !== "block" || expr.exprs.length !== 2) return undefined;
  const [decl, loop] = expr.exprs;

  if (decl.tag !== "var" || !decl.init) return undefined;
  const init = unwrapParens(decl.init);
  if (!isMethodCall(init, "keyValueIterator", 0)) return undefined;
  const iterator = decl.v;

  if (loop.tag !== "while" || loop.doWhile) return undefined;
  if (!isIteratorCall(loop.cond, iterator, "hasNext")) return undefined;

  const body = unwrapParens(loop.body);
  if (body.tag !== "block" || body.exprs.length === 0) return undefined;
  const [next, ...rest] = body.exprs;
  if (next.tag !== "var" || !next.init || !isIteratorCall(next.init, iterator, "next")) return undefined;
  const entry = next.v;

  let key: TypedVar | undefined;
  let value: TypedVar | undefined;
  let consumed = 0;
  for (const stmt of rest.slice(0, 2)) {
    const bound = entryField(stmt, entry);
    if (!bound) break;
    if (bound.field === "key" && !key) key = bound.v;
    else if (bound.field === "value" && !value) value = bound.v;
    else break;
    consumed++;
  }

  const remaining = rest.slice(consumed);
  // The entry and the iterator have no counterpart in the rewritten form
  if (remaining.some((stmt) => mentionsLocal(stmt, entry) || mentionsLocal(stmt, iterator))) {
    return undefined;
  }

  return {
    collection: init.callee.target,
    ...(key ? { key } : {}),
    ...(value ? { value } : {}),
    body: remaining,
  };
}

export function transformIteratorProtocol(fields: IteratorProtocolFields, ctx: PatternContext): Node {
  const bind = (v: TypedVar | undefined): Pattern => (v ? pVar(ctx.toElixirName(v.name)) : pWildcard);
  const body = fromStatements(fields.body.map((stmt) => ctx.buildExpr(stmt)));
  return eRemote("Enum", "each", [
    ctx.buildExpr(fields.collection),
    eLambda([pTuple([bind(fields.key), bind(fields.value)])], body),
  ]);
}

export const iteratorProtocol: IdiomPattern<IteratorProtocolFields> = {
  name: "iterator-protocol",
  matches: isIteratorProtocol,
  extract: extractIteratorProtocol,
  transform: transformIteratorProtocol,
};
