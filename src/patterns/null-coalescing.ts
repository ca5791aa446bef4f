/**
 * Null coalescing: `{ var tmp = source; tmp ?? fallback }`
 */

import type { Node } from "../ast/elixir-ast";
import { eBinary, eCase, eIf, eNil, eVar, pLit, pVar } from "../ast/elixir-ast";
import type { TypedExpr, TypedVar } from "../typed/typed-ast";
import { isLocalOf, unwrapParens } from "../typed/typed-ast";
import type { IdiomPattern, PatternContext } from "./context";

export interface NullCoalescingFields {
  temp: TypedVar;
  source: TypedExpr;
  fallback: TypedExpr;
}

export function isNullCoalescing(expr: TypedExpr): boolean {
  return extractNullCoalescing(expr) !== undefined;
}

export function extractNullCoalescing(expr: TypedExpr): NullCoalescingFields | undefined {
  if (expr.tag !== "block" || expr.exprs.length !== 2) return undefined;
  const [decl, last] = expr.exprs;
  if (decl.tag !== "var" || !decl.init) return undefined;

  const coalesce = unwrapParens(last);
  if (coalesce.tag !== "binop" || coalesce.op !== "??") return undefined;
  if (!isLocalOf(coalesce.left, decl.v)) return undefined;

  return { temp: decl.v, source: decl.init, fallback: coalesce.right };
}

/**
 * A variable or field access can be read twice, so it becomes an inline
 * `if`. Anything else is evaluated once through `case`.
 */
export function transformNullCoalescing(fields: NullCoalescingFields, ctx: PatternContext): Node {
  const source = ctx.buildExpr(fields.source);
  const fallback = ctx.buildExpr(fields.fallback);

  if (source.tag === "var" || source.tag === "field") {
    return eIf(eBinary("!=", source, eNil), source, fallback);
  }

  const tmp = ctx.toElixirName(fields.temp.name);
  return eCase(source, [
    { pattern: pLit(eNil), body: fallback },
    { pattern: pVar(tmp), body: eVar(tmp) },
  ]);
}

export const nullCoalescing: IdiomPattern<NullCoalescingFields> = {
  name: "null-coalescing",
  matches: isNullCoalescing,
  extract: extractNullCoalescing,
  transform: transformNullCoalescing,
};
