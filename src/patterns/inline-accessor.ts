/**
 * Inlined accessor expansion.
 *
 * The front-end inlines a null-safe accessor as
 *
 *   { var tmp = source; if (tmp != null) valueBranch else nullBranch }
 *
 * (or the `==` form with the branches swapped). Lowered to
 *
 *   case source do
 *     nil -> nullBranch
 *     tmp -> valueBranch
 *   end
 */

import type { Node } from "../ast/elixir-ast";
import { eCase, eNil, pLit, pVar } from "../ast/elixir-ast";
import type { TypedExpr, TypedVar } from "../typed/typed-ast";
import { nullTestOf, unwrapParens } from "../typed/typed-ast";
import type { IdiomPattern, PatternContext } from "./context";

export interface InlineAccessorFields {
  temp: TypedVar;
  source: TypedExpr;
  valueBranch?: TypedExpr;
  nullBranch?: TypedExpr;
}

/** A null-guard conditional testing exactly `temp`. */
function guardOf(expr: TypedExpr, temp: TypedVar): { op: "==" | "!="; then: TypedExpr; else?: TypedExpr } | undefined {
  const e = unwrapParens(expr);
  if (e.tag !== "if") return undefined;
  const op = nullTestOf(e.cond, temp);
  if (!op) return undefined;
  return { op, then: e.then, ...(e.else ? { else: e.else } : {}) };
}

export function isInlineAccessor(expr: TypedExpr): boolean {
  return extractInlineAccessor(expr) !== undefined;
}

export function extractInlineAccessor(expr: TypedExpr): InlineAccessorFields | undefined {
  if (expr.tag !== "block" || expr.exprs.length !== 2) return undefined;
  const [decl, test] = expr.exprs;
  if (decl.tag !== "var" || !decl.init) return undefined;

  const guard = guardOf(test, decl.v);
  if (!guard) return undefined;

  const valueBranch = guard.op === "!=" ? guard.then : guard.else;
  const nullBranch = guard.op === "!=" ? guard.else : guard.then;
  return {
    temp: decl.v,
    source: decl.init,
    ...(valueBranch ? { valueBranch } : {}),
    ...(nullBranch ? { nullBranch } : {}),
  };
}

export function transformInlineAccessor(fields: InlineAccessorFields, ctx: PatternContext): Node {
  const source = ctx.buildExpr(fields.source);
  const tmp = ctx.toElixirName(fields.temp.name);
  return eCase(source, [
    { pattern: pLit(eNil), body: fields.nullBranch ? ctx.buildExpr(fields.nullBranch) : eNil },
    { pattern: pVar(tmp), body: fields.valueBranch ? ctx.buildExpr(fields.valueBranch) : eNil },
  ]);
}

export const inlineAccessor: IdiomPattern<InlineAccessorFields> = {
  name: "inline-accessor",
  matches: isInlineAccessor,
  extract: extractInlineAccessor,
  transform: transformInlineAccessor,
};

// ============================================================================
// Two accessors compared in one expression
// ============================================================================

/**
 *   { var t1 = a; var t2 = b; (t1 guard) <cmp> (t2 guard) }
 *
 * Not reconstructed. The fallback lowers only the final comparison and drops
 * the two temporaries, so any side effect in `a` or `b` is lost. Replacing
 * this needs a real two-binding reconstruction with its own tests.
 */
export interface MultiTempAccessorFields {
  temps: [TypedVar, TypedVar];
  final: TypedExpr;
}

const COMPARISON_OPS = new Set(["==", "!=", "<", ">", "<=", ">="]);

export function isMultiTempAccessor(expr: TypedExpr): boolean {
  return extractMultiTempAccessor(expr) !== undefined;
}

export function extractMultiTempAccessor(expr: TypedExpr): MultiTempAccessorFields | undefined {
  if (expr.tag !== "block" || expr.exprs.length !== 3) return undefined;
  const [first, second, final] = expr.exprs;
  if (first.tag !== "var" || !first.init || second.tag !== "var" || !second.init) return undefined;

  const cmp = unwrapParens(final);
  if (cmp.tag !== "binop" || !COMPARISON_OPS.has(cmp.op)) return undefined;
  if (!guardOf(cmp.left, first.v) || !guardOf(cmp.right, second.v)) return undefined;

  return { temps: [first.v, second.v], final };
}

export function transformMultiTempAccessor(fields: MultiTempAccessorFields, ctx: PatternContext): Node {
  return ctx.buildExpr(fields.final);
}

export const multiTempAccessor: IdiomPattern<MultiTempAccessorFields> = {
  name: "multi-temp-accessor",
  matches: isMultiTempAccessor,
  extract: extractMultiTempAccessor,
  transform: transformMultiTempAccessor,
};
