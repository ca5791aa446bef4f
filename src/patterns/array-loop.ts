/**
 * Unrolled map/filter loop.
 *
 *   while (i < src.length) {
 *     var e = src[i];
 *     ++i;
 *     res.push(value);            // or: if (cond) res.push(value);
 *   }
 *
 * becomes `res = Enum.map(...)`, `res = Enum.filter(...)` or a `for`
 * comprehension with a filter.
 */

import type { Node } from "../ast/elixir-ast";
import { eAssign, eFor, eLambda, eRemote, pVar } from "../ast/elixir-ast";
import type { TypedExpr, TypedVar } from "../typed/typed-ast";
import { isLocalOf, isMethodCall, mentionsLocal, sameTypedExpr, unwrapParens } from "../typed/typed-ast";
import type { IdiomPattern, PatternContext } from "./context";

export interface ArrayLoopFields {
  result: TypedVar;
  element: TypedVar;
  source: TypedExpr;
  value: TypedExpr;
  filter?: TypedExpr;
}

/** `res.push(value)` with `res` a local */
function pushOf(expr: TypedExpr): { result: TypedVar; value: TypedExpr } | undefined {
  const e = unwrapParens(expr);
  if (!isMethodCall(e, "push", 1)) return undefined;
  const receiver = unwrapParens(e.callee.target);
  if (receiver.tag !== "local") return undefined;
  return { result: receiver.v, value: e.args[0] };
}

function isIncrementOf(expr: TypedExpr, index: TypedVar): boolean {
  const e = unwrapParens(expr);
  return e.tag === "unop" && e.op === "++" && isLocalOf(e.operand, index);
}

export function isArrayLoop(expr: TypedExpr): boolean {
  return extractArrayLoop(expr) !== undefined;
}

export function extractArrayLoop(expr: TypedExpr): ArrayLoopFields | undefined {
  if (expr.tag !== "while" || expr.doWhile) return undefined;

  // i < src.length
  const cond = unwrapParens(expr.cond);
  if (cond.tag !== "binop" || cond.op !== "<") return undefined;
  const index = unwrapParens(cond.left);
  const length = unwrapParens(cond.right);
  if (index.tag !== "local" || length.tag !== "field" || length.name !== "length") return undefined;
  const source = length.target;

  const body = unwrapParens(expr.body);
  if (body.tag !== "block" || body.exprs.length !== 3) return undefined;
  const [decl, step, emit] = body.exprs;

  // var e = src[i]
  if (decl.tag !== "var" || !decl.init) return undefined;
  const read = unwrapParens(decl.init);
  if (read.tag !== "array" || !sameTypedExpr(read.target, source) || !isLocalOf(read.index, index.v)) {
    return undefined;
  }

  if (!isIncrementOf(step, index.v)) return undefined;

  let push = pushOf(emit);
  let filter: TypedExpr | undefined;
  if (!push) {
    const guarded = unwrapParens(emit);
    if (guarded.tag !== "if" || guarded.else) return undefined;
    push = pushOf(guarded.then);
    filter = guarded.cond;
  }
  if (!push) return undefined;

  // The index has no counterpart inside Enum.map
  if (mentionsLocal(push.value, index.v)) return undefined;
  if (filter && mentionsLocal(filter, index.v)) return undefined;

  return {
    result: push.result,
    element: decl.v,
    source,
    value: push.value,
    ...(filter ? { filter } : {}),
  };
}

export function transformArrayLoop(fields: ArrayLoopFields, ctx: PatternContext): Node {
  const result = ctx.toElixirName(fields.result.name);
  const element = ctx.toElixirName(fields.element.name);
  const source = ctx.buildExpr(fields.source);

  if (!fields.filter) {
    const mapper = eLambda([pVar(element)], ctx.buildExpr(fields.value));
    return eAssign(result, eRemote("Enum", "map", [source, mapper]));
  }

  const filter = ctx.buildExpr(fields.filter);
  if (isLocalOf(fields.value, fields.element)) {
    return eAssign(result, eRemote("Enum", "filter", [source, eLambda([pVar(element)], filter)]));
  }

  return eAssign(
    result,
    eFor([{ pattern: pVar(element), source }], ctx.buildExpr(fields.value), [filter])
  );
}

export const arrayLoop: IdiomPattern<ArrayLoopFields> = {
  name: "array-loop",
  matches: isArrayLoop,
  extract: extractArrayLoop,
  transform: transformArrayLoop,
};
