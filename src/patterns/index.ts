/**
 * Pattern library entry point.
 *
 * Each idiom is lowered predicate-first: a failed predicate is a plain miss,
 * while an extractor failing after its predicate accepted the subtree means
 * the two disagree and is reported as an internal error.
 */

import type { Node } from "../ast/elixir-ast";
import { InternalCompilerError } from "../errors";
import type { TypedExpr } from "../typed/typed-ast";
import { arrayLoop } from "./array-loop";
import type { IdiomPattern, PatternContext } from "./context";
import { inlineAccessor, multiTempAccessor } from "./inline-accessor";
import { iteratorProtocol } from "./iterator-protocol";
import { nullCoalescing } from "./null-coalescing";

export type { IdiomPattern, PatternContext } from "./context";
export * from "./array-loop";
export * from "./inline-accessor";
export * from "./iterator-protocol";
export * from "./null-coalescing";

/**
 * Run one pattern. Returns undefined when the predicate rejects `expr`.
 */
export function lowerWith<F>(pattern: IdiomPattern<F>, expr: TypedExpr, ctx: PatternContext): Node | undefined {
  if (!pattern.matches(expr)) return undefined;
  const fields = pattern.extract(expr);
  if (fields === undefined) {
    throw InternalCompilerError.extractionDefect(pattern.name, summarize(expr));
  }
  return pattern.transform(fields, ctx);
}

function summarize(expr: TypedExpr): string {
  switch (expr.tag) {
    case "block":
      return `block of ${expr.exprs.length}`;
    case "while":
      return expr.doWhile ? "do-while" : "while";
    case "call":
      return `call with ${expr.args.length} args`;
    default:
      return expr.tag;
  }
}

export const lowerInlineAccessor = (expr: TypedExpr, ctx: PatternContext): Node | undefined =>
  lowerWith(inlineAccessor, expr, ctx);

export const lowerNullCoalescing = (expr: TypedExpr, ctx: PatternContext): Node | undefined =>
  lowerWith(nullCoalescing, expr, ctx);

export const lowerArrayLoop = (expr: TypedExpr, ctx: PatternContext): Node | undefined =>
  lowerWith(arrayLoop, expr, ctx);

export const lowerIteratorProtocol = (expr: TypedExpr, ctx: PatternContext): Node | undefined =>
  lowerWith(iteratorProtocol, expr, ctx);

export const lowerMultiTempAccessor = (expr: TypedExpr, ctx: PatternContext): Node | undefined =>
  lowerWith(multiTempAccessor, expr, ctx);

type AnyPattern = (expr: TypedExpr, ctx: PatternContext) => Node | undefined;

/** Order matters: the first pattern to accept the subtree wins. */
const PATTERNS: AnyPattern[] = [
  lowerInlineAccessor,
  lowerNullCoalescing,
  lowerArrayLoop,
  lowerIteratorProtocol,
  lowerMultiTempAccessor,
];

/**
 * Lower `expr` through the first idiom that recognizes it, or return
 * undefined so the caller falls back to node-by-node lowering.
 */
export function lowerIdiom(expr: TypedExpr, ctx: PatternContext): Node | undefined {
  for (const lower of PATTERNS) {
    const node = lower(expr, ctx);
    if (node) return node;
  }
  return undefined;
}
