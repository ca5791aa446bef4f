/**
 * Collaborators a pattern transformer needs from the tree builder.
 */

import type { Node } from "../ast/elixir-ast";
import type { TypedExpr } from "../typed/typed-ast";

export interface PatternContext {
  /** Lower a typed sub-expression to an Elixir node */
  buildExpr(expr: TypedExpr): Node;
  /** Map a source identifier to a valid Elixir variable name */
  toElixirName(name: string): string;
}

/**
 * A recognizer for one mechanically generated idiom.
 *
 * `matches` and `extract` must agree: when `matches` returns true,
 * `extract` returns fields.
 */
export interface IdiomPattern<Fields> {
  name: string;
  matches(expr: TypedExpr): boolean;
  extract(expr: TypedExpr): Fields | undefined;
  transform(fields: Fields, ctx: PatternContext): Node;
}
