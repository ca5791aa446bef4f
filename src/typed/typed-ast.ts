/**
 * Typed input tree
 *
 * The shape produced by the upstream front-end. Every expression carries its
 * resolved type, and every local variable a stable integer id. The lowering
 * core reads this tree but never re-checks the types.
 */

export interface TypeRef {
  name: string;
  params?: TypeRef[];
}

/** A local binding: one id per declaration, shared by every reference */
export interface TypedVar {
  id: number;
  name: string;
  type: TypeRef;
}

export type TypedExpr =
  | TConst
  | TLocal
  | TVarDecl
  | TField
  | TArrayAccess
  | TCall
  | TBinop
  | TUnop
  | TIf
  | TWhile
  | TBlock
  | TParen
  | TArrayDecl
  | TObjectDecl
  | TReturn
  | TFunction;

export type ConstValue = number | string | boolean | null;

/** Literal; `float` distinguishes 1.0 from 1 */
export interface TConst {
  tag: "const";
  type: TypeRef;
  value: ConstValue;
  float?: boolean;
}

export interface TLocal {
  tag: "local";
  type: TypeRef;
  v: TypedVar;
}

/** var name = init */
export interface TVarDecl {
  tag: "var";
  type: TypeRef;
  v: TypedVar;
  init?: TypedExpr;
}

export interface TField {
  tag: "field";
  type: TypeRef;
  target: TypedExpr;
  name: string;
}

/** target[index] */
export interface TArrayAccess {
  tag: "array";
  type: TypeRef;
  target: TypedExpr;
  index: TypedExpr;
}

export interface TCall {
  tag: "call";
  type: TypeRef;
  callee: TypedExpr;
  args: TypedExpr[];
}

export interface TBinop {
  tag: "binop";
  type: TypeRef;
  op: string;
  left: TypedExpr;
  right: TypedExpr;
}

export type TUnopOp = "++" | "--" | "-" | "!" | "~";

export interface TUnop {
  tag: "unop";
  type: TypeRef;
  op: TUnopOp;
  postfix: boolean;
  operand: TypedExpr;
}

export interface TIf {
  tag: "if";
  type: TypeRef;
  cond: TypedExpr;
  then: TypedExpr;
  else?: TypedExpr;
}

export interface TWhile {
  tag: "while";
  type: TypeRef;
  cond: TypedExpr;
  body: TypedExpr;
  doWhile: boolean;
}

export interface TBlock {
  tag: "block";
  type: TypeRef;
  exprs: TypedExpr[];
}

export interface TParen {
  tag: "paren";
  type: TypeRef;
  expr: TypedExpr;
}

export interface TArrayDecl {
  tag: "arrayDecl";
  type: TypeRef;
  elements: TypedExpr[];
}

export interface TObjectDecl {
  tag: "objectDecl";
  type: TypeRef;
  fields: { name: string; expr: TypedExpr }[];
}

export interface TReturn {
  tag: "return";
  type: TypeRef;
  value?: TypedExpr;
}

export interface TFunction {
  tag: "function";
  type: TypeRef;
  params: TypedVar[];
  body: TypedExpr;
}

// ============================================
// Helpers
// ============================================

export const VOID: TypeRef = { name: "Void" };

/** Strip any number of parentheses. */
export function unwrapParens(expr: TypedExpr): TypedExpr {
  let current = expr;
  while (current.tag === "paren") current = current.expr;
  return current;
}

export function isLocalOf(expr: TypedExpr, v: TypedVar): boolean {
  const e = unwrapParens(expr);
  return e.tag === "local" && e.v.id === v.id;
}

export function isNullConst(expr: TypedExpr): boolean {
  const e = unwrapParens(expr);
  return e.tag === "const" && e.value === null;
}

/** `target.method(args...)` */
export function isMethodCall(expr: TypedExpr, method: string, arity: number): expr is TCall & { callee: TField } {
  return (
    expr.tag === "call" &&
    expr.callee.tag === "field" &&
    expr.callee.name === method &&
    expr.args.length === arity
  );
}

/**
 * Structural equality. Locals compare by id, so two references to the same
 * binding are equal even when the names differ.
 */
export function sameTypedExpr(a: TypedExpr, b: TypedExpr): boolean {
  const x = unwrapParens(a);
  const y = unwrapParens(b);
  if (x.tag === "local" && y.tag === "local") return x.v.id === y.v.id;
  if (x.tag === "const" && y.tag === "const") return x.value === y.value;
  if (x.tag === "field" && y.tag === "field") return x.name === y.name && sameTypedExpr(x.target, y.target);
  if (x.tag === "array" && y.tag === "array") {
    return sameTypedExpr(x.target, y.target) && sameTypedExpr(x.index, y.index);
  }
  return false;
}

/** Null test of a local: `v == null` or `v != null`, either operand order */
export function nullTestOf(expr: TypedExpr, v: TypedVar): "==" | "!=" | undefined {
  const e = unwrapParens(expr);
  if (e.tag !== "binop" || (e.op !== "==" && e.op !== "!=")) return undefined;
  const matches =
    (isLocalOf(e.left, v) && isNullConst(e.right)) ||
    (isNullConst(e.left) && isLocalOf(e.right, v));
  return matches ? e.op : undefined;
}

/** Direct sub-expressions of `expr`, in source order. */
export function typedChildren(expr: TypedExpr): TypedExpr[] {
  switch (expr.tag) {
    case "const":
    case "local":
      return [];
    case "var":
      return expr.init ? [expr.init] : [];
    case "field":
      return [expr.target];
    case "array":
      return [expr.target, expr.index];
    case "call":
      return [expr.callee, ...expr.args];
    case "binop":
      return [expr.left, expr.right];
    case "unop":
      return [expr.operand];
    case "if":
      return expr.else ? [expr.cond, expr.then, expr.else] : [expr.cond, expr.then];
    case "while":
      return [expr.cond, expr.body];
    case "block":
      return expr.exprs;
    case "paren":
      return [expr.expr];
    case "arrayDecl":
      return expr.elements;
    case "objectDecl":
      return expr.fields.map((f) => f.expr);
    case "return":
      return expr.value ? [expr.value] : [];
    case "function":
      return [expr.body];
    default: {
      const _exhaustive: never = expr;
      return _exhaustive;
    }
  }
}

/** True if `v` is referenced or declared anywhere under `expr`. */
export function mentionsLocal(expr: TypedExpr, v: TypedVar): boolean {
  if ((expr.tag === "local" || expr.tag === "var") && expr.v.id === v.id) return true;
  return typedChildren(expr).some((child) => mentionsLocal(child, v));
}
