/**
 * Test helpers: typed-tree builders and a small reference lowering used as
 * the PatternContext collaborator.
 */

import type { BinaryOp, Node } from "../src/ast/elixir-ast";
import {
  eAccess,
  eApplyFn,
  eAtom,
  eBinary,
  eBlock,
  eBool,
  eField,
  eFloat,
  eIf,
  eInt,
  eLambda,
  eList,
  eMap,
  eMatch,
  eNil,
  eParen,
  eRemote,
  eString,
  eUnary,
  eVar,
  eWhile,
  pVar,
} from "../src/ast/elixir-ast";
import type { PatternContext } from "../src/patterns";
import type {
  ConstValue,
  TBinop,
  TBlock,
  TCall,
  TConst,
  TField,
  TIf,
  TLocal,
  TUnop,
  TUnopOp,
  TVarDecl,
  TWhile,
  TypedExpr,
  TypedVar,
  TypeRef,
} from "../src/typed/typed-ast";
import { VOID } from "../src/typed/typed-ast";

export const DYN: TypeRef = { name: "Dynamic" };

// ============================================
// Typed tree builders
// ============================================

export const tv = (id: number, name: string, type: TypeRef = DYN): TypedVar => ({ id, name, type });

export const local = (v: TypedVar): TLocal => ({ tag: "local", type: v.type, v });

export const decl = (v: TypedVar, init?: TypedExpr): TVarDecl => ({
  tag: "var",
  type: VOID,
  v,
  ...(init ? { init } : {}),
});

export const konst = (value: ConstValue, float?: boolean): TConst => ({
  tag: "const",
  type: DYN,
  value,
  ...(float ? { float } : {}),
});

export const field = (target: TypedExpr, name: string): TField => ({ tag: "field", type: DYN, target, name });

export const index = (target: TypedExpr, idx: TypedExpr): TypedExpr => ({
  tag: "array",
  type: DYN,
  target,
  index: idx,
});

export const call = (callee: TypedExpr, args: TypedExpr[]): TCall => ({ tag: "call", type: DYN, callee, args });

export const method = (target: TypedExpr, name: string, args: TypedExpr[]): TCall => call(field(target, name), args);

export const binop = (op: string, left: TypedExpr, right: TypedExpr): TBinop => ({
  tag: "binop",
  type: DYN,
  op,
  left,
  right,
});

export const unop = (op: TUnopOp, operand: TypedExpr, postfix = false): TUnop => ({
  tag: "unop",
  type: DYN,
  op,
  postfix,
  operand,
});

export const tif = (cond: TypedExpr, thenExpr: TypedExpr, elseExpr?: TypedExpr): TIf => ({
  tag: "if",
  type: DYN,
  cond,
  then: thenExpr,
  ...(elseExpr ? { else: elseExpr } : {}),
});

export const twhile = (cond: TypedExpr, body: TypedExpr, doWhile = false): TWhile => ({
  tag: "while",
  type: VOID,
  cond,
  body,
  doWhile,
});

export const block = (exprs: TypedExpr[]): TBlock => ({ tag: "block", type: DYN, exprs });

// ============================================
// Reference lowering
// ============================================

/** fooBar -> foo_bar */
export function snakeCase(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase();
}

const BINARY_OPS: Record<string, BinaryOp> = {
  "+": "+",
  "-": "-",
  "*": "*",
  "/": "/",
  "%": "%",
  "==": "==",
  "!=": "!=",
  "<": "<",
  ">": ">",
  "<=": "<=",
  ">=": ">=",
  "&&": "&&",
  "||": "||",
  "&": "&",
  "|": "|",
  "^": "^",
  "<<": "<<",
  ">>": ">>",
  ">>>": ">>>",
};

function constNode(c: TConst): Node {
  if (c.value === null) return eNil;
  if (typeof c.value === "string") return eString(c.value);
  if (typeof c.value === "boolean") return eBool(c.value);
  return c.float ? eFloat(c.value) : eInt(c.value);
}

export function buildExpr(expr: TypedExpr): Node {
  switch (expr.tag) {
    case "const":
      return constNode(expr);
    case "local":
      return eVar(snakeCase(expr.v.name), expr.v.id);
    case "var":
      return eMatch(pVar(snakeCase(expr.v.name), expr.v.id), expr.init ? buildExpr(expr.init) : eNil);
    case "field":
      return eField(buildExpr(expr.target), expr.name);
    case "array":
      return eAccess(buildExpr(expr.target), buildExpr(expr.index));
    case "call":
      if (expr.callee.tag === "field") {
        return eRemote(buildExpr(expr.callee.target), expr.callee.name, expr.args.map(buildExpr));
      }
      return eApplyFn(buildExpr(expr.callee), expr.args.map(buildExpr));
    case "binop": {
      const op = BINARY_OPS[expr.op];
      if (!op) throw new Error(`reference lowering has no operator ${expr.op}`);
      return eBinary(op, buildExpr(expr.left), buildExpr(expr.right));
    }
    case "unop":
      switch (expr.op) {
        case "++":
          return eUnary("increment", buildExpr(expr.operand), !expr.postfix);
        case "--":
          return eUnary("decrement", buildExpr(expr.operand), !expr.postfix);
        case "!":
          return eUnary("not", buildExpr(expr.operand));
        default:
          return eUnary(expr.op, buildExpr(expr.operand));
      }
    case "if":
      return eIf(buildExpr(expr.cond), buildExpr(expr.then), expr.else ? buildExpr(expr.else) : undefined);
    case "while":
      return eWhile(buildExpr(expr.cond), buildExpr(expr.body));
    case "block":
      return eBlock(expr.exprs.map(buildExpr));
    case "paren":
      return eParen(buildExpr(expr.expr));
    case "arrayDecl":
      return eList(expr.elements.map(buildExpr));
    case "objectDecl":
      return eMap(expr.fields.map((f) => ({ key: eAtom(f.name), value: buildExpr(f.expr) })));
    case "return":
      return expr.value ? buildExpr(expr.value) : eNil;
    case "function":
      return eLambda(
        expr.params.map((p) => pVar(snakeCase(p.name), p.id)),
        buildExpr(expr.body)
      );
  }
}

export const ctx: PatternContext = {
  buildExpr,
  toElixirName: snakeCase,
};
