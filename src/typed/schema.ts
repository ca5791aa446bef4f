/**
 * Zod schemas for the typed input tree.
 *
 * The front-end hands over its tree as JSON. The interfaces live in
 * typed-ast.ts; recursive schemas are annotated with z.ZodType<T> and
 * refer to each other through getters.
 */

import { z } from "zod/v4";
import { ErrorCodes, LoweringError } from "../errors";
import type {
  TArrayAccess,
  TArrayDecl,
  TBinop,
  TBlock,
  TCall,
  TConst,
  TField,
  TFunction,
  TIf,
  TLocal,
  TObjectDecl,
  TParen,
  TReturn,
  TUnop,
  TVarDecl,
  TWhile,
  TypedExpr,
  TypedVar,
  TypeRef,
} from "./typed-ast";

export const TypeRefSchema: z.ZodType<TypeRef> = z.object({
  name: z.string(),
  get params() {
    return z.array(TypeRefSchema).optional();
  },
});

export const TypedVarSchema: z.ZodType<TypedVar> = z.object({
  id: z.number().int(),
  name: z.string(),
  type: TypeRefSchema,
});

const TConstSchema: z.ZodType<TConst> = z.object({
  tag: z.literal("const"),
  type: TypeRefSchema,
  value: z.union([z.number(), z.string(), z.boolean(), z.null()]),
  float: z.boolean().optional(),
});

const TLocalSchema: z.ZodType<TLocal> = z.object({
  tag: z.literal("local"),
  type: TypeRefSchema,
  v: TypedVarSchema,
});

const TVarDeclSchema: z.ZodType<TVarDecl> = z.object({
  tag: z.literal("var"),
  type: TypeRefSchema,
  v: TypedVarSchema,
  get init() {
    return TypedExprSchema.optional();
  },
});

const TFieldSchema: z.ZodType<TField> = z.object({
  tag: z.literal("field"),
  type: TypeRefSchema,
  get target() {
    return TypedExprSchema;
  },
  name: z.string(),
});

const TArrayAccessSchema: z.ZodType<TArrayAccess> = z.object({
  tag: z.literal("array"),
  type: TypeRefSchema,
  get target() {
    return TypedExprSchema;
  },
  get index() {
    return TypedExprSchema;
  },
});

const TCallSchema: z.ZodType<TCall> = z.object({
  tag: z.literal("call"),
  type: TypeRefSchema,
  get callee() {
    return TypedExprSchema;
  },
  get args() {
    return z.array(TypedExprSchema);
  },
});

const TBinopSchema: z.ZodType<TBinop> = z.object({
  tag: z.literal("binop"),
  type: TypeRefSchema,
  op: z.string(),
  get left() {
    return TypedExprSchema;
  },
  get right() {
    return TypedExprSchema;
  },
});

const TUnopSchema: z.ZodType<TUnop> = z.object({
  tag: z.literal("unop"),
  type: TypeRefSchema,
  op: z.enum(["++", "--", "-", "!", "~"]),
  postfix: z.boolean(),
  get operand() {
    return TypedExprSchema;
  },
});

const TIfSchema: z.ZodType<TIf> = z.object({
  tag: z.literal("if"),
  type: TypeRefSchema,
  get cond() {
    return TypedExprSchema;
  },
  get then() {
    return TypedExprSchema;
  },
  get else() {
    return TypedExprSchema.optional();
  },
});

const TWhileSchema: z.ZodType<TWhile> = z.object({
  tag: z.literal("while"),
  type: TypeRefSchema,
  get cond() {
    return TypedExprSchema;
  },
  get body() {
    return TypedExprSchema;
  },
  doWhile: z.boolean(),
});

const TBlockSchema: z.ZodType<TBlock> = z.object({
  tag: z.literal("block"),
  type: TypeRefSchema,
  get exprs() {
    return z.array(TypedExprSchema);
  },
});

const TParenSchema: z.ZodType<TParen> = z.object({
  tag: z.literal("paren"),
  type: TypeRefSchema,
  get expr() {
    return TypedExprSchema;
  },
});

const TArrayDeclSchema: z.ZodType<TArrayDecl> = z.object({
  tag: z.literal("arrayDecl"),
  type: TypeRefSchema,
  get elements() {
    return z.array(TypedExprSchema);
  },
});

const TObjectDeclSchema: z.ZodType<TObjectDecl> = z.object({
  tag: z.literal("objectDecl"),
  type: TypeRefSchema,
  get fields() {
    return z.array(z.object({ name: z.string(), expr: TypedExprSchema }));
  },
});

const TReturnSchema: z.ZodType<TReturn> = z.object({
  tag: z.literal("return"),
  type: TypeRefSchema,
  get value() {
    return TypedExprSchema.optional();
  },
});

const TFunctionSchema: z.ZodType<TFunction> = z.object({
  tag: z.literal("function"),
  type: TypeRefSchema,
  params: z.array(TypedVarSchema),
  get body() {
    return TypedExprSchema;
  },
});

export const TypedExprSchema: z.ZodType<TypedExpr> = z.union([
  TConstSchema,
  TLocalSchema,
  TVarDeclSchema,
  TFieldSchema,
  TArrayAccessSchema,
  TCallSchema,
  TBinopSchema,
  TUnopSchema,
  TIfSchema,
  TWhileSchema,
  TBlockSchema,
  TParenSchema,
  TArrayDeclSchema,
  TObjectDeclSchema,
  TReturnSchema,
  TFunctionSchema,
]);

/**
 * Validate a JSON document from the front-end.
 * Throws LoweringError (InvalidInput) listing every issue found.
 */
export function parseTypedExpr(json: unknown): TypedExpr {
  const parsed = TypedExprSchema.safeParse(json);
  if (parsed.success) return parsed.data;

  const error = new LoweringError(ErrorCodes.InvalidInput, "Typed tree does not match the input contract", "input");
  for (const issue of parsed.error.issues) {
    const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "<root>";
    error.addNote(`${path}: ${issue.message}`);
  }
  throw error;
}
